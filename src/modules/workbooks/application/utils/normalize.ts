import { basename } from 'node:path';

export function fileBaseName(originalName: string): string {
  return basename(originalName).replace(/\.[^/.]+$/, '').trim();
}

export function fileExtension(originalName: string): string {
  const match = /\.([^/.\\]+)$/.exec(originalName);
  return match ? match[1].toLowerCase() : '';
}

export function parsePositiveInt(v: unknown, fallback: number): number {
  if (typeof v === 'number') return Number.isSafeInteger(v) && v > 0 ? v : fallback;
  if (typeof v !== 'string' || !/^\d+$/.test(v.trim())) return fallback;
  const n = Number(v.trim());
  return Number.isSafeInteger(n) && n > 0 ? n : fallback;
}
