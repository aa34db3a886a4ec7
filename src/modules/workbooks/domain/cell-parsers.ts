/**
 * Converts the text of a cell. `undefined` means the text is not a valid `T`.
 */
export type CellParser<T> = (raw: string) => T | undefined;

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOAT = /^[+-]?(inf|infinity|nan)$/i;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?)?$/;

function integer(raw: string): number | undefined {
  if (!INTEGER.test(raw)) return undefined;
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : undefined;
}

function float(raw: string): number | undefined {
  if (DECIMAL.test(raw)) return Number(raw);
  if (!SPECIAL_FLOAT.test(raw)) return undefined;

  const negative = raw.startsWith('-');
  if (/nan$/i.test(raw)) return Number.NaN;
  return negative ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
}

function boolean(raw: string): boolean | undefined {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  return undefined;
}

function text(raw: string): string {
  return raw;
}

function isoDate(raw: string): Date | undefined {
  if (!ISO_DATE.test(raw)) return undefined;
  const date = new Date(raw);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

export const cellParsers = {
  integer,
  float,
  boolean,
  text,
  isoDate,
} satisfies Record<string, CellParser<unknown>>;
