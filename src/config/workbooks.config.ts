import { registerAs } from '@nestjs/config';
import { parsePositiveInt } from '@/modules/workbooks/application/utils/normalize';

export const DEFAULT_PREVIEW_MAX_ROWS = 100;
export const DEFAULT_UPLOAD_MAX_BYTES = 50 * 1024 * 1024; // 50MB

export const workbooksConfig = registerAs('workbooks', () => ({
  previewMaxRows: parsePositiveInt(process.env.WORKBOOK_PREVIEW_MAX_ROWS, DEFAULT_PREVIEW_MAX_ROWS),
  uploadMaxBytes: parsePositiveInt(process.env.WORKBOOK_UPLOAD_MAX_BYTES, DEFAULT_UPLOAD_MAX_BYTES),
}));
