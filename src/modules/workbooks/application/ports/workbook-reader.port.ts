import type { CellGrid } from '@/modules/workbooks/domain/cell-grid';
import type { CellValue } from '@/modules/workbooks/domain/cell-value';

export interface OpenWorkbookBufferParams {
  buffer: Buffer;
  originalName: string;
  mimeType?: string;
}

export interface OpenedWorkbook {
  sheetNames(): string[];
  /** `undefined` when the workbook has no sheet with that name */
  worksheet(sheetName: string): CellGrid | undefined;
}

export const WORKBOOK_READER = Symbol('WORKBOOK_READER');

/**
 * Decodes workbook files. Implementations throw `WorkbookReadError` for files
 * they cannot read.
 */
export interface WorkbookReaderPort {
  openPath(path: string): OpenedWorkbook;
  openBuffer(params: OpenWorkbookBufferParams): OpenedWorkbook;
  cellToString(value: CellValue): string;
}
