import { readFileSync } from 'node:fs';
import { Injectable } from '@nestjs/common';
import * as XLSX from 'xlsx';
import { parse as csvParse } from 'csv-parse/sync';
import { CellGrid, type PositionedCell } from '@/modules/workbooks/domain/cell-grid';
import { CellError, type CellValue } from '@/modules/workbooks/domain/cell-value';
import { WorkbookReadError } from '@/modules/workbooks/domain/workbook-errors';
import type {
  OpenedWorkbook,
  OpenWorkbookBufferParams,
  WorkbookReaderPort,
} from '@/modules/workbooks/application/ports/workbook-reader.port';
import { fileBaseName, fileExtension } from '@/modules/workbooks/application/utils/normalize';

const SPREADSHEET_EXTENSIONS = new Set(['xlsx', 'xlsm', 'xlsb', 'xls', 'ods']);

const SPREADSHEET_MIME_TYPES = new Set([
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  'application/vnd.ms-excel',
  'application/vnd.ms-excel.sheet.macroEnabled.12',
  'application/vnd.ms-excel.sheet.binary.macroEnabled.12',
  'application/vnd.oasis.opendocument.spreadsheet',
]);

// BIFF error codes, used when SheetJS gives no formatted text for an error cell
const ERROR_CODES: Record<number, string> = {
  0x00: '#NULL!',
  0x07: '#DIV/0!',
  0x0f: '#VALUE!',
  0x17: '#REF!',
  0x1d: '#NAME?',
  0x24: '#NUM!',
  0x2a: '#N/A',
  0x2b: '#GETTING_DATA',
};

class StaticWorkbook implements OpenedWorkbook {
  constructor(private readonly sheets: Map<string, () => CellGrid>) {}

  sheetNames(): string[] {
    return [...this.sheets.keys()];
  }

  worksheet(sheetName: string): CellGrid | undefined {
    return this.sheets.get(sheetName)?.();
  }
}

/**
 * Reads workbooks with SheetJS and CSV files with csv-parse.
 */
@Injectable()
export class XlsxWorkbookReaderService implements WorkbookReaderPort {
  openPath(path: string): OpenedWorkbook {
    let buffer: Buffer;
    try {
      buffer = readFileSync(path);
    } catch (error) {
      throw new WorkbookReadError(path, error);
    }
    return this.openBuffer({ buffer, originalName: path });
  }

  openBuffer(params: OpenWorkbookBufferParams): OpenedWorkbook {
    const { buffer, originalName, mimeType } = params;
    const extension = fileExtension(originalName);

    if (mimeType === 'text/csv' || extension === 'csv') {
      return this.openCsv(buffer, originalName);
    }

    if ((mimeType && SPREADSHEET_MIME_TYPES.has(mimeType)) || SPREADSHEET_EXTENSIONS.has(extension)) {
      return this.openSpreadsheet(buffer, originalName);
    }

    throw new WorkbookReadError(
      originalName,
      new Error(`Unsupported file format: ${mimeType ?? (extension ? `.${extension}` : 'unknown')}`),
    );
  }

  cellToString(value: CellValue): string {
    if (value === null) return '';
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    if (value instanceof Date) return formatDate(value);
    return value.code;
  }

  private openSpreadsheet(buffer: Buffer, originalName: string): OpenedWorkbook {
    let workbook: XLSX.WorkBook;
    try {
      workbook = XLSX.read(buffer, {
        type: 'buffer',
        cellDates: true,
        cellNF: false,
        cellStyles: false,
      });
    } catch (error) {
      throw new WorkbookReadError(originalName, error);
    }

    const sheets = new Map<string, () => CellGrid>();
    for (const sheetName of workbook.SheetNames) {
      const sheet = workbook.Sheets[sheetName];
      sheets.set(sheetName, () => (sheet ? worksheetGrid(sheet) : CellGrid.empty()));
    }
    return new StaticWorkbook(sheets);
  }

  private openCsv(buffer: Buffer, originalName: string): OpenedWorkbook {
    let records: unknown;
    try {
      records = csvParse(buffer.toString('utf-8'), {
        bom: true,
        relax_column_count: true,
        skip_empty_lines: false,
      });
    } catch (error) {
      throw new WorkbookReadError(originalName, error);
    }

    const cells: PositionedCell[] = [];
    if (Array.isArray(records)) {
      records.forEach((record: unknown, row) => {
        if (!Array.isArray(record)) return;
        record.forEach((field: unknown, col) => {
          if (typeof field === 'string' && field !== '') cells.push({ row, col, value: field });
        });
      });
    }

    const grid = CellGrid.fromCells(cells);
    const sheetName = fileBaseName(originalName) || 'Sheet1';
    return new StaticWorkbook(new Map([[sheetName, () => grid]]));
  }
}

function worksheetGrid(sheet: XLSX.WorkSheet): CellGrid {
  const cells: PositionedCell[] = [];
  for (const address of Object.keys(sheet)) {
    if (address.startsWith('!')) continue;
    const cell: XLSX.CellObject | undefined = sheet[address];
    if (!cell) continue;
    const { r, c } = XLSX.utils.decode_cell(address);
    cells.push({ row: r, col: c, value: toCellValue(cell) });
  }
  return CellGrid.fromCells(cells);
}

export function toCellValue(cell: XLSX.CellObject): CellValue {
  const v = cell.v;
  switch (cell.t) {
    case 'n':
      return typeof v === 'number' ? v : null;
    case 's':
      return v === undefined ? null : String(v);
    case 'b':
      return typeof v === 'boolean' ? v : null;
    case 'd':
      if (v instanceof Date) return v;
      return typeof v === 'string' || typeof v === 'number' ? new Date(v) : null;
    case 'e':
      return new CellError(cell.w ?? (typeof v === 'number' ? ERROR_CODES[v] : undefined) ?? '#ERROR');
    default:
      return null;
  }
}

function formatDate(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  if (date.getHours() === 0 && date.getMinutes() === 0 && date.getSeconds() === 0) {
    return day;
  }
  return `${day} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
