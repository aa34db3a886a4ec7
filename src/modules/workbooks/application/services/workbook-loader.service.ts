import type { PathLike } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { TabularView } from '@/modules/workbooks/domain/tabular-view';
import {
  EmptySheetError,
  EmptyWorkbookError,
  WorkbookReadError,
} from '@/modules/workbooks/domain/workbook-errors';
import {
  type OpenedWorkbook,
  WORKBOOK_READER,
  type WorkbookReaderPort,
} from '@/modules/workbooks/application/ports/workbook-reader.port';

export interface LoadUploadParams {
  buffer: Buffer;
  originalName: string;
  mimeType?: string;
  sheetName?: string;
}

@Injectable()
export class WorkbookLoaderService {
  private readonly logger = new Logger(WorkbookLoaderService.name);

  constructor(@Inject(WORKBOOK_READER) private readonly reader: WorkbookReaderPort) {}

  /**
   * View over the first sheet that has a locatable header.
   *
   * @throws EmptyWorkbookError when no sheet has one
   * @throws WorkbookReadError
   */
  fromPath(path: PathLike): TabularView {
    const filename = pathToString(path);
    const workbook = this.decode(filename, () => this.reader.openPath(filename));
    return this.firstSheetWithData(workbook, filename);
  }

  /**
   * @throws EmptySheetError when the sheet is missing or has no locatable header
   * @throws WorkbookReadError
   */
  fromPathWithSheetName(path: PathLike, sheetName: string): TabularView {
    const filename = pathToString(path);
    const workbook = this.decode(filename, () => this.reader.openPath(filename));
    return this.namedSheet(workbook, filename, sheetName);
  }

  fromUpload(params: LoadUploadParams): TabularView {
    const { buffer, originalName, mimeType, sheetName } = params;
    const workbook = this.decode(originalName, () =>
      this.reader.openBuffer({ buffer, originalName, mimeType }),
    );

    if (sheetName === undefined) {
      return this.firstSheetWithData(workbook, originalName);
    }
    return this.namedSheet(workbook, originalName, sheetName);
  }

  private firstSheetWithData(workbook: OpenedWorkbook, filename: string): TabularView {
    for (const sheetName of workbook.sheetNames()) {
      const view = this.locate(workbook, filename, sheetName);
      if (view) return view;
      this.logger.debug(`No header found in sheet "${sheetName}" of ${filename}, trying next`);
    }

    throw new EmptyWorkbookError(filename);
  }

  private namedSheet(workbook: OpenedWorkbook, filename: string, sheetName: string): TabularView {
    const view = this.locate(workbook, filename, sheetName);
    if (!view) throw new EmptySheetError(filename, sheetName);
    return view;
  }

  private locate(workbook: OpenedWorkbook, filename: string, sheetName: string): TabularView | null {
    const grid = this.decode(filename, () => workbook.worksheet(sheetName));
    if (!grid) return null;

    const view = TabularView.fromGrid(grid, (value) => this.reader.cellToString(value), sheetName);
    if (view) {
      this.logger.log(
        `Sheet "${sheetName}" of ${filename}: header on row ${view.headerRow}, data rows ${view.firstRow}-${view.lastRow}`,
      );
    }
    return view;
  }

  private decode<T>(filename: string, run: () => T): T {
    try {
      return run();
    } catch (error) {
      const wrapped = error instanceof WorkbookReadError ? error : new WorkbookReadError(filename, error);
      this.logger.warn(wrapped.message);
      throw wrapped;
    }
  }
}

function pathToString(path: PathLike): string {
  if (typeof path === 'string') return path;
  if (path instanceof URL) return fileURLToPath(path);
  return path.toString();
}
