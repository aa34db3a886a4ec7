import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { workbooksConfig } from '@/config/workbooks.config';
import type { SheetPreview } from '@/modules/workbooks/domain/sheet-preview';
import type { TabularView } from '@/modules/workbooks/domain/tabular-view';

export interface PreviewOptions {
  maxRows?: number;
  includeEmptyRows?: boolean;
}

@Injectable()
export class SheetPreviewService {
  constructor(
    @Inject(workbooksConfig.KEY)
    private readonly config: ConfigType<typeof workbooksConfig>,
  ) {}

  preview(view: TabularView, options: PreviewOptions = {}): SheetPreview {
    const maxRows = options.maxRows ?? this.config.previewMaxRows;
    const includeEmptyRows = options.includeEmptyRows ?? false;

    const preview: SheetPreview = {
      sheetName: view.sheetName ?? null,
      headerRow: view.headerRow,
      firstRow: view.firstRow,
      lastRow: view.lastRow,
      columns: view.columnNames(),
      rows: [],
      skippedEmptyRows: 0,
      truncated: false,
    };

    // Blank rows don't end the sheet; data may follow them.
    for (const row of view.rows()) {
      if (!includeEmptyRows && row.isEmpty()) {
        preview.skippedEmptyRows++;
        continue;
      }
      if (preview.rows.length >= maxRows) {
        preview.truncated = true;
        break;
      }
      preview.rows.push({ rowNumber: row.rowNumber, values: row.toRecord() });
    }

    return preview;
  }
}
