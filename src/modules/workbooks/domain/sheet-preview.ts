export interface PreviewRow {
  rowNumber: number;
  values: Record<string, string | null>;
}

export interface SheetPreview {
  sheetName: string | null;
  headerRow: number;
  firstRow: number;
  lastRow: number;
  columns: string[];
  rows: PreviewRow[];
  skippedEmptyRows: number;
  truncated: boolean;
}
