export class WorkbookError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No sheet of the workbook has a locatable header. */
export class EmptyWorkbookError extends WorkbookError {
  constructor(readonly filename: string) {
    super(`No data found in '${filename}'`);
  }
}

/** The requested sheet is missing or has no locatable header. */
export class EmptySheetError extends WorkbookError {
  constructor(
    readonly filename: string,
    readonly sheetName: string,
  ) {
    super(`No data found in sheet '${sheetName}' in '${filename}'`);
  }
}

/** The decoder could not read the file (I/O, corrupt or unsupported format). */
export class WorkbookReadError extends WorkbookError {
  constructor(
    readonly filename: string,
    cause: unknown,
  ) {
    super(`Could not read '${filename}': ${describe(cause)}`, { cause });
  }
}

export class RowValueMissingError extends WorkbookError {
  constructor(
    readonly column: string,
    readonly rowNumber: number,
  ) {
    super(`No value for column '${column}' in row ${rowNumber}`);
  }
}

export class RowParseError extends WorkbookError {
  constructor(
    readonly column: string,
    readonly raw: string,
    readonly rowNumber: number,
    readonly expected?: string,
  ) {
    const target = expected ? ` as ${expected}` : '';
    super(`Could not parse '${raw}'${target} for column '${column}' in row ${rowNumber}`);
  }
}

function describe(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
