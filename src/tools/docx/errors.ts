/**
 * DOCX Error Handling
 *
 * Centralised error class, the typed error kinds raised by the
 * unpack / fill / pack pipeline, and an async error-wrapping utility.
 *
 * @module docx/errors
 */

export class DocxError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DocxError';
    Error.captureStackTrace?.(this, DocxError);
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message, code: this.code, context: this.context };
  }
}

export enum DocxErrorCode {
  NOT_AN_ARCHIVE = 'NOT_AN_ARCHIVE',
  PATH_TRAVERSAL = 'PATH_TRAVERSAL',
  XML_PARSE_ERROR = 'XML_PARSE_ERROR',
  MISSING_PART = 'MISSING_PART',
  VALIDATION_UNAVAILABLE = 'VALIDATION_UNAVAILABLE',
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  STRUCTURE_CHANGED = 'STRUCTURE_CHANGED',
  INVALID_MAPPING = 'INVALID_MAPPING',
  INVALID_PATH = 'INVALID_PATH',
  TABLE_NOT_FOUND = 'TABLE_NOT_FOUND',
  NO_TEMPLATE_ROW = 'NO_TEMPLATE_ROW',
  UNPACK_FAILED = 'UNPACK_FAILED',
  FILL_FAILED = 'FILL_FAILED',
  PACK_FAILED = 'PACK_FAILED',
  EXTRACT_FAILED = 'EXTRACT_FAILED',
}

/** The input is not a ZIP container, or lacks the mandatory OOXML parts. */
export class NotAnArchiveError extends DocxError {
  constructor(archivePath: string, reason: string) {
    super(`Not a DOCX archive: ${archivePath} (${reason})`, DocxErrorCode.NOT_AN_ARCHIVE, { archivePath, reason });
    this.name = 'NotAnArchiveError';
  }
}

/** An archive entry would be written outside the destination directory. */
export class PathTraversalError extends DocxError {
  constructor(entryName: string, destination: string) {
    super(
      `Archive entry "${entryName}" resolves outside ${destination}`,
      DocxErrorCode.PATH_TRAVERSAL,
      { entryName, destination }
    );
    this.name = 'PathTraversalError';
  }
}

export class XmlParseError extends DocxError {
  constructor(part: string, detail: string) {
    super(`Malformed XML in ${part}: ${detail}`, DocxErrorCode.XML_PARSE_ERROR, { part, detail });
    this.name = 'XmlParseError';
  }
}

export class MissingPartError extends DocxError {
  constructor(part: string, directory: string) {
    super(`Mandatory part ${part} is missing from ${directory}`, DocxErrorCode.MISSING_PART, { part, directory });
    this.name = 'MissingPartError';
  }
}

export class ValidationUnavailableError extends DocxError {
  constructor(validator: string, reason: string) {
    super(
      `Office validation unavailable (${validator}: ${reason}); pass force to pack without it`,
      DocxErrorCode.VALIDATION_UNAVAILABLE,
      { validator, reason }
    );
    this.name = 'ValidationUnavailableError';
  }
}

export class TableNotFoundError extends DocxError {
  constructor(tableIndex: number, tableCount: number) {
    super(
      `Table ${tableIndex} not found (the document has ${tableCount})`,
      DocxErrorCode.TABLE_NOT_FOUND,
      { tableIndex, tableCount }
    );
    this.name = 'TableNotFoundError';
  }
}

/** Wrap an async operation — re-throws existing DocxErrors, wraps everything else. */
export async function withErrorContext<T>(
  operation: () => Promise<T>,
  errorCode: DocxErrorCode | string,
  context?: Record<string, unknown>
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof DocxError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new DocxError(message, errorCode, {
      ...context,
      originalError: error instanceof Error ? error.stack : String(error),
    });
  }
}
