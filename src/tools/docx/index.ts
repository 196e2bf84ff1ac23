/**
 * DOCX Field Filling — Public API
 *
 * Pipeline: unpack → findPlaceholdersInTree / insertPlaceholders →
 * fillFields / fillTableRows → verifyFill → pack.  extractData reads
 * values back out of an unpacked document.  Every step reads and writes the
 * unpacked tree on disk; nothing is held between calls.
 *
 * @module docx
 */

// ── Archive ─────────────────────────────────────────────────────────────────
export { unpack } from './unpack.js';
export { pack, orderEntries } from './pack.js';
export { SofficeValidator, DEFAULT_VALIDATION_TIMEOUT_MS } from './office-validator.js';

// ── Editing ─────────────────────────────────────────────────────────────────
export { XmlEditor } from './editor.js';
export { fillFields, fillParts } from './fill.js';
export { FILL_STRATEGIES, type FillStrategy } from './strategies/index.js';
export { readFieldMapping, parseFieldMapping } from './mapping.js';
export { insertPlaceholders } from './insert-placeholders.js';
export { fillTableRows, fillTable } from './table-rows.js';

// ── Inspection ──────────────────────────────────────────────────────────────
export {
  findPlaceholders,
  findPlaceholdersInTree,
  scanPlaceholders,
  toPlaceholderList,
  writePlaceholderList,
} from './placeholders.js';
export { verifyFill } from './verify.js';
export { extractData, extractFromDocument, renameExtracted } from './extract.js';

// ── Types ───────────────────────────────────────────────────────────────────
export type {
  FieldMapping,
  FillOptions,
  FillResult,
  SkippedField,
  StrategyId,
  UnpackResult,
  PackOptions,
  PackResult,
  ValidationOutcome,
  OfficeCheck,
  OfficeValidator,
  PlaceholderField,
  PlaceholderList,
  InsertPlaceholdersResult,
  VerificationReport,
  TableRecord,
  TableFillResult,
  ExtractedData,
} from './types.js';

// ── Errors ──────────────────────────────────────────────────────────────────
export {
  DocxError,
  DocxErrorCode,
  NotAnArchiveError,
  PathTraversalError,
  XmlParseError,
  MissingPartError,
  ValidationUnavailableError,
  TableNotFoundError,
} from './errors.js';
