/**
 * Type definitions for the DOCX fill pipeline.
 * Single source of truth for every type used across the DOCX module.
 */

// ═══════════════════════════════════════════════════════════════════════
// Field mapping / fill result
// ═══════════════════════════════════════════════════════════════════════

/** Placeholder-or-label name → replacement value. Iterated in definition order. */
export type FieldMapping = Readonly<Record<string, string>> | ReadonlyMap<string, string>;

export type StrategyId =
    | 'exact_placeholder'
    | 'structured_field'
    | 'label_anchored'
    | 'multi_run'
    | 'table_cell'
    | 'element_id';

export interface SkippedField {
    name: string;
    reason: string;
}

export interface FillResult {
    filled: string[];
    skipped: SkippedField[];
    /** Strategy that succeeded, per filled name. */
    strategies: Record<string, StrategyId>;
    /** Tree-relative paths of the parts rewritten on disk. */
    modifiedParts: string[];
}

export interface FillOptions {
    /** Also fill word/header*.xml and word/footer*.xml. Default true. */
    includeHeadersFooters?: boolean;
}

// ═══════════════════════════════════════════════════════════════════════
// Unpack / pack
// ═══════════════════════════════════════════════════════════════════════

export interface UnpackResult {
    directory: string;
    /** Archive entry names in archive order (directories excluded). */
    entries: string[];
    xmlParts: number;
    binaryParts: number;
}

export type ValidationStatus = 'passed' | 'failed' | 'skipped';

export interface ValidationOutcome {
    status: ValidationStatus;
    message: string;
}

export interface PackResult {
    outputPath: string;
    entries: string[];
    validation: ValidationOutcome;
}

// ═══════════════════════════════════════════════════════════════════════
// Office validator (external collaborator)
// ═══════════════════════════════════════════════════════════════════════

export type OfficeCheck =
    | { kind: 'passed' }
    | { kind: 'failed'; message: string }
    | { kind: 'unavailable'; reason: string };

export interface OfficeValidator {
    readonly name: string;
    check(archivePath: string): Promise<OfficeCheck>;
}

export interface PackOptions {
    /** Pack even when the office validator is unavailable or rejects the archive. */
    force?: boolean;
    validator?: OfficeValidator;
}

// ═══════════════════════════════════════════════════════════════════════
// XML editor
// ═══════════════════════════════════════════════════════════════════════

/** WordprocessingML qualified name, e.g. `w:p`. Resolved by namespace, not prefix. */
export type WordTag = `w:${string}`;

export type NodePredicate =
    | { text: string }
    | { contains: string }
    | { attribute: string; value: string }
    | ((element: Element) => boolean);

/** One w:t node's share of a paragraph's text. */
export interface TextSegment {
    node: Element;
    /** Enclosing w:r, or null for a stray w:t. */
    run: Element | null;
    start: number;
    end: number;
}

/** A literal token located in a paragraph, with the segments it spans. */
export interface TextMatch {
    paragraph: Element;
    start: number;
    end: number;
    segments: TextSegment[];
}

// ═══════════════════════════════════════════════════════════════════════
// Placeholders
// ═══════════════════════════════════════════════════════════════════════

/** Persisted placeholder list file. */
export interface PlaceholderList {
    placeholders: string[];
    count: number;
}

export interface PlaceholderField {
    fieldName: string;
    label: string;
    location: 'below_label' | 'inline';
}

export interface InsertPlaceholdersResult {
    status: 'success' | 'partial' | 'failed';
    inserted: string[];
    failed: string[];
}

// ═══════════════════════════════════════════════════════════════════════
// Table rows
// ═══════════════════════════════════════════════════════════════════════

/** One repeated row: header text → cell value. */
export type TableRecord = Record<string, string>;

export interface TableFillResult {
    tableIndex: number;
    rowsWritten: number;
    /** Header texts of the table, by grid column. */
    columns: string[];
    /** Record keys that match no header, in first-seen order. */
    unknownColumns: string[];
}

// ═══════════════════════════════════════════════════════════════════════
// Extraction
// ═══════════════════════════════════════════════════════════════════════

export interface ExtractedData {
    /** Paragraph texts of the main part, one per line. */
    text: string;
    /** Every table in document order: rows of trimmed cell texts. */
    tables: string[][][];
    /** Content-control alias → current text. */
    structuredFields: Record<string, string>;
    /** First table's header (upper-cased, spaces to underscores) → first data row. */
    tableFields: Record<string, string>;
    /** structuredFields, then tableFields for names not already present. */
    values: Record<string, string>;
}

// ═══════════════════════════════════════════════════════════════════════
// Verification
// ═══════════════════════════════════════════════════════════════════════

export interface VerificationCheck {
    check: string;
    message: string;
}

export interface VerificationReport {
    passed: VerificationCheck[];
    failed: VerificationCheck[];
    warnings: VerificationCheck[];
    valid: boolean;
}

// ═══════════════════════════════════════════════════════════════════════
// Validation snapshot
// ═══════════════════════════════════════════════════════════════════════

export interface BodySnapshot {
    bodyChildCount: number;
    tableCount: number;
    paragraphCount: number;
    signature: string;
}
