/**
 * DOCX constants — shared values used across the module.
 */

// ═══════════════════════════════════════════════════════════════════════
// XML namespaces
// ═══════════════════════════════════════════════════════════════════════

export const NAMESPACES = {
    W: 'http://schemas.openxmlformats.org/wordprocessingml/2006/main',
    R: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
    RELS: 'http://schemas.openxmlformats.org/package/2006/relationships',
    CONTENT_TYPES: 'http://schemas.openxmlformats.org/package/2006/content-types',
    XML: 'http://www.w3.org/XML/1998/namespace',
} as const;

// ═══════════════════════════════════════════════════════════════════════
// File paths
// ═══════════════════════════════════════════════════════════════════════

export const DOCX_PATHS = {
    CONTENT_TYPES: '[Content_Types].xml',
    ROOT_RELS: '_rels/.rels',
    DOCUMENT_XML: 'word/document.xml',
    DOCUMENT_RELS: 'word/_rels/document.xml.rels',
    STYLES_XML: 'word/styles.xml',
    FONT_TABLE_XML: 'word/fontTable.xml',
    NUMBERING_XML: 'word/numbering.xml',
} as const;

/** Parts without which the package is not a word-processing document. */
export const MANDATORY_PARTS: readonly string[] = [
    DOCX_PATHS.CONTENT_TYPES,
    DOCX_PATHS.ROOT_RELS,
    DOCX_PATHS.DOCUMENT_XML,
];

/** Leading entries of a packed archive, in this order. */
export const LEADING_ENTRIES: readonly string[] = [
    DOCX_PATHS.CONTENT_TYPES,
    DOCX_PATHS.ROOT_RELS,
    DOCX_PATHS.DOCUMENT_XML,
];

export const OPTIONAL_PARTS: readonly string[] = [
    DOCX_PATHS.STYLES_XML,
    DOCX_PATHS.FONT_TABLE_XML,
    DOCX_PATHS.NUMBERING_XML,
];

/** Embedded media (images, SVG drawings); always copied byte for byte, never reformatted. */
export const MEDIA_DIR = 'word/media/';

/** Write-then-rename scratch files: `<part>.<pid>.tmp` and `.<stem>.<pid>.tmp.docx`. */
export const SCRATCH_FILE_PATTERN = /\.\d+\.tmp(?:\.docx)?$/;

export const HEADER_PART_PATTERN = /^word\/header(\d*)\.xml$/;
export const FOOTER_PART_PATTERN = /^word\/footer(\d*)\.xml$/;

// ═══════════════════════════════════════════════════════════════════════
// Placeholder syntax
// ═══════════════════════════════════════════════════════════════════════

/** `{{name}}` — no whitespace inside the braces. Global: reset lastIndex or use matchAll. */
export const PLACEHOLDER_PATTERN = /\{\{([A-Za-z0-9_]+)\}\}/g;

export const PLACEHOLDER_NAME_PATTERN = /^[A-Za-z0-9_]+$/;

export function placeholderToken(name: string): string {
    return `{{${name}}}`;
}

// ═══════════════════════════════════════════════════════════════════════
// Text handling
// ═══════════════════════════════════════════════════════════════════════

/** Elements whose text content is significant, whitespace included. */
export const TEXT_ELEMENTS: ReadonlySet<string> = new Set(['t', 'delText', 'instrText']);

/** A "fill line" left for a handwritten answer: blanks, underscores, dots, ellipsis. */
export const BLANK_FIELD_PATTERN = /^[\s_.…]*$/;

/** Separator characters allowed between a label and its blank. */
export const LABEL_SEPARATOR_PATTERN = /^\s*(?::|_{2,}|\.{2,}|…)/;

/** Every packed entry gets this timestamp so repeated packs are byte-identical. */
export const FIXED_ENTRY_DATE = new Date(2000, 0, 1, 0, 0, 0);
