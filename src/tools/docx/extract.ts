/**
 * Read-only extraction from a filled (or source) document: its text, its
 * tables as rows of cell texts, and the values held by named content
 * controls.  The merged `values` can feed fillFields on another template.
 */

import { DOCX_PATHS } from './constants.js';
import {
    findDirectChild,
    getCellText,
    getParagraphText,
    textOf,
    wChildren,
    wDescendants,
    wVal,
} from './dom.js';
import { XmlEditor } from './editor.js';
import { DocxErrorCode, withErrorContext } from './errors.js';
import type { ExtractedData } from './types.js';
import { assertPartExists } from './utils/paths.js';
import { logger } from '../../utils/logger.js';

export async function extractData(dir: string): Promise<ExtractedData> {
    return withErrorContext(
        async () => {
            await assertPartExists(dir, DOCX_PATHS.DOCUMENT_XML);
            const part = await XmlEditor.load(dir, DOCX_PATHS.DOCUMENT_XML);
            const data = extractFromDocument(part.document);

            logger.info(`Extracted ${Object.keys(data.values).length} value(s) from ${dir}`, {
                tables: data.tables.length,
                structuredFields: Object.keys(data.structuredFields).length,
            });
            return data;
        },
        DocxErrorCode.EXTRACT_FAILED,
        { dir },
    );
}

export function extractFromDocument(doc: Document): ExtractedData {
    const tables = extractTables(doc);
    const structuredFields = extractStructuredFields(doc);
    const tableFields = fieldsFromTables(tables);

    const values = { ...structuredFields };
    for (const [name, value] of Object.entries(tableFields)) {
        if (!Object.hasOwn(values, name)) values[name] = value;
    }

    return {
        text: wDescendants(doc, 'p').map(getParagraphText).join('\n'),
        tables,
        structuredFields,
        tableFields,
        values,
    };
}

export function extractTables(doc: Document): string[][][] {
    return wDescendants(doc, 'tbl').map((table) =>
        wChildren(table, 'tr').map((row) => wChildren(row, 'tc').map(getCellText)),
    );
}

/**
 * Alias → text of every content control that has an alias.  A control
 * still showing its placeholder prompt yields ''.  The first control wins
 * when an alias repeats.
 */
export function extractStructuredFields(doc: Document): Record<string, string> {
    const fields: Record<string, string> = {};
    for (const sdt of wDescendants(doc, 'sdt')) {
        const sdtPr = findDirectChild(sdt, 'sdtPr');
        const alias = sdtPr ? wVal(sdtPr, 'alias') : null;
        const content = findDirectChild(sdt, 'sdtContent');
        if (!sdtPr || !alias || !content || Object.hasOwn(fields, alias)) continue;

        fields[alias] = findDirectChild(sdtPr, 'showingPlcHdr')
            ? ''
            : wDescendants(content, 't').map(textOf).join('').trim();
    }
    return fields;
}

/** First table's header row → its first data row: "Unit Price" → UNIT_PRICE. */
export function fieldsFromTables(tables: string[][][]): Record<string, string> {
    const fields: Record<string, string> = {};
    const [first] = tables;
    if (!first || first.length < 2) return fields;

    const [header, row] = first;
    header.forEach((name, i) => {
        if (name === '' || i >= row.length) return;
        fields[name.toUpperCase().replace(/ /g, '_')] = row[i];
    });
    return fields;
}

/**
 * Rename extracted values to template field names.  Only names present in
 * `names` (source → template) are kept.
 */
export function renameExtracted(values: Record<string, string>, names: Record<string, string>): Record<string, string> {
    const renamed: Record<string, string> = {};
    for (const [source, target] of Object.entries(names)) {
        if (Object.hasOwn(values, source)) renamed[target] = values[source];
    }
    return renamed;
}
