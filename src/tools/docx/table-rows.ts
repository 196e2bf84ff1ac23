/**
 * Table Row Filler
 *
 * fillTableRows(dir, tableIndex, records) turns a table of the main part
 * into a list: row 0 is the header, row 1 the template.  The template and
 * every row below it are replaced by one copy of the template per record,
 * and each copy's cells take `record[header]` by grid column.  Cells whose
 * header has no value in the record keep the template's text.
 *
 * Tables are counted in document order, nested tables included.
 */

import { DOCX_PATHS } from './constants.js';
import { cellParagraphs, getCellText, isW, paragraphTextNodes, wChildren } from './dom.js';
import { XmlEditor } from './editor.js';
import { DocxError, DocxErrorCode, TableNotFoundError, withErrorContext } from './errors.js';
import { gridCells } from './strategies/table-cell.js';
import type { TableFillResult, TableRecord } from './types.js';
import { assertPartExists } from './utils/paths.js';
import { logger } from '../../utils/logger.js';

export async function fillTableRows(
    dir: string,
    tableIndex: number,
    records: TableRecord[],
): Promise<TableFillResult> {
    return withErrorContext(
        async () => {
            await assertPartExists(dir, DOCX_PATHS.DOCUMENT_XML);
            const part = await XmlEditor.load(dir, DOCX_PATHS.DOCUMENT_XML);

            const result = fillTable(part, tableIndex, records);
            if (result.rowsWritten > 0) await part.save(dir);

            logger.info(`Wrote ${result.rowsWritten} row(s) into table ${tableIndex}`, {
                unknownColumns: result.unknownColumns,
            });
            return result;
        },
        DocxErrorCode.FILL_FAILED,
        { dir, tableIndex },
    );
}

/** In-memory half of fillTableRows.  No records leaves the table as it is. */
export function fillTable(part: XmlEditor, tableIndex: number, records: TableRecord[]): TableFillResult {
    const tables = part.findAllNodes('w:tbl');
    const table = tables[tableIndex];
    if (!Number.isInteger(tableIndex) || !table) throw new TableNotFoundError(tableIndex, tables.length);

    const rows = wChildren(table, 'tr');
    if (rows.length < 2) {
        throw new DocxError(`Table ${tableIndex} has no template row`, DocxErrorCode.NO_TEMPLATE_ROW, {
            tableIndex,
            rowCount: rows.length,
        });
    }
    const [header, template] = rows;

    const headers = new Map<number, string>();
    for (const { cell, column } of gridCells(header)) headers.set(column, normalizeHeader(getCellText(cell)));
    const columns = [...headers.values()];

    const unknownColumns: string[] = [];
    for (const record of records) {
        for (const key of Object.keys(record)) {
            const name = normalizeHeader(key);
            if (!columns.includes(name) && !unknownColumns.includes(key)) unknownColumns.push(key);
        }
    }
    if (unknownColumns.length > 0) logger.info(`No header for ${unknownColumns.join(', ')} in table ${tableIndex}`);

    if (records.length === 0) return { tableIndex, rowsWritten: 0, columns, unknownColumns };

    for (const record of records) {
        const copy = template.cloneNode(true);
        if (!isW(copy, 'tr')) continue;
        const values = recordByHeader(record);
        for (const { cell, column } of gridCells(copy)) {
            const name = headers.get(column);
            const value = name === undefined ? undefined : values.get(name);
            if (value !== undefined) writeCell(part, cell, value);
        }
        table.insertBefore(copy, template);
    }
    for (const row of rows.slice(1)) table.removeChild(row);

    return { tableIndex, rowsWritten: records.length, columns, unknownColumns };
}

function normalizeHeader(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

function recordByHeader(record: TableRecord): Map<string, string> {
    return new Map(Object.entries(record).map(([key, value]) => [normalizeHeader(key), value]));
}

/** First text node of the cell takes the value; the others are cleared. */
function writeCell(part: XmlEditor, cell: Element, value: string): void {
    const paragraphs = cellParagraphs(cell);
    const [first, ...others] = paragraphs.flatMap(paragraphTextNodes);
    if (first) {
        part.replaceText(first, value);
        for (const t of others) part.replaceText(t, '');
        return;
    }
    const [paragraph] = paragraphs;
    if (paragraph) part.appendRun(paragraph, value, part.paragraphMarkProperties(paragraph));
}
