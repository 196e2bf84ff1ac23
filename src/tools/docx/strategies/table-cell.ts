/**
 * Strategy: table_cell
 *
 * A header cell whose text equals the name; the cell below it (same grid
 * column, next row) is filled when blank.  Column positions follow
 * w:gridBefore and w:gridSpan, so merged header cells line up with the
 * row underneath.
 */

import { cellParagraphs, cellSpan, findDirectChild, getCellText, isW, nextElementSibling, wChildren, wVal } from '../dom.js';
import { areBlankParagraphs, fillBlankParagraphs } from './blank-target.js';
import type { FillStrategy } from './index.js';
import { logger } from '../../../utils/logger.js';

interface HeaderHit {
    row: Element;
    column: number;
}

export const tableCell: FillStrategy = {
    id: 'table_cell',

    attempt(name, value, part) {
        const key = name.replace(/\s+/g, ' ').trim();
        if (!key) return false;

        const hits: HeaderHit[] = [];
        for (const table of part.findAllNodes('w:tbl')) {
            for (const row of wChildren(table, 'tr')) {
                for (const { cell, column } of gridCells(row)) {
                    if (getCellText(cell).replace(/\s+/g, ' ') === key) hits.push({ row, column });
                }
            }
        }
        if (hits.length !== 1) {
            if (hits.length > 1) logger.debug(`${part.part}: header "${key}" appears ${hits.length} times, skipped`);
            return false;
        }

        const [{ row, column }] = hits;
        const below = nextRow(row);
        const target = below ? gridCells(below).find((c) => c.column === column) : undefined;
        if (!target) return false;

        const paragraphs = cellParagraphs(target.cell);
        return areBlankParagraphs(paragraphs) && fillBlankParagraphs(part, paragraphs, value);
    },
};

/** Cells of a row with the grid column each one starts at. */
export function gridCells(row: Element): Array<{ cell: Element; column: number }> {
    const trPr = findDirectChild(row, 'trPr');
    const before = Number(trPr ? wVal(trPr, 'gridBefore') : 0);
    let column = Number.isInteger(before) && before > 0 ? before : 0;

    return wChildren(row, 'tc').map((cell) => {
        const entry = { cell, column };
        column += cellSpan(cell);
        return entry;
    });
}

function nextRow(row: Element): Element | null {
    let node = nextElementSibling(row);
    while (node && !isW(node, 'tr')) node = nextElementSibling(node);
    return node;
}
