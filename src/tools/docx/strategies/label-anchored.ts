/**
 * Strategy: label_anchored
 *
 * Forms without placeholder syntax: "Name: ________".  A label paragraph
 * is one whose text is the label, optionally followed by a separator (a
 * colon or a line of underscores / dots).  The search for the blank is
 * bounded:
 *
 *   1. the rest of the label paragraph,
 *   2. when the label sits in a table cell, the next cell of the row,
 *   3. otherwise the next paragraph, if it is blank.
 *
 * Two label paragraphs for the same name in one part is ambiguous and
 * left alone.
 */

import { LABEL_SEPARATOR_PATTERN } from '../constants.js';
import { cellParagraphs, closestW, getParagraphText, isW, nextElementSibling, textOf } from '../dom.js';
import type { XmlEditor } from '../editor.js';
import type { TextSegment } from '../types.js';
import { areBlankParagraphs, FILL_LINE_PATTERN, fillBlankParagraphs, isBlankText } from './blank-target.js';
import type { FillStrategy } from './index.js';
import { logger } from '../../../utils/logger.js';

const TRAILING_SEPARATOR = /\s*(?::|_{2,}|\.{2,}|…)\s*$/;

export const labelAnchored: FillStrategy = {
    id: 'label_anchored',

    attempt(name, value, part) {
        const key = labelKey(name);
        if (!key) return false;

        const labels: Array<{ paragraph: Element; end: number }> = [];
        for (const paragraph of part.findAllNodes('w:p')) {
            const end = labelEnd(getParagraphText(paragraph), key);
            if (end !== null) labels.push({ paragraph, end });
        }
        if (labels.length !== 1) {
            if (labels.length > 1) logger.debug(`${part.part}: label "${key}" appears ${labels.length} times, skipped`);
            return false;
        }

        const [{ paragraph, end }] = labels;
        return fillAfterLabel(part, paragraph, end, value);
    },
};

/** Collapse whitespace and drop a trailing separator: "Employee  Name:" → "Employee Name". */
export function labelKey(name: string): string {
    return name.replace(/\s+/g, ' ').trim().replace(TRAILING_SEPARATOR, '');
}

/**
 * Offset in `text` just past the label and a colon following it, or null
 * when `text` is not a label paragraph for `key`.  Whitespace runs in the
 * text match a single space in the key.
 */
export function labelEnd(text: string, key: string): number | null {
    let i = text.length - text.trimStart().length;
    let k = 0;
    while (k < key.length) {
        if (key[k] === ' ') {
            if (!/\s/.test(text[i] ?? '')) return null;
            while (i < text.length && /\s/.test(text[i])) i++;
            k++;
            continue;
        }
        if (text[i] !== key[k]) return null;
        i++;
        k++;
    }

    const rest = text.slice(i);
    if (rest.trim() !== '' && !LABEL_SEPARATOR_PATTERN.test(rest)) return null;

    const colon = /^\s*:/.exec(rest);
    return colon ? i + colon[0].length : i;
}

function fillAfterLabel(part: XmlEditor, paragraph: Element, end: number, value: string): boolean {
    if (fillLabelTail(part, paragraph, end, value)) return true;
    // "Name: John" is already filled
    if (!isBlankText(getParagraphText(paragraph).slice(end))) return false;

    const cell = closestW(paragraph.parentNode, 'tc');
    if (cell) {
        const next = nextElementSibling(cell);
        if (!isW(next, 'tc')) return false;
        const paragraphs = cellParagraphs(next);
        return areBlankParagraphs(paragraphs) && fillBlankParagraphs(part, paragraphs, value);
    }

    const next = nextElementSibling(paragraph);
    if (!isW(next, 'p') || !areBlankParagraphs([next])) return false;
    return fillBlankParagraphs(part, [next], value);
}

/**
 * Blank text after the label inside the label paragraph: a fill line
 * (possibly sharing a node with the label), or a separate empty or
 * whitespace-only node.  Segments are scanned in order and the scan stops
 * at the first non-blank text, so "Name: ____ Date: ____" fills only the
 * line right after "Name:".
 */
function fillLabelTail(part: XmlEditor, paragraph: Element, end: number, value: string): boolean {
    const tail = part.segments(paragraph).filter((s) => s.end > end || (s.start === end && s.end === end));
    const local = (s: TextSegment) => Math.max(end, s.start) - s.start;

    let own: TextSegment | undefined;
    for (const [i, seg] of tail.entries()) {
        const from = local(seg);
        const portion = textOf(seg.node).slice(from);
        const line = FILL_LINE_PATTERN.exec(portion);
        if (line && portion.slice(0, line.index).trim() === '') {
            fillLine(part, paragraph, tail.slice(i), from + line.index, line[0].length, value);
            return true;
        }
        if (portion.trim() !== '') break;
        if (!own && seg.start >= end) own = seg;
    }

    if (!own) return false;
    const before = getParagraphText(paragraph).slice(0, own.start);
    const current = textOf(own.node);
    const spacer = current === '' && /\S$/.test(before) ? ' ' : '';
    part.replaceRange(own.node, current.length, current.length, spacer + value);
    return true;
}

/** Write over the line at `start` in the first of `segments`, clearing the blank lines right after it. */
function fillLine(
    part: XmlEditor,
    paragraph: Element,
    segments: TextSegment[],
    start: number,
    length: number,
    value: string,
): void {
    const [lined, ...rest] = segments;
    const before = getParagraphText(paragraph).slice(0, lined.start + start);
    const spacer = /\S$/.test(before) ? ' ' : '';
    part.replaceRange(lined.node, start, start + length, spacer + value);

    for (const seg of rest) {
        const text = textOf(seg.node);
        const more = FILL_LINE_PATTERN.exec(text);
        if (!more || !isBlankText(text)) break;
        part.replaceRange(seg.node, more.index, more.index + more[0].length, '');
    }
}
