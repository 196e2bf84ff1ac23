/**
 * Shared by the label and table strategies: writing a value into a
 * container (cell, paragraph) that holds nothing but a blank field.
 */

import { BLANK_FIELD_PATTERN } from '../constants.js';
import { getParagraphText, textOf } from '../dom.js';
import type { XmlEditor } from '../editor.js';

/** Underscores, dots or an ellipsis drawn as a line to write on. */
export const FILL_LINE_PATTERN = /[_.…]+/;

export function isBlankText(text: string): boolean {
    return BLANK_FIELD_PATTERN.test(text);
}

export function areBlankParagraphs(paragraphs: Element[]): boolean {
    return paragraphs.length > 0 && paragraphs.every((p) => isBlankText(getParagraphText(p)));
}

/**
 * Fill blank paragraphs with `value`.  The first fill-line node (or the
 * first text node) takes the value and other fill lines are cleared; a
 * container with no text nodes gets a run carrying the paragraph mark's
 * formatting.
 */
export function fillBlankParagraphs(part: XmlEditor, paragraphs: Element[], value: string): boolean {
    const segments = paragraphs.flatMap((p) => part.segments(p));

    if (segments.length === 0) {
        const [paragraph] = paragraphs;
        if (!paragraph) return false;
        part.appendRun(paragraph, value, part.paragraphMarkProperties(paragraph));
        return true;
    }

    const target = segments.find((s) => FILL_LINE_PATTERN.test(textOf(s.node))) ?? segments[0];
    part.replaceText(target.node, value);
    for (const seg of segments) {
        if (seg !== target && FILL_LINE_PATTERN.test(textOf(seg.node))) part.replaceText(seg.node, '');
    }
    return true;
}
