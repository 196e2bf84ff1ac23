/**
 * Strategy: structured_field
 *
 * Content controls (w:sdt) whose w:alias or w:tag equals the name.  The
 * first text node of w:sdtContent takes the value, any others are
 * emptied, and w:showingPlcHdr is dropped so Word stops rendering the
 * control as placeholder text.
 */

import { closestW, findDirectChild, wDescendants, wVal } from '../dom.js';
import type { XmlEditor } from '../editor.js';
import type { FillStrategy } from './index.js';

export const structuredField: FillStrategy = {
    id: 'structured_field',

    attempt(name, value, part) {
        let filled = 0;
        for (const sdt of part.findAllNodes('w:sdt', (el) => controlNames(el).includes(name))) {
            if (fillControl(part, sdt, value)) filled++;
        }
        return filled > 0;
    },
};

/** Alias and tag of a content control. */
export function controlNames(sdt: Element): string[] {
    const sdtPr = findDirectChild(sdt, 'sdtPr');
    if (!sdtPr) return [];
    return [wVal(sdtPr, 'alias'), wVal(sdtPr, 'tag')].filter((v): v is string => v !== null);
}

function fillControl(part: XmlEditor, sdt: Element, value: string): boolean {
    const content = findDirectChild(sdt, 'sdtContent');
    if (!content) return false;

    const texts = wDescendants(content, 't');
    if (texts.length > 0) {
        part.replaceText(texts[0], value);
        for (const t of texts.slice(1)) part.replaceText(t, '');
    } else {
        const paragraph = wDescendants(content, 'p')[0];
        if (paragraph) {
            part.appendRun(paragraph, value, part.paragraphMarkProperties(paragraph));
        } else if (closestW(sdt.parentNode, 'p')) {
            // inline control: w:sdtContent holds runs directly
            part.appendRun(content, value);
        } else {
            return false;
        }
    }

    const sdtPr = findDirectChild(sdt, 'sdtPr');
    const showing = sdtPr ? findDirectChild(sdtPr, 'showingPlcHdr') : null;
    if (sdtPr && showing) sdtPr.removeChild(showing);
    return true;
}
