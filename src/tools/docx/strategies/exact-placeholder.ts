/**
 * Strategy: exact_placeholder
 *
 * Replaces `{{name}}` where the token sits in one run, or in runs that
 * follow each other directly (formatting applied mid-token).  Fragments
 * are folded into the first run first, so the value inherits that run's
 * w:rPr.
 */

import { placeholderToken } from '../constants.js';
import type { XmlEditor } from '../editor.js';
import type { FillStrategy } from './index.js';

export const exactPlaceholder: FillStrategy = {
    id: 'exact_placeholder',

    attempt(name, value, part) {
        const token = placeholderToken(name);
        let replaced = 0;

        for (const paragraph of part.findAllNodes('w:p', { contains: token })) {
            replaced += fillParagraph(part, paragraph, token, value);
        }
        return replaced > 0;
    },
};

function fillParagraph(part: XmlEditor, paragraph: Element, token: string, value: string): number {
    let replaced = 0;
    for (;;) {
        const match = part.findMatches(paragraph, token).find((m) => part.isFoldable(m));
        if (!match) return replaced;

        const folded = part.splitPlaceholderAcrossRuns(match);
        if (!folded) return replaced;
        part.replaceRange(folded.node, folded.offset, folded.offset + token.length, value);
        replaced++;
    }
}
