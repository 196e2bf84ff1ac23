/**
 * Strategy: multi_run
 *
 * Split placeholders the exact strategy could not fold: fragments
 * separated by other run content (tabs, breaks, bookmarks) or sitting
 * under different parents.  The token's characters are cut out of every
 * fragment, the value goes into a new run after the first fragment's run
 * (same w:rPr), and runs left holding nothing are removed.
 *
 * Also sweeps after exact_placeholder, so a name written both whole and
 * split across a bookmark is filled everywhere.
 */

import { placeholderToken } from '../constants.js';
import type { XmlEditor } from '../editor.js';
import type { TextMatch } from '../types.js';
import type { FillStrategy } from './index.js';

export const multiRun: FillStrategy = {
    id: 'multi_run',
    sweepsAfter: ['exact_placeholder'],

    attempt(name, value, part) {
        const token = placeholderToken(name);
        let replaced = 0;

        for (const paragraph of part.findAllNodes('w:p', { contains: token })) {
            for (;;) {
                const match = part.findMatches(paragraph, token).find((m) => isReassemblable(part, m));
                if (!match) break;
                reassemble(part, match, value);
                replaced++;
            }
        }
        return replaced > 0;
    },
};

function isReassemblable(part: XmlEditor, match: TextMatch): boolean {
    return !part.isFoldable(match) && match.segments.length > 0 && match.segments.every((s) => s.run !== null);
}

function reassemble(part: XmlEditor, match: TextMatch, value: string): void {
    const [first] = match.segments;
    const firstRun = first.run;
    if (!firstRun) return;

    const runs = [...new Set(match.segments.map((s) => s.run))];
    const singleRun = runs.length === 1;

    // Cut from the back so earlier offsets stay valid.
    for (const seg of [...match.segments].reverse()) {
        const from = Math.max(match.start, seg.start) - seg.start;
        const to = Math.min(match.end, seg.end) - seg.start;
        const replacement = singleRun && seg === first ? value : '';
        part.replaceRange(seg.node, from, to, replacement);
    }
    if (singleRun) return;

    part.insertRunAfter(firstRun, value, part.runProperties(firstRun));
    for (const run of runs) {
        if (run) part.removeRunIfEmpty(run);
    }
}
