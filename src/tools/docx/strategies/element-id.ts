/**
 * Strategy: element_id
 *
 * Runs addressed by a `w:id` attribute, as some form generators emit for
 * each input: <w:r w:id="field_7"><w:t/></w:r>.  The run's first text
 * node takes the value and its other text nodes are cleared.
 */

import { wChildren } from '../dom.js';
import type { FillStrategy } from './index.js';
import { logger } from '../../../utils/logger.js';

export const elementId: FillStrategy = {
    id: 'element_id',

    attempt(name, value, part) {
        let changed = false;
        for (const run of part.findAllNodes('w:r', { attribute: 'w:id', value: name })) {
            const [first, ...others] = wChildren(run, 't');
            if (!first) {
                logger.debug(`${part.part}: run with w:id="${name}" has no text node, skipped`);
                continue;
            }
            part.replaceText(first, value);
            for (const t of others) part.replaceText(t, '');
            changed = true;
        }
        return changed;
    },
};
