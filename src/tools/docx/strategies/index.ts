/**
 * Fill strategies, in priority order.
 *
 * The filler walks this list for every mapping entry and stops at the
 * first strategy that changes a part.  Adding a strategy means a new file
 * plus one entry here; existing strategies stay untouched.
 *
 * A strategy listing `sweepsAfter` also runs right after one of those
 * strategies wins, to finish occurrences the winner cannot reach.
 */

import type { XmlEditor } from '../editor.js';
import type { StrategyId } from '../types.js';
import { exactPlaceholder } from './exact-placeholder.js';
import { structuredField } from './structured-field.js';
import { labelAnchored } from './label-anchored.js';
import { multiRun } from './multi-run.js';
import { tableCell } from './table-cell.js';
import { elementId } from './element-id.js';

export interface FillStrategy {
    readonly id: StrategyId;
    /**
     * Fill every occurrence of `name` this strategy can handle in `part`.
     * Returns true when the part changed.
     */
    attempt(name: string, value: string, part: XmlEditor): boolean;
    readonly sweepsAfter?: readonly StrategyId[];
}

export const FILL_STRATEGIES: readonly FillStrategy[] = [
    exactPlaceholder,
    structuredField,
    labelAnchored,
    multiRun,
    tableCell,
    elementId,
];

export { exactPlaceholder, structuredField, labelAnchored, multiRun, tableCell, elementId };
