/**
 * Field Filler
 *
 * fillFields(dir, mapping) loads the main document part (and, unless
 * disabled, every header and footer) from an unpacked tree, runs the
 * strategy chain for each mapping entry in definition order, checks the
 * structural invariants and writes back only the parts that changed.
 *
 * Per-field misses are not errors: they end up in `skipped`.  Malformed
 * XML or a structural change aborts before anything is written.
 */

import { DOCX_PATHS } from './constants.js';
import { XmlEditor } from './editor.js';
import { DocxErrorCode, withErrorContext } from './errors.js';
import { mappingEntries } from './mapping.js';
import { listContentParts } from './placeholders.js';
import { FILL_STRATEGIES, type FillStrategy } from './strategies/index.js';
import type { FieldMapping, FillOptions, FillResult } from './types.js';
import { assertPartExists } from './utils/paths.js';
import { captureSnapshot, validateInvariants } from './validate.js';
import { logger } from '../../utils/logger.js';

export async function fillFields(
    dir: string,
    mapping: FieldMapping,
    options: FillOptions = {},
): Promise<FillResult> {
    return withErrorContext(
        async () => {
            const parts = await loadParts(dir, options.includeHeadersFooters ?? true);
            const snapshots = parts.map((part) => captureSnapshot(part.document));
            const result = fillParts(parts, mapping);

            parts.forEach((part, i) => validateInvariants(part.part, snapshots[i], captureSnapshot(part.document)));

            for (const part of parts) {
                if (!result.modifiedParts.includes(part.part)) continue;
                await part.save(dir);
                logger.debug(`Wrote ${part.part}`);
            }

            logger.info(
                `Filled ${result.filled.length} of ${result.filled.length + result.skipped.length} field(s) in ${dir}`,
                { modifiedParts: result.modifiedParts },
            );
            return result;
        },
        DocxErrorCode.FILL_FAILED,
        { dir },
    );
}

/**
 * Run the strategy chain over already-loaded parts.  Mutates the parts in
 * memory; nothing is written.
 */
export function fillParts(
    parts: XmlEditor[],
    mapping: FieldMapping,
    strategies: readonly FillStrategy[] = FILL_STRATEGIES,
): FillResult {
    const result: FillResult = { filled: [], skipped: [], strategies: {}, modifiedParts: [] };
    const modified = new Set<XmlEditor>();

    for (const [name, value] of mappingEntries(mapping)) {
        if (name.trim() === '') {
            result.skipped.push({ name, reason: 'empty field name' });
            logger.warning('Empty field name in mapping — skipped');
            continue;
        }

        const attempt = (strategy: FillStrategy): boolean => {
            let changed = false;
            for (const part of parts) {
                if (!strategy.attempt(name, value, part)) continue;
                changed = true;
                modified.add(part);
            }
            return changed;
        };

        const winner = strategies.find(attempt);
        if (winner) {
            for (const sweep of strategies) {
                if (sweep.sweepsAfter?.includes(winner.id) && attempt(sweep)) {
                    logger.debug(`${name}: ${sweep.id} finished occurrences left by ${winner.id}`);
                }
            }
            result.filled.push(name);
            result.strategies[name] = winner.id;
            logger.debug(`${name} filled by ${winner.id}`);
        } else {
            const reason = `placeholder {{${name}}} not found`;
            result.skipped.push({ name, reason });
            logger.info(`${reason} — skipped`);
        }
    }

    result.modifiedParts = parts.filter((part) => modified.has(part)).map((part) => part.part);
    return result;
}

async function loadParts(dir: string, includeHeadersFooters: boolean): Promise<XmlEditor[]> {
    await assertPartExists(dir, DOCX_PATHS.DOCUMENT_XML);

    const parts: XmlEditor[] = [];
    for (const name of await listContentParts(dir, includeHeadersFooters)) {
        parts.push(await XmlEditor.load(dir, name));
    }
    return parts;
}
