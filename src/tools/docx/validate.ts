/**
 * Invariant validation for fill passes.
 *
 * Single Responsibility: capture a structural snapshot of a part's content
 * root and compare before / after snapshots.  Filling only edits text and
 * runs, so every counter and the signature must come out unchanged.
 */

import { bodySignature, countTables, getBodyChildren, getContentRoot, wDescendants } from './dom.js';
import { DocxError, DocxErrorCode } from './errors.js';
import type { BodySnapshot } from './types.js';

// ─── Capture ─────────────────────────────────────────────────────────

/** Take a snapshot of the structural invariants of w:body (or w:hdr / w:ftr). */
export function captureSnapshot(doc: Document): BodySnapshot {
    const root = getContentRoot(doc);
    const children = getBodyChildren(root);
    return {
        bodyChildCount: children.length,
        tableCount: countTables(children),
        paragraphCount: wDescendants(root, 'p').length,
        signature: bodySignature(children),
    };
}

// ─── Validate ────────────────────────────────────────────────────────

/**
 * Compare before / after snapshots of `part`.
 * Throws STRUCTURE_CHANGED listing every violated invariant, so the
 * caller writes nothing.
 */
export function validateInvariants(part: string, before: BodySnapshot, after: BodySnapshot): void {
    const errors: string[] = [];

    if (before.bodyChildCount !== after.bodyChildCount) {
        errors.push(`Body child count changed: ${before.bodyChildCount} → ${after.bodyChildCount}`);
    }
    if (before.tableCount !== after.tableCount) {
        errors.push(`Table count changed: ${before.tableCount} → ${after.tableCount}`);
    }
    if (before.paragraphCount !== after.paragraphCount) {
        errors.push(`Paragraph count changed: ${before.paragraphCount} → ${after.paragraphCount}`);
    }
    if (before.signature !== after.signature) {
        errors.push(`Body signature changed:\n  before: ${before.signature}\n  after:  ${after.signature}`);
    }

    if (errors.length > 0) {
        throw new DocxError(
            `Structural validation of ${part} failed; nothing was written.\n` + errors.join('\n'),
            DocxErrorCode.STRUCTURE_CHANGED,
            { part, before, after },
        );
    }
}
