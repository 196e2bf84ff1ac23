/**
 * Placeholder Locator
 *
 * Read-only scan of document parts for `{{name}}` tokens.  Text is
 * concatenated per paragraph, so a token whose characters were split over
 * several runs is still found, but a token never spans two paragraphs.
 *
 * @module docx/placeholders
 */

import fs from 'fs/promises';
import path from 'path';
import { DOCX_PATHS, FOOTER_PART_PATTERN, HEADER_PART_PATTERN, PLACEHOLDER_PATTERN } from './constants.js';
import { getParagraphText, wDescendants } from './dom.js';
import { XmlEditor } from './editor.js';
import type { PlaceholderList } from './types.js';
import { assertPartExists } from './utils/paths.js';
import { logger } from '../../utils/logger.js';

/** Distinct placeholder names of one part, in first-seen order. */
export function findPlaceholders(part: XmlEditor): string[] {
    const text = wDescendants(part.document, 'p').map(getParagraphText).join('\n');
    return scanPlaceholders(text);
}

/** Distinct placeholder names in `text`, in first-seen order. */
export function scanPlaceholders(text: string): string[] {
    const seen = new Set<string>();
    for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
        seen.add(match[1]);
    }
    return [...seen];
}

/**
 * Tree-relative names of the parts to scan or fill: the main document,
 * then headers and footers in numeric order.
 */
export async function listContentParts(dir: string, includeHeadersFooters = true): Promise<string[]> {
    const parts = [DOCX_PATHS.DOCUMENT_XML];
    if (!includeHeadersFooters) return parts;

    let names: string[];
    try {
        names = await fs.readdir(path.join(dir, 'word'));
    } catch {
        return parts;
    }
    const byNumber = (pattern: RegExp) =>
        names
            .map((name) => `word/${name}`)
            .filter((rel) => pattern.test(rel))
            .sort((a, b) => partNumber(a, pattern) - partNumber(b, pattern) || a.localeCompare(b));

    return [...parts, ...byNumber(HEADER_PART_PATTERN), ...byNumber(FOOTER_PART_PATTERN)];
}

function partNumber(rel: string, pattern: RegExp): number {
    const digits = pattern.exec(rel)?.[1];
    return digits ? Number(digits) : 0;
}

/**
 * Scan an unpacked tree.  Names seen in several parts are reported once,
 * at their first position.
 */
export async function findPlaceholdersInTree(
    dir: string,
    options: { includeHeadersFooters?: boolean } = {},
): Promise<string[]> {
    await assertPartExists(dir, DOCX_PATHS.DOCUMENT_XML);

    const names = new Set<string>();
    for (const part of await listContentParts(dir, options.includeHeadersFooters ?? true)) {
        const editor = await XmlEditor.load(dir, part);
        const found = findPlaceholders(editor);
        logger.debug(`${part}: ${found.length} placeholder(s)`);
        for (const name of found) names.add(name);
    }
    return [...names];
}

export function toPlaceholderList(names: string[]): PlaceholderList {
    return { placeholders: names, count: names.length };
}

/** Persist `{"placeholders": [...], "count": N}`. */
export async function writePlaceholderList(filePath: string, names: string[]): Promise<PlaceholderList> {
    const list = toPlaceholderList(names);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(list, null, 2) + '\n', 'utf8');
    return list;
}
