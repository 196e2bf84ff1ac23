/**
 * Field mapping files: a flat JSON object of string → string.
 */

import fs from 'fs/promises';
import { z } from 'zod';
import { DocxError, DocxErrorCode } from './errors.js';
import type { FieldMapping } from './types.js';

export const FieldMappingSchema = z.record(z.string(), z.string());

/** Validate an already-parsed value as a field mapping. */
export function parseFieldMapping(value: unknown, source = 'field mapping'): Record<string, string> {
    const parsed = FieldMappingSchema.safeParse(value);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
        throw new DocxError(
            `Invalid ${source}${where}: ${issue.message}`,
            DocxErrorCode.INVALID_MAPPING,
            { source, issues: parsed.error.issues },
        );
    }
    return parsed.data;
}

export async function readFieldMapping(filePath: string): Promise<Record<string, string>> {
    const raw = await fs.readFile(filePath, 'utf8');
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new DocxError(
            `Field mapping ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
            DocxErrorCode.INVALID_MAPPING,
            { filePath },
        );
    }
    return parseFieldMapping(json, `field mapping ${filePath}`);
}

/** Mapping entries in definition order. */
export function mappingEntries(mapping: FieldMapping): Array<[string, string]> {
    return isMap(mapping) ? [...mapping.entries()] : Object.entries(mapping);
}

function isMap(mapping: FieldMapping): mapping is ReadonlyMap<string, string> {
    return mapping instanceof Map;
}
