/**
 * Placeholder insertion for templates that have labels but no
 * `{{name}}` tokens.  Each field names a label; the token goes either on
 * the paragraph after the label or at the end of the label paragraph.
 */

import { DOCX_PATHS, PLACEHOLDER_NAME_PATTERN, placeholderToken } from './constants.js';
import { isW, nextElementSibling, wChildren } from './dom.js';
import { XmlEditor } from './editor.js';
import { DocxErrorCode, withErrorContext } from './errors.js';
import type { InsertPlaceholdersResult, PlaceholderField } from './types.js';
import { assertPartExists } from './utils/paths.js';
import { logger } from '../../utils/logger.js';

export async function insertPlaceholders(
    dir: string,
    fields: PlaceholderField[],
): Promise<InsertPlaceholdersResult> {
    return withErrorContext(
        async () => {
            await assertPartExists(dir, DOCX_PATHS.DOCUMENT_XML);
            const part = await XmlEditor.load(dir, DOCX_PATHS.DOCUMENT_XML);

            const inserted: string[] = [];
            const failed: string[] = [];
            for (const field of fields) {
                if (insertField(part, field)) {
                    inserted.push(field.fieldName);
                } else {
                    failed.push(field.fieldName);
                    logger.info(`Label "${field.label}" for {{${field.fieldName}}} not found`);
                }
            }

            if (inserted.length > 0) await part.save(dir);

            const status = failed.length === 0 ? 'success' : inserted.length > 0 ? 'partial' : 'failed';
            logger.info(`Inserted ${inserted.length} of ${fields.length} placeholder(s)`, { status });
            return { status, inserted, failed };
        },
        DocxErrorCode.FILL_FAILED,
        { dir },
    );
}

function insertField(part: XmlEditor, field: PlaceholderField): boolean {
    if (!PLACEHOLDER_NAME_PATTERN.test(field.fieldName) || field.label.trim() === '') return false;

    const labelParagraph = part.findNode('w:p', { contains: field.label });
    if (!labelParagraph) return false;

    const token = placeholderToken(field.fieldName);
    const below = field.location === 'below_label' ? nextElementSibling(labelParagraph) : null;

    if (isW(below, 'p')) {
        const properties = lastRunProperties(part, below) ?? part.paragraphMarkProperties(below);
        part.appendRun(below, token, properties);
    } else {
        part.appendRun(labelParagraph, ` ${token}`, lastRunProperties(part, labelParagraph));
    }
    return true;
}

function lastRunProperties(part: XmlEditor, paragraph: Element): Element | null {
    const runs = wChildren(paragraph, 'r');
    return part.runProperties(runs[runs.length - 1] ?? null);
}
