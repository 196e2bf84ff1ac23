/**
 * Archive Packer
 *
 * pack(dir, output, options) rebuilds a .docx from an unpacked tree.  XML
 * parts are condensed, scratch files left by an interrupted write are
 * dropped, entries are written in a fixed order with a fixed
 * timestamp, and the archive goes to a temporary sibling that is only
 * renamed into place once the optional office validation is settled.
 */

import fs from 'fs/promises';
import path from 'path';
import { ContentTypes } from './content-types.js';
import { DOCX_PATHS, LEADING_ENTRIES, MANDATORY_PARTS, SCRATCH_FILE_PATTERN } from './constants.js';
import { parseXml, serializeXml } from './dom.js';
import { DocxError, DocxErrorCode, ValidationUnavailableError, withErrorContext } from './errors.js';
import { SofficeValidator } from './office-validator.js';
import type { PackOptions, PackResult, ValidationOutcome } from './types.js';
import { assertPartExists, listTreeFiles } from './utils/paths.js';
import { buildArchive } from './zip.js';
import { logger } from '../../utils/logger.js';

export async function pack(dir: string, outputPath: string, options: PackOptions = {}): Promise<PackResult> {
    return withErrorContext(
        async () => {
            for (const part of MANDATORY_PARTS) await assertPartExists(dir, part);

            const files = await listTreeFiles(dir);
            const scratch = files.filter((name) => SCRATCH_FILE_PATTERN.test(name));
            if (scratch.length > 0) logger.warning(`Left out interrupted writes: ${scratch.join(', ')}`);
            const names = orderEntries(files.filter((name) => !SCRATCH_FILE_PATTERN.test(name)));
            const contentTypes = ContentTypes.parse(
                await fs.readFile(path.join(dir, DOCX_PATHS.CONTENT_TYPES), 'utf8'),
            );

            const entries: Array<{ name: string; data: string | Buffer }> = [];
            for (const name of names) {
                const file = path.join(dir, ...name.split('/'));
                if (contentTypes.isXml(name)) {
                    const doc = parseXml(await fs.readFile(file, 'utf8'), name);
                    entries.push({ name, data: serializeXml(doc, 'condensed') });
                } else {
                    entries.push({ name, data: await fs.readFile(file) });
                }
            }

            const archive = buildArchive(entries);
            await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
            const temp = temporarySibling(outputPath);
            await fs.writeFile(temp, archive);

            let validation: ValidationOutcome;
            try {
                validation = await validateArchive(temp, options);
                await fs.rename(temp, outputPath);
            } catch (error) {
                await fs.rm(temp, { force: true });
                throw error;
            }

            logger.info(`Packed ${names.length} entries into ${outputPath} (validation ${validation.status})`);
            return { outputPath, entries: names, validation };
        },
        DocxErrorCode.PACK_FAILED,
        { dir, outputPath },
    );
}

/** Leading OOXML entries first, then every other path in code-unit order. */
export function orderEntries(files: string[]): string[] {
    const leading = LEADING_ENTRIES.filter((name) => files.includes(name));
    const rest = files.filter((name) => !LEADING_ENTRIES.includes(name)).sort();
    return [...leading, ...rest];
}

function temporarySibling(outputPath: string): string {
    const dir = path.dirname(outputPath);
    const stem = path.basename(outputPath, path.extname(outputPath));
    return path.join(dir, `.${stem}.${process.pid}.tmp.docx`);
}

async function validateArchive(archivePath: string, options: PackOptions): Promise<ValidationOutcome> {
    const validator = options.validator ?? new SofficeValidator();
    const force = options.force ?? false;
    const check = await validator.check(archivePath);

    switch (check.kind) {
        case 'passed':
            logger.debug(`${validator.name} opened ${archivePath}`);
            return { status: 'passed', message: `${validator.name} opened the archive` };
        case 'unavailable':
            if (!force) throw new ValidationUnavailableError(validator.name, check.reason);
            logger.warning(`Validation skipped: ${check.reason}`);
            return { status: 'skipped', message: check.reason };
        case 'failed':
            if (!force) {
                throw new DocxError(
                    `Office validation failed (${validator.name}): ${check.message}`,
                    DocxErrorCode.VALIDATION_FAILED,
                    { validator: validator.name, detail: check.message },
                );
            }
            logger.warning(`Validation failed, packed anyway: ${check.message}`);
            return { status: 'failed', message: check.message };
    }
}
