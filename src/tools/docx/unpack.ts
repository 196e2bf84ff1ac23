/**
 * Archive Unpacker
 *
 * unpack(archive, destination) expands a .docx into a directory tree:
 * XML parts pretty-printed, everything else copied byte for byte.  The
 * whole archive is checked and prepared in memory first, so a bad entry
 * leaves the destination untouched.
 */

import fs from 'fs/promises';
import path from 'path';
import { ContentTypes } from './content-types.js';
import { DOCX_PATHS, MANDATORY_PARTS } from './constants.js';
import { parseXml, serializeXml } from './dom.js';
import { DocxErrorCode, NotAnArchiveError, withErrorContext } from './errors.js';
import type { UnpackResult } from './types.js';
import { resolveEntryPath } from './utils/paths.js';
import { archiveEntries, loadArchive } from './zip.js';
import { logger } from '../../utils/logger.js';

interface PreparedEntry {
    name: string;
    target: string;
    data: string | Buffer;
}

export async function unpack(archivePath: string, destination: string): Promise<UnpackResult> {
    return withErrorContext(
        async () => {
            const zip = await loadArchive(archivePath);
            const entries = archiveEntries(zip);
            const names = new Set(entries.map((e) => e.name));

            for (const part of MANDATORY_PARTS) {
                if (!names.has(part)) throw new NotAnArchiveError(archivePath, `missing ${part}`);
            }

            const targets = entries.map((entry) => resolveEntryPath(destination, entry.name));

            const contentTypesEntry = entries.find((e) => e.name === DOCX_PATHS.CONTENT_TYPES);
            const contentTypes = ContentTypes.parse(contentTypesEntry ? contentTypesEntry.text() : '');

            let xmlParts = 0;
            const prepared: PreparedEntry[] = entries.map((entry, i) => {
                if (contentTypes.isXml(entry.name)) {
                    xmlParts++;
                    const doc = parseXml(entry.text(), entry.name);
                    return { name: entry.name, target: targets[i], data: serializeXml(doc, 'pretty') };
                }
                return { name: entry.name, target: targets[i], data: entry.bytes() };
            });

            for (const entry of prepared) {
                await fs.mkdir(path.dirname(entry.target), { recursive: true });
                await fs.writeFile(entry.target, entry.data);
                logger.debug(`Unpacked ${entry.name}`);
            }

            const result: UnpackResult = {
                directory: destination,
                entries: prepared.map((e) => e.name),
                xmlParts,
                binaryParts: prepared.length - xmlParts,
            };
            logger.info(
                `Unpacked ${archivePath} into ${destination} (${xmlParts} XML, ${result.binaryParts} binary)`,
            );
            return result;
        },
        DocxErrorCode.UNPACK_FAILED,
        { archivePath, destination },
    );
}
