/**
 * DOCX ZIP I/O — Single Responsibility: bytes ↔ PizZip.
 *
 * The unpacker and packer go through these helpers; nothing else in the
 * module touches PizZip directly.
 */

import fs from 'fs/promises';
import PizZip from 'pizzip';
import { FIXED_ENTRY_DATE } from './constants.js';
import { NotAnArchiveError } from './errors.js';

export interface ArchiveEntry {
    name: string;
    /** Decoded UTF-8 text of the entry. */
    text(): string;
    /** Raw bytes, unchanged. */
    bytes(): Buffer;
}

/**
 * Read a .docx file from disk.  Anything PizZip cannot open is reported
 * as NotAnArchiveError.
 */
export async function loadArchive(filePath: string): Promise<PizZip> {
    const buf = await fs.readFile(filePath);
    try {
        return new PizZip(buf);
    } catch (error) {
        throw new NotAnArchiveError(filePath, error instanceof Error ? error.message : String(error));
    }
}

/** File entries in archive order; directory entries are left out. */
export function archiveEntries(zip: PizZip): ArchiveEntry[] {
    return Object.values(zip.files)
        .filter((file) => !file.dir && !file.name.endsWith('/'))
        .map((file) => ({
            name: file.name,
            text: () => file.asText(),
            bytes: () => Buffer.from(file.asUint8Array()),
        }));
}

/**
 * Build an archive from `entries`, in the given order, DEFLATE-compressed.
 * Every entry gets FIXED_ENTRY_DATE so the same input yields the same bytes.
 */
export function buildArchive(entries: Array<{ name: string; data: string | Buffer }>) {
    const zip = new PizZip();
    for (const { name, data } of entries) {
        if (typeof data === 'string') {
            zip.file(name, data, { date: FIXED_ENTRY_DATE });
        } else {
            zip.file(name, data, { binary: true, date: FIXED_ENTRY_DATE });
        }
    }
    return zip.generate({ type: 'nodebuffer', compression: 'DEFLATE' });
}
