/**
 * Office-suite validation of packed archives.
 *
 * The default validator asks LibreOffice (`soffice`) to convert the
 * archive to HTML in a scratch directory; an archive it cannot open
 * produces no output.  A missing binary or a timeout means "unavailable",
 * which the packer turns into a skip under `force`.
 */

import { execFile } from 'child_process';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { promisify } from 'util';
import type { OfficeCheck, OfficeValidator } from './types.js';
import { logger } from '../../utils/logger.js';

const execFileAsync = promisify(execFile);

export const DEFAULT_VALIDATION_TIMEOUT_MS = 10000;

export interface SofficeValidatorOptions {
    /** Executable name or path. Default `soffice`. */
    binary?: string;
    timeoutMs?: number;
}

export class SofficeValidator implements OfficeValidator {
    readonly name = 'soffice';
    private readonly binary: string;
    private readonly timeoutMs: number;

    constructor(options: SofficeValidatorOptions = {}) {
        this.binary = options.binary ?? 'soffice';
        this.timeoutMs = options.timeoutMs ?? DEFAULT_VALIDATION_TIMEOUT_MS;
    }

    async check(archivePath: string): Promise<OfficeCheck> {
        const outDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docx-validate-'));
        try {
            await execFileAsync(
                this.binary,
                ['--headless', '--convert-to', 'html', '--outdir', outDir, archivePath],
                { timeout: this.timeoutMs },
            );
            const stem = path.basename(archivePath, path.extname(archivePath));
            const converted = await fs
                .access(path.join(outDir, `${stem}.html`))
                .then(() => true, () => false);
            return converted
                ? { kind: 'passed' }
                : { kind: 'failed', message: `${this.binary} could not open ${path.basename(archivePath)}` };
        } catch (error) {
            return this.classify(error);
        } finally {
            await fs.rm(outDir, { recursive: true, force: true });
        }
    }

    private classify(error: unknown): OfficeCheck {
        if (!(error instanceof Error)) return { kind: 'failed', message: String(error) };

        if ('code' in error && error.code === 'ENOENT') {
            return { kind: 'unavailable', reason: `${this.binary} not found` };
        }
        if ('killed' in error && error.killed === true) {
            return { kind: 'unavailable', reason: `${this.binary} timed out after ${this.timeoutMs} ms` };
        }
        const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : '';
        logger.debug(`${this.binary} exited with an error`, error.message);
        return { kind: 'failed', message: stderr || error.message };
    }
}
