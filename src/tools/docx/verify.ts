/**
 * Post-fill verification in three tiers:
 *
 *   1. placeholder completion — no expected `{{field}}` left, no content
 *      control for an expected field left empty;
 *   2. document integrity — mandatory and optional parts, XML declaration;
 *   3. well-formedness of every .xml / .rels file in the tree.
 *
 * Problems are reported, never thrown.
 */

import fs from 'fs/promises';
import path from 'path';
import { DOCX_PATHS, MANDATORY_PARTS, OPTIONAL_PARTS, placeholderToken } from './constants.js';
import { findDirectChild, getParagraphText, parseXml, textOf, wDescendants } from './dom.js';
import { XmlParseError } from './errors.js';
import { controlNames } from './strategies/structured-field.js';
import type { VerificationCheck, VerificationReport } from './types.js';
import { listTreeFiles } from './utils/paths.js';
import { logger } from '../../utils/logger.js';

export async function verifyFill(dir: string, expectedFields: string[]): Promise<VerificationReport> {
    const report: VerificationReport = { passed: [], failed: [], warnings: [], valid: false };

    await checkCompletion(dir, expectedFields, report);
    await checkIntegrity(dir, report);
    await checkWellFormed(dir, report);

    report.valid = report.failed.length === 0;
    logger.info(
        `Verification of ${dir}: ${report.passed.length} passed, ${report.failed.length} failed, ${report.warnings.length} warning(s)`,
    );
    return report;
}

// ─── Tier 1 ──────────────────────────────────────────────────────────

async function checkCompletion(dir: string, expectedFields: string[], report: VerificationReport): Promise<void> {
    const check = 'placeholder_completion';
    let doc: Document;
    try {
        doc = parseXml(await readPart(dir, DOCX_PATHS.DOCUMENT_XML), DOCX_PATHS.DOCUMENT_XML);
    } catch (error) {
        report.failed.push(entry(check, `Cannot read ${DOCX_PATHS.DOCUMENT_XML}: ${describe(error)}`));
        return;
    }

    const text = wDescendants(doc, 'p').map(getParagraphText).join('\n');
    const expected = new Set(expectedFields);

    for (const field of expectedFields) {
        if (text.includes(placeholderToken(field))) {
            report.failed.push(entry(check, `${placeholderToken(field)} is still present`));
        } else {
            report.passed.push(entry(check, `${field} filled`));
        }
    }

    for (const sdt of wDescendants(doc, 'sdt')) {
        const name = controlNames(sdt).find((n) => expected.has(n));
        if (!name) continue;
        const content = findDirectChild(sdt, 'sdtContent');
        if (!content || textOf(content).trim() === '') {
            report.failed.push(entry(check, `Structured field "${name}" is empty`));
        }
    }
}

// ─── Tier 2 ──────────────────────────────────────────────────────────

async function checkIntegrity(dir: string, report: VerificationReport): Promise<void> {
    const check = 'document_integrity';

    for (const part of MANDATORY_PARTS) {
        if (await exists(dir, part)) report.passed.push(entry(check, `${part} present`));
        else report.failed.push(entry(check, `Mandatory part ${part} is missing`));
    }
    for (const part of OPTIONAL_PARTS) {
        if (!(await exists(dir, part))) report.warnings.push(entry(check, `Optional part ${part} is missing`));
    }

    if (await exists(dir, DOCX_PATHS.DOCUMENT_XML)) {
        const xml = await readPart(dir, DOCX_PATHS.DOCUMENT_XML);
        if (xml.replace(/^\uFEFF/, '').startsWith('<?xml')) {
            report.passed.push(entry(check, `${DOCX_PATHS.DOCUMENT_XML} has an XML declaration`));
        } else {
            report.warnings.push(entry(check, `${DOCX_PATHS.DOCUMENT_XML} has no XML declaration`));
        }
    }
}

// ─── Tier 3 ──────────────────────────────────────────────────────────

async function checkWellFormed(dir: string, report: VerificationReport): Promise<void> {
    const check = 'xml_well_formed';
    const files = (await listTreeFiles(dir)).filter((f) => /\.(xml|rels)$/i.test(f));

    let good = 0;
    for (const file of files) {
        try {
            parseXml(await readPart(dir, file), file);
            good++;
        } catch (error) {
            if (!(error instanceof XmlParseError)) throw error;
            report.failed.push(entry(check, error.message));
        }
    }
    if (good === files.length) report.passed.push(entry(check, `${good} XML file(s) well-formed`));
}

// ─── Helpers ─────────────────────────────────────────────────────────

function entry(check: string, message: string): VerificationCheck {
    return { check, message };
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function readPart(dir: string, part: string): Promise<string> {
    return fs.readFile(path.join(dir, part), 'utf8');
}

async function exists(dir: string, part: string): Promise<boolean> {
    return fs.stat(path.join(dir, part)).then((s) => s.isFile(), () => false);
}
