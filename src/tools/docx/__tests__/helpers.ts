/**
 * In-memory DOCX fixtures for the test suite.
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import PizZip from 'pizzip';
import { NAMESPACES } from '../constants.js';
import { getParagraphText, wDescendants } from '../dom.js';
import { XmlEditor } from '../editor.js';
import type { OfficeCheck, OfficeValidator } from '../types.js';

export const W = NAMESPACES.W;

export const DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

export const CONTENT_TYPES =
    `${DECLARATION}\n` +
    `<Types xmlns="${NAMESPACES.CONTENT_TYPES}">` +
    '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
    '<Default Extension="xml" ContentType="application/xml"/>' +
    '<Default Extension="png" ContentType="image/png"/>' +
    '<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>' +
    '</Types>';

export const ROOT_RELS =
    `${DECLARATION}\n` +
    `<Relationships xmlns="${NAMESPACES.RELS}">` +
    '<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>' +
    '</Relationships>';

export const STYLES = `${DECLARATION}\n<w:styles xmlns:w="${W}"><w:style w:type="paragraph" w:styleId="Normal"/></w:styles>`;

/** Four bytes of a PNG signature plus a few that are not valid UTF-8. */
/** An SVG drawing whose inter-element space is significant. */
export const SVG_IMAGE = '<svg xmlns="http://www.w3.org/2000/svg"><text><tspan>A</tspan> <tspan>B</tspan></text></svg>';

export const CONTENT_TYPES_WITH_SVG = CONTENT_TYPES.replace(
    '<Default Extension="png"',
    '<Default Extension="svg" ContentType="image/svg+xml"/><Default Extension="png"',
);

export const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00, 0xff, 0xfe, 0x10]);

export function documentXml(body: string): string {
    return `${DECLARATION}\n<w:document xmlns:w="${W}"><w:body>${body}</w:body></w:document>`;
}

export function headerXml(content: string): string {
    return `${DECLARATION}\n<w:hdr xmlns:w="${W}">${content}</w:hdr>`;
}

export function footerXml(content: string): string {
    return `${DECLARATION}\n<w:ftr xmlns:w="${W}">${content}</w:ftr>`;
}

/** `<w:p>` holding one run per text; `rPr` is inner run-property markup. */
export function para(...runs: string[]): string {
    return `<w:p>${runs.join('')}</w:p>`;
}

export function run(text: string, rPr = ''): string {
    const props = rPr ? `<w:rPr>${rPr}</w:rPr>` : '';
    return `<w:r>${props}<w:t xml:space="preserve">${text}</w:t></w:r>`;
}

export function minimalParts(body: string, extra: Record<string, string | Buffer> = {}): Record<string, string | Buffer> {
    return {
        '[Content_Types].xml': CONTENT_TYPES,
        '_rels/.rels': ROOT_RELS,
        'word/document.xml': documentXml(body),
        ...extra,
    };
}

export async function writeDocx(filePath: string, entries: Record<string, string | Buffer>): Promise<void> {
    const zip = new PizZip();
    for (const [name, data] of Object.entries(entries)) {
        if (typeof data === 'string') zip.file(name, data);
        else zip.file(name, data, { binary: true });
    }
    await fs.writeFile(filePath, zip.generate({ type: 'nodebuffer', compression: 'DEFLATE' }));
}

/** Write files straight into a directory, as if it had been unpacked. */
export async function writeTree(dir: string, entries: Record<string, string | Buffer>): Promise<void> {
    for (const [name, data] of Object.entries(entries)) {
        const target = path.join(dir, ...name.split('/'));
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, data);
    }
}

export async function makeTempDir(prefix = 'docx-test-'): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}

export function editorFor(body: string): XmlEditor {
    return XmlEditor.fromString(documentXml(body), 'word/document.xml');
}

export function paragraphTexts(editor: XmlEditor): string[] {
    return wDescendants(editor.document, 'p').map(getParagraphText);
}

export async function partTexts(dir: string, part = 'word/document.xml'): Promise<string[]> {
    return paragraphTexts(await XmlEditor.load(dir, part));
}

export class FakeValidator implements OfficeValidator {
    readonly name = 'fake';
    readonly checked: string[] = [];

    constructor(private readonly outcome: OfficeCheck) {}

    async check(archivePath: string): Promise<OfficeCheck> {
        this.checked.push(archivePath);
        return this.outcome;
    }
}
