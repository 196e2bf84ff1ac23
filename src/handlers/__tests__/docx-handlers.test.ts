import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { callTool, TOOLS } from '../../server.js';
import type { ServerResult } from '../../types.js';
import { documentXml, minimalParts, para, run, writeTree } from '../../tools/docx/__tests__/helpers.js';

function textOf(result: ServerResult): string {
    const [first] = result.content;
    return first && first.type === 'text' ? first.text : '';
}

describe('docx tool handlers', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'docx-handlers-'));
        vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('lists every tool with an object input schema', () => {
        expect(TOOLS.map((t) => t.name)).toEqual([
            'unpack_docx',
            'find_placeholders',
            'insert_placeholders',
            'fill_fields',
            'fill_table',
            'verify_fill',
            'extract_data',
            'pack_docx',
        ]);
        const fill = TOOLS.find((t) => t.name === 'fill_fields');
        expect(fill?.inputSchema.type).toBe('object');
        expect(fill?.inputSchema.required).toEqual(['directory']);
    });

    it('find_placeholders returns the list as JSON', async () => {
        await writeTree(dir, minimalParts(para(run('{{b}} {{a}} {{b}}'))));

        const result = await callTool('find_placeholders', { directory: dir });

        expect(result.isError).toBeUndefined();
        expect(JSON.parse(textOf(result))).toEqual({ placeholders: ['b', 'a'], count: 2 });
    });

    it('find_placeholders writes the list file when asked', async () => {
        await writeTree(dir, minimalParts(para(run('{{a}}'))));
        const outputFile = path.join(dir, 'lists', 'placeholders.json');

        await callTool('find_placeholders', { directory: dir, outputFile });

        expect(await fs.readFile(outputFile, 'utf8')).toBe('{\n  "placeholders": [\n    "a"\n  ],\n  "count": 1\n}\n');
    });

    it('fill_fields reads a mapping file and summarises', async () => {
        await writeTree(dir, minimalParts(para(run('{{a}}'))));
        const mappingFile = path.join(dir, 'mapping.json');
        await fs.writeFile(mappingFile, JSON.stringify({ a: 'one', z: 'two' }));

        const result = await callTool('fill_fields', { directory: dir, mappingFile });
        const body = JSON.parse(textOf(result));

        expect(body.filled).toEqual(['a']);
        expect(body.summary).toBe('Filled 1 field(s), skipped 1');
        expect(await fs.readFile(path.join(dir, 'word/document.xml'), 'utf8')).toContain('>one</w:t>');
    });

    it('fill_fields needs a mapping', async () => {
        const result = await callTool('fill_fields', { directory: dir });

        expect(result.isError).toBe(true);
        expect(result._meta?.code).toBe('INVALID_ARGUMENTS');
        expect(textOf(result)).toBe('Error: Invalid arguments for fill_fields: fieldMapping: Provide fieldMapping or mappingFile');
    });

    it('pack_docx refuses an output that is not a .docx', async () => {
        const result = await callTool('pack_docx', { directory: dir, outputPath: path.join(dir, 'out.zip') });

        expect(result.isError).toBe(true);
        expect(result._meta?.code).toBe('INVALID_PATH');
    });

    it('carries the error code of a failed operation', async () => {
        const result = await callTool('unpack_docx', {
            archivePath: path.join(dir, 'missing.docx'),
            destinationDir: path.join(dir, 'out'),
        });

        expect(result.isError).toBe(true);
        expect(result._meta?.code).toBe('UNPACK_FAILED');
    });

    it('verify_fill reports problems in its result, not as an error', async () => {
        await writeTree(dir, { 'word/document.xml': documentXml('') });
        const result = await callTool('verify_fill', { directory: dir });
        const report = JSON.parse(textOf(result));

        expect(result.isError).toBeUndefined();
        expect(report.valid).toBe(false);
        expect(report.failed).toEqual([
            { check: 'document_integrity', message: 'Mandatory part [Content_Types].xml is missing' },
            { check: 'document_integrity', message: 'Mandatory part _rels/.rels is missing' },
        ]);
    });

    it('fill_table reports a missing table with its error code', async () => {
        await writeTree(dir, minimalParts(para(run('no tables here'))));

        const result = await callTool('fill_table', { directory: dir, tableIndex: 0, rows: [{ Item: 'Pen' }] });

        expect(result.isError).toBe(true);
        expect(result._meta?.code).toBe('TABLE_NOT_FOUND');
    });

    it('extract_data renames values to template field names', async () => {
        const control =
            '<w:sdt><w:sdtPr><w:alias w:val="Client"/></w:sdtPr>' +
            `<w:sdtContent>${para(run(' Acme Ltd '))}</w:sdtContent></w:sdt>`;
        await writeTree(dir, minimalParts(control));

        const result = await callTool('extract_data', { directory: dir, fieldNames: { Client: 'client_name' } });
        const body = JSON.parse(textOf(result));

        expect(body.structuredFields).toEqual({ Client: 'Acme Ltd' });
        expect(body.values).toEqual({ client_name: 'Acme Ltd' });
    });

    it('rejects unknown tools', async () => {
        const result = await callTool('print_docx', {});

        expect(result.isError).toBe(true);
        expect(textOf(result)).toBe('Error: Unknown tool: print_docx');
    });
});
