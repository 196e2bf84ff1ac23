import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MissingPartError, PathTraversalError } from '../errors.js';
import { assertPartExists, isDocxPath, listTreeFiles, resolveEntryPath } from '../utils/paths.js';
import { makeTempDir, removeDir, writeTree } from './helpers.js';

describe('resolveEntryPath', () => {
    const root = path.resolve('/tmp/dest');

    it('resolves ordinary entry names under the destination', () => {
        expect(resolveEntryPath('/tmp/dest', 'word/document.xml')).toBe(path.join(root, 'word', 'document.xml'));
        expect(resolveEntryPath('/tmp/dest', 'word/./media/a.png')).toBe(path.join(root, 'word', 'media', 'a.png'));
        expect(resolveEntryPath('/tmp/dest', '[Content_Types].xml')).toBe(path.join(root, '[Content_Types].xml'));
    });

    it.each([
        '../evil.xml',
        'word/../../evil.xml',
        '/etc/passwd',
        'C:/windows/evil.xml',
        'word\\..\\evil.xml',
        'word/evil\0.xml',
        '.',
    ])('rejects %j', (name) => {
        expect(() => resolveEntryPath('/tmp/dest', name)).toThrow(PathTraversalError);
    });
});

describe('isDocxPath', () => {
    it('matches the extension case-insensitively', () => {
        expect(isDocxPath('form.docx')).toBe(true);
        expect(isDocxPath('FORM.DOCX')).toBe(true);
        expect(isDocxPath('form.doc')).toBe(false);
        expect(isDocxPath('form.docx.zip')).toBe(false);
    });
});

describe('tree helpers', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('lists files with forward slashes and skips directories', async () => {
        await writeTree(dir, { '_rels/.rels': 'r', 'word/document.xml': 'd', 'word/media/image1.png': 'p' });
        await fs.mkdir(path.join(dir, 'empty'));

        expect((await listTreeFiles(dir)).sort()).toEqual(['_rels/.rels', 'word/document.xml', 'word/media/image1.png']);
    });

    it('requires a part to be a regular file', async () => {
        await writeTree(dir, { 'word/document.xml': 'd' });

        await expect(assertPartExists(dir, 'word/document.xml')).resolves.toBeUndefined();
        await expect(assertPartExists(dir, 'word')).rejects.toBeInstanceOf(MissingPartError);
        await expect(assertPartExists(dir, '_rels/.rels')).rejects.toThrow(
            `Mandatory part _rels/.rels is missing from ${dir}`,
        );
    });
});
