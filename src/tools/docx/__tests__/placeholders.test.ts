import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { MissingPartError } from '../errors.js';
import { findPlaceholders, findPlaceholdersInTree, scanPlaceholders, writePlaceholderList } from '../placeholders.js';
import {
    CONTENT_TYPES,
    ROOT_RELS,
    documentXml,
    editorFor,
    footerXml,
    headerXml,
    makeTempDir,
    para,
    removeDir,
    run,
    writeTree,
} from './helpers.js';

describe('scanPlaceholders', () => {
    it('returns valid names only, first-seen order, no duplicates', () => {
        const text = '{{alpha}} and {{ beta }} and {gamma} and {delta}} and {{epsilon_2}} and {{alpha}} and {{zeta';
        expect(scanPlaceholders(text)).toEqual(['alpha', 'epsilon_2']);
    });

    it('is case-sensitive', () => {
        expect(scanPlaceholders('{{Name}} {{name}}')).toEqual(['Name', 'name']);
    });

    it('returns an empty list when there is nothing to find', () => {
        expect(scanPlaceholders('No fields here.')).toEqual([]);
    });
});

describe('findPlaceholders', () => {
    it('finds tokens split across runs but not across paragraphs', () => {
        const editor = editorFor(
            para(run('Dear {{first'), run('_name', '<w:b/>'), run('}},')) +
                para(run('{{spl')) +
                para(run('it}} {{ bad }} {{city}}')),
        );
        expect(findPlaceholders(editor)).toEqual(['first_name', 'city']);
    });

    it('does not modify the part', () => {
        const editor = editorFor(para(run('{{a}}')));
        const before = editor.serialize('condensed');
        findPlaceholders(editor);
        expect(editor.serialize('condensed')).toBe(before);
    });
});

describe('findPlaceholdersInTree', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
        await writeTree(dir, {
            '[Content_Types].xml': CONTENT_TYPES,
            '_rels/.rels': ROOT_RELS,
            'word/document.xml': documentXml(para(run('{{body}} {{shared}}'))),
            'word/header10.xml': headerXml(para(run('{{h10}}'))),
            'word/header2.xml': headerXml(para(run('{{h2}}'))),
            'word/header1.xml': headerXml(para(run('{{h1}} {{shared}}'))),
            'word/footer1.xml': footerXml(para(run('{{page_note}}'))),
        });
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('scans the document, then headers and footers in numeric order', async () => {
        expect(await findPlaceholdersInTree(dir)).toEqual(['body', 'shared', 'h1', 'h2', 'h10', 'page_note']);
    });

    it('can be limited to the main document part', async () => {
        expect(await findPlaceholdersInTree(dir, { includeHeadersFooters: false })).toEqual(['body', 'shared']);
    });

    it('fails with MissingPartError when the main part is absent', async () => {
        await fs.rm(path.join(dir, 'word', 'document.xml'));
        await expect(findPlaceholdersInTree(dir)).rejects.toBeInstanceOf(MissingPartError);
    });

    it('writes the placeholder list file', async () => {
        const file = path.join(dir, 'out', 'placeholders.json');
        const list = await writePlaceholderList(file, ['body', 'shared']);

        expect(list).toEqual({ placeholders: ['body', 'shared'], count: 2 });
        expect(JSON.parse(await fs.readFile(file, 'utf8'))).toEqual({ placeholders: ['body', 'shared'], count: 2 });
    });
});
