import { describe, it, expect } from 'vitest';
import { NAMESPACES } from '../constants.js';
import { findDirectChild, getParagraphText, nodeListToArray, textOf, wChildren, wDescendants } from '../dom.js';
import { XmlEditor } from '../editor.js';
import { W, editorFor, para, run } from './helpers.js';

function localNames(el: Element): string[] {
    return nodeListToArray(el.childNodes)
        .filter((n): n is Element => n.nodeType === 1)
        .map((n) => n.localName);
}

describe('XmlEditor queries', () => {
    const body =
        '<w:p><w:pPr><w:pStyle w:val="Heading1"/></w:pPr>' + run('Invoice') + '</w:p>' +
        para(run('Total due: '), run('42')) +
        para(run('Notes'));

    it('finds the first node matching exact text', () => {
        const editor = editorFor(body);
        const p = editor.findNode('w:p', { text: 'Total due: 42' });
        expect(p).not.toBeNull();
        expect(p && getParagraphText(p)).toBe('Total due: 42');
    });

    it('matches substrings and attributes', () => {
        const editor = editorFor(body);
        expect(editor.findAllNodes('w:t', { contains: 'ot' }).map(textOf)).toEqual(['Total due: ', 'Notes']);
        expect(editor.findAllNodes('w:pStyle', { attribute: 'w:val', value: 'Heading1' })).toHaveLength(1);
    });

    it('returns null rather than throwing when nothing matches', () => {
        expect(editorFor(body).findNode('w:p', { text: 'Missing' })).toBeNull();
    });

    it('re-evaluates the tree on every call', () => {
        const editor = editorFor(body);
        expect(editor.findAllNodes('w:r')).toHaveLength(4);
        const last = editor.findAllNodes('w:p')[2];
        editor.appendRun(last, ' (draft)');
        expect(editor.findAllNodes('w:r')).toHaveLength(5);
    });

    it('resolves tags by namespace whatever the prefix', () => {
        const xml = `<x:document xmlns:x="${W}"><x:body><x:p><x:r><x:t>Prefixed</x:t></x:r></x:p></x:body></x:document>`;
        const editor = XmlEditor.fromString(xml, 'word/document.xml');
        const p = editor.findNode('w:p', { text: 'Prefixed' });
        expect(p).not.toBeNull();
        if (p) editor.appendRun(p, '!');
        expect(editor.serialize('condensed')).toContain('<x:r><x:t>!</x:t></x:r>');
    });
});

describe('XmlEditor mutations', () => {
    it('replaces text without touching the run properties', () => {
        const editor = editorFor(para(run('old', '<w:b/><w:color w:val="C00000"/>')));
        const [t] = editor.findAllNodes('w:t');
        editor.replaceText(t, 'new');

        const [r] = editor.findAllNodes('w:r');
        expect(localNames(r)).toEqual(['rPr', 't']);
        const rPr = findDirectChild(r, 'rPr');
        expect(rPr ? localNames(rPr) : []).toEqual(['b', 'color']);
        expect(textOf(t)).toBe('new');
    });

    it('marks text with edge whitespace as preserved', () => {
        const editor = editorFor('<w:p><w:r><w:t>x</w:t></w:r></w:p>');
        const [t] = editor.findAllNodes('w:t');
        editor.replaceText(t, ' padded');
        expect(t.getAttributeNS(NAMESPACES.XML, 'space')).toBe('preserve');
    });

    it('escapes markup characters in values', () => {
        const editor = editorFor(para(run('x')));
        const [t] = editor.findAllNodes('w:t');
        editor.replaceText(t, 'R&D <team>');

        const xml = editor.serialize('condensed');
        expect(xml).toContain('R&amp;D &lt;team');
        const reparsed = XmlEditor.fromString(xml, 'word/document.xml');
        expect(textOf(reparsed.findAllNodes('w:t')[0])).toBe('R&D <team>');
    });

    it('inserts a run directly after its anchor with cloned properties', () => {
        const editor = editorFor(para(run('A', '<w:i/>'), run('C')));
        const [first, second] = editor.findAllNodes('w:r');
        const rPr = editor.runProperties(first);
        const inserted = editor.insertRunAfter(first, 'B', rPr);

        const p = editor.findAllNodes('w:p')[0];
        expect(wChildren(p, 'r')).toEqual([first, inserted, second]);
        expect(getParagraphText(p)).toBe('ABC');
        const copy = findDirectChild(inserted, 'rPr');
        expect(copy).not.toBe(rPr);
        expect(copy ? localNames(copy) : []).toEqual(['i']);
    });

    it('folds a placeholder spread over consecutive runs into the first run', () => {
        const editor = editorFor(para(run('{{', '<w:b/>'), run('na'), run('me}} end')));
        const p = editor.findAllNodes('w:p')[0];
        const [match] = editor.findMatches(p, '{{name}}');
        expect(match.segments).toHaveLength(3);

        const folded = editor.splitPlaceholderAcrossRuns(match);
        expect(folded && textOf(folded.node)).toBe('{{name}}');
        expect(folded?.offset).toBe(0);
        expect(editor.findAllNodes('w:t').map(textOf)).toEqual(['{{name}}', '', ' end']);
        expect(getParagraphText(p)).toBe('{{name}} end');
    });

    it('refuses to fold runs separated by other markup', () => {
        const editor = editorFor(
            '<w:p>' + run('{{na') + '<w:bookmarkStart w:id="0" w:name="m"/>' + run('me}}') + '</w:p>',
        );
        const p = editor.findAllNodes('w:p')[0];
        const [match] = editor.findMatches(p, '{{name}}');
        expect(editor.isFoldable(match)).toBe(false);
        expect(editor.splitPlaceholderAcrossRuns(match)).toBeNull();
    });

    it('ignores matches overlapping text it wrote itself', () => {
        const editor = editorFor(para(run('{{a}}')));
        const p = editor.findAllNodes('w:p')[0];
        const [t] = editor.findAllNodes('w:t');
        editor.replaceRange(t, 0, 5, '{{b}}');
        expect(getParagraphText(p)).toBe('{{b}}');
        expect(editor.findMatches(p, '{{b}}')).toEqual([]);
    });

    it('removes only runs that hold nothing', () => {
        const editor = editorFor(
            '<w:p><w:r><w:rPr><w:b/></w:rPr><w:t></w:t></w:r><w:r><w:tab/><w:t></w:t></w:r></w:p>',
        );
        const [emptyRun, tabRun] = editor.findAllNodes('w:r');
        expect(editor.removeRunIfEmpty(emptyRun)).toBe(true);
        expect(editor.removeRunIfEmpty(tabRun)).toBe(false);
        expect(editor.findAllNodes('w:r')).toEqual([tabRun]);
    });

    it('derives run properties from the paragraph mark without revision marks', () => {
        const editor = editorFor(
            '<w:p><w:pPr><w:rPr><w:ins w:id="1" w:author="Reviewer"/><w:b/><w:sz w:val="28"/></w:rPr></w:pPr></w:p>',
        );
        const p = editor.findAllNodes('w:p')[0];
        const props = editor.paragraphMarkProperties(p);
        expect(props ? localNames(props) : null).toEqual(['b', 'sz']);
        expect(wDescendants(p, 'ins')).toHaveLength(1);
    });
});
