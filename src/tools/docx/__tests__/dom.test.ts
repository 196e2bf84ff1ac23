import { describe, it, expect } from 'vitest';
import { cellSpan, getCellText, getParagraphText, parseXml, serializeXml, wDescendants } from '../dom.js';
import { XmlParseError } from '../errors.js';
import { W, documentXml, para, run } from './helpers.js';

const SAMPLE = `<w:document xmlns:w="${W}"><w:body><w:p><w:r><w:t xml:space="preserve"> a </w:t></w:r></w:p></w:body></w:document>`;

describe('parseXml', () => {
    it('raises XmlParseError naming the part on malformed input', () => {
        const broken = `<w:document xmlns:w="${W}"><w:body></w:document>`;
        expect(() => parseXml(broken, 'word/document.xml')).toThrow(XmlParseError);
        expect(() => parseXml(broken, 'word/document.xml')).toThrow(/^Malformed XML in word\/document\.xml: /);
    });

    it('raises on a mismatched end tag inside an otherwise closed root', () => {
        const broken = `<w:hdr xmlns:w="${W}"><w:p></w:hdr>`;
        expect(() => parseXml(broken, 'word/header1.xml')).toThrow(XmlParseError);
        expect(() => parseXml(broken, 'word/header1.xml')).toThrow(/^Malformed XML in word\/header1\.xml: /);
    });

    it('raises on an attribute value without quotes', () => {
        const broken = `<w:document xmlns:w="${W}"><w:body w:x=1></w:body></w:document>`;
        expect(() => parseXml(broken, 'word/document.xml')).toThrow(XmlParseError);
    });

    it('accepts a leading byte-order mark', () => {
        const doc = parseXml('\uFEFF' + documentXml(para(run('x'))), 'word/document.xml');
        expect(wDescendants(doc, 'p')).toHaveLength(1);
    });
});

describe('serializeXml', () => {
    it('indents element-only containers by two spaces', () => {
        const out = serializeXml(parseXml(SAMPLE, 'x.xml'), 'pretty');
        expect(out).toBe(
            [
                `<w:document xmlns:w="${W}">`,
                '  <w:body>',
                '    <w:p>',
                '      <w:r>',
                '        <w:t xml:space="preserve"> a </w:t>',
                '      </w:r>',
                '    </w:p>',
                '  </w:body>',
                '</w:document>',
                '',
            ].join('\n'),
        );
    });

    it('condenses back to a single line without touching text', () => {
        const pretty = serializeXml(parseXml(SAMPLE, 'x.xml'), 'pretty');
        expect(serializeXml(parseXml(pretty, 'x.xml'), 'condensed')).toBe(SAMPLE);
    });

    it('pretty-printing a condensed tree gives the same pretty tree', () => {
        const source = documentXml(
            para(run('Hello ', '<w:b/>'), run('{{name}}')) +
                '<w:tbl><w:tr><w:tc><w:p/></w:tc></w:tr></w:tbl>',
        );
        const pretty = serializeXml(parseXml(source, 'x.xml'), 'pretty');
        const condensed = serializeXml(parseXml(source, 'x.xml'), 'condensed');
        expect(serializeXml(parseXml(condensed, 'x.xml'), 'pretty')).toBe(pretty);
    });

    it('keeps the XML declaration', () => {
        const out = serializeXml(parseXml(documentXml(para()), 'x.xml'), 'condensed');
        expect(out.startsWith('<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n<w:document')).toBe(true);
    });
});

describe('paragraph and cell text', () => {
    it('concatenates the runs of a paragraph', () => {
        const doc = parseXml(documentXml(para(run('Hel'), run('lo'))), 'x.xml');
        expect(getParagraphText(wDescendants(doc, 'p')[0])).toBe('Hello');
    });

    it('joins cell paragraphs and reads gridSpan', () => {
        const cell =
            '<w:tc><w:tcPr><w:gridSpan w:val="3"/></w:tcPr>' + para(run(' First ')) + para(run('Second')) + '</w:tc>';
        const doc = parseXml(documentXml(`<w:tbl><w:tr>${cell}</w:tr></w:tbl>`), 'x.xml');
        const tc = wDescendants(doc, 'tc')[0];
        expect(getCellText(tc)).toBe('First Second');
        expect(cellSpan(tc)).toBe(3);
    });
});
