/**
 * DOM utilities for DOCX XML manipulation.
 *
 * Single Responsibility: XML parsing, whitespace layout, serialisation and
 * WordprocessingML navigation.  No file I/O — every function works on
 * in-memory DOM nodes.
 *
 * Uses @xmldom/xmldom for parsing and serialisation so that the
 * document-order of nodes (and of attributes) is always preserved.
 */

import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { NAMESPACES, TEXT_ELEMENTS } from './constants.js';
import { XmlParseError } from './errors.js';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

const INDENT = '  ';

export type XmlLayout = 'pretty' | 'condensed';

// ═══════════════════════════════════════════════════════════════════════
// XML parse / serialize
// ═══════════════════════════════════════════════════════════════════════

/**
 * Parse a part.  Any parser diagnostic raises XmlParseError naming
 * `part`, so a malformed part is never half-loaded.
 *
 * xmldom 0.8 recovers from unclosed and mismatched tags and reports them
 * only as warnings, so warnings fail the parse too.
 */
export function parseXml(xmlStr: string, part: string): Document {
    const source = xmlStr.charCodeAt(0) === 0xfeff ? xmlStr.slice(1) : xmlStr;
    let firstError: string | null = null;
    const fail = (msg: unknown): never => {
        // xmldom re-reports an error thrown from inside its element loop; keep the original text.
        firstError ??= String(msg).trim();
        throw new XmlParseError(part, firstError);
    };

    const parser = new DOMParser({
        errorHandler: { warning: fail, error: fail, fatalError: fail },
    });
    const doc = parser.parseFromString(source, 'application/xml');
    if (!doc || !doc.documentElement) {
        throw new XmlParseError(part, 'document has no root element');
    }
    return doc;
}

/**
 * Serialise a document.
 *
 * `pretty` re-indents element-only containers with two spaces;
 * `condensed` strips that indentation.  Text-bearing elements and
 * mixed content are left exactly as they are in both layouts, so
 * `pretty(condensed(x)) === pretty(x)`.
 *
 * Mutates the whitespace text nodes of `doc`.
 */
export function serializeXml(doc: Document, layout: XmlLayout = 'condensed'): string {
    reflow(doc.documentElement, layout === 'pretty' ? 0 : null);

    const serializer = new XMLSerializer();
    const parts: string[] = [];
    for (const node of nodeListToArray(doc.childNodes)) {
        // whitespace between the declaration and the root is re-created by the join
        if (node.nodeType === TEXT_NODE) continue;
        parts.push(serializer.serializeToString(node));
    }
    return parts.join('\n') + (layout === 'pretty' ? '\n' : '');
}

function reflow(el: Element, depth: number | null): void {
    if (isTextElement(el)) return;

    const children = nodeListToArray(el.childNodes);
    const hasElementChild = children.some((n) => n.nodeType === ELEMENT_NODE);
    const hasSignificantText = children.some(
        (n) =>
            n.nodeType === CDATA_SECTION_NODE ||
            (n.nodeType === TEXT_NODE && (n.nodeValue ?? '').trim() !== ''),
    );

    if (hasElementChild && !hasSignificantText) {
        for (const child of children) {
            if (child.nodeType === TEXT_NODE) el.removeChild(child);
        }
        const doc = el.ownerDocument;
        if (depth !== null && doc) {
            const inner = '\n' + INDENT.repeat(depth + 1);
            for (const child of nodeListToArray(el.childNodes)) {
                el.insertBefore(doc.createTextNode(inner), child);
            }
            el.appendChild(doc.createTextNode('\n' + INDENT.repeat(depth)));
        }
    }

    for (const child of nodeListToArray(el.childNodes)) {
        if (isElement(child)) reflow(child, depth === null ? null : depth + 1);
    }
}

/** w:t / w:delText / w:instrText, or anything under xml:space="preserve". */
function isTextElement(el: Element): boolean {
    if (el.namespaceURI === NAMESPACES.W && TEXT_ELEMENTS.has(el.localName)) return true;
    return el.getAttribute('xml:space') === 'preserve';
}

// ═══════════════════════════════════════════════════════════════════════
// Generic DOM helpers
// ═══════════════════════════════════════════════════════════════════════

/**
 * Convert any NodeList / HTMLCollection-like object into a real array.
 */
export function nodeListToArray<T extends Node = Node>(
    nl: { length: number; item(index: number): T | null },
): T[] {
    const arr: T[] = [];
    for (let i = 0; i < nl.length; i++) {
        const n = nl.item(i);
        if (n) arr.push(n);
    }
    return arr;
}

export function isElement(node: Node | null | undefined): node is Element {
    return !!node && node.nodeType === ELEMENT_NODE;
}

/** Next sibling that is an element, skipping text and comments. */
export function nextElementSibling(el: Element): Element | null {
    let node = el.nextSibling;
    while (node && !isElement(node)) node = node.nextSibling;
    return node;
}

// ═══════════════════════════════════════════════════════════════════════
// WordprocessingML navigation
// ═══════════════════════════════════════════════════════════════════════

/** True when `node` is the WordprocessingML element `w:<local>`, whatever its prefix. */
export function isW(node: Node | null | undefined, local: string): node is Element {
    return isElement(node) && node.namespaceURI === NAMESPACES.W && node.localName === local;
}

/** Live re-evaluation of every `w:<local>` below `root`, in document order. */
export function wDescendants(root: Element | Document, local: string): Element[] {
    return nodeListToArray(root.getElementsByTagNameNS(NAMESPACES.W, local));
}

export function wChildren(parent: Element, local: string): Element[] {
    return nodeListToArray(parent.childNodes).filter((n): n is Element => isW(n, local));
}

/** Find the first direct child element `w:<local>`. */
export function findDirectChild(parent: Element, local: string): Element | null {
    return wChildren(parent, local)[0] ?? null;
}

/** Nearest ancestor-or-self `w:<local>`. */
export function closestW(node: Node | null, local: string): Element | null {
    let current: Node | null = node;
    while (current) {
        if (isW(current, local)) return current;
        current = current.parentNode;
    }
    return null;
}

/** Prefix the document binds to the WordprocessingML namespace (usually `w`). */
export function wPrefix(node: Node): string {
    if (isElement(node) && node.namespaceURI === NAMESPACES.W && node.prefix) return node.prefix;
    const doc = isDocument(node) ? node : node.ownerDocument;
    return doc?.documentElement?.lookupPrefix(NAMESPACES.W) ?? 'w';
}

function isDocument(node: Node): node is Document {
    return node.nodeType === 9;
}

/** Create `w:<local>` in the owning document, using the document's own prefix. */
export function createW(ref: Element, local: string): Element {
    const doc = ref.ownerDocument;
    if (!doc) throw new Error(`Cannot create w:${local}: node is detached from its document`);
    return doc.createElementNS(NAMESPACES.W, `${wPrefix(ref)}:${local}`);
}

/** `w:val` of a `w:<local>` property child, e.g. w:alias/@w:val. */
export function wVal(parent: Element, local: string): string | null {
    const child = findDirectChild(parent, local);
    if (!child) return null;
    return child.getAttributeNS(NAMESPACES.W, 'val') || child.getAttribute(`${wPrefix(child)}:val`) || null;
}

/** Return w:body for the main part, the root element (w:hdr / w:ftr) otherwise. */
export function getContentRoot(doc: Document): Element {
    return wDescendants(doc, 'body')[0] ?? doc.documentElement;
}

/**
 * Return ALL direct element children of the content root **in document order**.
 * Includes w:p, w:tbl, w:sdt, w:sectPr, etc.
 */
export function getBodyChildren(body: Element): Element[] {
    return nodeListToArray(body.childNodes).filter(isElement);
}

/**
 * Build a compact signature string from the body children array.
 * Maps each node's qualified name to its local name: "p,tbl,p,p,sectPr".
 */
export function bodySignature(children: Element[]): string {
    return children.map((ch) => ch.localName).join(',');
}

/** Count direct w:tbl children of body. */
export function countTables(children: Element[]): number {
    return children.filter((ch) => isW(ch, 'tbl')).length;
}

// ═══════════════════════════════════════════════════════════════════════
// Paragraph / cell text helpers
// ═══════════════════════════════════════════════════════════════════════

export function textOf(el: Element): string {
    return el.textContent ?? '';
}

/**
 * The w:t nodes that belong to `p` itself.  Text-box paragraphs nested
 * inside one of its runs belong to their own paragraph.
 */
export function paragraphTextNodes(p: Element): Element[] {
    return wDescendants(p, 't').filter((t) => closestW(t.parentNode, 'p') === p);
}

/** Concatenate text from the paragraph's own <w:t> nodes. */
export function getParagraphText(p: Element): string {
    return paragraphTextNodes(p).map(textOf).join('');
}

/** Paragraphs of a table cell, excluding those of nested tables. */
export function cellParagraphs(tc: Element): Element[] {
    return wDescendants(tc, 'p').filter((p) => closestW(p.parentNode, 'tc') === tc);
}

/**
 * Extract all text content from a table cell (w:tc).
 * Returns the concatenated text from all paragraphs in the cell.
 */
export function getCellText(tc: Element): string {
    return cellParagraphs(tc)
        .map((p) => getParagraphText(p).trim())
        .filter((text) => text.length > 0)
        .join(' ');
}

/** Width of a cell in grid columns (w:tcPr/w:gridSpan). */
export function cellSpan(tc: Element): number {
    const tcPr = findDirectChild(tc, 'tcPr');
    const span = tcPr ? Number(wVal(tcPr, 'gridSpan')) : NaN;
    return Number.isInteger(span) && span > 0 ? span : 1;
}
