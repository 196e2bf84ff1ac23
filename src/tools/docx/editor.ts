/**
 * XmlEditor — one parsed document part and the mutations the fill
 * strategies are allowed to make on it.
 *
 * The editor only ever changes text nodes, adds runs and removes runs a
 * strategy has emptied; paragraphs, tables and sections are never
 * touched.  It also remembers which character ranges it wrote during its
 * lifetime, so a value that happens to contain `{{other}}` is not picked
 * up again as a live placeholder.
 */

import fs from 'fs/promises';
import path from 'path';
import { NAMESPACES } from './constants.js';
import {
    closestW,
    createW,
    findDirectChild,
    getParagraphText,
    isElement,
    isW,
    nextElementSibling,
    nodeListToArray,
    paragraphTextNodes,
    parseXml,
    serializeXml,
    textOf,
    wDescendants,
    type XmlLayout,
} from './dom.js';
import type { NodePredicate, TextMatch, TextSegment, WordTag } from './types.js';

type Range = [start: number, end: number];

/** Revision markup allowed on a paragraph mark but not on a run. */
const MARK_ONLY_PROPERTIES = new Set(['ins', 'del', 'moveFrom', 'moveTo', 'rPrChange']);

export class XmlEditor {
    private readonly written = new Map<Element, Range[]>();

    private constructor(
        readonly part: string,
        readonly document: Document,
    ) {}

    static fromString(xml: string, part: string): XmlEditor {
        return new XmlEditor(part, parseXml(xml, part));
    }

    /** Load `<dir>/<part>`; `part` is the tree-relative name used in errors. */
    static async load(dir: string, part: string): Promise<XmlEditor> {
        const xml = await fs.readFile(path.join(dir, part), 'utf8');
        return XmlEditor.fromString(xml, part);
    }

    // ─── Queries ─────────────────────────────────────────────────────────

    findNode(tag: WordTag, predicate?: NodePredicate): Element | null {
        return this.findAllNodes(tag, predicate)[0] ?? null;
    }

    /** Re-evaluates the tree on every call; never returns a stale snapshot. */
    findAllNodes(tag: WordTag, predicate?: NodePredicate): Element[] {
        const local = tag.slice(2);
        return wDescendants(this.document, local).filter((el) => matchesPredicate(el, predicate));
    }

    /** Paragraph text split into its w:t segments, with offsets. */
    segments(paragraph: Element): TextSegment[] {
        const out: TextSegment[] = [];
        let offset = 0;
        for (const node of paragraphTextNodes(paragraph)) {
            const length = textOf(node).length;
            out.push({ node, run: closestW(node.parentNode, 'r'), start: offset, end: offset + length });
            offset += length;
        }
        return out;
    }

    /**
     * Occurrences of `token` in a paragraph, in order, skipping any that
     * overlap text this editor has already written.
     */
    findMatches(paragraph: Element, token: string): TextMatch[] {
        const segments = this.segments(paragraph);
        const text = segments.map((s) => textOf(s.node)).join('');
        const matches: TextMatch[] = [];

        let from = 0;
        for (;;) {
            const start = text.indexOf(token, from);
            if (start < 0) break;
            const end = start + token.length;
            const spanned = segments.filter((s) => s.end > s.start && s.end > start && s.start < end);

            if (spanned.some((s) => this.overlapsWritten(s, start, end))) {
                from = start + 1;
                continue;
            }
            matches.push({ paragraph, start, end, segments: spanned });
            from = end;
        }
        return matches;
    }

    /**
     * True when the match lies in one run, or in runs that follow each other
     * directly under the same parent — a fragment set that can be folded
     * into its first run without moving text across other markup.
     */
    isFoldable(match: TextMatch): boolean {
        for (let i = 0; i < match.segments.length; i++) {
            const seg = match.segments[i];
            if (!seg.run) return false;
            if (i === 0) continue;

            const prev = match.segments[i - 1];
            if (seg.run === prev.run) {
                if (nextElementSibling(prev.node) !== seg.node) return false;
            } else if (!prev.run || nextElementSibling(prev.run) !== seg.run) {
                return false;
            }
        }
        return match.segments.length > 0;
    }

    // ─── Mutations ───────────────────────────────────────────────────────

    /**
     * Fold a placeholder whose characters are spread over consecutive runs
     * into the first run's text node, leaving the other fragments' leftover
     * text (possibly empty) in place.  Returns the node now holding the whole
     * token and the token's offset in it, or null when the match cannot be
     * folded.
     */
    splitPlaceholderAcrossRuns(match: TextMatch): { node: Element; offset: number } | null {
        if (!this.isFoldable(match)) return null;

        const first = match.segments[0];
        const offset = match.start - first.start;
        if (match.segments.length === 1) return { node: first.node, offset };

        const token = match.segments
            .map((s) => textOf(s.node).slice(Math.max(match.start, s.start) - s.start, Math.min(match.end, s.end) - s.start))
            .join('');

        const last = match.segments[match.segments.length - 1];
        const consumed = match.end - last.start;
        this.setText(first.node, textOf(first.node).slice(0, offset) + token);
        for (const middle of match.segments.slice(1, -1)) this.setText(middle.node, '');
        this.setText(last.node, textOf(last.node).slice(consumed));
        this.shiftWritten(last.node, 0, -consumed);

        return { node: first.node, offset };
    }

    /** Replace the whole text of a w:t node; formatting siblings are untouched. */
    replaceText(node: Element, newText: string): void {
        this.setText(node, newText);
        this.written.set(node, [[0, newText.length]]);
    }

    /** Replace `[start, end)` of a w:t node's text with `value`. */
    replaceRange(node: Element, start: number, end: number, value: string): void {
        const text = textOf(node);
        this.setText(node, text.slice(0, start) + value + text.slice(end));
        this.shiftWritten(node, end, value.length - (end - start));
        this.markWritten(node, start, start + value.length);
    }

    /**
     * Insert a new run carrying `text` directly after `anchor`.
     * `properties` (a w:rPr) is cloned into the run when given.
     */
    insertRunAfter(anchor: Element, text: string, properties?: Element | null): Element {
        const parent = anchor.parentNode;
        if (!parent) throw new Error(`${this.part}: cannot insert a run after a detached node`);
        const run = this.buildRun(anchor, text, properties);
        parent.insertBefore(run, anchor.nextSibling);
        return run;
    }

    /** Append a run carrying `text` as the last child of a paragraph. */
    appendRun(paragraph: Element, text: string, properties?: Element | null): Element {
        const run = this.buildRun(paragraph, text, properties);
        paragraph.appendChild(run);
        return run;
    }

    /** Remove a run left with nothing but properties and empty text. */
    removeRunIfEmpty(run: Element): boolean {
        const children = nodeListToArray(run.childNodes).filter(isElement);
        const empty = children.every((n) => isW(n, 'rPr') || (isW(n, 't') && textOf(n) === ''));
        if (!empty || !run.parentNode) return false;
        for (const t of wDescendants(run, 't')) this.written.delete(t);
        run.parentNode.removeChild(run);
        return true;
    }

    // ─── Formatting helpers ──────────────────────────────────────────────

    runProperties(run: Element | null): Element | null {
        return run ? findDirectChild(run, 'rPr') : null;
    }

    /**
     * Run properties equivalent to a paragraph's mark formatting
     * (w:pPr/w:rPr minus the revision markup only a mark may carry).
     */
    paragraphMarkProperties(paragraph: Element): Element | null {
        const pPr = findDirectChild(paragraph, 'pPr');
        const markRPr = pPr ? findDirectChild(pPr, 'rPr') : null;
        if (!markRPr) return null;

        const copy = markRPr.cloneNode(true);
        if (!isW(copy, 'rPr')) return null;
        for (const child of nodeListToArray(copy.childNodes)) {
            if (isElement(child) && child.namespaceURI === NAMESPACES.W && MARK_ONLY_PROPERTIES.has(child.localName)) {
                copy.removeChild(child);
            }
        }
        return copy;
    }

    // ─── Output ──────────────────────────────────────────────────────────

    serialize(layout: XmlLayout = 'pretty'): string {
        return serializeXml(this.document, layout);
    }

    /** Write the part back under `dir` through a temporary file and a rename. */
    async save(dir: string): Promise<void> {
        const target = path.join(dir, this.part);
        const temp = `${target}.${process.pid}.tmp`;
        await fs.writeFile(temp, this.serialize('pretty'), 'utf8');
        await fs.rename(temp, target);
    }

    // ─── Internals ───────────────────────────────────────────────────────

    private buildRun(ref: Element, text: string, properties?: Element | null): Element {
        const run = createW(ref, 'r');
        if (properties) run.appendChild(properties.cloneNode(true));
        const t = createW(ref, 't');
        run.appendChild(t);
        this.replaceText(t, text);
        return run;
    }

    private setText(node: Element, text: string): void {
        node.textContent = text;
        if (/^\s|\s$/.test(text)) node.setAttributeNS(NAMESPACES.XML, 'xml:space', 'preserve');
    }

    private overlapsWritten(seg: TextSegment, start: number, end: number): boolean {
        const ranges = this.written.get(seg.node);
        if (!ranges) return false;
        const localStart = Math.max(start, seg.start) - seg.start;
        const localEnd = Math.min(end, seg.end) - seg.start;
        return ranges.some(([a, b]) => a < localEnd && localStart < b);
    }

    private markWritten(node: Element, start: number, end: number): void {
        const ranges = this.written.get(node) ?? [];
        ranges.push([start, end]);
        this.written.set(node, ranges);
    }

    /** Move ranges at or after `from` by `delta` characters. */
    private shiftWritten(node: Element, from: number, delta: number): void {
        const ranges = this.written.get(node);
        if (!ranges || delta === 0) return;
        this.written.set(
            node,
            ranges.map(([a, b]): Range => (a >= from ? [a + delta, b + delta] : [a, b])),
        );
    }
}

function matchesPredicate(el: Element, predicate?: NodePredicate): boolean {
    if (!predicate) return true;
    if (typeof predicate === 'function') return predicate(el);

    const text = isW(el, 'p') ? getParagraphText(el) : textOf(el);
    if ('text' in predicate) return text === predicate.text;
    if ('contains' in predicate) return text.includes(predicate.contains);

    const { attribute, value } = predicate;
    const actual = attribute.startsWith('w:')
        ? el.getAttributeNS(NAMESPACES.W, attribute.slice(2)) || el.getAttribute(attribute)
        : el.getAttribute(attribute);
    return actual === value;
}
