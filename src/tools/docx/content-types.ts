/**
 * [Content_Types].xml lookup: which entries hold XML.
 */

import { DOCX_PATHS, MEDIA_DIR, NAMESPACES } from './constants.js';
import { nodeListToArray, parseXml } from './dom.js';

const XML_EXTENSIONS = new Set(['xml', 'rels']);

export function isXmlContentType(contentType: string): boolean {
    const base = contentType.split(';')[0].trim().toLowerCase();
    return base.endsWith('+xml') || base === 'application/xml' || base === 'text/xml';
}

export class ContentTypes {
    private constructor(
        private readonly defaults: ReadonlyMap<string, string>,
        private readonly overrides: ReadonlyMap<string, string>,
    ) {}

    static parse(xml: string): ContentTypes {
        const doc = parseXml(xml, DOCX_PATHS.CONTENT_TYPES);
        const defaults = new Map<string, string>();
        const overrides = new Map<string, string>();

        for (const el of nodeListToArray(doc.getElementsByTagNameNS(NAMESPACES.CONTENT_TYPES, 'Default'))) {
            defaults.set(el.getAttribute('Extension')?.toLowerCase() ?? '', el.getAttribute('ContentType') ?? '');
        }
        for (const el of nodeListToArray(doc.getElementsByTagNameNS(NAMESPACES.CONTENT_TYPES, 'Override'))) {
            const partName = (el.getAttribute('PartName') ?? '').replace(/^\//, '');
            overrides.set(partName.toLowerCase(), el.getAttribute('ContentType') ?? '');
        }
        return new ContentTypes(defaults, overrides);
    }

    /** Content type declared for an entry, or null when none applies. */
    contentTypeOf(entryName: string): string | null {
        const override = this.overrides.get(entryName.toLowerCase());
        if (override) return override;
        return this.defaults.get(extensionOf(entryName)) || null;
    }

    /**
     * Declared XML content type, or an .xml / .rels name when nothing is
     * declared.  Media parts are never XML here, even image/svg+xml.
     */
    isXml(entryName: string): boolean {
        if (entryName.toLowerCase().startsWith(MEDIA_DIR)) return false;
        const declared = this.contentTypeOf(entryName);
        return declared ? isXmlContentType(declared) : XML_EXTENSIONS.has(extensionOf(entryName));
    }
}

function extensionOf(entryName: string): string {
    const base = entryName.slice(entryName.lastIndexOf('/') + 1);
    const dot = base.lastIndexOf('.');
    return dot < 0 ? '' : base.slice(dot + 1).toLowerCase();
}
