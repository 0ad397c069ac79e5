import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { IndexParseError } from './errors.js';
import { XmlTag } from './format.js';

export type XmlNode = { [key: string]: unknown };

const REPEATED_TAGS = new Set<string>([
    XmlTag.DATA_SOURCE,
    XmlTag.DATA_SET,
    XmlTag.RENDERER,
    XmlTag.CURVE_FIT_PARAMETER,
]);

const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseAttributeValue: false,
    parseTagValue: false,
    isArray: (tagName) => REPEATED_TAGS.has(tagName),
});

export function isXmlNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses a whole document into fast-xml-parser's object form.
 * Attributes are kept as strings under `@_`-prefixed keys.
 * @throws IndexParseError on text that is not well-formed XML.
 */
export function parseXmlDocument(xml: string): XmlNode {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
        const { code, msg, line, col } = validation.err;
        throw new IndexParseError(`Malformed XML (${code}) at line ${line}, column ${col}: ${msg}`);
    }
    const parsed: unknown = parser.parse(xml);
    if (!isXmlNode(parsed)) {
        throw new IndexParseError('XML document has no root element');
    }
    return parsed;
}

export function attr(node: XmlNode, name: string): string | undefined {
    const value = node[`@_${name}`];
    return typeof value === 'string' ? value : undefined;
}

/**
 * Child elements named `tag`. Elements with neither attributes nor children
 * come back from the parser as empty strings; they are returned as empty nodes.
 */
export function children(node: XmlNode, tag: string): XmlNode[] {
    const value = node[tag];
    if (value === undefined) return [];
    const list = Array.isArray(value) ? value : [value];
    return list.map((item) => (isXmlNode(item) ? item : {}));
}

export function firstChild(node: XmlNode, tag: string): XmlNode | undefined {
    return children(node, tag)[0];
}

/** Depth-first, document order among same-named siblings. */
export function findAll(node: XmlNode, tag: string, out: XmlNode[] = []): XmlNode[] {
    for (const [key, value] of Object.entries(node)) {
        if (key.startsWith('@_') || key === '#text') continue;
        const list = Array.isArray(value) ? value : [value];
        for (const item of list) {
            if (!isXmlNode(item)) {
                if (key === tag) out.push({});
                continue;
            }
            if (key === tag) out.push(item);
            findAll(item, tag, out);
        }
    }
    return out;
}

/** First value of attribute `name` on `node` or any descendant. */
export function findAttr(node: XmlNode, name: string): string | undefined {
    const own = attr(node, name);
    if (own !== undefined) return own;
    for (const [key, value] of Object.entries(node)) {
        if (key.startsWith('@_') || key === '#text') continue;
        const list = Array.isArray(value) ? value : [value];
        for (const item of list) {
            if (!isXmlNode(item)) continue;
            const found = findAttr(item, name);
            if (found !== undefined) return found;
        }
    }
    return undefined;
}
