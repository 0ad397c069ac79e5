import { IndexParseError } from './errors.js';
import { UNIT_ATTRIBUTES, XmlAttr, XmlTag } from './format.js';
import type { ChannelDescriptor, IndependentAxis } from './types.js';
import { attr, children, firstChild, isXmlNode, parseXmlDocument, type XmlNode } from './xml.js';

const UNSIGNED_INT = /^\d+$/;
const SIGNED_INT = /^-?\d+$/;

/**
 * Locates `DataRepository` either at the top level or one element below it
 * (the usual case, under the document root).
 */
function findRepository(doc: XmlNode): XmlNode | undefined {
    const direct = firstChild(doc, XmlTag.DATA_REPOSITORY);
    if (direct) return direct;
    for (const [key, value] of Object.entries(doc)) {
        if (key.startsWith('?') || key.startsWith('@_') || !isXmlNode(value)) continue;
        const nested = firstChild(value, XmlTag.DATA_REPOSITORY);
        if (nested) return nested;
    }
    return undefined;
}

function requireInt(node: XmlNode, name: string, where: string, pattern: RegExp): number {
    const raw = attr(node, name)?.trim();
    if (raw === undefined || raw === '') {
        throw new IndexParseError(`${where}: missing ${name} attribute`);
    }
    if (!pattern.test(raw)) {
        throw new IndexParseError(`${where}: ${name}="${raw}" is not an integer`);
    }
    return Number.parseInt(raw, 10);
}

function requireChild(node: XmlNode, tag: string, where: string): XmlNode {
    const child = firstChild(node, tag);
    if (!child) {
        throw new IndexParseError(`${where}: missing ${tag} element`);
    }
    return child;
}

function parseIndependent(segment: XmlNode, where: string): IndependentAxis | null {
    const element = firstChild(segment, XmlTag.INDEPENDENT_STORAGE);
    if (!element) return null;

    const fileRef = attr(element, XmlAttr.FILE_NAME)?.trim();
    if (fileRef) return { kind: 'file', fileRef };

    const rawInterval = attr(element, XmlAttr.INTERVAL)?.trim();
    const interval = rawInterval ? Number(rawInterval) : Number.NaN;
    if (!Number.isFinite(interval)) {
        throw new IndexParseError(
            `${where}/${XmlTag.INDEPENDENT_STORAGE}: needs ${XmlAttr.FILE_NAME} or a numeric ${XmlAttr.INTERVAL}` +
            (rawInterval ? ` (got "${rawInterval}")` : '')
        );
    }
    return { kind: 'interval', interval };
}

function unitOf(source: XmlNode): string {
    for (const name of UNIT_ATTRIBUTES) {
        const value = attr(source, name);
        if (value !== undefined) return value.trim();
    }
    return '';
}

function parseDataSet(
    dataSet: XmlNode,
    source: { measurementName: string; channelIdName: string | null; unit: string },
    where: string
): ChannelDescriptor {
    const groupNumber = requireInt(dataSet, XmlAttr.GROUP_NUMBER, where, SIGNED_INT);
    const segmentPath = `${where}/${XmlTag.DATA_SEGMENT}`;
    const segment = requireChild(dataSet, XmlTag.DATA_SEGMENT, where);
    const dependentPath = `${segmentPath}/${XmlTag.DEPENDENT_STORAGE}`;
    const dependent = requireChild(segment, XmlTag.DEPENDENT_STORAGE, segmentPath);

    const dataFileRef = attr(dependent, XmlAttr.FILE_NAME)?.trim();
    if (!dataFileRef) {
        throw new IndexParseError(`${dependentPath}: missing ${XmlAttr.FILE_NAME} attribute`);
    }
    const sampleCount = requireInt(dependent, XmlAttr.DATA_SIZE, dependentPath, UNSIGNED_INT);

    const { measurementName, channelIdName, unit } = source;
    return {
        name: channelIdName ? `${measurementName}-${channelIdName}` : measurementName,
        unit,
        dataFileRef,
        sampleCount,
        measurementName,
        channelIdName,
        groupNumber,
        independent: parseIndependent(segment, segmentPath),
    };
}

/**
 * Parses the `main.xml` index into channel descriptors, in document order.
 *
 * Expected shape:
 *   DataRepository/DataSource[MeasurementName, ChannelIDName?]
 *     /DataSet[DataGroupNumber]/DataSegmentElement
 *       /DependentStorageElement[FileName, DataCacheDataSize]
 *       /IndependentStorageElement[FileName | IntervalCacheInterval]
 *
 * Sources without data sets, and documents without a repository, contribute
 * nothing. Anything malformed inside a data set is rejected.
 *
 * @throws IndexParseError
 */
export function parseIndex(xml: string): ChannelDescriptor[] {
    return parseIndexDocument(parseXmlDocument(xml));
}

/** {@link parseIndex} over an already parsed document. */
export function parseIndexDocument(doc: XmlNode): ChannelDescriptor[] {
    const repository = findRepository(doc);
    if (!repository) return [];

    const channels: ChannelDescriptor[] = [];
    children(repository, XmlTag.DATA_SOURCE).forEach((source, sourceIndex) => {
        const dataSets = children(source, XmlTag.DATA_SET);
        if (dataSets.length === 0) return;

        const sourcePath = `${XmlTag.DATA_REPOSITORY}/${XmlTag.DATA_SOURCE}[${sourceIndex}]`;
        const measurementName = attr(source, XmlAttr.MEASUREMENT_NAME)?.trim();
        if (!measurementName) {
            throw new IndexParseError(`${sourcePath}: missing ${XmlAttr.MEASUREMENT_NAME} attribute`);
        }
        const channelIdName = attr(source, XmlAttr.CHANNEL_ID_NAME)?.trim() || null;
        const meta = { measurementName, channelIdName, unit: unitOf(source) };

        dataSets.forEach((dataSet, setIndex) => {
            channels.push(parseDataSet(dataSet, meta, `${sourcePath}/${XmlTag.DATA_SET}[${setIndex}]`));
        });
    });
    return channels;
}
