import { CapstoneArchive } from './archive.js';
import { extractCurveFits } from './curve-fit.js';
import { checkRunAlignment } from './dataset.js';
import { ArchiveError, DecodeError } from './errors.js';
import { RECORD_SIZE } from './format.js';
import { parseIndexDocument } from './index-parser.js';
import { decodeRecords, intervalAxis } from './records.js';
import type { ChannelDescriptor, DecodedChannel, Dataset, LoaderOptions } from './types.js';
import { parseXmlDocument } from './xml.js';

type ResolvedLoaderOptions = Required<LoaderOptions>;

/**
 * Reads `count` samples from a record entry. Records past `count` are
 * dropped; fewer than `count` is an error.
 */
async function readSamples(
    archive: CapstoneArchive,
    entry: string,
    count: number,
    options: ResolvedLoaderOptions
): Promise<number[]> {
    const bytes = await archive.readEntry(entry);
    const needed = count * RECORD_SIZE;
    if (bytes.length < needed) {
        throw new DecodeError(
            `${entry}: expected ${count} records (${needed} bytes), found ${bytes.length} bytes`
        );
    }
    if (bytes.length > needed) {
        options.logger?.warn?.(`${entry}: ignoring ${bytes.length - needed} bytes past the ${count} advertised records`);
    }
    return decodeRecords(bytes.subarray(0, needed), { littleEndian: options.littleEndian });
}

async function decodeChannel(
    archive: CapstoneArchive,
    channel: ChannelDescriptor,
    options: ResolvedLoaderOptions
): Promise<DecodedChannel> {
    if (channel.sampleCount === 0) {
        return { ...channel, samples: [], time: channel.independent ? [] : null };
    }

    const samples = await readSamples(archive, channel.dataFileRef, channel.sampleCount, options);
    let time: number[] | null = null;
    if (channel.independent?.kind === 'file') {
        time = await readSamples(archive, channel.independent.fileRef, channel.sampleCount, options);
    } else if (channel.independent?.kind === 'interval') {
        time = intervalAxis(channel.independent.interval, samples.length);
    }
    return { ...channel, samples, time };
}

function missingEntry(archive: CapstoneArchive, channel: ChannelDescriptor): string | null {
    if (channel.sampleCount === 0) return null;
    if (!archive.hasEntry(channel.dataFileRef)) return channel.dataFileRef;
    if (channel.independent?.kind === 'file' && !archive.hasEntry(channel.independent.fileRef)) {
        return channel.independent.fileRef;
    }
    return null;
}

/**
 * Decodes every channel listed in the archive's index.
 *
 * @throws IndexParseError if `main.xml` is malformed
 * @throws ArchiveError if a referenced entry is missing (unless `missingData` is 'skip')
 * @throws DecodeError if an entry holds fewer records than advertised
 */
export async function readCapstone(archive: CapstoneArchive, options: LoaderOptions = {}): Promise<Dataset> {
    const resolved: ResolvedLoaderOptions = {
        missingData: options.missingData ?? 'error',
        littleEndian: options.littleEndian ?? true,
        logger: options.logger ?? null,
    };
    const logger = resolved.logger;

    const doc = parseXmlDocument(await archive.readIndex());
    const descriptors = parseIndexDocument(doc);
    logger?.info?.(`${archive.source}: ${descriptors.length} channel(s) in index`);

    const channels: DecodedChannel[] = [];
    for (const descriptor of descriptors) {
        const missing = missingEntry(archive, descriptor);
        if (missing !== null) {
            const message = `${archive.source}: entry "${missing}" of channel "${descriptor.name}" (run ${descriptor.groupNumber}) not found in archive`;
            if (resolved.missingData === 'error') throw new ArchiveError(message);
            logger?.warn?.(`${message}; skipped`);
            continue;
        }
        channels.push(await decodeChannel(archive, descriptor, resolved));
    }

    const dataset: Dataset = {
        source: archive.source,
        channels,
        curveFits: extractCurveFits(doc),
    };
    for (const warning of checkRunAlignment(dataset)) {
        logger?.warn?.(warning);
    }
    return dataset;
}

/** Opens a `.cap` file and decodes it. See {@link readCapstone}. */
export async function loadCapstone(filePath: string, options: LoaderOptions = {}): Promise<Dataset> {
    const archive = await CapstoneArchive.open(filePath);
    options.logger?.info?.(`Opened ${filePath} (${archive.entryNames().length} entries)`);
    return readCapstone(archive, options);
}
