import * as path from 'path';
import { groupByRun } from '../capstone/dataset.js';
import type { Dataset, DecodedChannel, RunGroup, WriteOptions } from '../capstone/types.js';
import { formatSample } from './number.js';
import { writeOutput } from './output.js';

const HEADER = ['# dump from cap file', '@WITH G0', '@G0 ON'];

function axisSource(channel: DecodedChannel): string {
    const independent = channel.independent;
    if (!independent) return 'index';
    return independent.kind === 'file' ? independent.fileRef : formatSample(independent.interval);
}

/**
 * One run as an xmgrace text dump: a legend entry and a tab-separated x/y
 * block per channel, channels in name order, empty channels left out.
 */
export function toGrace(run: RunGroup): string {
    const lines = [...HEADER];
    const channels = [...run.channels]
        .filter((c) => c.samples.length > 0)
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    channels.forEach((channel, legendIndex) => {
        lines.push(`# ${run.groupNumber}, field "${channel.name}", from ${axisSource(channel)} and ${channel.dataFileRef}.`);
        lines.push('@TYPE xy');
        lines.push(`@    legend string ${legendIndex} "${channel.name}"`);
        channel.samples.forEach((y, i) => {
            const x = channel.time ? channel.time[i] : i;
            lines.push(`${formatSample(x)}\t${formatSample(y)}`);
        });
        lines.push('&');
    });
    return lines.join('\n') + '\n';
}

/**
 * Writes `set<run>.txt` for every run into `directory`.
 * @returns the written paths, in run order
 * @throws WriteError
 */
export async function writeGrace(directory: string, dataset: Dataset, options: WriteOptions = {}): Promise<string[]> {
    const written: string[] = [];
    for (const run of groupByRun(dataset)) {
        const filePath = path.join(directory, `set${run.groupNumber}.txt`);
        await writeOutput(filePath, toGrace(run));
        written.push(filePath);
    }
    options.logger?.info?.(`Wrote ${written.length} Grace set(s) to ${directory}`);
    return written;
}
