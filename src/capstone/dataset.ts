import * as path from 'path';
import { formatSample } from '../export/number.js';
import type { Dataset, DecodedChannel, RunGroup } from './types.js';

/** Runs in ascending group number; channels keep their index order. */
export function groupByRun(dataset: Dataset): RunGroup[] {
    const runs = new Map<number, DecodedChannel[]>();
    for (const channel of dataset.channels) {
        const list = runs.get(channel.groupNumber);
        if (list) list.push(channel);
        else runs.set(channel.groupNumber, [channel]);
    }
    return [...runs.entries()]
        .sort(([a], [b]) => a - b)
        .map(([groupNumber, channels]) => ({ groupNumber, channels }));
}

export function findChannel(dataset: Dataset, name: string, groupNumber?: number): DecodedChannel | undefined {
    return dataset.channels.find((c) => c.name === name && (groupNumber === undefined || c.groupNumber === groupNumber));
}

/**
 * Channels of one run are expected to share a time base. Returns one message
 * per run whose channels disagree on sample count.
 */
export function checkRunAlignment(dataset: Dataset): string[] {
    const warnings: string[] = [];
    for (const run of groupByRun(dataset)) {
        const counts = new Set(run.channels.map((c) => c.samples.length));
        if (counts.size > 1) {
            const detail = run.channels.map((c) => `${c.name}=${c.samples.length}`).join(', ');
            warnings.push(`Run ${run.groupNumber}: channels have different sample counts (${detail})`);
        }
    }
    return warnings;
}

function describeChannel(channel: DecodedChannel): string {
    const label = channel.unit ? `${channel.name} [${channel.unit}]` : channel.name;
    const n = channel.samples.length;
    if (n === 0) return `  ${label}: no samples`;
    const first = formatSample(channel.samples[0]);
    const last = formatSample(channel.samples[n - 1]);
    const span = n === 1 ? first : `${first} .. ${last}`;
    return `  ${label}: ${n} sample${n === 1 ? '' : 's'}, ${span}`;
}

/** Multi-line, human-readable summary of a dataset, grouped by run. */
export function describeDataset(dataset: Dataset): string {
    const runs = groupByRun(dataset);
    const lines = [
        `${path.basename(dataset.source)}: ${dataset.channels.length} channel(s) in ${runs.length} run(s)`,
    ];
    for (const run of runs) {
        lines.push(`Run ${run.groupNumber}:`);
        for (const channel of run.channels) lines.push(describeChannel(channel));
        const fit = dataset.curveFits.get(run.groupNumber);
        if (fit) {
            lines.push(`  fit: y = ${formatSample(fit.slope)} * x + ${formatSample(fit.intercept)}`);
        }
    }
    return lines.join('\n');
}
