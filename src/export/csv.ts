import { OptionError } from '../capstone/errors.js';
import type { CsvOptions, Dataset, WriteOptions } from '../capstone/types.js';
import { formatSample } from './number.js';
import { writeOutput } from './output.js';

export const CSV_DEFAULTS: Required<CsvOptions> = {
    decimalSeparator: '.',
    cellSeparator: ',',
    includeTime: false,
};

interface Column {
    header: string;
    values: readonly number[];
}

/**
 * Fills in defaults and checks that each separator is one character.
 * The two may be the same: cells holding the cell separator get quoted.
 * @throws OptionError
 */
export function resolveCsvOptions(options: CsvOptions = {}): Required<CsvOptions> {
    const resolved: Required<CsvOptions> = {
        decimalSeparator: options.decimalSeparator ?? CSV_DEFAULTS.decimalSeparator,
        cellSeparator: options.cellSeparator ?? CSV_DEFAULTS.cellSeparator,
        includeTime: options.includeTime ?? CSV_DEFAULTS.includeTime,
    };
    for (const [name, value] of [['decimal', resolved.decimalSeparator], ['cell', resolved.cellSeparator]] as const) {
        if ([...value].length !== 1) {
            throw new OptionError(`The ${name} separator must be a single character, got "${value}"`);
        }
    }
    return resolved;
}

function quoteCell(text: string, cellSeparator: string): string {
    if (!text.includes(cellSeparator) && !/["\r\n]/.test(text)) return text;
    return `"${text.replace(/"/g, '""')}"`;
}

function columnsOf(dataset: Dataset, includeTime: boolean): Column[] {
    const columns: Column[] = [];
    for (const channel of dataset.channels) {
        if (includeTime) {
            columns.push({
                header: `${channel.name} [time]`,
                values: channel.time ?? channel.samples.map((_, i) => i),
            });
        }
        columns.push({ header: channel.name, values: channel.samples });
    }
    return columns;
}

/**
 * Renders a dataset as CSV: a header row of channel names, then one row per
 * sample index. Shorter channels leave empty cells.
 * @throws OptionError if a separator is not one character.
 */
export function toCsv(dataset: Dataset, options: CsvOptions = {}): string {
    const { decimalSeparator, cellSeparator, includeTime } = resolveCsvOptions(options);
    const columns = columnsOf(dataset, includeTime);
    const rowCount = columns.reduce((max, column) => Math.max(max, column.values.length), 0);

    const lines = [columns.map((c) => quoteCell(c.header, cellSeparator)).join(cellSeparator)];
    for (let row = 0; row < rowCount; row++) {
        lines.push(
            columns
                .map((c) => (row < c.values.length ? quoteCell(formatSample(c.values[row], decimalSeparator), cellSeparator) : ''))
                .join(cellSeparator)
        );
    }
    return lines.join('\n') + '\n';
}

/**
 * @throws OptionError if a separator is not one character.
 * @throws WriteError if the destination cannot be created or written.
 */
export async function writeCsv(
    filePath: string,
    dataset: Dataset,
    options: CsvOptions & WriteOptions = {}
): Promise<void> {
    const text = toCsv(dataset, options);
    await writeOutput(filePath, text);
    options.logger?.info?.(`Wrote ${dataset.channels.length} channel(s) to ${filePath}`);
}
