/**
 * capstone-extract public API
 *
 * @module capstone-extract
 */

import { CapstoneArchive } from './capstone/archive.js';
import { describeDataset, groupByRun } from './capstone/dataset.js';
import { parseIndex } from './capstone/index-parser.js';
import { loadCapstone, readCapstone } from './capstone/reader.js';
import { decodeRecords } from './capstone/records.js';
import { toCsv, writeCsv } from './export/csv.js';
import { toGrace, writeGrace } from './export/grace.js';
import { buildFigure, writePlot } from './export/plot.js';

export type {
    CapstoneLogger as Logger,
    ChannelDescriptor,
    CsvOptions,
    CurveFit,
    Dataset,
    DecodedChannel,
    IndependentAxis,
    LoaderOptions,
    MissingDataMode,
    PlotOptions,
    RecordDecoderOptions,
    RunGroup,
    WriteOptions,
} from './capstone/types.js';
export { ArchiveError, CapstoneError, DecodeError, IndexParseError, OptionError, UsageError, WriteError } from './capstone/errors.js';
export { INDEX_ENTRY, RECORD_SIZE } from './capstone/format.js';
export { CapstoneArchive, normalizeEntryName } from './capstone/archive.js';
export { parseIndex } from './capstone/index-parser.js';
export { extractCurveFits } from './capstone/curve-fit.js';
export { countRecords, decodeRecords, intervalAxis } from './capstone/records.js';
export { loadCapstone, readCapstone } from './capstone/reader.js';
export { checkRunAlignment, describeDataset, findChannel, groupByRun } from './capstone/dataset.js';
export { CSV_DEFAULTS, resolveCsvOptions, toCsv, writeCsv } from './export/csv.js';
export { formatSample } from './export/number.js';
export { buildFigure, renderPlotHtml, writePlot } from './export/plot.js';
export type { PlotFigure, PlotLayout, PlotTrace } from './export/plot.js';
export { toGrace, writeGrace } from './export/grace.js';
export { runCli } from './cli.js';

export const Capstone = {
    /**
     * Opens a `.cap` file and decodes all of its channels.
     */
    load: loadCapstone,

    /**
     * Decodes an archive already opened with {@link CapstoneArchive}.
     */
    read: readCapstone,

    /**
     * Opens a `.cap` archive held in memory.
     */
    open: (bytes: Uint8Array, source?: string): Promise<CapstoneArchive> => CapstoneArchive.fromBytes(bytes, source),

    parseIndex,
    decodeRecords,
    describe: describeDataset,
    runs: groupByRun,

    toCsv,
    writeCsv,
    figure: buildFigure,
    writePlot,
    toGrace,
    writeGrace,
};

export default Capstone;
