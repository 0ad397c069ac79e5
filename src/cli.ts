import { describeDataset } from './capstone/dataset.js';
import { CapstoneError, UsageError } from './capstone/errors.js';
import { loadCapstone } from './capstone/reader.js';
import type { CapstoneLogger } from './capstone/types.js';
import { parseCliArgs, USAGE, type CliConfig } from './config.js';
import { writeCsv } from './export/csv.js';
import { writeGrace } from './export/grace.js';
import { writePlot } from './export/plot.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIO {
    stdout: (line: string) => void;
    stderr: (line: string) => void;
    env: NodeJS.ProcessEnv;
}

const consoleIO: CliIO = {
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
    env: process.env,
};

function createLogger(io: CliIO, quiet: boolean): CapstoneLogger {
    return {
        info: quiet ? undefined : (msg) => io.stderr(msg),
        warn: (msg) => io.stderr(`warning: ${msg}`),
        error: (msg) => io.stderr(`error: ${msg}`),
    };
}

/**
 * Runs one conversion and returns the process exit code. Never throws for
 * expected failures: those are reported on `stderr`.
 */
export async function runCli(argv: readonly string[], io: CliIO = consoleIO): Promise<number> {
    let config: CliConfig;
    try {
        config = parseCliArgs(argv, io.env);
    } catch (err) {
        if (!(err instanceof UsageError)) throw err;
        io.stderr(`${err.name}: ${err.message}`);
        io.stderr(USAGE);
        return EXIT_USAGE;
    }
    if (config.help) {
        io.stdout(USAGE);
        return EXIT_OK;
    }

    const logger = createLogger(io, config.quiet);
    try {
        const dataset = await loadCapstone(config.input, { missingData: config.missingData, logger });

        if (config.showInfo) io.stdout(describeDataset(dataset));

        if (config.mode === 'csv' && config.output) {
            await writeCsv(config.output, dataset, {
                decimalSeparator: config.decimalSeparator,
                cellSeparator: config.cellSeparator,
                includeTime: config.includeTime,
                logger,
            });
        } else if (config.mode === 'plot' && config.output) {
            await writePlot(config.output, dataset, { logger });
        }

        if (config.graceDir) {
            await writeGrace(config.graceDir, dataset, { logger });
        }
        return EXIT_OK;
    } catch (err) {
        if (!(err instanceof CapstoneError)) throw err;
        logger.error?.(`${err.name}: ${err.message}`);
        return EXIT_FAILURE;
    }
}
