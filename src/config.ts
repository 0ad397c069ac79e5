import * as path from 'path';
import { OptionError, UsageError } from './capstone/errors.js';
import type { MissingDataMode } from './capstone/types.js';
import { CSV_DEFAULTS, resolveCsvOptions } from './export/csv.js';

export const ENV_DECIMAL_SEPARATOR = 'CAPSTONE_CSV_DECIMAL';
export const ENV_CELL_SEPARATOR = 'CAPSTONE_CSV_SEPARATOR';
export const ENV_MISSING_DATA = 'CAPSTONE_MISSING_DATA';

export const USAGE = [
    'Usage: capstone-extract <file.cap> [options]',
    '',
    '  -to-csv <out.csv>   write every channel to a CSV file',
    '  -dec <char>         decimal separator for -to-csv (default ".")',
    '  -sep <char>         cell separator for -to-csv (default ",")',
    '  -with-time          add a time column before each channel (-to-csv only)',
    '  -plot [out.html]    write an interactive plot (default <file>.html)',
    '  -to-grace <dir>     write one xmgrace set<run>.txt per run',
    '  -info               print a summary of the archive',
    '  -lenient            skip channels whose data entries are missing',
    '  -quiet              only print warnings and errors',
    '  -help               show this message',
    '',
    `Environment: ${ENV_DECIMAL_SEPARATOR}, ${ENV_CELL_SEPARATOR}, ${ENV_MISSING_DATA}=error|skip`,
].join('\n');

export type ExportMode = 'csv' | 'plot' | 'none';

export interface CliConfig {
    help: boolean;
    input: string;
    mode: ExportMode;
    /** Destination of the csv or plot export. */
    output: string | null;
    decimalSeparator: string;
    cellSeparator: string;
    includeTime: boolean;
    graceDir: string | null;
    showInfo: boolean;
    missingData: MissingDataMode;
    quiet: boolean;
}

type Flag = 'to-csv' | 'plot' | 'dec' | 'sep' | 'with-time' | 'to-grace' | 'info' | 'lenient' | 'quiet' | 'help';

const FLAGS: ReadonlySet<string> = new Set<Flag>([
    'to-csv', 'plot', 'dec', 'sep', 'with-time', 'to-grace', 'info', 'lenient', 'quiet', 'help',
]);

function isFlag(name: string): name is Flag {
    return FLAGS.has(name);
}

/** `-flag` and `--flag` are the same; anything else is positional. */
function flagName(arg: string): string | null {
    if (!arg.startsWith('-') || arg === '-' || /^-\d/.test(arg)) return null;
    return arg.replace(/^--?/, '');
}

function parseMissingData(value: string | undefined, source: string): MissingDataMode | undefined {
    if (value === undefined || value === '') return undefined;
    if (value === 'error' || value === 'skip') return value;
    throw new UsageError(`${source} must be "error" or "skip", got "${value}"`);
}

/** Default plot destination: the input path with an `.html` extension. */
export function defaultPlotPath(input: string): string {
    const parsed = path.parse(input);
    return path.join(parsed.dir, `${parsed.name}.html`);
}

/**
 * Resolves the command line. Each setting comes from its flag, then the
 * environment, then the built-in default.
 * @throws UsageError
 */
export function parseCliArgs(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): CliConfig {
    const seen = new Map<Flag, string | true>();
    const positional: string[] = [];

    const valueOf = (flag: Flag, i: number): string => {
        const value = argv[i + 1];
        if (value === undefined || flagName(value) !== null) {
            throw new UsageError(`-${flag} needs a value`);
        }
        return value;
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const name = flagName(arg);
        if (name === null) {
            positional.push(arg);
            continue;
        }
        if (!isFlag(name)) throw new UsageError(`Unknown option ${arg}`);
        if (seen.has(name)) throw new UsageError(`-${name} given more than once`);

        switch (name) {
            case 'to-csv':
            case 'dec':
            case 'sep':
            case 'to-grace':
                seen.set(name, valueOf(name, i));
                i++;
                break;
            case 'plot': {
                const next = argv[i + 1];
                if (next !== undefined && flagName(next) === null && positional.length > 0) {
                    seen.set(name, next);
                    i++;
                } else {
                    seen.set(name, true);
                }
                break;
            }
            default:
                seen.set(name, true);
        }
    }

    if (seen.has('help')) {
        return { ...emptyConfig(), help: true };
    }

    if (positional.length !== 1) {
        throw new UsageError(positional.length === 0 ? 'Missing input .cap file' : `Unexpected argument ${positional[1]}`);
    }
    const input = positional[0];

    const csvPath = seen.get('to-csv');
    const plot = seen.get('plot');
    if (csvPath !== undefined && plot !== undefined) {
        throw new UsageError('-to-csv and -plot cannot be combined');
    }
    if (csvPath === undefined) {
        for (const flag of ['dec', 'sep', 'with-time'] as const) {
            if (seen.has(flag)) throw new UsageError(`-${flag} only applies with -to-csv`);
        }
    }

    const mode: ExportMode = csvPath !== undefined ? 'csv' : plot !== undefined ? 'plot' : 'none';
    let output: string | null = null;
    if (typeof csvPath === 'string') output = csvPath;
    else if (plot !== undefined) output = typeof plot === 'string' ? plot : defaultPlotPath(input);

    const flagDec = seen.get('dec');
    const flagSep = seen.get('sep');
    const decimalSeparator = typeof flagDec === 'string' ? flagDec : env[ENV_DECIMAL_SEPARATOR] || CSV_DEFAULTS.decimalSeparator;
    const cellSeparator = typeof flagSep === 'string' ? flagSep : env[ENV_CELL_SEPARATOR] || CSV_DEFAULTS.cellSeparator;
    if (mode === 'csv') {
        try {
            resolveCsvOptions({ decimalSeparator, cellSeparator });
        } catch (err) {
            if (!(err instanceof OptionError)) throw err;
            throw new UsageError(err.message);
        }
    }

    const grace = seen.get('to-grace');
    const missingData = seen.has('lenient')
        ? 'skip'
        : parseMissingData(env[ENV_MISSING_DATA], ENV_MISSING_DATA) ?? 'error';

    return {
        help: false,
        input,
        mode,
        output,
        decimalSeparator,
        cellSeparator,
        includeTime: seen.has('with-time'),
        graceDir: typeof grace === 'string' ? grace : null,
        showInfo: seen.has('info') || (mode === 'none' && grace === undefined),
        missingData,
        quiet: seen.has('quiet'),
    };
}

function emptyConfig(): CliConfig {
    return {
        help: false,
        input: '',
        mode: 'none',
        output: null,
        decimalSeparator: CSV_DEFAULTS.decimalSeparator,
        cellSeparator: CSV_DEFAULTS.cellSeparator,
        includeTime: false,
        graceDir: null,
        showInfo: false,
        missingData: 'error',
        quiet: false,
    };
}
