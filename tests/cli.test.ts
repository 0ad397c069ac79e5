import { describe, it, expect } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runCli, type CliIO } from '../src/cli.js';
import { buildCapArchive, corruptEntry, sampleEntries, withTempDir, writeCapFile } from './helpers/cap-fixtures.js';

function captureIO(env: NodeJS.ProcessEnv = {}): CliIO & { out: string[]; err: string[] } {
    const out: string[] = [];
    const err: string[] = [];
    return {
        out,
        err,
        env,
        stdout: (line) => out.push(line),
        stderr: (line) => err.push(line),
    };
}

describe('CLI', () => {
    it('prints the dataset summary by default', async () => {
        await withTempDir(async (dir) => {
            const input = await writeCapFile(dir, 'lab.cap', sampleEntries());
            const io = captureIO();

            expect(await runCli([input, '-quiet'], io)).toBe(EXIT_OK);
            expect(io.out).toEqual([
                [
                    'lab.cap: 3 channel(s) in 2 run(s)',
                    'Run 1:',
                    '  Voltage-Ch A [V]: 3 samples, 1.5 .. 2.5',
                    '  Current [A]: 3 samples, 0.25 .. 0.75',
                    'Run 2:',
                    '  Voltage-Ch A [V]: 2 samples, 4.0 .. 8.0',
                ].join('\n'),
            ]);
            expect(io.err).toEqual([]);
        });
    });

    it('exports CSV with the requested separators', async () => {
        await withTempDir(async (dir) => {
            const input = await writeCapFile(dir, 'lab.cap', sampleEntries());
            const output = path.join(dir, 'lab.csv');
            const io = captureIO();

            expect(await runCli([input, '-to-csv', output, '-dec', ',', '-sep', ';'], io)).toBe(EXIT_OK);
            expect(await fs.readFile(output, 'utf8')).toBe([
                'Voltage-Ch A;Voltage-Ch A;Current',
                '1,5;4,0;0,25',
                '2,0;8,0;0,5',
                '2,5;;0,75',
                '',
            ].join('\n'));
            expect(io.out).toEqual([]);
            expect(io.err).toContain(`Wrote 3 channel(s) to ${output}`);
        });
    });

    it('quotes comma decimals under the default cell separator', async () => {
        await withTempDir(async (dir) => {
            const input = await writeCapFile(dir, 'lab.cap', sampleEntries());
            const output = path.join(dir, 'lab.csv');

            expect(await runCli([input, '-to-csv', output, '-dec', ',', '-quiet'], captureIO())).toBe(EXIT_OK);
            expect(await fs.readFile(output, 'utf8')).toBe([
                'Voltage-Ch A,Voltage-Ch A,Current',
                '"1,5","4,0","0,25"',
                '"2,0","8,0","0,5"',
                '"2,5",,"0,75"',
                '',
            ].join('\n'));
        });
    });

    it('writes an HTML plot with the bundled Plotly', async () => {
        await withTempDir(async (dir) => {
            const input = await writeCapFile(dir, 'lab.cap', sampleEntries());
            const output = path.join(dir, 'plots', 'lab-plot.html');
            const io = captureIO();

            expect(await runCli([input, '-plot', output], io)).toBe(EXIT_OK);
            const html = await fs.readFile(output, 'utf8');
            expect(html.startsWith('<!DOCTYPE html>')).toBe(true);
            expect(html).toContain('Plotly.newPlot("plot", ');
            expect(html).toContain('"name":"Voltage-Ch A (run 2)"');
            expect(io.err).toContain(`Wrote plot of 3 channel(s) to ${output}`);
        });
    });

    it('writes the plot next to the input when -plot has no path', async () => {
        await withTempDir(async (dir) => {
            const input = await writeCapFile(dir, 'lab.cap', sampleEntries());

            expect(await runCli([input, '-plot', '-quiet'], captureIO())).toBe(EXIT_OK);
            expect((await fs.readdir(dir)).sort()).toEqual(['lab.cap', 'lab.html']);
        });
    });

    it('writes Grace sets next to a CSV export', async () => {
        await withTempDir(async (dir) => {
            const input = await writeCapFile(dir, 'lab.cap', sampleEntries());
            const io = captureIO();
            const graceDir = path.join(dir, 'grace');

            expect(await runCli([input, '-to-csv', path.join(dir, 'x.csv'), '-to-grace', graceDir, '-quiet'], io)).toBe(EXIT_OK);
            expect((await fs.readdir(graceDir)).sort()).toEqual(['set1.txt', 'set2.txt']);
        });
    });

    it('exits 1 with the error name when main.xml is missing', async () => {
        await withTempDir(async (dir) => {
            const input = await writeCapFile(dir, 'bad.cap', { 'other.txt': 'x' });
            const io = captureIO();

            expect(await runCli([input], io)).toBe(EXIT_FAILURE);
            expect(io.err).toEqual([`error: ArchiveError: ${input}: archive has no main.xml index`]);
        });
    });

    it('exits 1 with ArchiveError when main.xml does not inflate', async () => {
        await withTempDir(async (dir) => {
            const input = path.join(dir, 'corrupt.cap');
            await fs.writeFile(input, corruptEntry(await buildCapArchive(sampleEntries()), 'main.xml'));
            const io = captureIO();

            expect(await runCli([input, '-quiet'], io)).toBe(EXIT_FAILURE);
            expect(io.err).toHaveLength(1);
            expect(io.err[0].startsWith(`error: ArchiveError: ${input}: entry "main.xml" is corrupt: `)).toBe(true);
        });
    });

    it('exits 1 when the output cannot be written', async () => {
        await withTempDir(async (dir) => {
            const input = await writeCapFile(dir, 'lab.cap', sampleEntries());
            const blocker = path.join(dir, 'blocker');
            await fs.writeFile(blocker, 'x');
            const io = captureIO();

            expect(await runCli([input, '-to-csv', path.join(blocker, 'out.csv'), '-quiet'], io)).toBe(EXIT_FAILURE);
            expect(io.err).toHaveLength(1);
            expect(io.err[0].startsWith('error: WriteError: Cannot write ')).toBe(true);
        });
    });

    it('skips channels with missing data in lenient mode', async () => {
        await withTempDir(async (dir) => {
            const entries = sampleEntries();
            delete entries['data/amp1.bin'];
            const input = await writeCapFile(dir, 'lab.cap', entries);
            const io = captureIO();

            expect(await runCli([input], io)).toBe(EXIT_FAILURE);
            const lenient = captureIO();
            expect(await runCli([input, '-lenient', '-quiet'], lenient)).toBe(EXIT_OK);
            expect(lenient.err).toEqual([
                `warning: ${input}: entry "data\\amp1.bin" of channel "Current" (run 1) not found in archive; skipped`,
            ]);
        });
    });

    it('exits 2 with usage on bad arguments', async () => {
        const io = captureIO();
        expect(await runCli(['a.cap', '-dec', ','], io)).toBe(EXIT_USAGE);
        expect(io.err[0]).toBe('UsageError: -dec only applies with -to-csv');
        expect(io.err[1].startsWith('Usage: capstone-extract')).toBe(true);
    });

    it('prints usage on -help', async () => {
        const io = captureIO();
        expect(await runCli(['-help'], io)).toBe(EXIT_OK);
        expect(io.out[0].split('\n')[0]).toBe('Usage: capstone-extract <file.cap> [options]');
    });
});
