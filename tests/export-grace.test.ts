import { describe, it, expect } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { toGrace, writeGrace } from '../src/export/grace.js';
import { makeChannel, makeDataset, withTempDir } from './helpers/cap-fixtures.js';

describe('Grace export', () => {
    it('dumps each non-empty channel of a run in name order', () => {
        const text = toGrace({
            groupNumber: 2,
            channels: [
                makeChannel('Voltage', [1.5, 2], {
                    dataFileRef: 'v.bin',
                    independent: { kind: 'interval', interval: 0.5 },
                    time: [0, 0.5],
                }),
                makeChannel('Empty', []),
                makeChannel('Current', [3], {
                    dataFileRef: 'i.bin',
                    independent: { kind: 'file', fileRef: 't.bin' },
                    time: [10],
                }),
            ],
        });

        expect(text).toBe([
            '# dump from cap file',
            '@WITH G0',
            '@G0 ON',
            '# 2, field "Current", from t.bin and i.bin.',
            '@TYPE xy',
            '@    legend string 0 "Current"',
            '10.0\t3.0',
            '&',
            '# 2, field "Voltage", from 0.5 and v.bin.',
            '@TYPE xy',
            '@    legend string 1 "Voltage"',
            '0.0\t1.5',
            '0.5\t2.0',
            '&',
            '',
        ].join('\n'));
    });

    it('writes one set file per run', async () => {
        await withTempDir(async (dir) => {
            const dataset = makeDataset([
                makeChannel('A', [1], { groupNumber: 3 }),
                makeChannel('B', [2], { groupNumber: 1 }),
            ]);
            const written = await writeGrace(path.join(dir, 'grace'), dataset);
            expect(written).toEqual([path.join(dir, 'grace', 'set1.txt'), path.join(dir, 'grace', 'set3.txt')]);
            const set1 = await fs.readFile(written[0], 'utf8');
            expect(set1.split('\n').slice(3, 7)).toEqual([
                '# 1, field "B", from index and B.bin.',
                '@TYPE xy',
                '@    legend string 0 "B"',
                '0.0\t2.0',
            ]);
        });
    });
});
