import { DecodeError } from './errors.js';
import { INTERVAL_PRECISION, RECORD_SIZE, VALUE_SIZE } from './format.js';
import type { RecordDecoderOptions } from './types.js';

function resolveRecordSize(options: RecordDecoderOptions): number {
    const recordSize = options.recordSize ?? RECORD_SIZE;
    if (!Number.isInteger(recordSize) || recordSize < VALUE_SIZE) {
        throw new DecodeError(`Invalid record size ${recordSize}: must be an integer >= ${VALUE_SIZE}`);
    }
    return recordSize;
}

/**
 * Number of whole records in `bytes`.
 * @throws DecodeError if the length is not a multiple of the record size.
 */
export function countRecords(bytes: Uint8Array, options: RecordDecoderOptions = {}): number {
    const recordSize = resolveRecordSize(options);
    if (bytes.length % recordSize !== 0) {
        throw new DecodeError(
            `Data length ${bytes.length} is not a multiple of the ${recordSize}-byte record size ` +
            `(${bytes.length % recordSize} trailing bytes)`
        );
    }
    return bytes.length / recordSize;
}

/**
 * Decodes a flat record file into one sample per record. Each sample is the
 * float64 in the trailing 8 bytes of its record; the leading bytes are skipped.
 */
export function decodeRecords(bytes: Uint8Array, options: RecordDecoderOptions = {}): number[] {
    const recordSize = resolveRecordSize(options);
    const count = countRecords(bytes, options);
    const littleEndian = options.littleEndian ?? true;
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const valueOffset = recordSize - VALUE_SIZE;

    const samples = new Array<number>(count);
    for (let i = 0; i < count; i++) {
        samples[i] = view.getFloat64(i * recordSize + valueOffset, littleEndian);
    }
    return samples;
}

/** Constant-step time axis `interval * i`, rounded to 12 decimals. */
export function intervalAxis(interval: number, count: number): number[] {
    const axis = new Array<number>(count);
    for (let i = 0; i < count; i++) {
        axis[i] = Number((interval * i).toFixed(INTERVAL_PRECISION));
    }
    return axis;
}
