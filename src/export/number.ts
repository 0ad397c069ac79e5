/**
 * Shortest round-trip decimal for a sample, with `.0` on integral values
 * (`2` -> `2.0`, `-0` -> `-0.0`). Magnitudes from 1e16 up, or below 1e-4,
 * use exponent notation with at least two exponent digits (`1e+16`,
 * `1.5e-07`). `decimalSeparator` replaces the point.
 */
export function formatSample(value: number, decimalSeparator: string = '.'): string {
    if (Number.isNaN(value)) return 'NaN';
    if (!Number.isFinite(value)) return value > 0 ? 'Infinity' : '-Infinity';

    const magnitude = Math.abs(value);
    let text: string;
    if (magnitude !== 0 && (magnitude >= 1e16 || magnitude < 1e-4)) {
        text = value.toExponential().replace(/e([+-])(\d)$/, 'e$10$2');
    } else {
        text = Object.is(value, -0) ? '-0' : String(value);
        if (Number.isInteger(value)) text += '.0';
    }
    return decimalSeparator === '.' ? text : text.replace('.', decimalSeparator);
}
