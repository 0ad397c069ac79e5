import { XmlAttr, XmlTag } from './format.js';
import type { CurveFit } from './types.js';
import { findAll, findAttr, type XmlNode } from './xml.js';

const SET_NUMBER = /^[^#]*#(\d+)/;

function parseResult(definition: XmlNode): number | null {
    const raw = findAttr(definition, XmlAttr.CURVE_FIT_RESULT);
    if (raw === undefined) return null;
    const value = Number(raw.trim());
    return raw.trim() !== '' && Number.isFinite(value) ? value : null;
}

/**
 * Linear fits shown by renderers, keyed by the run number found after `#`
 * in the renderer's usage name. A renderer must hold exactly two fit
 * parameters: intercept first, slope second. Other renderers are ignored.
 */
export function extractCurveFits(doc: XmlNode): Map<number, CurveFit> {
    const fits = new Map<number, CurveFit>();
    for (const renderer of findAll(doc, XmlTag.RENDERER)) {
        const usage = findAttr(renderer, XmlAttr.USAGE_NAME);
        const match = usage ? SET_NUMBER.exec(usage) : null;
        if (!match) continue;

        const parameters = findAll(renderer, XmlTag.CURVE_FIT_PARAMETER);
        if (parameters.length !== 2) continue;

        const intercept = parseResult(parameters[0]);
        const slope = parseResult(parameters[1]);
        if (intercept === null || slope === null) continue;

        fits.set(Number.parseInt(match[1], 10), { intercept, slope });
    }
    return fits;
}
