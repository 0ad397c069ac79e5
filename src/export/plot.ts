import * as fs from 'fs/promises';
import * as path from 'path';
import { createRequire } from 'module';
import { WriteError } from '../capstone/errors.js';
import type { Dataset, PlotOptions, WriteOptions } from '../capstone/types.js';
import { writeOutput } from './output.js';

export interface PlotTrace {
    x: number[];
    y: number[];
    name: string;
    type: 'scatter';
    mode: 'lines';
    line: { width: number };
}

export interface PlotLayout {
    title: { text: string };
    xaxis: { automargin: boolean; title: { text: string } };
    yaxis: { automargin: boolean; title: { text: string } };
    margin: { l: number; r: number; t: number; b: number };
    showlegend: boolean;
}

export interface PlotFigure {
    data: PlotTrace[];
    layout: PlotLayout;
}

const PLOT_CONFIG = { displaylogo: false, responsive: true };

function traceName(name: string, groupNumber: number, multiRun: boolean): string {
    return multiRun ? `${name} (run ${groupNumber})` : name;
}

/**
 * One line trace per channel, plotted against its time axis when the index
 * gives one, else against the sample index.
 */
export function buildFigure(dataset: Dataset, options: PlotOptions = {}): PlotFigure {
    const multiRun = new Set(dataset.channels.map((c) => c.groupNumber)).size > 1;
    const data: PlotTrace[] = dataset.channels.map((channel) => ({
        x: channel.time ? [...channel.time] : channel.samples.map((_, i) => i),
        y: [...channel.samples],
        name: traceName(channel.name, channel.groupNumber, multiRun),
        type: 'scatter' as const,
        mode: 'lines' as const,
        line: { width: 1 },
    }));

    const hasTime = dataset.channels.length > 0 && dataset.channels.every((c) => c.time !== null);
    const units = [...new Set(dataset.channels.map((c) => c.unit).filter((u) => u.length > 0))];

    return {
        data,
        layout: {
            title: { text: options.title ?? path.basename(dataset.source) },
            xaxis: { automargin: true, title: { text: hasTime ? 'Time (s)' : 'Sample index' } },
            yaxis: { automargin: true, title: { text: units.length > 0 ? units.join(', ') : 'Value' } },
            margin: { l: 50, r: 50, t: 50, b: 50 },
            showlegend: true,
        },
    };
}

function escapeHtml(text: string): string {
    return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** JSON safe to inline in a `<script>` element. */
function scriptJson(value: unknown): string {
    return JSON.stringify(value).replace(/</g, '\\u003c');
}

export function renderPlotHtml(figure: PlotFigure, plotlyBundle: string): string {
    return [
        '<!DOCTYPE html>',
        '<html>',
        '<head>',
        '<meta charset="utf-8">',
        `<title>${escapeHtml(figure.layout.title.text)}</title>`,
        `<script>${plotlyBundle.replace(/<\/script/gi, '<\\/script')}</script>`,
        '</head>',
        '<body>',
        '<div id="plot" style="width:100%;height:90vh"></div>',
        '<script>',
        `Plotly.newPlot("plot", ${scriptJson(figure.data)}, ${scriptJson(figure.layout)}, ${scriptJson(PLOT_CONFIG)});`,
        '</script>',
        '</body>',
        '</html>',
        '',
    ].join('\n');
}

/**
 * Source of the minified Plotly bundle shipped by `plotly.js-dist-min`.
 * @throws WriteError if the package cannot be found.
 */
export async function loadPlotlyBundle(): Promise<string> {
    try {
        const resolver = createRequire(import.meta.url);
        return await fs.readFile(resolver.resolve('plotly.js-dist-min'), 'utf8');
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new WriteError(`Cannot load the Plotly bundle: ${reason}`, err);
    }
}

/**
 * Writes the dataset as a standalone interactive HTML plot.
 * @throws WriteError
 */
export async function writePlot(
    filePath: string,
    dataset: Dataset,
    options: PlotOptions & WriteOptions = {}
): Promise<void> {
    const bundle = options.plotlyBundle ?? await loadPlotlyBundle();
    await writeOutput(filePath, renderPlotHtml(buildFigure(dataset, options), bundle));
    options.logger?.info?.(`Wrote plot of ${dataset.channels.length} channel(s) to ${filePath}`);
}
