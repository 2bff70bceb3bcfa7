import type { CssFontFace, FontHandle, PdfFontSource } from '../types/sheet.types';

/**
 * Advance widths in 1/1000 em, the unit AFM metrics use.
 */
export interface MetricsTable {
    advances: Readonly<Record<string, number>>;
    defaultAdvance: number;
}

export interface MetricsFontOptions {
    name: string;
    metrics: MetricsTable;
    pdf?: PdfFontSource;
    css?: CssFontFace;
}

/**
 * Font whose width is the sum of per-character advances from a fixed table.
 * Drawn with a standard PDF font unless told otherwise.
 */
export const createMetricsFont = ({ name, metrics, pdf, css }: MetricsFontOptions): FontHandle => ({
    name,
    pdf: pdf ?? { kind: 'standard', name: 'Helvetica' },
    css: css ?? { family: 'Helvetica, Arial, sans-serif', weight: 'normal' },
    widthOfString(text: string, size: number): number {
        let units = 0;
        for (const char of text) {
            units += metrics.advances[char] ?? metrics.defaultAdvance;
        }
        return (units * size) / 1000;
    },
});

export const monospaceMetrics = (advance: number): MetricsTable => ({ advances: {}, defaultAdvance: advance });
