/**
 * Adapter interfaces for the sheet pipelines
 *
 * Callers swap these to change how fonts are found or how cell values are
 * printed without touching the layout engine.
 */

import type { CellValue } from './sheet.types';
import type { SheetWarning } from '../errors';
import type { FontPairs, WideFontOptions } from '../fonts/fontResolver';
import { resolveFontPairs } from '../fonts/fontResolver';
import { formatValue } from '../text/format';

/**
 * Font resolution adapter
 * Produces the plain and emphasized narrow/wide pairs for one render call
 */
export interface FontResolver {
    /**
     * @param options - Wide (CJK) font file, if the caller has one
     * @returns Font pairs plus any degradation warnings
     */
    resolvePairs(options: WideFontOptions): { pairs: FontPairs; warnings: SheetWarning[] };
}

/**
 * Value formatting adapter
 * Turns a raw cell value into display text
 */
export interface ValueFormatter {
    format(value: CellValue): string;
}

export interface SheetAdapters {
    fontResolver: FontResolver;
    valueFormatter: ValueFormatter;
}

export const createDefaultFontResolver = (): FontResolver => ({
    resolvePairs: resolveFontPairs,
});

/**
 * Resolver that hands back fixed pairs, for callers that manage fonts themselves.
 */
export const createStaticFontResolver = (pairs: FontPairs): FontResolver => ({
    resolvePairs: () => ({ pairs, warnings: [] }),
});

export const createDefaultValueFormatter = (): ValueFormatter => ({
    format: formatValue,
});

export function createDefaultAdapters(overrides: Partial<SheetAdapters> = {}): SheetAdapters {
    return {
        fontResolver: overrides.fontResolver ?? createDefaultFontResolver(),
        valueFormatter: overrides.valueFormatter ?? createDefaultValueFormatter(),
    };
}
