import type { FontHandle, FontPair, PlacedRun, TextRun } from '../types/sheet.types';
import { splitRuns } from './scriptRuns';

export const fontForRun = (run: TextRun, fonts: FontPair): FontHandle => (run.isWide ? fonts.wide : fonts.narrow);

export const measureMixed = (text: string, fonts: FontPair, size: number): number =>
    splitRuns(text).reduce((width, run) => width + fontForRun(run, fonts).widthOfString(run.text, size), 0);

/**
 * Runs of `text` with their fonts and x-offsets, ready for a text op.
 */
export const layoutRuns = (text: string, fonts: FontPair, size: number): { runs: PlacedRun[]; width: number } => {
    const runs: PlacedRun[] = [];
    let offsetX = 0;
    splitRuns(text).forEach((run) => {
        const font = fontForRun(run, fonts);
        const width = font.widthOfString(run.text, size);
        runs.push({ text: run.text, fontName: font.name, isWide: run.isWide, offsetX, width });
        offsetX += width;
    });
    return { runs, width: offsetX };
};
