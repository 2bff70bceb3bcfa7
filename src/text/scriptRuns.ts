import type { TextRun } from '../types/sheet.types';

const NARROW_MIN = 0x20;
const NARROW_MAX = 0x7e;

/**
 * Printable ASCII counts as narrow; everything else (including accented
 * Latin) goes to the wide font.
 */
export const isNarrowChar = (char: string): boolean => {
    const code = char.codePointAt(0);
    return code !== undefined && code >= NARROW_MIN && code <= NARROW_MAX;
};

export const splitRuns = (text: string): TextRun[] => {
    const runs: TextRun[] = [];
    for (const char of text) {
        const isWide = !isNarrowChar(char);
        const last = runs[runs.length - 1];
        if (last && last.isWide === isWide) {
            last.text += char;
        } else {
            runs.push({ text: char, isWide });
        }
    }
    return runs;
};
