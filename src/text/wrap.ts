import type { FontPair } from '../types/sheet.types';
import { measureMixed } from './measure';
import { isNarrowChar } from './scriptRuns';

/**
 * Greedy line breaking for mixed text. Wide characters may break anywhere;
 * narrow text prefers the last space on the line and falls back to a
 * character break for words longer than the line.
 */
export const wrapMixed = (text: string, maxWidth: number, fonts: FontPair, size: number): string[] => {
    const lines: string[] = [];
    let current = '';

    for (const char of text) {
        const candidate = current + char;
        if (current === '' || measureMixed(candidate, fonts, size) <= maxWidth) {
            current = candidate;
            continue;
        }

        const breakAt = isNarrowChar(char) && char !== ' ' ? current.lastIndexOf(' ') : -1;
        if (breakAt > 0) {
            lines.push(current.slice(0, breakAt));
            current = current.slice(breakAt + 1) + char;
        } else {
            lines.push(current.trimEnd());
            current = char === ' ' ? '' : char;
        }
    }

    if (current !== '') {
        lines.push(current);
    }

    return lines;
};
