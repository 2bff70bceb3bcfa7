import { describe, expect, it } from '@jest/globals';
import { assembleHeader, createHeaderTemplate, DEFAULT_HEADER_SAFETY_MARGIN, fitHeader } from '../headerFit';
import { EMPHASIZED_PAIR } from '../../__tests__/test-utils';
import { mm } from '../../layout/utils';

// Bold narrow glyphs are 6pt wide at 10pt, wide glyphs 10pt.
const template = createHeaderTemplate('1111');

describe('assembleHeader', () => {
    it('joins prefix, labels and fillers', () => {
        expect(assembleHeader(template, '________', '___')).toBe('1111 Name________ Class___');
    });

    it('drops the space before the second label when tight', () => {
        expect(assembleHeader(template, '__', '_', true)).toBe('1111 Name__Class_');
    });
});

describe('fitHeader', () => {
    it('uses a 1mm safety margin by default', () => {
        expect(DEFAULT_HEADER_SAFETY_MARGIN).toBeCloseTo(mm(1), 9);
        const fit = fitHeader(template, 200, 10, EMPHASIZED_PAIR);
        expect(fit.budget).toBeCloseTo(200 - mm(1), 9);
    });

    it('returns the full header when it fits', () => {
        const fit = fitHeader(template, 156, 10, EMPHASIZED_PAIR, { safetyMargin: 0 });
        expect(fit).toEqual({
            text: '1111 Name________ Class___',
            width: 156,
            budget: 156,
            iterations: 0,
            separatorRemoved: false,
            overflow: false,
        });
    });

    it('shortens the first filler before the second', () => {
        // "1111 Name__ Class_" is 18 characters
        const fit = fitHeader(template, 108, 10, EMPHASIZED_PAIR, { safetyMargin: 0 });
        expect(fit.text).toBe('1111 Name__ Class_');
        expect(fit.width).toBe(108);
        expect(fit.iterations).toBe(8);
        expect(fit.separatorRemoved).toBe(false);
        expect(fit.overflow).toBe(false);
    });

    it('stops shrinking the first filler at its minimum', () => {
        const fit = fitHeader(template, 120, 10, EMPHASIZED_PAIR, { safetyMargin: 0 });
        expect(fit.text).toBe('1111 Name__ Class___');
        expect(fit.iterations).toBe(6);
    });

    it('removes the separator once both fillers are at their minimums', () => {
        const fit = fitHeader(template, 105, 10, EMPHASIZED_PAIR, { safetyMargin: 0 });
        expect(fit.text).toBe('1111 Name__Class_');
        expect(fit.width).toBe(102);
        expect(fit.separatorRemoved).toBe(true);
        expect(fit.overflow).toBe(false);
    });

    it('reports overflow instead of truncating labels', () => {
        const fit = fitHeader(template, 50, 10, EMPHASIZED_PAIR, { safetyMargin: 0 });
        expect(fit.text).toBe('1111 Name__Class_');
        expect(fit.separatorRemoved).toBe(true);
        expect(fit.overflow).toBe(true);
        expect(fit.iterations).toBe(8);
    });

    it('measures wide characters in the prefix', () => {
        const mixed = createHeaderTemplate('1111默写');
        // 4 + 22 narrow at 6pt plus 2 wide at 10pt
        const fit = fitHeader(mixed, 500, 10, EMPHASIZED_PAIR, { safetyMargin: 0 });
        expect(fit.width).toBe(176);
    });

    it('never widens as the budget shrinks', () => {
        let previous = Number.POSITIVE_INFINITY;
        for (let maxWidth = 200; maxWidth >= 10; maxWidth -= 1) {
            const fit = fitHeader(template, maxWidth, 10, EMPHASIZED_PAIR);
            expect(fit.width).toBeLessThanOrEqual(previous);
            expect(fit.iterations).toBeLessThanOrEqual(8);
            previous = fit.width;
        }
    });

    it('honours custom labels and minimums', () => {
        const custom = createHeaderTemplate('Quiz', { labelA: '姓名', labelB: '班级', minLengthA: 4, minLengthB: 2 });
        const fit = fitHeader(custom, 0, 10, EMPHASIZED_PAIR, { safetyMargin: 0 });
        expect(fit.text).toBe('Quiz 姓名____班级__');
        expect(fit.iterations).toBe(5);
        expect(fit.overflow).toBe(true);
    });
});
