import { describe, expect, it } from '@jest/globals';
import { generateWorksheet, worksheetHeaderPrefix } from '../worksheet';
import { createStaticFontResolver } from '../../types/adapters.types';
import { SheetConfigError } from '../../errors';
import type { TextOp } from '../../types/sheet.types';
import { TEST_FONT_PAIRS } from '../../__tests__/test-utils';

const adapters = { fontResolver: createStaticFontResolver(TEST_FONT_PAIRS) };

const configErrorOf = (run: () => unknown): SheetConfigError => {
    try {
        run();
    } catch (error) {
        if (error instanceof SheetConfigError) {
            return error;
        }
        throw error;
    }
    throw new Error('expected a SheetConfigError');
};

describe('worksheetHeaderPrefix', () => {
    it('joins date, heading and scope', () => {
        expect(worksheetHeaderPrefix({ date: '1111', heading: '默写', scope: 'unit3' })).toBe('1111默写 unit3');
    });

    it('leaves out empty parts', () => {
        expect(worksheetHeaderPrefix({ date: '1111', heading: '默写', scope: '' })).toBe('1111默写');
        expect(worksheetHeaderPrefix({ date: '', heading: '', scope: 'unit3' })).toBe('unit3');
    });
});

describe('generateWorksheet', () => {
    it('fills one page with identical cells', () => {
        const { document, layout } = generateWorksheet({ items: ['w1', 'w2'], scope: 'unit3' }, adapters);
        expect(document.pages).toHaveLength(1);
        expect(document.pages[0]?.ops).toHaveLength(6);
        expect(document.title).toBe('1111-unit3');
        expect(document.metadata.kind).toBe('worksheet');
        expect(layout.mode).toBe('tiled');
        expect(layout.spec.gutter).toBe(0);
    });

    it('keeps the full header when it fits', () => {
        // 32 narrow characters at 6.6pt and 2 wide at 11pt
        const { header, warnings } = generateWorksheet({ items: ['w1'], scope: 'unit3' }, adapters);
        expect(header.text).toBe('1111重默 unit3 Name________ Class___');
        expect(header.width).toBeCloseTo(233.2, 9);
        expect(header.iterations).toBe(0);
        expect(warnings).toEqual([]);
    });

    it('warns when the header overflows narrow cells', () => {
        const { header, warnings } = generateWorksheet({ items: ['w1'], scope: 'unit3', cols: 4 }, adapters);
        expect(header.text).toBe('1111重默 unit3 Name__Class_');
        expect(header.separatorRemoved).toBe(true);
        expect(header.overflow).toBe(true);
        expect(warnings.map((warning) => warning.code)).toEqual(['header-overflow']);
    });

    it('uses custom labels in the header', () => {
        const { header } = generateWorksheet({ items: ['w1'], nameLabel: '姓名', classLabel: '班级' }, adapters);
        expect(header.text).toBe('1111重默 姓名________ 班级___');
    });

    it('draws trimmed, numbered items in every cell', () => {
        const { document } = generateWorksheet({ items: [' apple ', '', '苹果'] }, adapters);
        const cells = document.pages[0]?.ops ?? [];
        cells.forEach((cell) => {
            if (cell.type !== 'group') {
                throw new Error('expected a cell group');
            }
            const lines = cell.ops
                .filter((op): op is TextOp => op.type === 'text')
                .map((op) => op.runs.map((run) => run.text).join(''));
            expect(lines).toEqual(['1111重默 Name________ Class___', '1. apple', '2. 苹果']);
        });
    });

    it('drops items that overflow a cell', () => {
        const items = Array.from({ length: 40 }, (_, index) => `w${index + 1}`);
        const { cell, warnings } = generateWorksheet({ items }, adapters);
        expect(cell).toEqual({ drawnItems: 16, droppedItems: 24 });
        expect(warnings).toEqual([
            {
                level: 'warn',
                code: 'lines-dropped',
                message: '24 item(s) did not fit in a cell',
                details: { drawnItems: 16, droppedItems: 24 },
            },
        ]);
    });

    it('rejects an empty item list', () => {
        expect(configErrorOf(() => generateWorksheet({}, adapters)).code).toBe('empty-items');
        expect(configErrorOf(() => generateWorksheet({ items: ['  ', ''] }, adapters)).code).toBe('empty-items');
    });
});
