import { describe, expect, it } from '@jest/globals';
import { GroupSurface, SheetDocumentBuilder } from '../SheetDocumentBuilder';
import { lineOp, rgb } from '../../render/primitives';
import { EMPHASIZED_PAIR, PLAIN_PAIR } from '../../__tests__/test-utils';

const INK = rgb(0, 0, 0);

const createBuilder = () =>
    new SheetDocumentBuilder({ title: 'Unit 3', size: { width: 600, height: 800 }, kind: 'cards' });

describe('SheetDocumentBuilder', () => {
    it('refuses ops before the first page', () => {
        expect(() => createBuilder().add(lineOp(0, 0, 1, 1, INK))).toThrow('No open page');
    });

    it('numbers pages and appends ops to the latest one', () => {
        const builder = createBuilder();
        builder.beginPage();
        builder.add(lineOp(0, 0, 1, 1, INK));
        builder.beginPage();
        builder.add(lineOp(0, 0, 2, 2, INK));
        builder.add(lineOp(0, 0, 3, 3, INK));

        const document = builder.build();
        expect(builder.pageCount).toBe(2);
        expect(document.pages.map((page) => [page.pageNumber, page.ops.length])).toEqual([
            [1, 1],
            [2, 2],
        ]);
        expect(document.metadata.kind).toBe('cards');
        expect(document.metadata.preview).toBe(false);
    });

    it('registers each font once by name', () => {
        const document = createBuilder().registerFonts(PLAIN_PAIR, EMPHASIZED_PAIR).build();
        expect(Object.keys(document.fonts).sort()).toEqual(['TestNarrow', 'TestNarrowBold', 'TestWide']);
    });

    it('snapshots pages at build time', () => {
        const builder = createBuilder();
        builder.beginPage();
        const document = builder.build();
        builder.add(lineOp(0, 0, 1, 1, INK));
        expect(document.pages[0]?.ops).toHaveLength(0);
    });
});

describe('GroupSurface', () => {
    it('buffers ops in order', () => {
        const surface = new GroupSurface();
        const first = lineOp(0, 0, 1, 1, INK);
        const second = lineOp(1, 1, 2, 2, INK);
        surface.add(first);
        surface.add(second);
        expect(surface.ops).toEqual([first, second]);
    });
});
