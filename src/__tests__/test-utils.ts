/**
 * Test utilities for sheet tests
 * Fixed-advance fonts keep every measured width a whole number
 */

import type { CellValue, FontPair, SheetRecord, SheetTable } from '../types/sheet.types';
import { createMetricsFont, monospaceMetrics } from '../fonts/metricsFont';

/** 5pt per narrow character at 10pt. */
export const NARROW = createMetricsFont({ name: 'TestNarrow', metrics: monospaceMetrics(500) });

/** 6pt per narrow character at 10pt; bold glyphs run wider. */
export const NARROW_BOLD = createMetricsFont({
    name: 'TestNarrowBold',
    metrics: monospaceMetrics(600),
    pdf: { kind: 'standard', name: 'Helvetica-Bold' },
    css: { family: 'Helvetica, Arial, sans-serif', weight: 'bold' },
});

/** 10pt per wide character at 10pt. */
export const WIDE = createMetricsFont({ name: 'TestWide', metrics: monospaceMetrics(1000) });

export const PLAIN_PAIR: FontPair = { narrow: NARROW, wide: WIDE };
export const EMPHASIZED_PAIR: FontPair = { narrow: NARROW_BOLD, wide: WIDE };
export const TEST_FONT_PAIRS = { plain: PLAIN_PAIR, emphasized: EMPHASIZED_PAIR };

export const SCORE_COLUMNS = ['姓名', '学号', '班级', '语文', '数学', '英语'];

/**
 * Score table with `count` students named `Student {i}` and codes from 1000.
 */
export function createScoreTable(count: number, columns: string[] = SCORE_COLUMNS): SheetTable {
    const records: SheetRecord[] = Array.from({ length: count }, (_, index) => {
        const values: CellValue[] = [`Student ${index}`, 1000 + index, 'Class 1', 90 + (index % 10), 85.5, null];
        const entries = columns.map((column, columnIndex): [string, CellValue] => [
            column,
            columnIndex < values.length ? values[columnIndex] : index,
        ]);
        return Object.fromEntries(entries);
    });
    return { columns, records };
}
