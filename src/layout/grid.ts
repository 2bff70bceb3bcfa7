import type { CellBox } from '../types/sheet.types';
import { SheetConfigError } from '../errors';
import { LAYOUT_EPSILON } from './utils';
import { logEngineEvent } from './debug/engineLogs';

/**
 * Page grid request. Omitting `cellHeight` selects tiled mode, where the usable
 * height is divided evenly between `rows`. Supplying it selects fixed mode,
 * where `rows` is clamped to what fits vertically.
 */
export interface GridSpec {
    pageWidth: number;
    pageHeight: number;
    margin: number;
    gutter: number;
    cols: number;
    rows: number;
    cellHeight?: number;
}

export type GridMode = 'tiled' | 'fixed';

export interface EffectiveRows {
    effectiveRows: number;
    requestedRows: number;
    maxRowsFit: number;
    wasClamped: boolean;
}

export interface GridLayout {
    spec: GridSpec;
    mode: GridMode;
    cols: number;
    effectiveRows: number;
    requestedRows: number;
    wasClamped: boolean;
    cellsPerPage: number;
    cellWidth: number;
    cellHeight: number;
    usableWidth: number;
    usableHeight: number;
}

const usableSize = (spec: GridSpec) => ({
    usableWidth: spec.pageWidth - 2 * spec.margin,
    usableHeight: spec.pageHeight - 2 * spec.margin,
});

const assertPositiveCount = (label: string, value: number): void => {
    if (!Number.isInteger(value) || value < 1) {
        throw new SheetConfigError('invalid-grid', `Grid ${label} must be a positive integer`, { [label]: value });
    }
};

export const resolveEffectiveRows = (spec: GridSpec): EffectiveRows => {
    assertPositiveCount('rows', spec.rows);

    if (spec.cellHeight === undefined) {
        return { effectiveRows: spec.rows, requestedRows: spec.rows, maxRowsFit: spec.rows, wasClamped: false };
    }

    const { usableHeight } = usableSize(spec);
    const pitch = spec.cellHeight + spec.gutter;
    const maxRowsFit = Math.max(1, Math.floor((usableHeight + spec.gutter) / pitch + LAYOUT_EPSILON));
    const effectiveRows = Math.min(spec.rows, maxRowsFit);

    return {
        effectiveRows,
        requestedRows: spec.rows,
        maxRowsFit,
        wasClamped: effectiveRows < spec.rows,
    };
};

export const computeGridLayout = (spec: GridSpec): GridLayout => {
    assertPositiveCount('cols', spec.cols);
    if (spec.gutter < 0 || spec.margin < 0) {
        throw new SheetConfigError('invalid-grid', 'Grid margin and gutter must not be negative', {
            margin: spec.margin,
            gutter: spec.gutter,
        });
    }

    const { usableWidth, usableHeight } = usableSize(spec);
    const cellWidth = (usableWidth - (spec.cols - 1) * spec.gutter) / spec.cols;
    if (!(cellWidth > 0)) {
        throw new SheetConfigError('invalid-grid', 'Columns do not fit inside the page width', {
            cols: spec.cols,
            usableWidth,
            gutter: spec.gutter,
        });
    }

    const rows = resolveEffectiveRows(spec);
    const mode: GridMode = spec.cellHeight === undefined ? 'tiled' : 'fixed';
    const cellHeight = spec.cellHeight ?? (usableHeight - (spec.rows - 1) * spec.gutter) / spec.rows;
    if (!(cellHeight > 0)) {
        throw new SheetConfigError('invalid-grid', 'Cell height must be positive', { cellHeight, mode });
    }

    const layout: GridLayout = {
        spec,
        mode,
        cols: spec.cols,
        effectiveRows: rows.effectiveRows,
        requestedRows: rows.requestedRows,
        wasClamped: rows.wasClamped,
        cellsPerPage: spec.cols * rows.effectiveRows,
        cellWidth,
        cellHeight,
        usableWidth,
        usableHeight,
    };

    logEngineEvent('grid', '📐', 'grid-layout', {
        mode,
        cols: layout.cols,
        effectiveRows: layout.effectiveRows,
        requestedRows: layout.requestedRows,
        cellWidth,
        cellHeight,
    });

    return layout;
};

/**
 * Box of the cell at (`rowIndex`, `colIndex`). Row 0 is the top row.
 */
export const cellBox = (layout: GridLayout, rowIndex: number, colIndex: number): CellBox => {
    if (rowIndex < 0 || rowIndex >= layout.effectiveRows || !Number.isInteger(rowIndex)) {
        throw new RangeError(`Row index ${rowIndex} outside 0..${layout.effectiveRows - 1}`);
    }
    if (colIndex < 0 || colIndex >= layout.cols || !Number.isInteger(colIndex)) {
        throw new RangeError(`Column index ${colIndex} outside 0..${layout.cols - 1}`);
    }

    const { margin, gutter, pageHeight } = layout.spec;
    return {
        x: margin + colIndex * (layout.cellWidth + gutter),
        y: pageHeight - margin - layout.cellHeight - rowIndex * (layout.cellHeight + gutter),
        width: layout.cellWidth,
        height: layout.cellHeight,
    };
};

export const allCellBoxes = (layout: GridLayout): CellBox[] => {
    const boxes: CellBox[] = [];
    for (let row = 0; row < layout.effectiveRows; row += 1) {
        for (let col = 0; col < layout.cols; col += 1) {
            boxes.push(cellBox(layout, row, col));
        }
    }
    return boxes;
};
