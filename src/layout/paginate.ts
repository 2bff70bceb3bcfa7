import type { CellBox } from '../types/sheet.types';
import type { GridLayout } from './grid';
import { cellBox } from './grid';
import { logEngineEvent, logPackerTransition } from './debug/engineLogs';

export type PackerState = 'awaiting-record' | 'emitting-cell' | 'page-boundary' | 'done';

export interface CellPlacement {
    /** 1-based page the cell lands on. */
    pageIndex: number;
    /** Index of the record in the (possibly truncated) stream. */
    recordIndex: number;
    position: number;
    row: number;
    col: number;
    box: CellBox;
}

export interface PaginateCallbacks<R> {
    renderCell: (record: R, placement: CellPlacement) => void;
    /**
     * Invoked when a page boundary opens a new page, before the next record is
     * placed. The first page is opened by the caller.
     */
    beginPage?: (pageIndex: number) => void;
}

export interface PaginateOptions {
    /** Keep at most one page of records and never break pages. */
    preview?: boolean;
}

export interface PaginationSummary {
    pageCount: number;
    emitted: number;
    boundaries: number;
    truncated: number;
    finalState: PackerState;
}

export const countPages = (recordCount: number, cellsPerPage: number): number =>
    recordCount <= 0 ? 0 : Math.ceil(recordCount / cellsPerPage);

export const paginate = <R>(
    records: readonly R[],
    layout: GridLayout,
    callbacks: PaginateCallbacks<R>,
    options: PaginateOptions = {}
): PaginationSummary => {
    const { cellsPerPage, cols } = layout;
    const preview = options.preview ?? false;
    const stream = preview ? records.slice(0, cellsPerPage) : records;
    const truncated = records.length - stream.length;

    let state: PackerState = 'awaiting-record';
    let pageIndex = 1;
    let emitted = 0;
    let boundaries = 0;

    const transition = (next: PackerState, context: Record<string, unknown> = {}) => {
        logPackerTransition(state, next, { pageIndex, emitted, ...context });
        state = next;
    };

    logEngineEvent('paginate', '🧮', 'paginate-start', {
        records: records.length,
        streamed: stream.length,
        cellsPerPage,
        preview,
    });

    stream.forEach((record, recordIndex) => {
        transition('emitting-cell', { recordIndex });

        const position = emitted % cellsPerPage;
        const row = Math.floor(position / cols);
        const col = position % cols;
        callbacks.renderCell(record, {
            pageIndex,
            recordIndex,
            position,
            row,
            col,
            box: cellBox(layout, row, col),
        });
        emitted += 1;

        const isLast = recordIndex === stream.length - 1;
        if (!preview && emitted % cellsPerPage === 0 && !isLast) {
            transition('page-boundary');
            pageIndex += 1;
            boundaries += 1;
            callbacks.beginPage?.(pageIndex);
        }

        transition('awaiting-record');
    });

    transition('done');

    const summary: PaginationSummary = {
        pageCount: emitted === 0 ? 0 : pageIndex,
        emitted,
        boundaries,
        truncated,
        finalState: state,
    };

    logEngineEvent('paginate', '🧾', 'paginate-complete', { ...summary });

    return summary;
};
