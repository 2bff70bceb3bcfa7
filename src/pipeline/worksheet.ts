import type { SheetDocument } from '../types/sheet.types';
import type { SheetAdapters } from '../types/adapters.types';
import { createDefaultAdapters } from '../types/adapters.types';
import type { SheetWarning } from '../errors';
import { SheetConfigError } from '../errors';
import type { WorksheetOptions, WorksheetOptionsInput } from '../config/options';
import { parseWorksheetOptions } from '../config/options';
import { SheetDocumentBuilder } from '../data/SheetDocumentBuilder';
import type { GridLayout } from '../layout/grid';
import { computeGridLayout } from '../layout/grid';
import { paginate } from '../layout/paginate';
import { A4_PORTRAIT, mm, pageSizeFor } from '../layout/utils';
import type { HeaderFit } from '../text/headerFit';
import { createHeaderTemplate, fitHeader } from '../text/headerFit';
import type { WorksheetCellResult } from '../render/worksheetRenderer';
import { renderWorksheetCell } from '../render/worksheetRenderer';

export interface WorksheetResult {
    document: SheetDocument;
    warnings: SheetWarning[];
    options: WorksheetOptions;
    layout: GridLayout;
    header: HeaderFit;
    cell: WorksheetCellResult;
}

export const worksheetHeaderPrefix = (options: Pick<WorksheetOptions, 'date' | 'heading' | 'scope'>): string =>
    [`${options.date}${options.heading}`, options.scope].filter((part) => part.length > 0).join(' ');

/**
 * One page of identical dictation cells, tiled edge to edge.
 */
export const generateWorksheet = (
    input: WorksheetOptionsInput = {},
    adapterOverrides: Partial<SheetAdapters> = {}
): WorksheetResult => {
    const options = parseWorksheetOptions(input);
    const adapters = createDefaultAdapters(adapterOverrides);

    const items = options.items.map((item) => item.trim()).filter((item) => item.length > 0);
    if (items.length === 0) {
        throw new SheetConfigError('empty-items', 'Enter at least one item');
    }

    const size = pageSizeFor(options.orientation, A4_PORTRAIT);
    const padding = mm(options.paddingMm);
    const layout = computeGridLayout({
        pageWidth: size.width,
        pageHeight: size.height,
        margin: mm(options.marginMm),
        gutter: 0,
        cols: options.cols,
        rows: options.rows,
    });

    const warnings: SheetWarning[] = [];
    const fonts = adapters.fontResolver.resolvePairs({ widePath: options.widePath, wideFamily: options.wideFamily });
    warnings.push(...fonts.warnings);

    const innerWidth = layout.cellWidth - 2 * padding;
    const template = createHeaderTemplate(worksheetHeaderPrefix(options), {
        labelA: options.nameLabel,
        labelB: options.classLabel,
    });
    const header = fitHeader(template, innerWidth, options.fontSize, fonts.pairs.emphasized);
    if (header.overflow) {
        warnings.push({
            level: 'warn',
            code: 'header-overflow',
            message: 'The header is wider than the cell even with the shortest fillers',
            details: { text: header.text, width: header.width, budget: header.budget },
        });
    }

    const builder = new SheetDocumentBuilder({
        title: `${options.date}-${options.scope}`,
        size,
        kind: 'worksheet',
    }).registerFonts(fonts.pairs.plain, fonts.pairs.emphasized);
    builder.beginPage();

    let cell: WorksheetCellResult = { drawnItems: 0, droppedItems: items.length };
    const copies = Array.from({ length: layout.cellsPerPage }, () => items);
    paginate(copies, layout, {
        renderCell: (cellItems, placement) => {
            cell = renderWorksheetCell(builder, placement.box, { header: header.text, items: cellItems }, {
                fontSize: options.fontSize,
                padding,
            }, fonts.pairs);
        },
    });

    if (cell.droppedItems > 0) {
        warnings.push({
            level: 'warn',
            code: 'lines-dropped',
            message: `${cell.droppedItems} item(s) did not fit in a cell`,
            details: { drawnItems: cell.drawnItems, droppedItems: cell.droppedItems },
        });
    }

    return {
        document: builder.build(),
        warnings,
        options,
        layout,
        header,
        cell,
    };
};
