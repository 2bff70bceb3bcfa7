import type { SheetDocument, SheetTable } from '../types/sheet.types';
import type { SheetAdapters } from '../types/adapters.types';
import { createDefaultAdapters } from '../types/adapters.types';
import type { SheetWarning } from '../errors';
import { SheetConfigError } from '../errors';
import type { CardSheetOptions, CardSheetOptionsInput } from '../config/options';
import { parseCardSheetOptions } from '../config/options';
import type { RoleAssignment } from '../data/roleResolver';
import { resolveRoles } from '../data/roleResolver';
import { assertRecords, fieldPairs, selectFields, titleValues } from '../data/fieldSelection';
import { SheetDocumentBuilder } from '../data/SheetDocumentBuilder';
import type { GridLayout } from '../layout/grid';
import { computeGridLayout } from '../layout/grid';
import type { PaginationSummary } from '../layout/paginate';
import { paginate } from '../layout/paginate';
import { A4_PORTRAIT, pageSizeFor } from '../layout/utils';
import { logEngineEvent } from '../layout/debug/engineLogs';
import type { CardStyle } from '../render/cardRenderer';
import { renderCell } from '../render/cardRenderer';
import { rgb, textOp } from '../render/primitives';

const PAGE_HEADER_COLOR = rgb(0.15, 0.15, 0.15);
const PAGE_HEADER_RISE = 10;

export interface CardSheetResult {
    document: SheetDocument;
    warnings: SheetWarning[];
    options: CardSheetOptions;
    layout: GridLayout;
    roles: RoleAssignment;
    fields: string[];
    pagination: PaginationSummary;
}

export const pageHeaderText = (title: string, pageIndex: number): string => `${title}  —  Page ${pageIndex}`;

const cardStyleFrom = (options: CardSheetOptions): CardStyle => ({
    padding: options.padding,
    cornerRadius: options.cornerRadius,
    titleSize: options.titleFontSize,
    asideSize: options.asideFontSize,
    bodySize: options.bodyFontSize,
});

/**
 * Lay out one card per record on as many pages as the grid needs. With
 * `preview` only the first page is produced.
 */
export const generateCardSheet = (
    table: SheetTable,
    input: CardSheetOptionsInput = {},
    adapterOverrides: Partial<SheetAdapters> = {}
): CardSheetResult => {
    const options = parseCardSheetOptions(input);
    const adapters = createDefaultAdapters(adapterOverrides);

    assertRecords(table);

    const roleResult = resolveRoles(table.columns);
    if (!roleResult.ok) {
        const { message, ...details } = roleResult.error;
        throw new SheetConfigError('ambiguous-schema', message, { ...details });
    }
    const roles = roleResult.value;
    const fields = selectFields(table.columns, roles, options.fields);

    const size = pageSizeFor(options.orientation, options.pageSize ?? A4_PORTRAIT);
    const layout = computeGridLayout({
        pageWidth: size.width,
        pageHeight: size.height,
        margin: options.margin,
        gutter: options.gutter,
        cols: options.cols,
        rows: options.rows,
        cellHeight: options.cardHeight,
    });

    const warnings: SheetWarning[] = roles.unbound.map(({ message, ...details }): SheetWarning => ({
        level: 'warn',
        code: 'role-unbound',
        message,
        details: { ...details },
    }));
    if (layout.wasClamped) {
        warnings.push({
            level: 'info',
            code: 'rows-clamped',
            message: `Only ${layout.effectiveRows} of ${layout.requestedRows} rows fit on a page`,
            details: { requestedRows: layout.requestedRows, effectiveRows: layout.effectiveRows },
        });
    }

    const fonts = adapters.fontResolver.resolvePairs({ widePath: options.widePath, wideFamily: options.wideFamily });
    warnings.push(...fonts.warnings);
    const { plain } = fonts.pairs;

    const builder = new SheetDocumentBuilder({
        title: options.title,
        size,
        kind: 'cards',
        preview: options.preview,
    }).registerFonts(fonts.pairs.plain, fonts.pairs.emphasized);

    const openPage = (pageIndex: number) => {
        builder.beginPage();
        builder.add(textOp(
            pageHeaderText(options.title, pageIndex),
            options.margin,
            size.height - options.margin + PAGE_HEADER_RISE,
            options.headerFontSize,
            PAGE_HEADER_COLOR,
            plain
        ));
    };

    const style = cardStyleFrom(options);
    let droppedPerCard = 0;

    openPage(1);
    const pagination = paginate(table.records, layout, {
        beginPage: openPage,
        renderCell: (record, placement) => {
            const result = renderCell(builder, placement.box, {
                titleFields: titleValues(record, roles, options.titleRoles, adapters.valueFormatter),
                asideLabel: options.asideLabel,
                fields: fieldPairs(record, fields, adapters.valueFormatter),
            }, style, plain);
            droppedPerCard = Math.max(droppedPerCard, result.droppedFields);
        },
    }, { preview: options.preview });

    if (droppedPerCard > 0) {
        warnings.push({
            level: 'warn',
            code: 'fields-dropped',
            message: `${droppedPerCard} field(s) per card did not fit and were left out`,
            details: { droppedPerCard, selectedFields: fields.length },
        });
    }

    logEngineEvent('render', '🗂️', 'card-sheet-complete', {
        pages: pagination.pageCount,
        cards: pagination.emitted,
        warnings: warnings.map((warning) => warning.code),
    });

    return {
        document: builder.build(),
        warnings,
        options,
        layout,
        roles,
        fields,
        pagination,
    };
};
