import type { CellBox, FontPair } from '../types/sheet.types';
import type { DrawingSurface } from '../data/SheetDocumentBuilder';
import { GroupSurface } from '../data/SheetDocumentBuilder';
import { measureMixed } from '../text/measure';
import { lineOp, rectOp, rgb, textOp } from './primitives';

export const CARD_COLORS = {
    border: rgb(0.25, 0.35, 0.55),
    background: rgb(0.97, 0.98, 1.0),
    title: rgb(0.12, 0.18, 0.35),
    divider: rgb(0.75, 0.8, 0.95),
    body: rgb(0.1, 0.1, 0.1),
};

export const CARD_METRICS = {
    dividerOffset: 4,
    bodyOffset: 20,
    lineGap: 4,
    columnGap: 8,
    columnCount: 3,
};

export interface CardStyle {
    padding: number;
    cornerRadius: number;
    titleSize: number;
    asideSize: number;
    bodySize: number;
}

export interface CardRequest {
    titleFields: readonly string[];
    asideLabel?: string;
    /** Key/value pairs in display order. */
    fields: ReadonlyArray<readonly [string, string]>;
}

export interface CardRenderResult {
    capacityPerColumn: number;
    drawnFields: number;
    droppedFields: number;
}

export const cardTitleBaseline = (box: CellBox, style: CardStyle): number =>
    box.y + box.height - style.padding - style.titleSize;

export const cardColumnCapacity = (box: CellBox, style: CardStyle): number => {
    const bodyTop = cardTitleBaseline(box, style) - CARD_METRICS.bodyOffset;
    const lineHeight = style.bodySize + CARD_METRICS.lineGap;
    const bodyBottom = box.y + style.padding;
    return Math.max(1, Math.floor((bodyTop - bodyBottom) / lineHeight) + 1);
};

/**
 * Fill column 1, then 2, then 3. Whatever is left over is returned separately.
 */
export const splitIntoColumns = <T>(
    items: readonly T[],
    capacity: number,
    columnCount: number = CARD_METRICS.columnCount
): { columns: T[][]; overflow: T[] } => {
    const columns: T[][] = [];
    for (let index = 0; index < columnCount; index += 1) {
        columns.push(items.slice(index * capacity, (index + 1) * capacity));
    }
    return { columns, overflow: items.slice(columnCount * capacity) };
};

export const renderCell = (
    surface: DrawingSurface,
    box: CellBox,
    request: CardRequest,
    style: CardStyle,
    fonts: FontPair
): CardRenderResult => {
    const group = new GroupSurface();
    const { padding } = style;

    group.add(rectOp(box, {
        radius: style.cornerRadius,
        lineWidth: 1,
        stroke: CARD_COLORS.border,
        fill: CARD_COLORS.background,
    }));

    const titleY = cardTitleBaseline(box, style);
    const title = request.titleFields.join(' ');
    if (title.length > 0) {
        group.add(textOp(title, box.x + padding, titleY, style.titleSize, CARD_COLORS.title, fonts));
    }

    if (request.asideLabel) {
        const labelWidth = measureMixed(request.asideLabel, fonts, style.asideSize);
        const labelX = box.x + box.width - padding - labelWidth;
        group.add(textOp(request.asideLabel, labelX, titleY, style.asideSize, CARD_COLORS.title, fonts));
    }

    const dividerY = titleY - CARD_METRICS.dividerOffset;
    group.add(lineOp(box.x + padding, dividerY, box.x + box.width - padding, dividerY, CARD_COLORS.divider));

    const bodyTop = titleY - CARD_METRICS.bodyOffset;
    const lineHeight = style.bodySize + CARD_METRICS.lineGap;
    const { columnGap, columnCount } = CARD_METRICS;
    const columnWidth = (box.width - padding * 2 - columnGap * (columnCount - 1)) / columnCount;
    const capacity = cardColumnCapacity(box, style);
    const { columns, overflow } = splitIntoColumns(request.fields, capacity, columnCount);

    columns.forEach((column, columnIndex) => {
        const columnX = box.x + padding + columnIndex * (columnWidth + columnGap);
        column.forEach(([key, value], lineIndex) => {
            group.add(textOp(
                `${key}: ${value}`,
                columnX,
                bodyTop - lineIndex * lineHeight,
                style.bodySize,
                CARD_COLORS.body,
                fonts
            ));
        });
    });

    surface.add({ type: 'group', clip: { ...box }, ops: group.ops });

    return {
        capacityPerColumn: capacity,
        drawnFields: request.fields.length - overflow.length,
        droppedFields: overflow.length,
    };
};
