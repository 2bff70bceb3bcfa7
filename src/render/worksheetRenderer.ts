import type { CellBox, FontPair } from '../types/sheet.types';
import type { DrawingSurface } from '../data/SheetDocumentBuilder';
import { GroupSurface } from '../data/SheetDocumentBuilder';
import { wrapMixed } from '../text/wrap';
import { rectOp, rgb, textOp } from './primitives';

const INK = rgb(0, 0, 0);
const LEADING_RATIO = 13.5 / 11;
const HEADER_SPACE_AFTER = 2;
const ITEM_SPACE_AFTER = 1;

export interface WorksheetCellStyle {
    fontSize: number;
    padding: number;
}

export interface WorksheetCellContent {
    /** Already fitted to one line. */
    header: string;
    items: readonly string[];
}

export interface WorksheetCellResult {
    drawnItems: number;
    droppedItems: number;
}

export const worksheetLeading = (fontSize: number): number => fontSize * LEADING_RATIO;

export const numberItems = (items: readonly string[]): string[] => items.map((item, index) => `${index + 1}. ${item}`);

/**
 * Header, then one paragraph per item. A paragraph that does not fit in the
 * remaining height is dropped along with everything after it.
 */
export const renderWorksheetCell = (
    surface: DrawingSurface,
    box: CellBox,
    content: WorksheetCellContent,
    style: WorksheetCellStyle,
    fonts: { plain: FontPair; emphasized: FontPair }
): WorksheetCellResult => {
    const group = new GroupSurface();
    const { fontSize, padding } = style;
    const leading = worksheetLeading(fontSize);
    const innerWidth = box.width - 2 * padding;
    const floor = box.y + padding;

    group.add(rectOp(box, { stroke: INK, lineWidth: 1 }));

    let cursor = box.y + box.height - padding;
    const paragraphs: Array<{ lines: string[]; emphasized: boolean; spaceAfter: number }> = [
        { lines: [content.header], emphasized: true, spaceAfter: HEADER_SPACE_AFTER },
        ...numberItems(content.items).map((item) => ({
            lines: wrapMixed(item, innerWidth, fonts.plain, fontSize),
            emphasized: false,
            spaceAfter: ITEM_SPACE_AFTER,
        })),
    ];

    let drawnParagraphs = 0;
    for (const paragraph of paragraphs) {
        const height = paragraph.lines.length * leading;
        if (cursor - height < floor) {
            break;
        }
        paragraph.lines.forEach((line, lineIndex) => {
            group.add(textOp(
                line,
                box.x + padding,
                cursor - fontSize - lineIndex * leading,
                fontSize,
                INK,
                paragraph.emphasized ? fonts.emphasized : fonts.plain
            ));
        });
        cursor -= height + paragraph.spaceAfter;
        drawnParagraphs += 1;
    }

    surface.add({ type: 'group', clip: { ...box }, ops: group.ops });

    const drawnItems = Math.max(0, drawnParagraphs - 1);
    return { drawnItems, droppedItems: content.items.length - drawnItems };
};
