import type { SheetTable } from '../types/sheet.types';
import type { SheetAdapters } from '../types/adapters.types';
import type { CardSheetOptionsInput, WorksheetOptionsInput } from '../config/options';
import { renderPreviewPng } from '../backends/previewImage';
import type { CardSheetResult } from './cardSheet';
import { generateCardSheet } from './cardSheet';
import type { WorksheetResult } from './worksheet';
import { generateWorksheet } from './worksheet';

export const WORKSHEET_PREVIEW_DPI = 120;

export interface PreviewResult<R> {
    png: Buffer;
    result: R;
}

/**
 * First page only, as a PNG. Records past the first page are never laid out.
 */
export const previewCardSheet = async (
    table: SheetTable,
    input: CardSheetOptionsInput = {},
    options: { dpi?: number; adapters?: Partial<SheetAdapters> } = {}
): Promise<PreviewResult<CardSheetResult>> => {
    const result = generateCardSheet(table, { ...input, preview: true }, options.adapters);
    const png = await renderPreviewPng(result.document, { dpi: options.dpi });
    return { png, result };
};

export const previewWorksheet = async (
    input: WorksheetOptionsInput = {},
    options: { dpi?: number; adapters?: Partial<SheetAdapters> } = {}
): Promise<PreviewResult<WorksheetResult>> => {
    const result = generateWorksheet(input, options.adapters);
    const png = await renderPreviewPng(result.document, { dpi: options.dpi ?? WORKSHEET_PREVIEW_DPI });
    return { png, result };
};
