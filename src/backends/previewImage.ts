import { createElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import sharp from 'sharp';
import type { SheetDocument } from '../types/sheet.types';
import { SheetRenderError } from '../errors';
import { PT_PER_INCH } from '../layout/utils';
import { SheetPage } from '../components/SheetPage';

export const DEFAULT_PREVIEW_DPI = 144;

export interface PreviewOptions {
    dpi?: number;
    pageNumber?: number;
}

export const renderPageSvg = (document: SheetDocument, options: PreviewOptions = {}): string => {
    const scale = (options.dpi ?? DEFAULT_PREVIEW_DPI) / PT_PER_INCH;
    return renderToStaticMarkup(createElement(SheetPage, { document, pageNumber: options.pageNumber ?? 1, scale }));
};

/**
 * Rasterise one page (the first by default) to PNG.
 */
export const renderPreviewPng = async (document: SheetDocument, options: PreviewOptions = {}): Promise<Buffer> => {
    const svg = renderPageSvg(document, options);
    try {
        return await sharp(Buffer.from(svg)).png().toBuffer();
    } catch (error) {
        throw new SheetRenderError('Failed to rasterise preview', { cause: error });
    }
};
