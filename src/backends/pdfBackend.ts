import { promises as fsPromises } from 'fs';
import PDFDocument from 'pdfkit';
import type { DrawOp, RgbColor, SheetDocument } from '../types/sheet.types';
import { SheetRenderError } from '../errors';
import { logEngineEvent } from '../layout/debug/engineLogs';

export const toHexColor = ({ r, g, b }: RgbColor): string => {
    const channel = (value: number) => Math.round(Math.min(Math.max(value, 0), 1) * 255).toString(16).padStart(2, '0');
    return `#${channel(r)}${channel(g)}${channel(b)}`;
};

/**
 * Map document font names to the keys pdfkit draws with. Standard fonts are
 * drawn by their built-in name; files are registered under the handle name.
 */
const registerFonts = (doc: PDFKit.PDFDocument, document: SheetDocument): Map<string, string> => {
    const keys = new Map<string, string>();
    Object.values(document.fonts).forEach((font) => {
        if (font.pdf.kind === 'standard') {
            keys.set(font.name, font.pdf.name);
            return;
        }
        if (font.pdf.family) {
            doc.registerFont(font.name, font.pdf.path, font.pdf.family);
        } else {
            doc.registerFont(font.name, font.pdf.path);
        }
        keys.set(font.name, font.name);
    });
    return keys;
};

const drawOps = (doc: PDFKit.PDFDocument, ops: DrawOp[], pageHeight: number, fontKeys: Map<string, string>): void => {
    // Ops use a bottom-left origin; pdfkit draws from the top-left
    const flipY = (y: number) => pageHeight - y;

    ops.forEach((op) => {
        switch (op.type) {
            case 'rect': {
                const top = flipY(op.box.y + op.box.height);
                if (op.radius > 0) {
                    doc.roundedRect(op.box.x, top, op.box.width, op.box.height, op.radius);
                } else {
                    doc.rect(op.box.x, top, op.box.width, op.box.height);
                }
                doc.lineWidth(op.lineWidth);
                if (op.fill && op.stroke) {
                    doc.fillAndStroke(toHexColor(op.fill), toHexColor(op.stroke));
                } else if (op.fill) {
                    doc.fill(toHexColor(op.fill));
                } else if (op.stroke) {
                    doc.stroke(toHexColor(op.stroke));
                }
                break;
            }
            case 'line':
                doc.moveTo(op.from.x, flipY(op.from.y))
                    .lineTo(op.to.x, flipY(op.to.y))
                    .lineWidth(op.lineWidth)
                    .stroke(toHexColor(op.stroke));
                break;
            case 'text':
                doc.fillColor(toHexColor(op.color));
                op.runs.forEach((run) => {
                    doc.font(fontKeys.get(run.fontName) ?? run.fontName)
                        .fontSize(op.size)
                        .text(run.text, op.x + run.offsetX, flipY(op.y), { lineBreak: false, baseline: 'alphabetic' });
                });
                break;
            case 'group':
                doc.save();
                if (op.clip) {
                    doc.rect(op.clip.x, flipY(op.clip.y + op.clip.height), op.clip.width, op.clip.height).clip();
                }
                drawOps(doc, op.ops, pageHeight, fontKeys);
                doc.restore();
                break;
        }
    });
};

/**
 * Write every page of the document into a PDF and resolve with its bytes.
 */
export const renderPdf = (document: SheetDocument): Promise<Buffer> =>
    new Promise<Buffer>((resolve, reject) => {
        const doc = new PDFDocument({
            size: [document.size.width, document.size.height],
            margin: 0,
            autoFirstPage: false,
            info: { Title: document.title },
        });
        const chunks: Buffer[] = [];
        doc.on('data', (chunk: Buffer) => chunks.push(chunk));
        doc.on('end', () => resolve(Buffer.concat(chunks)));
        doc.on('error', (error: unknown) => reject(new SheetRenderError('PDF stream failed', { cause: error })));

        try {
            const fontKeys = registerFonts(doc, document);
            document.pages.forEach((page) => {
                doc.addPage({ size: [document.size.width, document.size.height], margin: 0 });
                drawOps(doc, page.ops, document.size.height, fontKeys);
            });
            logEngineEvent('render', '🖨️', 'pdf-written', { pages: document.pages.length, title: document.title });
            doc.end();
        } catch (error) {
            reject(new SheetRenderError('Failed to draw PDF', { cause: error }));
        }
    });

export const writePdf = async (document: SheetDocument, outputPath: string): Promise<void> => {
    const bytes = await renderPdf(document);
    try {
        await fsPromises.writeFile(outputPath, bytes);
    } catch (error) {
        throw new SheetRenderError(`Failed to write ${outputPath}`, { cause: error });
    }
};
