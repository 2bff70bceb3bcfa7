import type { CellBox, FontPair, LineOp, RectOp, RgbColor, TextOp } from '../types/sheet.types';
import { layoutRuns } from '../text/measure';

export const rgb = (r: number, g: number, b: number): RgbColor => ({ r, g, b });

export const textOp = (
    text: string,
    x: number,
    y: number,
    size: number,
    color: RgbColor,
    fonts: FontPair
): TextOp => ({
    type: 'text',
    x,
    y,
    size,
    color,
    runs: layoutRuns(text, fonts, size).runs,
});

export const rectOp = (
    box: CellBox,
    options: { radius?: number; lineWidth?: number; stroke?: RgbColor; fill?: RgbColor }
): RectOp => ({
    type: 'rect',
    box: { ...box },
    radius: options.radius ?? 0,
    lineWidth: options.lineWidth ?? 1,
    stroke: options.stroke,
    fill: options.fill,
});

export const lineOp = (x1: number, y1: number, x2: number, y2: number, stroke: RgbColor, lineWidth = 1): LineOp => ({
    type: 'line',
    from: { x: x1, y: y1 },
    to: { x: x2, y: y2 },
    lineWidth,
    stroke,
});
