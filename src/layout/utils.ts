import type { Orientation, PageSize } from '../types/sheet.types';

export const PT_PER_INCH = 72;
export const MM_PER_INCH = 25.4;
export const LAYOUT_EPSILON = 1e-6;

export const A4_PORTRAIT: PageSize = { width: 595.2755905511812, height: 841.8897637795277 };

export const mm = (value: number): number => (value / MM_PER_INCH) * PT_PER_INCH;

export const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max);

export const pageSizeFor = (orientation: Orientation, base: PageSize = A4_PORTRAIT): PageSize => {
    const short = Math.min(base.width, base.height);
    const long = Math.max(base.width, base.height);
    return orientation === 'landscape' ? { width: long, height: short } : { width: short, height: long };
};
