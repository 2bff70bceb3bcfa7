/**
 * Sheet Core Types
 *
 * Types shared by the grid, text and rendering layers. Everything here is
 * built per render call and discarded once the document is emitted.
 */

// ============================================================================
// Records
// ============================================================================

export type CellValue = string | number | null | undefined;

/**
 * One row from the tabular source. Column order lives in {@link SheetTable.columns}.
 */
export type SheetRecord = Readonly<Record<string, CellValue>>;

export interface SheetTable {
    /** Header row, in source order. */
    columns: readonly string[];
    records: readonly SheetRecord[];
}

// ============================================================================
// Geometry
// ============================================================================

export type Orientation = 'portrait' | 'landscape';

export interface PageSize {
    width: number;
    height: number;
}

/**
 * Bottom-left-origin rectangle in points.
 */
export interface CellBox {
    x: number;
    y: number;
    width: number;
    height: number;
}

export interface Point {
    x: number;
    y: number;
}

// ============================================================================
// Text
// ============================================================================

export interface TextRun {
    text: string;
    isWide: boolean;
}

export type PdfFontSource =
    | { kind: 'standard'; name: string }
    | { kind: 'file'; path: string; family?: string };

export interface CssFontFace {
    family: string;
    weight: 'normal' | 'bold';
}

/**
 * A measurable font. `name` is the key the document and backends use to find it.
 */
export interface FontHandle {
    name: string;
    pdf: PdfFontSource;
    css: CssFontFace;
    widthOfString(text: string, size: number): number;
}

export interface FontPair {
    narrow: FontHandle;
    wide: FontHandle;
}

export interface HeaderTemplate {
    prefix: string;
    labelA: string;
    fillerA: string;
    labelB: string;
    fillerB: string;
    minLengthA: number;
    minLengthB: number;
}

// ============================================================================
// Drawing
// ============================================================================

export interface RgbColor {
    r: number;
    g: number;
    b: number;
}

export interface PlacedRun {
    text: string;
    fontName: string;
    isWide: boolean;
    /** Offset from the text op's x. */
    offsetX: number;
    width: number;
}

export interface RectOp {
    type: 'rect';
    box: CellBox;
    radius: number;
    lineWidth: number;
    stroke?: RgbColor;
    fill?: RgbColor;
}

export interface LineOp {
    type: 'line';
    from: Point;
    to: Point;
    lineWidth: number;
    stroke: RgbColor;
}

export interface TextOp {
    type: 'text';
    /** Left edge of the first run. */
    x: number;
    /** Alphabetic baseline. */
    y: number;
    size: number;
    color: RgbColor;
    runs: PlacedRun[];
}

export interface GroupOp {
    type: 'group';
    clip?: CellBox;
    ops: DrawOp[];
}

export type DrawOp = RectOp | LineOp | TextOp | GroupOp;

export interface SheetPage {
    pageNumber: number;
    ops: DrawOp[];
}

export interface SheetDocument {
    title: string;
    size: PageSize;
    fonts: Record<string, FontHandle>;
    pages: SheetPage[];
    metadata: {
        kind: 'cards' | 'worksheet';
        createdAt: string;
        preview: boolean;
    };
}
