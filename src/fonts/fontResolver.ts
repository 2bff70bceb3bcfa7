import fs from 'fs';
import PDFDocument from 'pdfkit';
import type { CssFontFace, FontHandle, FontPair } from '../types/sheet.types';
import type { SheetWarning } from '../errors';
import { logEngineEvent } from '../layout/debug/engineLogs';

export type StandardFontName =
    | 'Helvetica'
    | 'Helvetica-Bold'
    | 'Times-Roman'
    | 'Times-Bold'
    | 'Courier'
    | 'Courier-Bold';

export const FALLBACK_FONT: StandardFontName = 'Helvetica';

const STANDARD_CSS: Record<StandardFontName, CssFontFace> = {
    'Helvetica': { family: 'Helvetica, Arial, sans-serif', weight: 'normal' },
    'Helvetica-Bold': { family: 'Helvetica, Arial, sans-serif', weight: 'bold' },
    'Times-Roman': { family: '"Times New Roman", Times, serif', weight: 'normal' },
    'Times-Bold': { family: '"Times New Roman", Times, serif', weight: 'bold' },
    'Courier': { family: '"Courier New", Courier, monospace', weight: 'normal' },
    'Courier-Bold': { family: '"Courier New", Courier, monospace', weight: 'bold' },
};

export interface FontSpec {
    /** Prefix of the key the document registers this font under. */
    name: string;
    path?: string;
    /** PostScript name inside a .ttc collection. */
    family?: string;
}

export interface FontResolution {
    handle: FontHandle;
    degraded: boolean;
    reason?: string;
}

export interface FontPairs {
    plain: FontPair;
    emphasized: FontPair;
}

let measureDoc: PDFKit.PDFDocument | null = null;

// Shared by every handle for measuring; it never gets a page
const measuringDocument = (): PDFKit.PDFDocument => {
    if (!measureDoc) {
        measureDoc = new PDFDocument({ autoFirstPage: false });
    }
    return measureDoc;
};

const pdfkitWidth = (key: string) => (text: string, size: number): number => {
    if (text.length === 0) {
        return 0;
    }
    return measuringDocument().font(key).fontSize(size).widthOfString(text);
};

export const standardFont = (name: StandardFontName): FontHandle => ({
    name,
    pdf: { kind: 'standard', name },
    css: STANDARD_CSS[name],
    widthOfString: pdfkitWidth(name),
});

const fallbackResolution = (reason: string, fallback: StandardFontName): FontResolution => {
    logEngineEvent('fonts', '⚠️', 'font-fallback', { reason, fallback });
    return { handle: standardFont(fallback), degraded: true, reason };
};

/**
 * pdfkit caches a loaded font by its registered name, so every file (and
 * every face inside a collection) needs a key of its own.
 */
export const fontKey = (spec: FontSpec & { path: string }): string =>
    spec.family ? `${spec.name}:${spec.path}#${spec.family}` : `${spec.name}:${spec.path}`;

/**
 * Register a font file for measuring and drawing. Never throws: a missing or
 * unreadable file resolves to a built-in standard font with `degraded` set.
 */
export const resolveFont = (spec: FontSpec, fallback: StandardFontName = FALLBACK_FONT): FontResolution => {
    if (!spec.path) {
        return fallbackResolution('no font file given', fallback);
    }
    if (!fs.existsSync(spec.path)) {
        return fallbackResolution(`font file not found: ${spec.path}`, fallback);
    }

    const key = fontKey({ ...spec, path: spec.path });
    try {
        const doc = measuringDocument();
        if (spec.family) {
            doc.registerFont(key, spec.path, spec.family);
        } else {
            doc.registerFont(key, spec.path);
        }
        // Parse now so a bad file falls back here
        doc.font(key);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return fallbackResolution(`failed to load ${spec.path}: ${message}`, fallback);
    }

    logEngineEvent('fonts', '🔤', 'font-registered', { key, path: spec.path, family: spec.family });

    return {
        handle: {
            name: key,
            pdf: { kind: 'file', path: spec.path, family: spec.family },
            css: { family: spec.family ?? spec.name, weight: 'normal' },
            widthOfString: pdfkitWidth(key),
        },
        degraded: false,
    };
};

export interface WideFontOptions {
    widePath?: string;
    wideFamily?: string;
}

/**
 * Times for narrow runs (roman for plain, bold for emphasized) and the given
 * CJK file for wide runs in both.
 */
export const resolveFontPairs = (options: WideFontOptions): { pairs: FontPairs; warnings: SheetWarning[] } => {
    const wide = resolveFont({ name: 'SheetWide', path: options.widePath, family: options.wideFamily });
    const warnings: SheetWarning[] = [];
    if (wide.degraded) {
        warnings.push({
            level: 'warn',
            code: 'font-fallback',
            message: `Using ${wide.handle.name} for wide text; CJK glyphs may not render`,
            details: { reason: wide.reason, path: options.widePath },
        });
    }

    return {
        pairs: {
            plain: { narrow: standardFont('Times-Roman'), wide: wide.handle },
            emphasized: { narrow: standardFont('Times-Bold'), wide: wide.handle },
        },
        warnings,
    };
};
