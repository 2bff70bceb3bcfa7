import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterAll, describe, expect, it } from '@jest/globals';
import { FALLBACK_FONT, resolveFont, resolveFontPairs, standardFont } from '../fontResolver';
import { createMetricsFont, monospaceMetrics } from '../metricsFont';

const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sheet-fonts-'));

afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('standardFont', () => {
    it('measures with the built-in metrics', () => {
        // a 556, b 556, c 500
        expect(standardFont('Helvetica').widthOfString('abc', 10)).toBeCloseTo(16.12, 6);
    });

    it('measures bold wider than roman', () => {
        const roman = standardFont('Times-Roman').widthOfString('Name', 10);
        const bold = standardFont('Times-Bold').widthOfString('Name', 10);
        expect(bold).toBeGreaterThan(roman);
    });

    it('measures empty text as zero', () => {
        expect(standardFont('Times-Roman').widthOfString('', 12)).toBe(0);
    });

    it('describes how to draw the font', () => {
        const font = standardFont('Times-Bold');
        expect(font.pdf).toEqual({ kind: 'standard', name: 'Times-Bold' });
        expect(font.css.weight).toBe('bold');
    });
});

describe('resolveFont', () => {
    it('falls back when no file is given', () => {
        const resolution = resolveFont({ name: 'Wide' });
        expect(resolution.degraded).toBe(true);
        expect(resolution.reason).toBe('no font file given');
        expect(resolution.handle.name).toBe(FALLBACK_FONT);
    });

    it('falls back when the file is missing', () => {
        const missing = path.join(tempDir, 'missing.ttf');
        const resolution = resolveFont({ name: 'Wide', path: missing }, 'Courier');
        expect(resolution.degraded).toBe(true);
        expect(resolution.reason).toBe(`font file not found: ${missing}`);
        expect(resolution.handle.name).toBe('Courier');
    });

    it('falls back when the file cannot be parsed', () => {
        const broken = path.join(tempDir, 'broken.ttf');
        fs.writeFileSync(broken, 'not a font');
        const resolution = resolveFont({ name: 'Broken', path: broken });
        expect(resolution.degraded).toBe(true);
        expect(resolution.reason?.startsWith(`failed to load ${broken}`)).toBe(true);
        expect(resolution.handle.name).toBe('Helvetica');
    });
});

describe('resolveFontPairs', () => {
    it('uses Times for narrow runs and warns about the wide fallback', () => {
        const { pairs, warnings } = resolveFontPairs({});
        expect(pairs.plain.narrow.name).toBe('Times-Roman');
        expect(pairs.emphasized.narrow.name).toBe('Times-Bold');
        expect(pairs.plain.wide.name).toBe('Helvetica');
        expect(pairs.emphasized.wide).toBe(pairs.plain.wide);
        expect(warnings).toHaveLength(1);
        expect(warnings[0]).toMatchObject({ level: 'warn', code: 'font-fallback' });
    });
});

describe('createMetricsFont', () => {
    it('sums per-character advances', () => {
        const font = createMetricsFont({ name: 'Table', metrics: { advances: { i: 250, m: 900 }, defaultAdvance: 500 } });
        // 250 + 900 + 500 units at 10pt
        expect(font.widthOfString('imx', 10)).toBeCloseTo(16.5, 9);
        expect(font.pdf).toEqual({ kind: 'standard', name: 'Helvetica' });
    });

    it('treats every character alike with monospace metrics', () => {
        const font = createMetricsFont({ name: 'Mono', metrics: monospaceMetrics(600) });
        expect(font.widthOfString('中a', 10)).toBe(12);
    });
});
