import { z } from 'zod';
import { SheetConfigError } from '../errors';
import { clamp } from '../layout/utils';

// Out-of-range numbers are bounded to the nearest legal value rather than rejected
const clampedNumber = (min: number, max: number, fallback: number) =>
    z.number().finite().default(fallback).transform((value) => clamp(value, min, max));

const clampedInt = (min: number, max: number, fallback: number) =>
    z.number().finite().default(fallback).transform((value) => clamp(Math.round(value), min, max));

const orientation = z.enum(['portrait', 'landscape']).default('portrait');

const pageSize = z.object({
    width: z.number().finite().positive(),
    height: z.number().finite().positive(),
});

const wideFont = {
    widePath: z.string().min(1).optional(),
    wideFamily: z.string().min(1).optional(),
};

export const cardSheetOptionsSchema = z.object({
    title: z.string().default('学生成绩小分条'),
    asideLabel: z.string().default('期中英语'),
    orientation,
    pageSize: pageSize.optional(),
    cols: clampedInt(1, 4, 2),
    rows: clampedInt(1, 10, 6),
    cardHeight: clampedNumber(80, 250, 110),
    margin: clampedNumber(18, 72, 36),
    gutter: clampedNumber(4, 32, 16),
    padding: clampedNumber(2, 30, 10),
    cornerRadius: clampedNumber(0, 30, 10),
    headerFontSize: clampedInt(6, 24, 12),
    titleFontSize: clampedInt(6, 20, 10),
    asideFontSize: clampedInt(6, 18, 8),
    bodyFontSize: clampedInt(6, 16, 8),
    fields: z.array(z.string()).optional(),
    titleRoles: z.array(z.enum(['name', 'code', 'class'])).min(1).default(['name', 'code']),
    preview: z.boolean().default(false),
    ...wideFont,
});

export const worksheetOptionsSchema = z.object({
    date: z.string().default('1111'),
    heading: z.string().default('重默'),
    scope: z.string().default(''),
    items: z.array(z.string()).default([]),
    orientation,
    cols: clampedInt(1, 4, 2),
    rows: clampedInt(1, 5, 3),
    fontSize: clampedInt(8, 16, 11),
    paddingMm: clampedNumber(1, 10, 3),
    marginMm: clampedNumber(0, 30, 8),
    nameLabel: z.string().default('Name'),
    classLabel: z.string().default('Class'),
    ...wideFont,
});

export type CardSheetOptionsInput = z.input<typeof cardSheetOptionsSchema>;
export type CardSheetOptions = z.output<typeof cardSheetOptionsSchema>;
export type WorksheetOptionsInput = z.input<typeof worksheetOptionsSchema>;
export type WorksheetOptions = z.output<typeof worksheetOptionsSchema>;

const parseWith = <S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.output<S> => {
    const parsed = schema.safeParse(input ?? {});
    if (!parsed.success) {
        throw new SheetConfigError('invalid-options', `Invalid ${label} options: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`, {
            issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
        });
    }
    return parsed.data;
};

export const parseCardSheetOptions = (input: unknown): CardSheetOptions =>
    parseWith(cardSheetOptionsSchema, input, 'card sheet');

export const parseWorksheetOptions = (input: unknown): WorksheetOptions =>
    parseWith(worksheetOptionsSchema, input, 'worksheet');
