import type { FontPair, HeaderTemplate } from '../types/sheet.types';
import { mm } from '../layout/utils';
import { logEngineEvent } from '../layout/debug/engineLogs';
import { measureMixed } from './measure';

export const DEFAULT_HEADER_SAFETY_MARGIN = mm(1);

export interface HeaderFitOptions {
    safetyMargin?: number;
}

export interface HeaderFit {
    text: string;
    width: number;
    budget: number;
    iterations: number;
    /** The space before the second label was dropped as a last resort. */
    separatorRemoved: boolean;
    /** Still wider than the budget after every reduction. */
    overflow: boolean;
}

export const createHeaderTemplate = (
    prefix: string,
    overrides: Partial<Omit<HeaderTemplate, 'prefix'>> = {}
): HeaderTemplate => ({
    prefix,
    labelA: 'Name',
    fillerA: '________',
    labelB: 'Class',
    fillerB: '___',
    minLengthA: 2,
    minLengthB: 1,
    ...overrides,
});

export const assembleHeader = (
    template: HeaderTemplate,
    fillerA: string,
    fillerB: string,
    tight = false
): string => {
    const separator = tight ? '' : ' ';
    return `${template.prefix} ${template.labelA}${fillerA}${separator}${template.labelB}${fillerB}`;
};

/**
 * Shorten the fillers until the header fits on one line. Measure with the
 * emphasized pair: the header is drawn bold.
 */
export const fitHeader = (
    template: HeaderTemplate,
    maxWidth: number,
    size: number,
    emphasized: FontPair,
    options: HeaderFitOptions = {}
): HeaderFit => {
    const budget = maxWidth - (options.safetyMargin ?? DEFAULT_HEADER_SAFETY_MARGIN);
    const minA = Math.max(0, template.minLengthA);
    const minB = Math.max(0, template.minLengthB);

    let fillerA = template.fillerA;
    let fillerB = template.fillerB;
    let separatorRemoved = false;
    let iterations = 0;
    let text = assembleHeader(template, fillerA, fillerB);
    let width = measureMixed(text, emphasized, size);

    while (width > budget) {
        if (fillerA.length > minA) {
            fillerA = fillerA.slice(0, -1);
        } else if (fillerB.length > minB) {
            fillerB = fillerB.slice(0, -1);
        } else {
            text = assembleHeader(template, fillerA, fillerB, true);
            width = measureMixed(text, emphasized, size);
            separatorRemoved = true;
            break;
        }
        iterations += 1;
        text = assembleHeader(template, fillerA, fillerB);
        width = measureMixed(text, emphasized, size);
    }

    const result: HeaderFit = {
        text,
        width,
        budget,
        iterations,
        separatorRemoved,
        overflow: width > budget,
    };

    logEngineEvent('header-fit', result.overflow ? '⚠️' : '✂️', 'header-fit', {
        text,
        width,
        budget,
        iterations,
        separatorRemoved,
    });

    return result;
};
