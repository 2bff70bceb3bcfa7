import type { CellValue } from '../types/sheet.types';

export const EMPTY_VALUE_PLACEHOLDER = '-';

const INTEGRAL_TOLERANCE = 1e-9;

export const formatValue = (value: CellValue): string => {
    if (value === null || value === undefined || value === '') {
        return EMPTY_VALUE_PLACEHOLDER;
    }

    if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
            return EMPTY_VALUE_PLACEHOLDER;
        }
        if (Math.abs(value - Math.trunc(value)) < INTEGRAL_TOLERANCE) {
            return String(Math.trunc(value));
        }
        return value.toFixed(2).replace(/0+$/, '').replace(/\.$/, '');
    }

    return value;
};
