import { describe, expect, it } from '@jest/globals';
import { assertRecords, detailColumns, fieldPairs, selectFields, titleValues } from '../fieldSelection';
import { resolveRoles } from '../roleResolver';
import type { RoleAssignment } from '../roleResolver';
import { SheetConfigError } from '../../errors';
import { createDefaultValueFormatter } from '../../types/adapters.types';
import { SCORE_COLUMNS, createScoreTable } from '../../__tests__/test-utils';

const resolved = resolveRoles(SCORE_COLUMNS);
if (!resolved.ok) {
    throw new Error('fixture columns should resolve');
}
const roles: RoleAssignment = resolved.value;
const formatter = createDefaultValueFormatter();

describe('detailColumns', () => {
    it('drops the identity columns', () => {
        expect(detailColumns(SCORE_COLUMNS, roles)).toEqual(['语文', '数学', '英语']);
    });
});

describe('selectFields', () => {
    it('defaults to every detail column', () => {
        expect(selectFields(SCORE_COLUMNS, roles)).toEqual(['语文', '数学', '英语']);
    });

    it('keeps source order and drops unknown or identity columns', () => {
        expect(selectFields(SCORE_COLUMNS, roles, ['英语', '姓名', '语文', '物理'])).toEqual(['语文', '英语']);
    });

    it('throws when nothing is left', () => {
        expect(() => selectFields(SCORE_COLUMNS, roles, [])).toThrow(SheetConfigError);
        try {
            selectFields(SCORE_COLUMNS, roles, ['姓名']);
        } catch (error) {
            expect(error instanceof SheetConfigError && error.code).toBe('no-fields');
        }
    });
});

describe('assertRecords', () => {
    it('rejects an empty table', () => {
        expect(() => assertRecords({ columns: SCORE_COLUMNS, records: [] })).toThrow('The sheet has no records');
    });

    it('accepts a table with records', () => {
        expect(() => assertRecords(createScoreTable(1))).not.toThrow();
    });
});

describe('record values', () => {
    const [record] = createScoreTable(3).records;

    it('formats field pairs', () => {
        if (!record) {
            throw new Error('fixture record missing');
        }
        expect(fieldPairs(record, ['语文', '数学', '英语'], formatter)).toEqual([
            ['语文', '90'],
            ['数学', '85.5'],
            ['英语', '-'],
        ]);
    });

    it('reads title values by role', () => {
        if (!record) {
            throw new Error('fixture record missing');
        }
        expect(titleValues(record, roles, ['name', 'code'], formatter)).toEqual(['Student 0', '1000']);
    });

    it('shows a placeholder for an unbound role', () => {
        if (!record) {
            throw new Error('fixture record missing');
        }
        const withoutClass: RoleAssignment = { ...roles, class: undefined };
        expect(titleValues(record, withoutClass, ['class', 'name'], formatter)).toEqual(['-', 'Student 0']);
    });
});
