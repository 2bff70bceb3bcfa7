import type { SheetRecord, SheetTable } from '../types/sheet.types';
import type { ValueFormatter } from '../types/adapters.types';
import { SheetConfigError } from '../errors';
import type { IdentityRole, RoleAssignment } from './roleResolver';
import { identityColumns } from './roleResolver';

/**
 * Columns that can appear in a card body: everything except the identity columns.
 */
export const detailColumns = (columns: readonly string[], roles: RoleAssignment): string[] => {
    const identity = identityColumns(roles);
    return columns.filter((column) => !identity.has(column));
};

/**
 * Keep the requested fields that exist and are not identity columns, in
 * source column order. Throws when nothing is left to render.
 */
export const selectFields = (
    columns: readonly string[],
    roles: RoleAssignment,
    requested?: readonly string[]
): string[] => {
    const available = detailColumns(columns, roles);
    const selected = requested ? available.filter((column) => requested.includes(column)) : available;

    if (selected.length === 0) {
        throw new SheetConfigError('no-fields', 'Select at least one column to show on the cards', {
            available,
            requested,
        });
    }

    return selected;
};

export const assertRecords = (table: SheetTable): void => {
    if (table.records.length === 0) {
        throw new SheetConfigError('empty-records', 'The sheet has no records');
    }
};

export const fieldPairs = (
    record: SheetRecord,
    fields: readonly string[],
    formatter: ValueFormatter
): Array<[string, string]> => fields.map((field) => [field, formatter.format(record[field])]);

/**
 * One formatted value per title role; an unbound role formats as a missing value.
 */
export const titleValues = (
    record: SheetRecord,
    roles: RoleAssignment,
    titleRoles: readonly IdentityRole[],
    formatter: ValueFormatter
): string[] =>
    titleRoles.map((role) => {
        const binding = roles[role];
        return formatter.format(binding ? record[binding.column] : null);
    });
