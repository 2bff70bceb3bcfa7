/**
 * Identity role resolution
 *
 * Each identity role (name, code, class) is matched against its alias list
 * first. Without a match the role falls back to a fixed column position; that
 * branch is tagged so callers can tell a guessed column from a named one.
 * Name and code must bind. Class is left unbound when its fallback column is
 * missing or already taken.
 */

export type IdentityRole = 'name' | 'code' | 'class';

export const IDENTITY_ROLES: readonly IdentityRole[] = ['name', 'code', 'class'];

export type RoleAliases = Record<IdentityRole, readonly string[]>;

export const DEFAULT_ROLE_ALIASES: RoleAliases = {
    name: ['姓名', '姓名/Name', 'name', 'Name'],
    code: ['学号', '学号/Code', 'code', 'Code'],
    class: ['班级', '班级/Class', 'class', 'Class'],
};

export const OPTIONAL_ROLES: ReadonlySet<IdentityRole> = new Set<IdentityRole>(['class']);

export const DEFAULT_ROLE_POSITIONS: Record<IdentityRole, number> = {
    name: 0,
    code: 1,
    class: 2,
};

export interface RoleBinding {
    column: string;
    index: number;
    via: 'alias' | 'position';
}

export interface AmbiguousSchema {
    kind: 'ambiguous-schema';
    role: IdentityRole;
    reason: 'missing-column' | 'column-collision';
    message: string;
    /** Role already bound to the column the fallback wanted. */
    conflictsWith?: IdentityRole;
}

export interface RoleAssignment {
    name: RoleBinding;
    code: RoleBinding;
    class?: RoleBinding;
    /** Optional roles that could not bind, and why. */
    unbound: AmbiguousSchema[];
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

const findAlias = (columns: readonly string[], aliases: readonly string[]): number =>
    columns.findIndex((column) => aliases.includes(column.trim()));

export const resolveRoles = (
    columns: readonly string[],
    aliases: RoleAliases = DEFAULT_ROLE_ALIASES,
    positions: Record<IdentityRole, number> = DEFAULT_ROLE_POSITIONS
): Result<RoleAssignment, AmbiguousSchema> => {
    const byAlias = new Map<IdentityRole, number>();
    IDENTITY_ROLES.forEach((role) => {
        const index = findAlias(columns, aliases[role]);
        if (index >= 0) {
            byAlias.set(role, index);
        }
    });

    const bindings: Partial<Record<IdentityRole, RoleBinding>> = {};
    const claimed = new Map<number, IdentityRole>();
    byAlias.forEach((index, role) => {
        bindings[role] = { column: columns[index], index, via: 'alias' };
        claimed.set(index, role);
    });

    const unbound: AmbiguousSchema[] = [];
    for (const role of IDENTITY_ROLES) {
        if (bindings[role]) {
            continue;
        }

        const index = positions[role];
        const owner = claimed.get(index);
        let problem: AmbiguousSchema | null = null;
        if (index >= columns.length) {
            problem = {
                kind: 'ambiguous-schema',
                role,
                reason: 'missing-column',
                message: `No column matches the ${role} aliases and position ${index} does not exist`,
            };
        } else if (owner) {
            problem = {
                kind: 'ambiguous-schema',
                role,
                reason: 'column-collision',
                message: `Fallback column "${columns[index]}" for ${role} is already the ${owner} column`,
                conflictsWith: owner,
            };
        }

        if (problem) {
            if (!OPTIONAL_ROLES.has(role)) {
                return { ok: false, error: problem };
            }
            unbound.push(problem);
            continue;
        }

        bindings[role] = { column: columns[index], index, via: 'position' };
        claimed.set(index, role);
    }

    const { name, code } = bindings;
    if (!name || !code) {
        throw new Error('Role resolution left a required role unbound');
    }
    const value: RoleAssignment = { name, code, unbound };
    if (bindings.class) {
        value.class = bindings.class;
    }
    return { ok: true, value };
};

export const identityColumns = (assignment: RoleAssignment): Set<string> => {
    const columns = new Set<string>();
    IDENTITY_ROLES.forEach((role) => {
        const binding = assignment[role];
        if (binding) {
            columns.add(binding.column);
        }
    });
    return columns;
};
