/**
 * Error and warning types shared by the sheet pipelines.
 *
 * Configuration problems throw before any drawing starts. Degraded output
 * (fallback fonts, header overflow, clamped rows) is reported as warnings on
 * the result instead.
 */

export type SheetConfigErrorCode =
    | 'empty-records'
    | 'empty-items'
    | 'no-fields'
    | 'invalid-grid'
    | 'invalid-options'
    | 'ambiguous-schema';

export class SheetConfigError extends Error {
    readonly code: SheetConfigErrorCode;
    readonly details?: Record<string, unknown>;

    constructor(code: SheetConfigErrorCode, message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = 'SheetConfigError';
        this.code = code;
        this.details = details;
    }
}

/**
 * Raised when the rendering backend fails while writing output.
 */
export class SheetRenderError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SheetRenderError';
    }
}

export type SheetWarningCode =
    | 'font-fallback'
    | 'header-overflow'
    | 'rows-clamped'
    | 'role-unbound'
    | 'fields-dropped'
    | 'lines-dropped';

export interface SheetWarning {
    level: 'info' | 'warn';
    code: SheetWarningCode;
    message: string;
    details?: Record<string, unknown>;
}
