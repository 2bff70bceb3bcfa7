/**
 * sheet-layout - Main Exports
 *
 * Grid, pagination and mixed-script text layout for printable card sheets
 * and dictation worksheets.
 */

// Pipelines
export { generateCardSheet, pageHeaderText } from './pipeline/cardSheet';
export type { CardSheetResult } from './pipeline/cardSheet';
export { generateWorksheet, worksheetHeaderPrefix } from './pipeline/worksheet';
export type { WorksheetResult } from './pipeline/worksheet';
export { previewCardSheet, previewWorksheet, WORKSHEET_PREVIEW_DPI } from './pipeline/preview';
export type { PreviewResult } from './pipeline/preview';

// Backends
export { renderPdf, writePdf, toHexColor } from './backends/pdfBackend';
export { renderPreviewPng, renderPageSvg, DEFAULT_PREVIEW_DPI } from './backends/previewImage';
export type { PreviewOptions } from './backends/previewImage';
export { SheetPage } from './components/SheetPage';
export type { SheetPageProps } from './components/SheetPage';

// Configuration
export {
    cardSheetOptionsSchema,
    worksheetOptionsSchema,
    parseCardSheetOptions,
    parseWorksheetOptions,
} from './config/options';
export type {
    CardSheetOptions,
    CardSheetOptionsInput,
    WorksheetOptions,
    WorksheetOptionsInput,
} from './config/options';

// Errors
export { SheetConfigError, SheetRenderError } from './errors';
export type { SheetConfigErrorCode, SheetWarning, SheetWarningCode } from './errors';

// Layout
export { computeGridLayout, resolveEffectiveRows, cellBox, allCellBoxes } from './layout/grid';
export type { GridSpec, GridLayout, GridMode, EffectiveRows } from './layout/grid';
export { paginate, countPages } from './layout/paginate';
export type { PackerState, CellPlacement, PaginateCallbacks, PaginateOptions, PaginationSummary } from './layout/paginate';
export { A4_PORTRAIT, mm, pageSizeFor, clamp } from './layout/utils';
export { isDebugEnabled } from './layout/debugFlags';
export type { DebugChannel } from './layout/debugFlags';

// Text
export { splitRuns, isNarrowChar } from './text/scriptRuns';
export { measureMixed, layoutRuns } from './text/measure';
export { fitHeader, assembleHeader, createHeaderTemplate, DEFAULT_HEADER_SAFETY_MARGIN } from './text/headerFit';
export type { HeaderFit, HeaderFitOptions } from './text/headerFit';
export { formatValue, EMPTY_VALUE_PLACEHOLDER } from './text/format';
export { wrapMixed } from './text/wrap';

// Fonts
export { resolveFont, resolveFontPairs, fontKey, standardFont, FALLBACK_FONT } from './fonts/fontResolver';
export type { FontSpec, FontResolution, FontPairs, StandardFontName, WideFontOptions } from './fonts/fontResolver';
export { createMetricsFont, monospaceMetrics } from './fonts/metricsFont';
export type { MetricsTable, MetricsFontOptions } from './fonts/metricsFont';

// Records
export { resolveRoles, identityColumns, DEFAULT_ROLE_ALIASES, DEFAULT_ROLE_POSITIONS, IDENTITY_ROLES, OPTIONAL_ROLES } from './data/roleResolver';
export type { IdentityRole, RoleAliases, RoleAssignment, RoleBinding, AmbiguousSchema, Result } from './data/roleResolver';
export { detailColumns, selectFields } from './data/fieldSelection';
export { SheetDocumentBuilder } from './data/SheetDocumentBuilder';
export type { DrawingSurface } from './data/SheetDocumentBuilder';

// Rendering
export { renderCell, cardColumnCapacity, splitIntoColumns, CARD_COLORS, CARD_METRICS } from './render/cardRenderer';
export type { CardStyle, CardRequest, CardRenderResult } from './render/cardRenderer';
export { renderWorksheetCell, worksheetLeading } from './render/worksheetRenderer';
export type { WorksheetCellStyle, WorksheetCellContent, WorksheetCellResult } from './render/worksheetRenderer';

// Adapter System
export {
    createDefaultAdapters,
    createDefaultFontResolver,
    createStaticFontResolver,
    createDefaultValueFormatter,
} from './types/adapters.types';
export type { FontResolver, ValueFormatter, SheetAdapters } from './types/adapters.types';

// Core Types
export type {
    CellValue,
    SheetRecord,
    SheetTable,
    Orientation,
    PageSize,
    CellBox,
    TextRun,
    FontHandle,
    FontPair,
    HeaderTemplate,
    DrawOp,
    SheetPage as SheetPageData,
    SheetDocument,
} from './types/sheet.types';
