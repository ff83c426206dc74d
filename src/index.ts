// xlsx-lens - read, resolve and round-trip edit XLSX workbooks
// Public API

// Types
export type {
	CellType,
	CellAddress,
	CellRange,
	RichTextRun,
	RunFont,
	UnderlineStyle,
	VerticalTextAlignment,
	HorizontalAlignment,
	VerticalAlignment,
	BorderEdge,
	GradientStop,
	GradientFill,
	Style,
	DxfStyle,
	Hyperlink,
	Comment,
	Cell,
	CellData,
	CfvoType,
	Cfvo,
	CellIsOperator,
	TimePeriod,
	ColorScaleRule,
	DataBarRule,
	IconSetRule,
	CellIsRule,
	Top10Rule,
	AboveAverageRule,
	TextRule,
	TimePeriodRule,
	ExpressionRule,
	SimpleRule,
	CfRule,
	ConditionalFormatting,
	DrawingMarker,
	DrawingContent,
	DrawingAnchor,
	Sparkline,
	SparklineGroup,
	DataValidation,
	AutoFilter,
	SheetState,
	Sheet,
	Theme,
	DefinedName,
	NamedStyle,
	Workbook,
} from "./types.js";

// Read
export { read, readFile } from "./read.js";
export type { ParseOptions } from "./read.js";

// Edit and save
export { WorkbookEditor, inferCell } from "./edit/editor.js";
export type { EditorOptions } from "./edit/editor.js";

// Conditional formatting
export { ConditionalFormatEvaluator, evaluateSheet } from "./conditional/evaluate.js";
export type { EvaluateOptions, ConditionalFormatResult, DataBarResult, IconResult } from "./conditional/evaluate.js";

// Colors
export { resolveColor, applyTint } from "./style/color.js";
export type { ColorSpec, ColorContext } from "./style/color.js";

// Number formatting and dates
export { formatNumber, formatText, compileFormat, formatCompiled, isDateFormat, getFormatCode, BUILTIN_FORMATS } from "./ssf/index.js";
export type { CompiledFormat, FormattedValue } from "./ssf/index.js";
export { dateToSerialNumber, serialNumberToDate, serialToDateParts } from "./utils/date.js";
export type { DateParts } from "./utils/date.js";

// Cell references
export { decodeCell, encodeCell, decodeRange, safeDecodeRange, encodeRange, decodeCol, encodeCol, parseSqref } from "./utils/cell.js";

// Errors
export {
	WorkbookError,
	InvalidArchiveError,
	MissingPartError,
	XmlParseError,
	InvalidReferenceError,
	InvalidSheetIndexError,
	NotLoadedError,
	isWorkbookError,
} from "./errors.js";
export type { WorkbookErrorCode } from "./errors.js";

// Logging
export { createLogger, silentLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
