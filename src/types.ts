/** Cell value type: number, string, boolean, error, ISO date, or stub (no value) */
export type CellType = "n" | "s" | "b" | "e" | "d" | "z";

/** Zero-based cell address */
export interface CellAddress {
	/** Row index */
	r: number;
	/** Column index */
	c: number;
}

/** Inclusive rectangle of cells, start (s) to end (e), with s <= e on both axes */
export interface CellRange {
	s: CellAddress;
	e: CellAddress;
}

/** One formatted run of a rich text string */
export interface RichTextRun {
	text: string;
	/** Run formatting; absent for runs that inherit the cell font */
	font?: RunFont;
}

/** Character formatting carried by a rich text run */
export interface RunFont {
	fontFamily?: string;
	fontSize?: number;
	fontColor?: string;
	bold?: boolean;
	italic?: boolean;
	underline?: UnderlineStyle;
	strikethrough?: boolean;
	vertAlign?: VerticalTextAlignment;
}

export type UnderlineStyle = "none" | "single" | "double" | "singleAccounting" | "doubleAccounting";
export type VerticalTextAlignment = "baseline" | "superscript" | "subscript";
export type HorizontalAlignment = "general" | "left" | "center" | "right" | "fill" | "justify" | "centerContinuous" | "distributed";
export type VerticalAlignment = "top" | "center" | "bottom" | "justify" | "distributed";

/** One side of a cell border */
export interface BorderEdge {
	/** ECMA line style, e.g. "thin", "dashed", "double" */
	style: string;
	/** Resolved `#RRGGBB` color; absent means automatic */
	color?: string;
}

export interface GradientStop {
	/** 0 to 1 */
	position: number;
	color: string;
}

export interface GradientFill {
	type: "linear" | "path";
	/** Angle of a linear gradient in degrees */
	degree: number;
	/** Focus rectangle of a path gradient, each 0 to 1 */
	left: number;
	right: number;
	top: number;
	bottom: number;
	stops: GradientStop[];
}

/**
 * Fully resolved cell formatting.
 *
 * Every field has a value after resolution; optional fields are optional because
 * "none" is a meaningful state (no border on that edge, no fill color, automatic
 * font color, default alignment).
 */
export interface Style {
	fontFamily: string;
	/** Points */
	fontSize: number;
	/** `#RRGGBB`; absent means automatic (black) */
	fontColor?: string;
	bold: boolean;
	italic: boolean;
	underline: UnderlineStyle;
	strikethrough: boolean;
	vertAlign: VerticalTextAlignment;

	/** ECMA pattern type; "none" for no fill */
	patternType: string;
	/** Background color; for solid fills this is the pattern foreground */
	bgColor?: string;
	/** Pattern color of non-solid fills */
	fgColor?: string;
	gradient?: GradientFill;

	borderTop?: BorderEdge;
	borderRight?: BorderEdge;
	borderBottom?: BorderEdge;
	borderLeft?: BorderEdge;
	borderDiagonal?: BorderEdge;
	diagonalUp: boolean;
	diagonalDown: boolean;

	/** Absent means general alignment */
	alignH?: HorizontalAlignment;
	/** Absent means bottom alignment */
	alignV?: VerticalAlignment;
	wrap: boolean;
	/** Never true together with `wrap` */
	shrinkToFit: boolean;
	/** 0-90 counterclockwise, 91-180 clockwise (90 - value), 255 vertical stacked text */
	rotation: number;
	indent: number;
	/** 0 context, 1 left-to-right, 2 right-to-left */
	readingOrder: number;

	locked: boolean;
	hidden: boolean;

	numFmtId: number;
	/** Format code for the number format engine, "General" at minimum */
	numberFormat: string;
}

/** Differential format applied by conditional formatting */
export interface DxfStyle {
	fontColor?: string;
	bold?: boolean;
	italic?: boolean;
	underline?: UnderlineStyle;
	strikethrough?: boolean;
	fillColor?: string;
	borderColor?: string;
	borderStyle?: string;
	numberFormat?: string;
}

export interface Hyperlink {
	/** Range the link covers, e.g. "B2" or "B2:C4" */
	ref: string;
	/** External target resolved from the sheet relationships */
	target?: string;
	/** In-workbook location, e.g. "Sheet2!A1" */
	location?: string;
	display?: string;
	tooltip?: string;
}

export interface Comment {
	/** Cell the comment is attached to, e.g. "A1" */
	ref: string;
	r: number;
	c: number;
	author: string;
	/** Text of all runs concatenated */
	text: string;
}

/** A single cell */
export interface Cell {
	t: CellType;
	/** Raw value text: numbers as written, booleans as "TRUE"/"FALSE", strings resolved */
	v?: string;
	/** Formatted display text */
	w?: string;
	/** Formula text without the leading "=" */
	formula?: string;
	/** Resolved style; shared by every cell with the same style index */
	s?: Style;
	/** Index into cellXfs, when the cell carries one */
	styleIndex?: number;
	richText?: RichTextRun[];
	hasComment?: boolean;
	hyperlink?: Hyperlink;
}

export interface CellData {
	r: number;
	c: number;
	cell: Cell;
}

/** Value source of a color scale stop, data bar end or icon threshold */
export type CfvoType = "num" | "percent" | "percentile" | "min" | "max" | "formula" | "autoMin" | "autoMax";

export interface Cfvo {
	type: CfvoType;
	value?: string;
	/** Icon thresholds: compare with >= (default) or > */
	gte: boolean;
}

export type CellIsOperator =
	| "lessThan"
	| "lessThanOrEqual"
	| "equal"
	| "notEqual"
	| "greaterThanOrEqual"
	| "greaterThan"
	| "between"
	| "notBetween";

export type TimePeriod =
	| "today"
	| "yesterday"
	| "tomorrow"
	| "last7Days"
	| "thisWeek"
	| "lastWeek"
	| "nextWeek"
	| "thisMonth"
	| "lastMonth"
	| "nextMonth";

interface CfRuleBase {
	/** Lower values are evaluated first */
	priority: number;
	stopIfTrue: boolean;
	dxfId?: number;
}

export interface ColorScaleRule extends CfRuleBase {
	type: "colorScale";
	cfvos: Cfvo[];
	/** One resolved color per cfvo */
	colors: string[];
}

export interface DataBarRule extends CfRuleBase {
	type: "dataBar";
	/** Minimum and maximum value sources */
	cfvos: Cfvo[];
	color: string;
	negativeFillColor?: string;
	axisColor?: string;
	axisPosition: "automatic" | "middle" | "none";
	/** Bar length bounds in percent of the cell width */
	minLength: number;
	maxLength: number;
	showValue: boolean;
	gradient: boolean;
	/** Identifier linking the rule to its x14 extension */
	extId?: string;
}

export interface IconSetRule extends CfRuleBase {
	type: "iconSet";
	iconSet: string;
	cfvos: Cfvo[];
	reverse: boolean;
	showValue: boolean;
}

export interface CellIsRule extends CfRuleBase {
	type: "cellIs";
	operator: CellIsOperator;
	formulas: string[];
}

export interface Top10Rule extends CfRuleBase {
	type: "top10";
	rank: number;
	percent: boolean;
	bottom: boolean;
}

export interface AboveAverageRule extends CfRuleBase {
	type: "aboveAverage";
	aboveAverage: boolean;
	equalAverage: boolean;
	/** Number of standard deviations; 0 compares with the mean itself */
	stdDev: number;
}

export interface TextRule extends CfRuleBase {
	type: "containsText" | "notContainsText" | "beginsWith" | "endsWith";
	text: string;
}

export interface TimePeriodRule extends CfRuleBase {
	type: "timePeriod";
	timePeriod: TimePeriod;
}

export interface ExpressionRule extends CfRuleBase {
	type: "expression";
	formulas: string[];
}

export interface SimpleRule extends CfRuleBase {
	type: "duplicateValues" | "uniqueValues" | "containsBlanks" | "notContainsBlanks" | "containsErrors" | "notContainsErrors";
}

export type CfRule =
	| ColorScaleRule
	| DataBarRule
	| IconSetRule
	| CellIsRule
	| Top10Rule
	| AboveAverageRule
	| TextRule
	| TimePeriodRule
	| ExpressionRule
	| SimpleRule;

/** Rules sharing one target range */
export interface ConditionalFormatting {
	sqref: string;
	ranges: CellRange[];
	rules: CfRule[];
}

export interface DrawingMarker {
	col: number;
	colOff: number;
	row: number;
	rowOff: number;
}

export type DrawingContent =
	| { kind: "picture"; name: string; description?: string; imagePath?: string }
	| { kind: "chart"; name: string; chartPath?: string }
	| { kind: "shape"; name: string; text: string };

export interface DrawingAnchor {
	type: "twoCell" | "oneCell" | "absolute";
	from?: DrawingMarker;
	to?: DrawingMarker;
	/** Position of an absolute anchor in EMU */
	pos?: { x: number; y: number };
	/** Extent in EMU */
	ext?: { cx: number; cy: number };
	content: DrawingContent;
}

export interface Sparkline {
	/** Source data, e.g. "Sheet1!A1:E1" */
	formula: string;
	/** Cell that shows the sparkline */
	sqref: string;
}

export interface SparklineGroup {
	type: "line" | "column" | "stacked";
	colorSeries?: string;
	colorNegative?: string;
	colorMarkers?: string;
	colorHigh?: string;
	colorLow?: string;
	colorFirst?: string;
	colorLast?: string;
	markers: boolean;
	high: boolean;
	low: boolean;
	first: boolean;
	last: boolean;
	negative: boolean;
	displayEmptyCellsAs: "gap" | "zero" | "span";
	/** Points */
	lineWeight: number;
	sparklines: Sparkline[];
}

export interface DataValidation {
	sqref: string;
	ranges: CellRange[];
	type: string;
	operator?: string;
	allowBlank: boolean;
	showDropDown: boolean;
	showInputMessage: boolean;
	showErrorMessage: boolean;
	errorTitle?: string;
	error?: string;
	promptTitle?: string;
	prompt?: string;
	formula1?: string;
	formula2?: string;
}

export interface AutoFilter {
	ref: string;
	range: CellRange;
}

export type SheetState = "visible" | "hidden" | "veryHidden";

export interface Sheet {
	name: string;
	sheetId: number;
	/** Package path of the worksheet part */
	path: string;
	state: SheetState;
	tabColor?: string;
	/** Unique by (r, c), sorted by row then column */
	cells: CellData[];
	/** Non-overlapping merged ranges */
	merges: CellRange[];
	/** Number of rows in the bounding box of cells, merges and the declared dimension */
	maxRow: number;
	/** Number of columns in the bounding box */
	maxCol: number;
	/** Declared `<dimension ref>` */
	dimension?: string;
	frozenRows: number;
	frozenCols: number;
	conditionalFormatting: ConditionalFormatting[];
	hyperlinks: Hyperlink[];
	comments: Comment[];
	drawings: DrawingAnchor[];
	sparklineGroups: SparklineGroup[];
	dataValidations: DataValidation[];
	autoFilter?: AutoFilter;
	/** Column width overrides by zero-based column, in character units */
	colWidths: Record<number, number>;
	/** Row height overrides by zero-based row, in points */
	rowHeights: Record<number, number>;
	hiddenRows: number[];
	hiddenCols: number[];
	defaultColWidth?: number;
	defaultRowHeight: number;
}

export interface Theme {
	/** 12 slots in SpreadsheetML order: lt1, dk1, lt2, dk2, accent1-6, hlink, folHlink */
	colors: string[];
	majorFont: string;
	minorFont: string;
}

export interface DefinedName {
	name: string;
	/** Formula text, e.g. "Sheet1!$A$1:$B$4" */
	value: string;
	/** Sheet scope; absent for workbook scope */
	localSheetId?: number;
	hidden: boolean;
}

/** A named cell style from `<cellStyles>` */
export interface NamedStyle {
	name: string;
	/** Index into cellStyleXfs */
	xfId: number;
	builtinId?: number;
}

export interface Workbook {
	sheets: Sheet[];
	theme: Theme;
	definedNames: DefinedName[];
	/** True when serials count from 1904-01-01 */
	date1904: boolean;
	/** Differential styles indexed by dxfId */
	dxfStyles: DxfStyle[];
	namedStyles: NamedStyle[];
	/** Index of the sheet shown when the workbook opens */
	activeSheet: number;
}
