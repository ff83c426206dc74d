import { expectRoot, forEachXmlTag, parseXmlBoolean, parseXmlInt, parseXmlNumber, type XmlTag } from "../xml/parser.js";
import { unescapeXml } from "../xml/escape.js";
import { decodeCell, encodeRange, MAX_COL, MAX_ROW, parseSqref, rangesOverlap, safeDecodeRange } from "../utils/cell.js";
import { parseColorSpec } from "./styles.js";
import { RichTextCollector, type RawString } from "./shared-strings.js";
import { ConditionalFormattingCollector, type ColorResolver } from "./conditional.js";
import { SparklineCollector } from "./sparklines.js";
import { InvalidReferenceError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { AutoFilter, CellRange, ConditionalFormatting, DataValidation, SparklineGroup } from "../types.js";

/** A `<c>` element as written */
export interface RawCell {
	r: number;
	c: number;
	/** `t` attribute: n, s, str, inlineStr, b, e, d; absent means number */
	type?: string;
	/** Text of `<v>` */
	value?: string;
	/** Text of `<f>` */
	formula?: string;
	styleIndex?: number;
	/** Content of `<is>` */
	inline?: RawString;
}

export interface RawHyperlink {
	ref: string;
	/** Relationship id of an external target */
	relId?: string;
	location?: string;
	display?: string;
	tooltip?: string;
}

/** Everything a worksheet part declares, before strings and styles are attached */
export interface WorksheetFile {
	/** Sorted by row then column, one entry per address */
	cells: RawCell[];
	merges: CellRange[];
	dimension?: string;
	tabColor?: string;
	frozenRows: number;
	frozenCols: number;
	colWidths: Record<number, number>;
	rowHeights: Record<number, number>;
	hiddenRows: number[];
	hiddenCols: number[];
	defaultColWidth?: number;
	defaultRowHeight: number;
	hyperlinks: RawHyperlink[];
	dataValidations: DataValidation[];
	autoFilter?: AutoFilter;
	/** `r:id` of `<drawing>` elements */
	drawingRelIds: string[];
	conditionalFormatting: ConditionalFormatting[];
	sparklineGroups: SparklineGroup[];
}

export interface WorksheetContext {
	color: ColorResolver;
	logger: Logger;
}

const DEFAULT_ROW_HEIGHT = 15;

function emptyWorksheet(): WorksheetFile {
	return {
		cells: [],
		merges: [],
		frozenRows: 0,
		frozenCols: 0,
		colWidths: {},
		rowHeights: {},
		hiddenRows: [],
		hiddenCols: [],
		defaultRowHeight: DEFAULT_ROW_HEIGHT,
		hyperlinks: [],
		dataValidations: [],
		drawingRelIds: [],
		conditionalFormatting: [],
		sparklineGroups: [],
	};
}

/** Keep the last entry per address, ordered by row then column */
function sortCells(cells: RawCell[]): RawCell[] {
	const byAddress = new Map<number, RawCell>();
	for (const cell of cells) {
		byAddress.set(cell.r * (MAX_COL + 1) + cell.c, cell);
	}
	return [...byAddress.entries()].sort((a, b) => a[0] - b[0]).map(([, cell]) => cell);
}

/**
 * Decode a worksheet part in a single pass.
 *
 * @throws XmlParseError when the part is malformed
 * @throws InvalidReferenceError when a cell `r` attribute is not an A1 reference
 */
export function parseWorksheet(data: string, part: string, ctx: WorksheetContext): WorksheetFile {
	expectRoot(data, part, "worksheet");
	const ws = emptyWorksheet();
	const cells: RawCell[] = [];
	const cf = new ConditionalFormattingCollector(data, ctx.color, ctx.logger);
	const sparklines = new SparklineCollector(data, ctx.color);

	// Tags between a delegate's opening element and its close go to the delegate
	let delegate: { visit(tag: XmlTag): void } | undefined;
	let delegateDepth = 0;
	let extDepth = 0;

	let row = -1;
	let col = -1;
	let cell: RawCell | undefined;
	let inline: RichTextCollector | undefined;
	let validation: DataValidation | undefined;
	let textStart = -1;
	let sheetViews = 0;

	const text = (tag: XmlTag): string => {
		const value = textStart >= 0 ? unescapeXml(data.slice(textStart, tag.start)) : "";
		textStart = -1;
		return value;
	};

	const endCell = (): void => {
		if (cell) {
			cells.push(cell);
		}
		cell = undefined;
	};

	const open = (tag: XmlTag): void => {
		const { name, kind, attrs } = tag;
		if (inline) {
			inline.visit(tag);
			return;
		}
		switch (name) {
			case "tabColor":
				ws.tabColor = ctx.color(parseColorSpec(attrs));
				break;
			case "dimension":
				if (attrs.ref) {
					ws.dimension = attrs.ref;
				}
				break;
			case "sheetView":
				sheetViews++;
				break;
			case "pane":
				if (sheetViews === 1 && (attrs.state === "frozen" || attrs.state === "frozenSplit")) {
					ws.frozenCols = Math.max(0, Math.trunc(parseXmlNumber(attrs.xSplit) ?? 0));
					ws.frozenRows = Math.max(0, Math.trunc(parseXmlNumber(attrs.ySplit) ?? 0));
				}
				break;
			case "sheetFormatPr":
				ws.defaultRowHeight = parseXmlNumber(attrs.defaultRowHeight) ?? DEFAULT_ROW_HEIGHT;
				ws.defaultColWidth = parseXmlNumber(attrs.defaultColWidth);
				break;
			case "col": {
				const min = parseXmlInt(attrs.min);
				const max = Math.min(parseXmlInt(attrs.max) ?? min ?? 0, MAX_COL + 1);
				if (min === undefined || min < 1) {
					break;
				}
				const width = parseXmlNumber(attrs.width);
				const hidden = parseXmlBoolean(attrs.hidden);
				for (let c = min - 1; c < max; c++) {
					if (width !== undefined) {
						ws.colWidths[c] = width;
					}
					if (hidden) {
						ws.hiddenCols.push(c);
					}
				}
				break;
			}
			case "row": {
				const r = parseXmlInt(attrs.r);
				row = r !== undefined ? r - 1 : row + 1;
				col = -1;
				const height = parseXmlNumber(attrs.ht);
				if (height !== undefined) {
					ws.rowHeights[row] = height;
				}
				if (parseXmlBoolean(attrs.hidden)) {
					ws.hiddenRows.push(row);
				}
				break;
			}
			case "c": {
				if (row < 0) {
					row = 0;
				}
				if (attrs.r !== undefined) {
					const address = decodeCell(attrs.r);
					row = address.r;
					col = address.c;
				} else {
					col++;
					if (col > MAX_COL || row > MAX_ROW) {
						throw new InvalidReferenceError(`R${row + 1}C${col + 1}`);
					}
				}
				cell = { r: row, c: col, type: attrs.t, styleIndex: parseXmlInt(attrs.s) };
				if (kind === "empty") {
					endCell();
				}
				break;
			}
			case "v":
			case "f":
			case "formula1":
			case "formula2":
				if (kind === "open") {
					textStart = tag.end;
				}
				break;
			case "is":
				if (kind === "open") {
					inline = new RichTextCollector(data);
				}
				break;
			case "mergeCell": {
				const range = attrs.ref ? safeDecodeRange(attrs.ref) : undefined;
				if (!range) {
					ctx.logger.warn({ part, ref: attrs.ref }, "merge_invalid");
				} else if (ws.merges.some((m) => rangesOverlap(m, range))) {
					ctx.logger.warn({ part, ref: encodeRange(range) }, "merge_overlap");
				} else if (range.s.r !== range.e.r || range.s.c !== range.e.c) {
					ws.merges.push(range);
				}
				break;
			}
			case "hyperlink":
				if (attrs.ref) {
					ws.hyperlinks.push({
						ref: attrs.ref,
						relId: attrs.id,
						location: attrs.location,
						display: attrs.display,
						tooltip: attrs.tooltip,
					});
				}
				break;
			case "dataValidation":
				validation = {
					sqref: attrs.sqref ?? "",
					ranges: parseSqref(attrs.sqref ?? ""),
					type: attrs.type ?? "none",
					operator: attrs.operator,
					allowBlank: parseXmlBoolean(attrs.allowBlank),
					showDropDown: parseXmlBoolean(attrs.showDropDown),
					showInputMessage: parseXmlBoolean(attrs.showInputMessage),
					showErrorMessage: parseXmlBoolean(attrs.showErrorMessage),
					errorTitle: attrs.errorTitle,
					error: attrs.error,
					promptTitle: attrs.promptTitle,
					prompt: attrs.prompt,
				};
				if (kind === "empty") {
					close(tag);
				}
				break;
			case "autoFilter": {
				const range = attrs.ref ? safeDecodeRange(attrs.ref) : undefined;
				if (range) {
					ws.autoFilter = { ref: attrs.ref, range };
				}
				break;
			}
			case "drawing":
				if (attrs.id) {
					ws.drawingRelIds.push(attrs.id);
				}
				break;
		}
	};

	const close = (tag: XmlTag): void => {
		if (inline) {
			if (tag.name === "is") {
				if (cell) {
					cell.inline = inline.finish();
				}
				inline = undefined;
			} else {
				inline.visit(tag);
			}
			return;
		}
		switch (tag.name) {
			case "c":
				endCell();
				break;
			case "v":
				if (cell) {
					cell.value = text(tag);
				}
				break;
			case "f":
				if (cell) {
					cell.formula = text(tag);
				}
				break;
			case "formula1":
			case "formula2":
				if (validation) {
					validation[tag.name] = text(tag);
				}
				break;
			case "dataValidation":
				if (validation) {
					ws.dataValidations.push(validation);
				}
				validation = undefined;
				break;
		}
	};

	forEachXmlTag(data, part, (tag) => {
		if (delegate) {
			delegate.visit(tag);
			if (tag.kind === "open") {
				delegateDepth++;
			} else if (tag.kind === "close" && --delegateDepth === 0) {
				delegate = undefined;
			}
			return;
		}
		if (tag.kind !== "close" && (tag.name === "conditionalFormatting" || tag.name === "sparklineGroups")) {
			const target = tag.name === "conditionalFormatting" ? cf : sparklines;
			target.visit(tag);
			if (tag.kind === "open") {
				delegate = target;
				delegateDepth = 1;
			}
			return;
		}
		// Other extension content (x14 validations, slicers) is not read
		if (tag.name === "extLst") {
			if (tag.kind === "open") {
				extDepth++;
			} else if (tag.kind === "close") {
				extDepth--;
			}
			return;
		}
		if (extDepth > 0) {
			return;
		}
		if (tag.kind === "close") {
			close(tag);
		} else {
			open(tag);
		}
	});

	ws.cells = sortCells(cells);
	ws.conditionalFormatting = cf.finish();
	ws.sparklineGroups = sparklines.groups;
	return ws;
}
