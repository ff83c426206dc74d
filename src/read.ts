import { readFileSync } from "node:fs";
import { openPackage, type XlsxPackage } from "./xlsx/package.js";
import { parseWorkbook, type SheetEntry } from "./xlsx/workbook.js";
import { emptyStyleSheet, parseStyleSheet } from "./xlsx/styles.js";
import { defaultTheme, parseTheme } from "./xlsx/theme.js";
import { parseSharedStrings, type RawString } from "./xlsx/shared-strings.js";
import { parseWorksheet, type RawCell, type WorksheetFile } from "./xlsx/worksheet.js";
import { parseComments } from "./xlsx/comments.js";
import { parseDrawing } from "./xlsx/drawings.js";
import { StyleResolver } from "./style/resolve.js";
import { compileFormat, formatCompiled, formatText, type CompiledFormat } from "./ssf/format.js";
import { RELS, relTypeIs } from "./xml/namespaces.js";
import { rangeContains, safeDecodeRange } from "./utils/cell.js";
import { MissingPartError, XmlParseError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { Relationships } from "./opc/relationships.js";
import type { Cell, CellData, Comment, DrawingAnchor, Hyperlink, RichTextRun, Sheet, Workbook } from "./types.js";

export interface ParseOptions {
	/** Receives warnings about recoverable problems; silent by default */
	logger?: Logger;
	/** Fill `Cell.w` with formatted display text (default true) */
	formatValues?: boolean;
}

/** Find the first internal relationship of a type */
function relatedPart(rels: Relationships, type: string): string | undefined {
	for (const rel of rels.values()) {
		if (!rel.external && relTypeIs(rel.type, type)) {
			return rel.target;
		}
	}
	return undefined;
}

interface ReadContext {
	pkg: XlsxPackage;
	logger: Logger;
	styles: StyleResolver;
	strings: RawString[];
	date1904: boolean;
	formatValues: boolean;
	formats: Map<string, CompiledFormat>;
}

/**
 * Decode an optional part. A part that is absent or fails to parse yields
 * `fallback` and a warning; other errors propagate.
 */
function optionalPart<T>(ctx: Pick<ReadContext, "pkg" | "logger">, path: string | undefined, parse: (data: string, path: string) => T, fallback: T): T {
	if (path === undefined) {
		return fallback;
	}
	const data = ctx.pkg.text(path);
	if (data === undefined) {
		ctx.logger.warn({ part: path }, "part_missing");
		return fallback;
	}
	try {
		return parse(data, path);
	} catch (e) {
		if (e instanceof XmlParseError) {
			ctx.logger.warn({ part: path, err: e }, "part_invalid");
			return fallback;
		}
		throw e;
	}
}

function resolveRuns(ctx: ReadContext, item: RawString): RichTextRun[] | undefined {
	return item.runs?.map((run) => (run.font ? { text: run.text, font: ctx.styles.resolveRunFont(run.font) } : { text: run.text }));
}

function formatted(ctx: ReadContext, code: string): CompiledFormat {
	let format = ctx.formats.get(code);
	if (!format) {
		format = compileFormat(code);
		ctx.formats.set(code, format);
	}
	return format;
}

function buildCell(ctx: ReadContext, raw: RawCell): Cell {
	let cell: Cell;
	let item: RawString | undefined;
	switch (raw.type) {
		case "s": {
			const index = Number(raw.value);
			item = ctx.strings[index];
			if (!item) {
				ctx.logger.warn({ index }, "shared_string_out_of_range");
				item = { text: "" };
			}
			cell = { t: "s", v: item.text };
			break;
		}
		case "inlineStr":
			item = raw.inline ?? { text: raw.value ?? "" };
			cell = { t: "s", v: item.text };
			break;
		case "str":
			cell = { t: "s", v: raw.value ?? "" };
			break;
		case "b":
			cell = { t: "b", v: raw.value === "1" || raw.value?.toLowerCase() === "true" ? "TRUE" : "FALSE" };
			break;
		case "e":
			cell = { t: "e", v: raw.value ?? "#N/A" };
			break;
		case "d":
			cell = raw.value === undefined ? { t: "z" } : { t: "d", v: raw.value };
			break;
		default:
			if (raw.inline) {
				item = raw.inline;
				cell = { t: "s", v: item.text };
			} else {
				cell = raw.value === undefined ? { t: "z" } : { t: "n", v: raw.value };
			}
	}
	const runs = item ? resolveRuns(ctx, item) : undefined;
	if (runs) {
		cell.richText = runs;
	}
	if (raw.formula) {
		cell.formula = raw.formula;
	}
	if (raw.styleIndex !== undefined) {
		cell.styleIndex = raw.styleIndex;
		cell.s = ctx.styles.resolve(raw.styleIndex);
	}
	if (ctx.formatValues && cell.v !== undefined) {
		cell.w = displayText(ctx, cell, cell.v);
	}
	return cell;
}

function displayText(ctx: ReadContext, cell: Cell, v: string): string {
	const code = cell.s?.numberFormat ?? "General";
	if (cell.t === "n") {
		const n = Number(v);
		return Number.isFinite(n) ? formatCompiled(formatted(ctx, code), n, ctx.date1904).text : v;
	}
	if (cell.t === "s" && code !== "General") {
		return formatText(v, formatted(ctx, code));
	}
	return v;
}

function attachHyperlinks(cells: CellData[], links: Hyperlink[]): void {
	const ranges = links.flatMap((link) => {
		const range = safeDecodeRange(link.ref);
		return range ? [{ range, link }] : [];
	});
	if (ranges.length === 0) {
		return;
	}
	for (const { r, c, cell } of cells) {
		const hit = ranges.find(({ range }) => rangeContains(range, r, c));
		if (hit) {
			cell.hyperlink = hit.link;
		}
	}
}

function attachComments(cells: CellData[], comments: Comment[]): void {
	const keys = new Set(comments.map((comment) => `${comment.r}:${comment.c}`));
	for (const { r, c, cell } of cells) {
		if (keys.has(`${r}:${c}`)) {
			cell.hasComment = true;
		}
	}
}

function boundingBox(ws: WorksheetFile, cells: CellData[]): { maxRow: number; maxCol: number } {
	let maxRow = 0;
	let maxCol = 0;
	const extend = (r: number, c: number): void => {
		maxRow = Math.max(maxRow, r + 1);
		maxCol = Math.max(maxCol, c + 1);
	};
	for (const { r, c } of cells) {
		extend(r, c);
	}
	for (const merge of ws.merges) {
		extend(merge.e.r, merge.e.c);
	}
	const dimension = ws.dimension ? safeDecodeRange(ws.dimension) : undefined;
	if (dimension) {
		extend(dimension.e.r, dimension.e.c);
	}
	return { maxRow, maxCol };
}

function readSheet(ctx: ReadContext, entry: SheetEntry, path: string): Sheet {
	const { pkg, logger } = ctx;
	const ws = parseWorksheet(pkg.requireText(path), path, {
		color: (spec) => ctx.styles.color(spec),
		logger,
	});
	const rels = pkg.relationshipsOf(path);
	const cells: CellData[] = ws.cells.map((raw) => ({ r: raw.r, c: raw.c, cell: buildCell(ctx, raw) }));

	const hyperlinks: Hyperlink[] = ws.hyperlinks.map(({ relId, ...link }) => {
		const target = relId ? rels.get(relId)?.target : undefined;
		return target === undefined ? link : { ...link, target };
	});
	attachHyperlinks(cells, hyperlinks);

	const comments = optionalPart(ctx, relatedPart(rels, RELS.CMNT), (data, part) => parseComments(data, part, logger), []);
	attachComments(cells, comments);

	const drawings: DrawingAnchor[] = [];
	for (const relId of ws.drawingRelIds) {
		const rel = rels.get(relId);
		if (!rel || rel.external) {
			logger.warn({ part: path, relId }, "relationship_missing");
			continue;
		}
		drawings.push(...optionalPart(ctx, rel.target, (data, part) => parseDrawing(data, part, pkg.relationshipsOf(part)), []));
	}

	return {
		name: entry.name,
		sheetId: entry.sheetId,
		path,
		state: entry.state,
		tabColor: ws.tabColor,
		cells,
		merges: ws.merges,
		...boundingBox(ws, cells),
		dimension: ws.dimension,
		frozenRows: ws.frozenRows,
		frozenCols: ws.frozenCols,
		conditionalFormatting: ws.conditionalFormatting,
		hyperlinks,
		comments,
		drawings,
		sparklineGroups: ws.sparklineGroups,
		dataValidations: ws.dataValidations,
		autoFilter: ws.autoFilter,
		colWidths: ws.colWidths,
		rowHeights: ws.rowHeights,
		hiddenRows: ws.hiddenRows,
		hiddenCols: ws.hiddenCols,
		defaultColWidth: ws.defaultColWidth,
		defaultRowHeight: ws.defaultRowHeight,
	};
}

/**
 * Parse an `.xlsx` package into a fully resolved workbook.
 *
 * @throws InvalidArchiveError when the bytes are not a zip archive
 * @throws MissingPartError when the workbook or a worksheet part is absent
 * @throws XmlParseError when the workbook, styles, shared strings or a worksheet is malformed
 * @throws InvalidReferenceError when a cell carries a malformed reference
 */
export function read(data: Uint8Array, options: ParseOptions = {}): Workbook {
	return readPackage(openPackage(data, options.logger ?? silentLogger()), options);
}

/** Parse an already opened package; see {@link read} */
export function readPackage(pkg: XlsxPackage, options: ParseOptions = {}): Workbook {
	const logger = options.logger ?? silentLogger();
	const wbPath = pkg.workbookPath;
	const wb = parseWorkbook(pkg.requireText(wbPath), wbPath);
	const wbRels = pkg.relationshipsOf(wbPath);

	const theme = optionalPart({ pkg, logger }, relatedPart(wbRels, RELS.THEME), parseTheme, defaultTheme());
	const stylesPath = relatedPart(wbRels, RELS.STY);
	const sstPath = relatedPart(wbRels, RELS.SST);
	for (const path of [stylesPath, sstPath]) {
		if (path !== undefined && !pkg.has(path)) {
			logger.warn({ part: path }, "part_missing");
		}
	}
	const stylesText = stylesPath !== undefined ? pkg.text(stylesPath) : undefined;
	const styleSheet = stylesPath !== undefined && stylesText !== undefined ? parseStyleSheet(stylesText, stylesPath) : emptyStyleSheet();
	const sstText = sstPath !== undefined ? pkg.text(sstPath) : undefined;

	const styles = new StyleResolver(styleSheet, theme, logger);
	const ctx: ReadContext = {
		pkg,
		logger,
		styles,
		strings: sstPath !== undefined && sstText !== undefined ? parseSharedStrings(sstText, sstPath) : [],
		date1904: wb.date1904,
		formatValues: options.formatValues ?? true,
		formats: new Map(),
	};

	const sheets: Sheet[] = [];
	for (const entry of wb.sheets) {
		const rel = wbRels.get(entry.relId);
		if (!rel) {
			throw new MissingPartError(entry.relId, `Sheet "${entry.name}" has no worksheet relationship ${entry.relId}`);
		}
		if (!relTypeIs(rel.type, RELS.SHEET)) {
			logger.warn({ sheet: entry.name, type: rel.type }, "sheet_unsupported");
			continue;
		}
		sheets.push(readSheet(ctx, entry, rel.target));
	}
	logger.debug({ sheets: sheets.length, styles: styles.size, strings: ctx.strings.length }, "workbook_read");

	return {
		sheets,
		theme,
		definedNames: wb.definedNames,
		date1904: wb.date1904,
		dxfStyles: styles.resolveDxfs(),
		namedStyles: styleSheet.cellStyles.map(({ name, xfId, builtinId }) => ({ name, xfId, builtinId })),
		activeSheet: Math.min(wb.activeTab, Math.max(0, sheets.length - 1)),
	};
}

/** Read and parse an `.xlsx` file from disk */
export function readFile(path: string, options: ParseOptions = {}): Workbook {
	return read(readFileSync(path), options);
}
