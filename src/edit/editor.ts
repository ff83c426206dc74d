import { openPackage, type XlsxPackage } from "../xlsx/package.js";
import { readPackage } from "../read.js";
import { zipPatch } from "../zip/index.js";
import { formatNumber, formatText } from "../ssf/format.js";
import { MAX_COL, MAX_ROW } from "../utils/cell.js";
import { InvalidReferenceError, InvalidSheetIndexError, NotLoadedError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { applyCellEdits, type CellEdit } from "./sheet-writer.js";
import type { Cell, CellData, Sheet, Workbook } from "../types.js";

export interface EditorOptions {
	logger?: Logger;
	/** zlib level for regenerated worksheet parts (default 6) */
	compressionLevel?: number;
}

interface Loaded {
	bytes: Uint8Array;
	pkg: XlsxPackage;
	workbook: Workbook;
	/** Pending edits per sheet index, keyed by address */
	edits: Map<number, Map<string, CellEdit>>;
	dirty: boolean;
}

const NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Infer the cell an input string stands for.
 * @returns undefined when the input is blank and the cell should be removed
 */
export function inferCell(input: string): Cell | undefined {
	const text = input.trim();
	if (text === "") {
		return undefined;
	}
	const lower = text.toLowerCase();
	if (lower === "true" || lower === "false") {
		return { t: "b", v: lower === "true" ? "TRUE" : "FALSE" };
	}
	if (NUMBER.test(text)) {
		const n = Number(text);
		if (Number.isFinite(n)) {
			return { t: "n", v: String(n) };
		}
	}
	return { t: "s", v: text };
}

function findCell(sheet: Sheet, r: number, c: number): number {
	let lo = 0;
	let hi = sheet.cells.length;
	while (lo < hi) {
		const mid = (lo + hi) >> 1;
		const { r: mr, c: mc } = sheet.cells[mid];
		if (mr < r || (mr === r && mc < c)) {
			lo = mid + 1;
		} else {
			hi = mid;
		}
	}
	return lo;
}

/**
 * Holds a loaded package and its parsed workbook, takes single-cell edits and
 * writes the package back with only the edited worksheets regenerated.
 */
export class WorkbookEditor {
	private state: Loaded | undefined;
	private readonly logger: Logger;
	private readonly compressionLevel: number;

	constructor(options: EditorOptions = {}) {
		this.logger = options.logger ?? silentLogger();
		this.compressionLevel = options.compressionLevel ?? 6;
	}

	/**
	 * Parse a package and make it the editor's document, discarding pending edits.
	 * On failure the previous document is kept.
	 * @returns a snapshot of the parsed workbook; edits show in {@link workbook}, not in it
	 */
	load(bytes: Uint8Array): Workbook {
		const pkg = openPackage(bytes, this.logger);
		const workbook = readPackage(pkg, { logger: this.logger });
		this.state = { bytes, pkg, workbook, edits: new Map(), dirty: false };
		return structuredClone(workbook);
	}

	/** The parsed workbook, reflecting committed edits */
	get workbook(): Workbook {
		return this.loaded("read the workbook").workbook;
	}

	isDirty(): boolean {
		return this.state?.dirty ?? false;
	}

	/**
	 * Set the content of one cell from user input.
	 *
	 * Blank input removes the cell; "true"/"false" in any case becomes a boolean;
	 * a decimal number becomes a number; anything else is kept as trimmed text. The cell's
	 * formula is dropped and its style kept.
	 *
	 * @throws NotLoadedError before {@link load}
	 * @throws InvalidSheetIndexError when no sheet has this index
	 * @throws InvalidReferenceError when row or col is outside the grid
	 */
	commitEdit(sheetIndex: number, row: number, col: number, input: string): void {
		const state = this.loaded("commit an edit");
		const sheet = state.workbook.sheets.at(sheetIndex);
		if (!sheet || sheetIndex < 0 || !Number.isInteger(sheetIndex)) {
			throw new InvalidSheetIndexError(sheetIndex, state.workbook.sheets.length);
		}
		if (!Number.isInteger(row) || !Number.isInteger(col) || row < 0 || col < 0 || row > MAX_ROW || col > MAX_COL) {
			throw new InvalidReferenceError(`R${row + 1}C${col + 1}`);
		}

		const at = findCell(sheet, row, col);
		const existing: CellData | undefined = sheet.cells[at]?.r === row && sheet.cells[at]?.c === col ? sheet.cells[at] : undefined;
		const inferred = inferCell(input);
		let cell: Cell | undefined;
		if (inferred) {
			cell = this.restyle(inferred, existing?.cell, state.workbook.date1904);
			if (existing) {
				existing.cell = cell;
			} else {
				sheet.cells.splice(at, 0, { r: row, c: col, cell });
			}
			sheet.maxRow = Math.max(sheet.maxRow, row + 1);
			sheet.maxCol = Math.max(sheet.maxCol, col + 1);
		} else if (existing) {
			sheet.cells.splice(at, 1);
		}

		let edits = state.edits.get(sheetIndex);
		if (!edits) {
			edits = new Map();
			state.edits.set(sheetIndex, edits);
		}
		edits.set(`${row}:${col}`, { r: row, c: col, cell });
		state.dirty = true;
		this.logger.debug({ sheet: sheet.name, row, col, type: cell?.t ?? "removed" }, "cell_edited");
	}

	/**
	 * Serialize the document. Without edits the loaded bytes come back unchanged;
	 * otherwise edited worksheets are regenerated and every other member is copied.
	 *
	 * @throws NotLoadedError before {@link load}
	 */
	save(): Uint8Array {
		const state = this.loaded("save");
		if (state.edits.size === 0) {
			return state.bytes;
		}
		const replacements = new Map<string, Uint8Array>();
		const encoder = new TextEncoder();
		for (const [index, edits] of state.edits) {
			const { path } = state.workbook.sheets[index];
			const xml = applyCellEdits(state.pkg.requireText(path), path, edits.values());
			replacements.set(this.memberName(state.pkg, path), encoder.encode(xml));
		}
		const out = zipPatch(state.pkg.archive, replacements, this.compressionLevel);
		this.logger.debug({ parts: [...replacements.keys()], bytes: out.length }, "workbook_saved");
		return out;
	}

	private loaded(operation: string): Loaded {
		if (!this.state) {
			throw new NotLoadedError(operation);
		}
		return this.state;
	}

	/** Archive entry name of a part, which may differ in case or a leading slash */
	private memberName(pkg: XlsxPackage, path: string): string {
		const lower = path.replace(/^\//, "").toLowerCase();
		const entry = pkg.archive.entries.find((e) => e.name.replace(/^\//, "").toLowerCase() === lower);
		return entry ? entry.name : path;
	}

	private restyle(cell: Cell, previous: Cell | undefined, date1904: boolean): Cell {
		if (previous?.styleIndex !== undefined) {
			cell.styleIndex = previous.styleIndex;
		}
		if (previous?.s) {
			cell.s = previous.s;
		}
		if (previous?.hyperlink) {
			cell.hyperlink = previous.hyperlink;
		}
		if (previous?.hasComment) {
			cell.hasComment = true;
		}
		const code = cell.s?.numberFormat ?? "General";
		if (cell.t === "n") {
			cell.w = formatNumber(Number(cell.v), code, date1904);
		} else if (cell.t === "s" && code !== "General") {
			cell.w = formatText(cell.v ?? "", code);
		} else {
			cell.w = cell.v;
		}
		return cell;
	}
}
