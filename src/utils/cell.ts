import type { CellAddress, CellRange } from "../types.js";
import { InvalidReferenceError } from "../errors.js";

/** Last row index of a worksheet (1048576 rows) */
export const MAX_ROW = 1048575;
/** Last column index of a worksheet (XFD) */
export const MAX_COL = 16383;

const cellRefRegex = /^([A-Z]+)([0-9]+)$/;

/**
 * Decode a column label (e.g. "A", "AA") to a zero-based column index.
 *
 * Treats column letters as a base-26 number where A=1, B=2, ..., Z=26.
 */
export function decodeCol(colstr: string): number {
	let d = 0;
	for (let i = 0; i < colstr.length; ++i) {
		// 'A' is charCode 65; subtract 64 so A=1, B=2, ..., Z=26
		d = 26 * d + colstr.charCodeAt(i) - 64;
	}
	return d - 1;
}

/**
 * Encode a zero-based column index to an Excel column label (A, B, ..., Z, AA, AB, ...).
 *
 * Uses bijective base-26 numeration: col 0 = "A", col 25 = "Z", col 26 = "AA".
 *
 * @throws InvalidReferenceError if col is negative
 */
export function encodeCol(col: number): string {
	if (col < 0 || !Number.isInteger(col)) {
		throw new InvalidReferenceError(String(col));
	}
	let result = "";
	for (++col; col; col = Math.floor((col - 1) / 26)) {
		result = String.fromCharCode(((col - 1) % 26) + 65) + result;
	}
	return result;
}

/**
 * Decode an A1-style cell reference to a zero-based address.
 * Only uppercase column letters followed by a row number of at least 1 are
 * accepted, and the address must lie within A1:XFD1048576.
 * @throws InvalidReferenceError for anything else
 */
export function decodeCell(ref: string): CellAddress {
	const m = cellRefRegex.exec(ref);
	const row = m ? parseInt(m[2], 10) : 0;
	const col = m ? decodeCol(m[1]) : -1;
	if (!m || row < 1 || row > MAX_ROW + 1 || col > MAX_COL) {
		throw new InvalidReferenceError(ref);
	}
	return { r: row - 1, c: col };
}

/** Encode a zero-based address to an A1-style reference, e.g. "A1" for {r:0, c:0} */
export function encodeCell(cell: CellAddress): string {
	return encodeCol(cell.c) + (cell.r + 1);
}

/** Order the corners so that s <= e on both axes */
function normalize(a: CellAddress, b: CellAddress): CellRange {
	return {
		s: { r: Math.min(a.r, b.r), c: Math.min(a.c, b.c) },
		e: { r: Math.max(a.r, b.r), c: Math.max(a.c, b.c) },
	};
}

/**
 * Decode a range string (e.g. "A1:B2") to a normalized range.
 * A single reference yields a one-cell range. `$` markers are ignored.
 * @throws InvalidReferenceError when either corner is malformed
 */
export function decodeRange(range: string): CellRange {
	const plain = range.replace(/\$/g, "");
	const idx = plain.indexOf(":");
	if (idx === -1) {
		const cell = decodeCell(plain);
		return { s: cell, e: { ...cell } };
	}
	return normalize(decodeCell(plain.slice(0, idx)), decodeCell(plain.slice(idx + 1)));
}

/**
 * Like {@link decodeRange}, and also accepts whole columns ("A:C") and whole
 * rows ("2:5").
 * @returns the range, or undefined when the text is not a reference
 */
export function safeDecodeRange(range: string): CellRange | undefined {
	const plain = range.replace(/\$/g, "");
	const cols = /^([A-Z]+):([A-Z]+)$/.exec(plain);
	if (cols) {
		return normalize({ r: 0, c: decodeCol(cols[1]) }, { r: MAX_ROW, c: decodeCol(cols[2]) });
	}
	const rows = /^([0-9]+):([0-9]+)$/.exec(plain);
	if (rows && Number(rows[1]) >= 1 && Number(rows[2]) >= 1) {
		return normalize({ r: Number(rows[1]) - 1, c: 0 }, { r: Number(rows[2]) - 1, c: MAX_COL });
	}
	try {
		return decodeRange(plain);
	} catch (e) {
		if (e instanceof InvalidReferenceError) {
			return undefined;
		}
		throw e;
	}
}

/** Encode a range, collapsing a one-cell range to a single reference */
export function encodeRange(range: CellRange): string {
	const s = encodeCell(range.s);
	const e = encodeCell(range.e);
	return s === e ? s : s + ":" + e;
}

/** Split a space-separated `sqref` list into ranges, skipping malformed entries */
export function parseSqref(sqref: string): CellRange[] {
	const ranges: CellRange[] = [];
	for (const part of sqref.split(/\s+/)) {
		const range = part ? safeDecodeRange(part) : undefined;
		if (range) {
			ranges.push(range);
		}
	}
	return ranges;
}

export function rangeContains(range: CellRange, r: number, c: number): boolean {
	return r >= range.s.r && r <= range.e.r && c >= range.s.c && c <= range.e.c;
}

export function rangesOverlap(a: CellRange, b: CellRange): boolean {
	return a.s.r <= b.e.r && b.s.r <= a.e.r && a.s.c <= b.e.c && b.s.c <= a.e.c;
}
