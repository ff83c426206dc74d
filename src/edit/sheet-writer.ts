import { forEachXmlTag } from "../xml/parser.js";
import { writeXmlElement, writeXmlTag } from "../xml/writer.js";
import { decodeCell, encodeCell, encodeRange, MAX_COL } from "../utils/cell.js";
import { XmlParseError } from "../errors.js";
import type { Cell } from "../types.js";

/** New content of one address; an absent cell removes it */
export interface CellEdit {
	r: number;
	c: number;
	cell?: Cell;
}

interface CellSlice {
	c: number;
	xml: string;
}

interface RowSlice {
	r: number;
	/** Row open tag as written, or undefined for rows created by edits */
	open?: string;
	cells: CellSlice[];
}

const key = (r: number, c: number): number => r * (MAX_COL + 1) + c;

/** Qualified element name at the start of a raw tag */
function qualifiedName(raw: string): string {
	const m = /^<\/?([^\s/>]+)/.exec(raw);
	return m ? m[1] : "";
}

function withAttribute(raw: string, name: string, value: string): string {
	const tagEnd = raw.endsWith("/>") ? raw.length - 2 : raw.length - 1;
	return raw.slice(0, tagEnd) + " " + name + '="' + value + '"' + raw.slice(tagEnd);
}

/** Cell XML for an edited value, keeping the prefix of the surrounding sheetData */
export function writeCellXml(r: number, c: number, cell: Cell, prefix = ""): string {
	const tag = (name: string): string => prefix + name;
	const attrs = { r: encodeCell({ r, c }), s: cell.styleIndex || undefined };
	switch (cell.t) {
		case "b":
			return writeXmlElement(tag("c"), writeXmlElement(tag("v"), cell.v === "TRUE" ? "1" : "0"), { ...attrs, t: "b" });
		case "n":
			return writeXmlElement(tag("c"), writeXmlElement(tag("v"), cell.v ?? "0"), attrs);
		case "z":
			return writeXmlElement(tag("c"), null, attrs);
		default:
			return writeXmlElement(tag("c"), writeXmlElement(tag("is"), writeXmlTag(tag("t"), cell.v ?? "")), { ...attrs, t: "inlineStr" });
	}
}

/**
 * Apply cell edits to the XML of a worksheet part.
 *
 * Only `<sheetData>` and `<dimension>` change. Cells and rows the edits do not
 * touch keep their original markup; row `spans` hints are dropped since they
 * may no longer hold. The dimension becomes the bounding box of the remaining
 * cells, "A1" when none are left.
 *
 * @throws XmlParseError when the part is malformed or has no sheetData
 */
export function applyCellEdits(data: string, part: string, edits: Iterable<CellEdit>): string {
	const rows: RowSlice[] = [];
	let sheetData: { start: number; end: number; prefix: string } | undefined;
	let dataOpenStart = -1;
	let dataOpenEnd = -1;
	let dimension: { start: number; end: number } | undefined;
	let sheetPrEnd = -1;
	let rootEnd = -1;
	let depth = 0;

	let row: RowSlice | undefined;
	let col = -1;
	let cellStart = -1;
	let cellCol = -1;

	forEachXmlTag(data, part, (tag) => {
		const raw = data.slice(tag.start, tag.end);
		if (tag.kind === "open") {
			depth++;
		} else if (tag.kind === "close") {
			depth--;
		}
		if (rootEnd < 0) {
			rootEnd = tag.end;
			return;
		}
		switch (tag.name) {
			case "sheetPr":
				if (depth <= 1 && tag.kind !== "open") {
					sheetPrEnd = tag.end;
				}
				return;
			case "dimension":
				if (tag.kind === "empty" || tag.kind === "open") {
					dimension = { start: tag.start, end: tag.end };
				} else if (dimension) {
					dimension.end = tag.end;
				}
				return;
			case "sheetData":
				if (tag.kind === "empty") {
					sheetData = { start: tag.start, end: tag.end, prefix: tag.prefix ? tag.prefix + ":" : "" };
				} else if (tag.kind === "open") {
					dataOpenStart = tag.start;
					dataOpenEnd = tag.end;
				} else {
					sheetData = { start: dataOpenStart, end: tag.end, prefix: tag.prefix ? tag.prefix + ":" : "" };
				}
				return;
		}
		if (dataOpenEnd < 0 || sheetData) {
			return;
		}
		if (tag.name === "row" && tag.kind !== "close") {
			const r = tag.attrs.r !== undefined ? Number(tag.attrs.r) - 1 : (rows.at(-1)?.r ?? -1) + 1;
			let open = raw.replace(/\sspans\s*=\s*("[^"]*"|'[^']*')/, "");
			if (tag.attrs.r === undefined) {
				open = withAttribute(open, "r", String(r + 1));
			}
			row = { r, open, cells: [] };
			rows.push(row);
			col = -1;
			if (tag.kind === "empty") {
				row = undefined;
			}
		} else if (tag.name === "row") {
			row = undefined;
		} else if (tag.name === "c" && row && tag.kind !== "close") {
			cellCol = tag.attrs.r !== undefined ? decodeCell(tag.attrs.r).c : col + 1;
			col = cellCol;
			cellStart = tag.start;
			if (tag.kind === "empty") {
				row.cells.push({ c: cellCol, xml: tag.attrs.r !== undefined ? raw : withAttribute(raw, "r", encodeCell({ r: row.r, c: cellCol })) });
			}
		} else if (tag.name === "c" && row && cellStart >= 0) {
			let xml = data.slice(cellStart, tag.end);
			if (!/^<[^>]*\sr\s*=/.test(xml)) {
				const openEnd = xml.indexOf(">");
				xml = withAttribute(xml.slice(0, openEnd + 1), "r", encodeCell({ r: row.r, c: cellCol })) + xml.slice(openEnd + 1);
			}
			row.cells.push({ c: cellCol, xml });
			cellStart = -1;
		}
	});

	if (!sheetData) {
		throw new XmlParseError(part, "missing <sheetData>");
	}
	const prefix = sheetData.prefix;

	// Later edits to an address replace earlier ones
	const pending = new Map<number, CellEdit>();
	for (const edit of edits) {
		pending.set(key(edit.r, edit.c), edit);
	}

	const byRow = new Map<number, RowSlice>();
	for (const slice of rows) {
		byRow.set(slice.r, slice);
	}
	for (const edit of pending.values()) {
		let target = byRow.get(edit.r);
		if (!target) {
			target = { r: edit.r, cells: [] };
			byRow.set(edit.r, target);
			rows.push(target);
		}
		target.cells = target.cells.filter((slice) => slice.c !== edit.c);
		if (edit.cell) {
			target.cells.push({ c: edit.c, xml: writeCellXml(edit.r, edit.c, edit.cell, prefix) });
		}
	}
	rows.sort((a, b) => a.r - b.r);

	let minR = Infinity;
	let minC = Infinity;
	let maxR = -1;
	let maxC = -1;
	let body = "";
	for (const slice of rows) {
		slice.cells.sort((a, b) => a.c - b.c);
		if (!slice.open && slice.cells.length === 0) {
			continue;
		}
		for (const { c } of slice.cells) {
			minR = Math.min(minR, slice.r);
			maxR = Math.max(maxR, slice.r);
			minC = Math.min(minC, c);
			maxC = Math.max(maxC, c);
		}
		const open = slice.open ?? `<${prefix}row r="${slice.r + 1}">`;
		const inner = slice.cells.map((cell) => cell.xml).join("");
		if (open.endsWith("/>")) {
			body += inner ? open.slice(0, -2) + ">" + inner + `</${prefix}row>` : open;
		} else {
			body += open + inner + `</${prefix}row>`;
		}
	}

	const ref = maxR < 0 ? "A1" : encodeRange({ s: { r: minR, c: minC }, e: { r: maxR, c: maxC } });
	const dataXml = `<${prefix}sheetData>${body}</${prefix}sheetData>`;
	const dimensionXml = `<${prefix}dimension ref="${ref}"/>`;

	// Splice from the end so earlier offsets stay valid
	const splices: { start: number; end: number; text: string }[] = [{ start: sheetData.start, end: sheetData.end, text: dataXml }];
	if (dimension) {
		const existing = data.slice(dimension.start, dimension.end);
		splices.push({ start: dimension.start, end: dimension.end, text: `<${qualifiedName(existing)} ref="${ref}"/>` });
	} else {
		const at = sheetPrEnd >= 0 ? sheetPrEnd : rootEnd;
		splices.push({ start: at, end: at, text: dimensionXml });
	}
	splices.sort((a, b) => b.start - a.start);
	let out = data;
	for (const { start, end, text } of splices) {
		out = out.slice(0, start) + text + out.slice(end);
	}
	return out;
}
