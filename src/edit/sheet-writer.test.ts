import { describe, expect, it } from "vitest";
import { applyCellEdits, writeCellXml } from "./sheet-writer.js";
import { XmlParseError } from "../errors.js";

const open = `<worksheet xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main">`;

describe("writeCellXml", () => {
	it("writes each inferred type", () => {
		expect(writeCellXml(0, 0, { t: "n", v: "1.5" })).toBe(`<c r="A1"><v>1.5</v></c>`);
		expect(writeCellXml(1, 2, { t: "b", v: "FALSE", styleIndex: 4 })).toBe(`<c r="C2" s="4" t="b"><v>0</v></c>`);
		expect(writeCellXml(0, 1, { t: "s", v: " a<b " })).toBe(`<c r="B1" t="inlineStr"><is><t xml:space="preserve"> a&lt;b </t></is></c>`);
		expect(writeCellXml(0, 0, { t: "s", v: "x" }, "x:")).toBe(`<x:c r="A1" t="inlineStr"><x:is><x:t>x</x:t></x:is></x:c>`);
	});
});

describe("applyCellEdits", () => {
	it("inserts rows and cells in order and adds a missing dimension after sheetPr", () => {
		const xml = `${open}<sheetPr/><sheetData><row r="2"><c r="B2"><v>1</v></c></row></sheetData></worksheet>`;
		const out = applyCellEdits(xml, "sheet.xml", [
			{ r: 0, c: 0, cell: { t: "n", v: "5" } },
			{ r: 1, c: 0, cell: { t: "n", v: "6" } },
		]);
		expect(out).toBe(
			`${open}<sheetPr/><dimension ref="A1:B2"/><sheetData><row r="1"><c r="A1"><v>5</v></c></row>` +
				`<row r="2"><c r="A2"><v>6</v></c><c r="B2"><v>1</v></c></row></sheetData></worksheet>`,
		);
	});

	it("numbers rows and cells that relied on position", () => {
		const xml = `${open}<sheetData><row><c><v>1</v></c><c t="b"><v>1</v></c></row></sheetData></worksheet>`;
		const out = applyCellEdits(xml, "sheet.xml", [{ r: 0, c: 2, cell: { t: "n", v: "3" } }]);
		expect(out).toBe(
			`${open}<dimension ref="A1:C1"/><sheetData><row r="1"><c r="A1"><v>1</v></c><c t="b" r="B1"><v>1</v></c>` +
				`<c r="C1"><v>3</v></c></row></sheetData></worksheet>`,
		);
	});

	it("expands an empty sheetData and falls back to A1 when nothing is left", () => {
		const xml = `${open}<dimension ref="A1:A1"/><sheetData/></worksheet>`;
		expect(applyCellEdits(xml, "sheet.xml", [{ r: 4, c: 1, cell: { t: "b", v: "TRUE" } }])).toBe(
			`${open}<dimension ref="B5"/><sheetData><row r="5"><c r="B5" t="b"><v>1</v></c></row></sheetData></worksheet>`,
		);
		expect(applyCellEdits(xml, "sheet.xml", [{ r: 4, c: 1 }])).toBe(`${open}<dimension ref="A1"/><sheetData></sheetData></worksheet>`);
	});

	it("fails without sheetData", () => {
		expect(() => applyCellEdits(`${open}</worksheet>`, "sheet.xml", [])).toThrow(XmlParseError);
	});
});
