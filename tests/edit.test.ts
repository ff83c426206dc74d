import { describe, expect, it } from "vitest";
import { InvalidSheetIndexError, NotLoadedError, read, WorkbookEditor } from "../src/index.js";
import { zipRead, zipReadString } from "../src/zip/index.js";
import { buildXlsx, stylesXml } from "./helpers/build-xlsx.js";

const STYLES = stylesXml(
	`<fonts count="2"><font><sz val="11"/><name val="Calibri"/></font><font><b/><sz val="11"/><name val="Calibri"/></font></fonts>` +
		`<fills count="1"><fill><patternFill patternType="none"/></fill></fills><borders count="1"><border/></borders>` +
		`<cellStyleXfs count="1"><xf/></cellStyleXfs><cellXfs count="2"><xf xfId="0"/><xf fontId="1" xfId="0"/></cellXfs>`,
);

const SHEET1 =
	`<sheetPr><tabColor rgb="FF00FF00"/></sheetPr><dimension ref="A1:B2"/>` +
	`<sheetData><row r="1" spans="1:2"><c r="A1" t="s"><v>0</v></c><c r="B1" s="1"><f>1+1</f><v>2</v></c></row>` +
	`<row r="2" spans="1:2"><c r="A2"><v>10</v></c><c r="B2" t="b"><v>0</v></c></row></sheetData>` +
	`<mergeCells count="1"><mergeCell ref="C5:D6"/></mergeCells>`;
const SHEET2 = `<sheetData><row r="1"><c r="A1" t="s"><v>1</v></c></row></sheetData><mergeCells count="1"><mergeCell ref="A2:B2"/></mergeCells>`;

function fixture(): Uint8Array {
	return buildXlsx({
		styles: STYLES,
		sharedStrings: ["name", "other"],
		sheets: [
			{ name: "Edit", body: SHEET1 },
			{ name: "Keep", body: SHEET2 },
		],
	});
}

function roundTrip(edit: (editor: WorkbookEditor) => void): Uint8Array {
	const editor = new WorkbookEditor();
	editor.load(fixture());
	edit(editor);
	return editor.save();
}

describe("WorkbookEditor", () => {
	it("returns the loaded bytes when nothing was edited", () => {
		const bytes = fixture();
		const editor = new WorkbookEditor();
		editor.load(bytes);
		expect(editor.isDirty()).toBe(false);
		expect(editor.save()).toEqual(bytes);
	});

	it("infers booleans, numbers and text", () => {
		const saved = roundTrip((editor) => {
			editor.commitEdit(0, 0, 0, "TRUE");
			editor.commitEdit(0, 1, 0, " 42.5 ");
			editor.commitEdit(0, 3, 2, " spaced ");
			editor.commitEdit(0, 3, 3, "_x0041_");
		});
		const cells = read(saved).sheets[0].cells.map(({ r, c, cell }) => [r, c, cell.t, cell.v]);
		expect(cells).toEqual([
			[0, 0, "b", "TRUE"],
			[0, 1, "n", "2"],
			[1, 0, "n", "42.5"],
			[1, 1, "b", "FALSE"],
			[3, 2, "s", "spaced"],
			[3, 3, "s", "_x0041_"],
		]);
	});

	it("removes a cell on blank input and rewrites the dimension", () => {
		const saved = roundTrip((editor) => {
			editor.commitEdit(0, 1, 1, "  ");
			editor.commitEdit(0, 1, 0, "");
		});
		const xml = zipReadString(zipRead(saved), "xl/worksheets/sheet1.xml");
		expect(xml).toContain(`<dimension ref="A1:B1"/>`);
		expect(xml).toContain(`<row r="2"></row>`);
		expect(xml).not.toContain("spans=");
		expect(read(saved).sheets[0].cells.map(({ r, c }) => [r, c])).toEqual([
			[0, 0],
			[0, 1],
		]);
	});

	it("drops the formula and keeps the style", () => {
		const saved = roundTrip((editor) => editor.commitEdit(0, 0, 1, "7"));
		const xml = zipReadString(zipRead(saved), "xl/worksheets/sheet1.xml");
		expect(xml).toContain(`<c r="B1" s="1"><v>7</v></c>`);
		const { cell } = read(saved).sheets[0].cells[1];
		expect(cell.formula).toBeUndefined();
		expect(cell.s?.bold).toBe(true);
	});

	it("keeps the last edit to a cell", () => {
		const editor = new WorkbookEditor();
		editor.load(fixture());
		editor.commitEdit(0, 4, 0, "first");
		editor.commitEdit(0, 4, 0, "second");
		expect(editor.workbook.sheets[0].cells.at(-1)?.cell.v).toBe("second");
		const sheet = read(editor.save()).sheets[0];
		expect(sheet.cells.at(-1)).toEqual({ r: 4, c: 0, cell: { t: "s", v: "second", w: "second" } });
		expect(sheet.dimension).toBe("A1:B5");
	});

	it("copies untouched sheets and members byte for byte", () => {
		const original = zipRead(fixture());
		const bytes = roundTrip((editor) => editor.commitEdit(0, 0, 0, "changed"));
		const saved = zipRead(bytes);
		for (const name of ["xl/worksheets/sheet2.xml", "xl/styles.xml", "xl/sharedStrings.xml", "xl/workbook.xml"]) {
			expect(saved.files[name]).toEqual(original.files[name]);
		}
		const before = read(fixture()).sheets[1];
		const after = read(bytes).sheets[1];
		expect(after.cells).toEqual(before.cells);
		expect(after.merges).toEqual(before.merges);
		expect(saved.entries.map((e) => e.name)).toEqual(original.entries.map((e) => e.name));
	});

	it("keeps the sheet markup outside sheetData", () => {
		const saved = roundTrip((editor) => editor.commitEdit(0, 0, 0, "x"));
		const xml = zipReadString(zipRead(saved), "xl/worksheets/sheet1.xml");
		expect(xml).toContain(`<sheetPr><tabColor rgb="FF00FF00"/></sheetPr><dimension ref="A1:B2"/><sheetData>`);
		expect(xml).toContain(`</sheetData><mergeCells count="1"><mergeCell ref="C5:D6"/></mergeCells>`);
	});

	it("tracks the dirty flag until the next load", () => {
		const editor = new WorkbookEditor();
		editor.load(fixture());
		editor.commitEdit(1, 9, 9, "");
		expect(editor.isDirty()).toBe(true);
		editor.load(fixture());
		expect(editor.isDirty()).toBe(false);
	});

	it("returns a snapshot from load that later edits leave alone", () => {
		const editor = new WorkbookEditor();
		const loaded = editor.load(fixture());
		editor.commitEdit(0, 0, 0, "changed");
		expect(loaded.sheets[0].cells[0].cell.v).toBe("name");
		expect(editor.workbook.sheets[0].cells[0].cell.v).toBe("changed");
	});

	it("rejects a sheet index out of range", () => {
		const editor = new WorkbookEditor();
		editor.load(fixture());
		expect(() => editor.commitEdit(2, 0, 0, "1")).toThrow(InvalidSheetIndexError);
		expect(() => editor.commitEdit(-1, 0, 0, "1")).toThrow(InvalidSheetIndexError);
	});

	it("refuses to work before load", () => {
		const editor = new WorkbookEditor();
		expect(() => editor.save()).toThrow(NotLoadedError);
		expect(() => editor.commitEdit(0, 0, 0, "1")).toThrow(NotLoadedError);
	});
});
