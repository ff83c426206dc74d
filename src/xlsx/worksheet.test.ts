import { Writable } from "node:stream";
import { describe, expect, it } from "vitest";
import { parseWorksheet, type WorksheetContext } from "./worksheet.js";
import { createLogger, silentLogger } from "../logger.js";
import { InvalidReferenceError, XmlParseError } from "../errors.js";
import type { ColorSpec } from "../style/color.js";

const NS =
	'xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main" xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships" ' +
	'xmlns:x14="http://schemas.microsoft.com/office/spreadsheetml/2009/9/main" xmlns:xm="http://schemas.microsoft.com/office/excel/2006/main"';

const SHEET = `<worksheet ${NS}>
<sheetPr><tabColor rgb="FF112233"/></sheetPr>
<dimension ref="A1:C3"/>
<sheetViews><sheetView workbookViewId="0"><pane ySplit="1" topLeftCell="A2" state="frozen"/></sheetView></sheetViews>
<sheetFormatPr defaultRowHeight="16" defaultColWidth="10"/>
<cols><col min="2" max="3" width="20" hidden="1"/></cols>
<sheetData>
<row r="1" ht="30" customHeight="1"><c r="A1" t="s" s="2"><v>0</v></c><c><v>5</v></c></row>
<row r="3" hidden="1"><c r="C3" t="inlineStr"><is><r><rPr><b/></rPr><t>Bo</t></r><r><t>ld</t></r></is></c><c r="A3"><v>1</v></c><c r="A3"><v>2</v></c></row>
</sheetData>
<mergeCells count="4"><mergeCell ref="A5:B6"/><mergeCell ref="B6:C7"/><mergeCell ref="Z"/><mergeCell ref="D1:D1"/></mergeCells>
<conditionalFormatting sqref="A1:A3">
<cfRule type="dataBar" priority="1"><dataBar><cfvo type="min"/><cfvo type="max"/><color rgb="FF00AA00"/></dataBar>
<extLst><ext uri="{B025F937-C7B1-47D3-B67F-A62EFF666E3E}"><x14:id>{BAR-1}</x14:id></ext></extLst></cfRule>
<cfRule type="cellIs" priority="2" operator="greaterThan" dxfId="0"><formula>10</formula></cfRule>
<cfRule type="mystery" priority="3"/>
</conditionalFormatting>
<dataValidations count="1"><dataValidation type="list" allowBlank="1" sqref="B2:B4"><formula1>"a,b"</formula1></dataValidation></dataValidations>
<hyperlinks><hyperlink ref="A1" location="Other!A1" display="Go"/></hyperlinks>
<drawing r:id="rId3"/><legacyDrawing r:id="rId4"/>
<extLst>
<ext uri="{78C0D931-6437-407d-A8EE-F0AAD8539E65}"><x14:conditionalFormattings><x14:conditionalFormatting>
<x14:cfRule type="dataBar" id="{BAR-1}"><x14:dataBar minLength="0" maxLength="100" gradient="0" axisPosition="middle">
<x14:cfvo type="autoMin"/><x14:cfvo type="autoMax"/><x14:negativeFillColor rgb="FFFF0000"/><x14:axisColor rgb="FF000000"/></x14:dataBar></x14:cfRule>
<xm:sqref>A1:A3</xm:sqref></x14:conditionalFormatting></x14:conditionalFormattings></ext>
<ext uri="{05C60535-1F16-4fd2-B633-F4F36F0B64E0}"><x14:sparklineGroups><x14:sparklineGroup type="column" high="1" displayEmptyCellsAs="gap">
<x14:colorSeries rgb="FF376092"/><x14:sparklines><x14:sparkline><xm:f>Data!A1:E1</xm:f><xm:sqref>F1</xm:sqref></x14:sparkline></x14:sparklines>
</x14:sparklineGroup></x14:sparklineGroups></ext>
</extLst>
</worksheet>`;

const rgbOnly = (spec: ColorSpec | undefined): string | undefined => (spec?.rgb ? "#" + spec.rgb.slice(-6) : undefined);

function context(): { ctx: WorksheetContext; lines: unknown[] } {
	const lines: unknown[] = [];
	const destination = new Writable({
		write(chunk: Buffer, _encoding, callback) {
			lines.push(...chunk.toString("utf8").trim().split("\n").map((line): unknown => JSON.parse(line)));
			callback();
		},
	});
	return { ctx: { color: rgbOnly, logger: createLogger({ level: "warn", destination }) }, lines };
}

describe("parseWorksheet", () => {
	const { ctx, lines } = context();
	const ws = parseWorksheet(SHEET, "xl/worksheets/sheet1.xml", ctx);

	it("collects cells in address order with the last duplicate winning", () => {
		expect(ws.cells).toEqual([
			{ r: 0, c: 0, type: "s", styleIndex: 2, value: "0" },
			{ r: 0, c: 1, value: "5" },
			{ r: 2, c: 0, value: "2" },
			{
				r: 2,
				c: 2,
				type: "inlineStr",
				inline: {
					text: "Bold",
					runs: [{ text: "Bo", font: { bold: true } }, { text: "ld" }],
				},
			},
		]);
	});

	it("reads sheet layout", () => {
		expect(ws).toMatchObject({
			dimension: "A1:C3",
			tabColor: "#112233",
			frozenRows: 1,
			frozenCols: 0,
			defaultRowHeight: 16,
			defaultColWidth: 10,
			colWidths: { 1: 20, 2: 20 },
			hiddenCols: [1, 2],
			rowHeights: { 0: 30 },
			hiddenRows: [2],
			drawingRelIds: ["rId3"],
		});
	});

	it("keeps valid merges and reports the rest", () => {
		expect(ws.merges).toEqual([{ s: { r: 4, c: 0 }, e: { r: 5, c: 1 } }]);
		expect(lines).toContainEqual(expect.objectContaining({ msg: "merge_overlap", ref: "B6:C7" }));
		expect(lines).toContainEqual(expect.objectContaining({ msg: "merge_invalid", ref: "Z" }));
	});

	it("reads hyperlinks and validations", () => {
		expect(ws.hyperlinks).toEqual([{ ref: "A1", location: "Other!A1", display: "Go" }]);
		expect(ws.dataValidations).toEqual([
			expect.objectContaining({
				sqref: "B2:B4",
				ranges: [{ s: { r: 1, c: 1 }, e: { r: 3, c: 1 } }],
				type: "list",
				allowBlank: true,
				showErrorMessage: false,
				formula1: '"a,b"',
			}),
		]);
	});

	it("merges the extension data bar into its main rule", () => {
		expect(ws.conditionalFormatting).toHaveLength(1);
		const [group] = ws.conditionalFormatting;
		expect(group.sqref).toBe("A1:A3");
		expect(group.rules).toEqual([
			{
				priority: 1,
				stopIfTrue: false,
				type: "dataBar",
				cfvos: [
					{ type: "min", gte: true },
					{ type: "max", gte: true },
				],
				color: "#00AA00",
				negativeFillColor: "#FF0000",
				axisColor: "#000000",
				axisPosition: "middle",
				minLength: 0,
				maxLength: 100,
				showValue: true,
				gradient: false,
				extId: "{BAR-1}",
			},
			{ priority: 2, stopIfTrue: false, dxfId: 0, type: "cellIs", operator: "greaterThan", formulas: ["10"] },
		]);
		expect(lines).toContainEqual(expect.objectContaining({ msg: "cf_rule_unsupported", type: "mystery" }));
	});

	it("reads sparkline groups from the extension list", () => {
		expect(ws.sparklineGroups).toEqual([
			{
				type: "column",
				colorSeries: "#376092",
				markers: false,
				high: true,
				low: false,
				first: false,
				last: false,
				negative: false,
				displayEmptyCellsAs: "gap",
				lineWeight: 0.75,
				sparklines: [{ formula: "Data!A1:E1", sqref: "F1" }],
			},
		]);
	});

	it("reads x14 rules without a main rule as their own rules", () => {
		const xml =
			`<worksheet ${NS}><sheetData/><extLst><ext><x14:conditionalFormattings><x14:conditionalFormatting>` +
			`<x14:cfRule type="iconSet" priority="4" id="{ICON}"><x14:iconSet iconSet="3Stars" reverse="1"><x14:cfvo type="percent"><xm:f>0</xm:f></x14:cfvo>` +
			`<x14:cfvo type="percent"><xm:f>50</xm:f></x14:cfvo></x14:iconSet></x14:cfRule><xm:sqref>B1:B9</xm:sqref>` +
			`</x14:conditionalFormatting></x14:conditionalFormattings></ext></extLst></worksheet>`;
		const result = parseWorksheet(xml, "sheet.xml", { color: rgbOnly, logger: silentLogger() });
		expect(result.conditionalFormatting).toEqual([
			{
				sqref: "B1:B9",
				ranges: [{ s: { r: 0, c: 1 }, e: { r: 8, c: 1 } }],
				rules: [
					{
						priority: 4,
						stopIfTrue: false,
						type: "iconSet",
						iconSet: "3Stars",
						reverse: true,
						showValue: true,
						cfvos: [
							{ type: "percent", value: "0", gte: true },
							{ type: "percent", value: "50", gte: true },
						],
					},
				],
			},
		]);
	});

	it("rejects a malformed cell reference", () => {
		const xml = `<worksheet ${NS}><sheetData><row r="1"><c r="1A"><v>1</v></c></row></sheetData></worksheet>`;
		expect(() => parseWorksheet(xml, "sheet.xml", { color: rgbOnly, logger: silentLogger() })).toThrow(InvalidReferenceError);
	});

	it("rejects cells beyond the last column", () => {
		const outside = `<worksheet ${NS}><sheetData><row r="1"><c r="XFE1"><v>8</v></c></row><row r="2"><c r="A2"><v>8</v></c></row></sheetData></worksheet>`;
		expect(() => parseWorksheet(outside, "sheet.xml", { color: rgbOnly, logger: silentLogger() })).toThrow(InvalidReferenceError);
		const counted = `<worksheet ${NS}><sheetData><row r="1"><c r="XFD1"><v>1</v></c><c><v>2</v></c></row></sheetData></worksheet>`;
		expect(() => parseWorksheet(counted, "sheet.xml", { color: rgbOnly, logger: silentLogger() })).toThrow(InvalidReferenceError);
	});

	it("rejects a part with another root", () => {
		expect(() => parseWorksheet("<chartsheet/>", "sheet.xml", { color: rgbOnly, logger: silentLogger() })).toThrow(XmlParseError);
	});
});
