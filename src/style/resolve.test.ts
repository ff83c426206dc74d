import { describe, it, expect } from "vitest";
import { Writable } from "node:stream";
import { createLogger } from "../logger.js";
import { parseStyleSheet } from "../xlsx/styles.js";
import { defaultTheme } from "../xlsx/theme.js";
import { StyleResolver } from "./resolve.js";

const STYLES = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<styleSheet xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main">
<numFmts count="1"><numFmt numFmtId="164" formatCode="0.000"/></numFmts>
<fonts count="3">
<font><sz val="11"/><color theme="1"/><name val="Calibri"/><scheme val="minor"/></font>
<font><b/><sz val="14"/><color rgb="FFFF0000"/><name val="Arial"/></font>
<font><i/><u val="double"/><strike/><sz val="9"/><name val="Courier New"/><vertAlign val="superscript"/></font>
</fonts>
<fills count="4">
<fill><patternFill patternType="none"/></fill>
<fill><patternFill patternType="gray125"/></fill>
<fill><patternFill patternType="solid"><fgColor theme="4"/><bgColor indexed="64"/></patternFill></fill>
<fill><gradientFill degree="90"><stop position="0"><color rgb="FFFFFFFF"/></stop><stop position="1"><color theme="4"/></stop></gradientFill></fill>
</fills>
<borders count="2">
<border><left/><right/><top/><bottom/><diagonal/></border>
<border diagonalUp="1"><left style="thin"><color indexed="10"/></left><right/><top style="double"/><bottom/><diagonal style="hair"/></border>
</borders>
<cellStyleXfs count="2">
<xf numFmtId="0" fontId="0" fillId="0" borderId="0"/>
<xf numFmtId="0" fontId="0" fillId="0" borderId="1" applyBorder="1"/>
</cellStyleXfs>
<cellXfs count="9">
<xf numFmtId="0" fontId="0" fillId="0" borderId="0" xfId="0"/>
<xf numFmtId="0" fontId="1" fillId="0" borderId="0" xfId="0"/>
<xf numFmtId="0" fontId="0" fillId="0" borderId="0" xfId="1"/>
<xf numFmtId="0" fontId="0" fillId="0" borderId="0" xfId="1" applyBorder="1"/>
<xf numFmtId="164" fontId="2" fillId="2" borderId="0" xfId="0" applyFont="0" applyNumberFormat="1"/>
<xf numFmtId="14" fontId="7" fillId="3" borderId="0" xfId="0"><alignment horizontal="center" vertical="top" wrapText="1" shrinkToFit="1" textRotation="45" indent="2"/></xf>
<xf numFmtId="0" fontId="0" fillId="1" borderId="0" xfId="0" applyProtection="1"><protection locked="0" hidden="1"/></xf>
<xf numFmtId="200" fontId="0" fillId="0" borderId="0" xfId="9"/>
<xf numFmtId="0" fontId="0" fillId="0" borderId="0" xfId="0"><alignment horizontal="general" textRotation="300"/></xf>
</cellXfs>
<cellStyles count="1"><cellStyle name="Normal" xfId="0" builtinId="0"/></cellStyles>
<dxfs count="2">
<dxf><font><b/><color rgb="FF9C0006"/></font><fill><patternFill><bgColor rgb="FFFFC7CE"/></patternFill></fill></dxf>
<dxf><numFmt numFmtId="165" formatCode="0.0%"/><border><bottom style="thin"><color rgb="FF0000FF"/></bottom></border></dxf>
</dxfs>
</styleSheet>`;

function capture(): { lines: string[]; stream: Writable } {
	const lines: string[] = [];
	const stream = new Writable({
		write(chunk: Buffer, _enc, done) {
			lines.push(chunk.toString());
			done();
		},
	});
	return { lines, stream };
}

function resolver(): StyleResolver {
	return new StyleResolver(parseStyleSheet(STYLES), defaultTheme());
}

describe("StyleResolver", () => {
	it("starts from font 0, fill 0 and border 0", () => {
		const style = resolver().resolve(0);
		expect(style.fontFamily).toBe("Calibri");
		expect(style.fontSize).toBe(11);
		expect(style.fontColor).toBe("#000000");
		expect(style.bold).toBe(false);
		expect(style.patternType).toBe("none");
		expect(style.borderLeft).toBeUndefined();
		expect(style.locked).toBe(true);
		expect(style.numberFormat).toBe("General");
	});

	it("applies a present font id without applyFont", () => {
		const style = resolver().resolve(1);
		expect(style.bold).toBe(true);
		expect(style.fontFamily).toBe("Arial");
		expect(style.fontSize).toBe(14);
		expect(style.fontColor).toBe("#FF0000");
	});

	it("inherits the parent border when applyBorder is absent", () => {
		const style = resolver().resolve(2);
		expect(style.borderLeft).toEqual({ style: "thin", color: "#FF0000" });
		expect(style.borderTop).toEqual({ style: "double" });
		expect(style.borderDiagonal).toEqual({ style: "hair" });
		expect(style.diagonalUp).toBe(true);
		expect(style.diagonalDown).toBe(false);
	});

	it("lets applyBorder override the parent border", () => {
		const style = resolver().resolve(3);
		expect(style.borderLeft).toBeUndefined();
		expect(style.borderTop).toBeUndefined();
		expect(style.diagonalUp).toBe(false);
	});

	it("keeps the baseline for an explicit false flag", () => {
		const style = resolver().resolve(4);
		expect(style.italic).toBe(false);
		expect(style.fontFamily).toBe("Calibri");
		expect(style.numFmtId).toBe(164);
		expect(style.numberFormat).toBe("0.000");
		expect(style.patternType).toBe("solid");
		expect(style.bgColor).toBe("#4472C4");
		expect(style.fgColor).toBeUndefined();
	});

	it("resolves alignment, gradients and built-in formats", () => {
		const style = resolver().resolve(5);
		expect(style.alignH).toBe("center");
		expect(style.alignV).toBe("top");
		expect(style.wrap).toBe(true);
		expect(style.shrinkToFit).toBe(false);
		expect(style.rotation).toBe(45);
		expect(style.indent).toBe(2);
		expect(style.numberFormat).toBe("m/d/yy");
		expect(style.gradient).toEqual({
			type: "linear",
			degree: 90,
			left: 0,
			right: 0,
			top: 0,
			bottom: 0,
			stops: [
				{ position: 0, color: "#FFFFFF" },
				{ position: 1, color: "#4472C4" },
			],
		});
	});

	it("substitutes font 0 for an out-of-range font id and logs it", () => {
		const { lines, stream } = capture();
		const styles = new StyleResolver(parseStyleSheet(STYLES), defaultTheme(), createLogger({ level: "warn", destination: stream }));
		const style = styles.resolve(5);
		expect(style.fontFamily).toBe("Calibri");
		expect(style.bold).toBe(false);
		const logged = lines.map((line): unknown => JSON.parse(line));
		expect(logged).toContainEqual(expect.objectContaining({ msg: "style_index_out_of_range", category: "font", index: 7 }));
	});

	it("reads protection and pattern fills", () => {
		const style = resolver().resolve(6);
		expect(style.locked).toBe(false);
		expect(style.hidden).toBe(true);
		expect(style.patternType).toBe("gray125");
	});

	it("falls back for a missing parent and an unknown custom format", () => {
		const style = resolver().resolve(7);
		expect(style.numFmtId).toBe(200);
		expect(style.numberFormat).toBe("General");
		expect(style.fontFamily).toBe("Calibri");
	});

	it("normalizes general alignment and invalid rotations", () => {
		const style = resolver().resolve(8);
		expect(style.alignH).toBeUndefined();
		expect(style.rotation).toBe(0);
	});

	it("uses defaults for an out-of-range cellXfs index", () => {
		const style = resolver().resolve(99);
		expect(style.fontFamily).toBe("Calibri");
		expect(style.numberFormat).toBe("General");
	});

	it("returns the identical object for repeated lookups", () => {
		const styles = resolver();
		expect(styles.resolve(1)).toBe(styles.resolve(1));
		expect(styles.resolve(1)).not.toBe(styles.resolve(0));
	});

	it("resolves differential formats", () => {
		const styles = resolver();
		expect(styles.resolveDxf(0)).toEqual({ bold: true, fontColor: "#9C0006", fillColor: "#FFC7CE" });
		expect(styles.resolveDxf(1)).toEqual({ numberFormat: "0.0%", borderStyle: "thin", borderColor: "#0000FF" });
		expect(styles.resolveDxf(2)).toBeUndefined();
		expect(styles.resolveDxfs()).toHaveLength(2);
	});

	it("resolves rich text run fonts to the properties they set", () => {
		const styles = resolver();
		expect(styles.resolveRunFont({ bold: true, color: { theme: 4 } })).toEqual({ bold: true, fontColor: "#4472C4" });
		expect(styles.resolveRunFont({ scheme: "major", size: 18 })).toEqual({ fontFamily: "Calibri Light", fontSize: 18 });
	});
});

describe("parseStyleSheet", () => {
	it("collects every section", () => {
		const sheet = parseStyleSheet(STYLES);
		expect(sheet.numFmts.get(164)).toBe("0.000");
		expect(sheet.fonts).toHaveLength(3);
		expect(sheet.fonts[2]).toEqual({
			italic: true,
			underline: "double",
			strike: true,
			size: 9,
			name: "Courier New",
			vertAlign: "superscript",
		});
		expect(sheet.fills).toHaveLength(4);
		expect(sheet.borders).toHaveLength(2);
		expect(sheet.cellStyleXfs).toHaveLength(2);
		expect(sheet.cellXfs).toHaveLength(9);
		expect(sheet.cellStyles).toEqual([{ name: "Normal", xfId: 0, builtinId: 0 }]);
		expect(sheet.dxfs).toHaveLength(2);
		expect(sheet.dxfs[1].numFmt).toEqual({ id: 165, code: "0.0%" });
	});

	it("reads a workbook indexed palette", () => {
		const sheet = parseStyleSheet(
			'<styleSheet><colors><indexedColors><rgbColor rgb="FF010203"/><rgbColor rgb="FFA0B0C0"/></indexedColors></colors></styleSheet>',
		);
		expect(sheet.indexedColors).toEqual(["#010203", "#A0B0C0"]);
	});

	it("rejects a part with another root", () => {
		expect(() => parseStyleSheet("<worksheet/>")).toThrow("Malformed XML in xl/styles.xml: expected <styleSheet> root element but found <worksheet>");
	});
});
