import { describe, expect, it } from "vitest";
import { parseSharedStrings } from "./shared-strings.js";
import { parseComments } from "./comments.js";
import { XmlParseError } from "../errors.js";

const MAIN = 'xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main"';

describe("parseSharedStrings", () => {
	it("reads plain, rich and empty items in order", () => {
		const xml =
			`<sst ${MAIN} count="4" uniqueCount="4">` +
			`<si><t>plain &amp; simple</t></si>` +
			`<si><r><rPr><i/><sz val="9"/><color rgb="FFFF0000"/><rFont val="Arial"/></rPr><t>red</t></r><r><t xml:space="preserve"> text</t></r></si>` +
			`<si/>` +
			`<si><t>漢字</t><rPh sb="0" eb="2"><t>かんじ</t></rPh></si>` +
			`</sst>`;
		expect(parseSharedStrings(xml)).toEqual([
			{ text: "plain & simple" },
			{
				text: "red text",
				runs: [{ text: "red", font: { italic: true, size: 9, color: { rgb: "FFFF0000" }, name: "Arial" } }, { text: " text" }],
			},
			{ text: "" },
			{ text: "漢字" },
		]);
	});

	it("decodes escaped control characters", () => {
		const xml = `<sst ${MAIN}><si><t>a_x000D_b</t></si></sst>`;
		expect(parseSharedStrings(xml)[0].text).toBe("a\rb");
	});

	it("rejects another root element", () => {
		expect(() => parseSharedStrings(`<styleSheet ${MAIN}/>`)).toThrow(XmlParseError);
	});
});

describe("parseComments", () => {
	it("joins the runs of each comment and names its author", () => {
		const xml =
			`<comments ${MAIN}><authors><author>Ann</author><author>Ben &lt;b&gt;</author></authors><commentList>` +
			`<comment ref="C2" authorId="1"><text><r><rPr><b/></rPr><t>Ben:</t></r><r><t xml:space="preserve"> check this</t></r></text></comment>` +
			`<comment ref="A1" authorId="0"><text><t>ok</t></text></comment>` +
			`<comment ref="bad" authorId="0"><text><t>dropped</t></text></comment>` +
			`</commentList></comments>`;
		expect(parseComments(xml, "xl/comments1.xml")).toEqual([
			{ ref: "C2", r: 1, c: 2, author: "Ben <b>", text: "Ben: check this" },
			{ ref: "A1", r: 0, c: 0, author: "Ann", text: "ok" },
		]);
	});
});
