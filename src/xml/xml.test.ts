import { describe, it, expect } from "vitest";
import { escapeXml, unescapeXml } from "./escape.js";
import { expectRoot, forEachXmlTag, parseXmlBoolean, parseXmlInt, parseXmlNumber, parseXmlTag, type XmlTag } from "./parser.js";
import { writeXmlElement, writeXmlTag } from "./writer.js";
import { XmlParseError } from "../errors.js";

describe("escapeXml", () => {
	it("escapes markup characters", () => {
		expect(escapeXml(`<a href="x">Tom & 'Jerry'</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;Tom &amp; &apos;Jerry&apos;&lt;/a&gt;");
	});

	it("encodes control characters as _xHHHH_", () => {
		expect(escapeXml("a\x01b")).toBe("a_x0001_b");
		expect(escapeXml("\x1F")).toBe("_x001F_");
	});

	it("escapes the underscore of literal _xHHHH_ text", () => {
		expect(escapeXml("_x0041_")).toBe("_x005F_x0041_");
		expect(escapeXml("a_x00_b")).toBe("a_x00_b");
		expect(unescapeXml(escapeXml("id_x000D_ and _x1F60_"))).toBe("id_x000D_ and _x1F60_");
	});

	it("keeps tab, newline and carriage return", () => {
		expect(escapeXml("a\tb\nc\r")).toBe("a\tb\nc\r");
	});
});

describe("unescapeXml", () => {
	it("decodes named and numeric entities", () => {
		expect(unescapeXml("&lt;&amp;&gt;&quot;&apos;")).toBe(`<&>"'`);
		expect(unescapeXml("&#65;&#x42;&#x1F600;")).toBe("AB\u{1F600}");
	});

	it("decodes _xHHHH_ escapes", () => {
		expect(unescapeXml("line_x000D_break")).toBe("line\rbreak");
	});

	it("keeps CDATA content verbatim", () => {
		expect(unescapeXml("a&amp;<![CDATA[<b>&amp;]]>c")).toBe("a&<b>&amp;c");
	});

	it("normalizes CRLF only on request", () => {
		expect(unescapeXml("a\r\nb", true)).toBe("a\nb");
		expect(unescapeXml("a\r\nb")).toBe("a\r\nb");
	});

	it("inverts escapeXml", () => {
		const input = "Q1 <total> & \"net\" \x02";
		expect(unescapeXml(escapeXml(input))).toBe(input);
	});
});

describe("parseXmlTag", () => {
	it("strips namespace prefixes from attribute names", () => {
		expect(parseXmlTag('<hyperlink ref="A1" r:id="rId3"/>')).toEqual({ ref: "A1", id: "rId3" });
	});

	it("keeps xmlns declarations apart", () => {
		expect(parseXmlTag('<worksheet xmlns="main" xmlns:r="rels">')).toEqual({ xmlns: "main", xmlnsr: "rels" });
	});

	it("lets an unprefixed attribute win over a prefixed one", () => {
		expect(parseXmlTag('<x id="plain" r:id="prefixed"/>')).toEqual({ id: "plain" });
		expect(parseXmlTag('<x r:id="prefixed" id="plain"/>')).toEqual({ id: "plain" });
	});

	it("unescapes values and accepts single quotes", () => {
		expect(parseXmlTag(`<t name='a &amp; b'/>`)).toEqual({ name: "a & b" });
	});
});

describe("forEachXmlTag", () => {
	it("reports tags in document order", () => {
		const seen: Array<Pick<XmlTag, "name" | "prefix" | "kind">> = [];
		forEachXmlTag('<?xml version="1.0"?><a><x14:b k="1"/></a>', "t.xml", (tag) => {
			seen.push({ name: tag.name, prefix: tag.prefix, kind: tag.kind });
		});
		expect(seen).toEqual([
			{ name: "a", prefix: "", kind: "open" },
			{ name: "b", prefix: "x14", kind: "empty" },
			{ name: "a", prefix: "", kind: "close" },
		]);
	});

	it("records source offsets", () => {
		const data = "<a><b/></a>";
		const offsets: number[][] = [];
		forEachXmlTag(data, "t.xml", (tag) => offsets.push([tag.start, tag.end]));
		expect(offsets).toEqual([
			[0, 3],
			[3, 7],
			[7, 11],
		]);
	});

	it("rejects mismatched close tags", () => {
		expect(() => forEachXmlTag("<a><b></a>", "xl/bad.xml", () => undefined)).toThrow(
			"Malformed XML in xl/bad.xml: expected </b> but found </a>",
		);
	});

	it("rejects unclosed elements", () => {
		expect(() => forEachXmlTag("<a><b/>", "xl/bad.xml", () => undefined)).toThrow(XmlParseError);
	});

	it("rejects a stray close tag", () => {
		expect(() => forEachXmlTag("</a>", "p.xml", () => undefined)).toThrow("Malformed XML in p.xml: unexpected </a>");
	});
});

describe("expectRoot", () => {
	it("returns the root attributes", () => {
		expect(expectRoot('<?xml version="1.0"?><workbook xmlns="ns"/>', "wb.xml", "workbook")).toEqual({ xmlns: "ns" });
	});

	it("rejects another root element", () => {
		expect(() => expectRoot("<sst/>", "wb.xml", "workbook")).toThrow(XmlParseError);
	});
});

describe("attribute value parsers", () => {
	it("parses xsd booleans with a fallback", () => {
		expect(parseXmlBoolean("1")).toBe(true);
		expect(parseXmlBoolean("false", true)).toBe(false);
		expect(parseXmlBoolean(undefined, true)).toBe(true);
		expect(parseXmlBoolean("yes")).toBe(false);
	});

	it("parses numbers and integers", () => {
		expect(parseXmlNumber("12.5")).toBe(12.5);
		expect(parseXmlNumber("abc")).toBeUndefined();
		expect(parseXmlNumber("")).toBeUndefined();
		expect(parseXmlInt("7.9")).toBe(7);
	});
});

describe("writer", () => {
	it("writes self-closing and content elements", () => {
		expect(writeXmlElement("c", null, { r: "A1", s: 2, t: undefined })).toBe('<c r="A1" s="2"/>');
		expect(writeXmlElement("row", "<c/>", { r: 1 })).toBe('<row r="1"><c/></row>');
	});

	it("escapes attribute values", () => {
		expect(writeXmlElement("f", null, { name: 'a<"b"' })).toBe('<f name="a&lt;&quot;b&quot;"/>');
	});

	it("preserves significant whitespace in text elements", () => {
		expect(writeXmlTag("t", "plain")).toBe("<t>plain</t>");
		expect(writeXmlTag("t", " padded")).toBe('<t xml:space="preserve"> padded</t>');
		expect(writeXmlTag("t", "a & b")).toBe("<t>a &amp; b</t>");
	});
});
