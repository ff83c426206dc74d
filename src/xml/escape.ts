/** Lookup table mapping XML named entities to their decoded characters */
const NAMED_ENTITIES: Record<string, string> = {
	quot: '"',
	apos: "'",
	gt: ">",
	lt: "<",
	amp: "&",
};

/** Reverse lookup: special characters to their XML entity representations */
const XML_ESCAPE_MAP: Record<string, string> = {
	'"': "&quot;",
	"'": "&apos;",
	">": "&gt;",
	"<": "&lt;",
	"&": "&amp;",
};

// Named entities (&quot; etc.) and numeric character references (&#x1A; or &#26;)
const entityRegex = /&(?:(quot|apos|gt|lt|amp)|#x([\da-fA-F]+)|#(\d+));/g;
// OOXML-style escaped characters like _x000D_ (underscore-hex encoding)
const ooxmlCodeRegex = /_x([\da-fA-F]{4})_/g;
// Literal text that would otherwise read back as an escape; its underscore becomes _x005F_
const literalCodeRegex = /_(?=x[\da-fA-F]{4}_)/g;
// Characters that must be escaped in XML text and attributes
const specialCharRegex = /[&<>'"]/g;
// XML-illegal control characters (everything below U+0020 except tab, LF and CR; U+FFFE; U+FFFF)
// eslint-disable-next-line no-control-regex
const illegalCharRegex = /[\u0000-\u0008\u000b\u000c\u000e-\u001f\uFFFE\uFFFF]/g;

function decodeEntities(text: string): string {
	return text
		.replace(entityRegex, (whole: string, named?: string, hex?: string, dec?: string) => {
			if (named) {
				return NAMED_ENTITIES[named];
			}
			const code = hex ? parseInt(hex, 16) : parseInt(dec ?? "", 10);
			return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : whole;
		})
		.replace(ooxmlCodeRegex, (_m: string, code: string) => String.fromCharCode(parseInt(code, 16)));
}

/**
 * Unescape XML entities, keeping CDATA section content verbatim.
 * @param text - raw XML text potentially containing entities and CDATA blocks
 * @param normalizeNewlines - when true, \r\n line endings become \n
 */
export function unescapeXml(text: string, normalizeNewlines?: boolean): string {
	let out = "";
	let rest = text;
	for (let start = rest.indexOf("<![CDATA["); start !== -1; start = rest.indexOf("<![CDATA[")) {
		const stop = rest.indexOf("]]>", start + 9);
		if (stop === -1) {
			break;
		}
		out += decodeEntities(rest.slice(0, start)) + rest.slice(start + 9, stop);
		rest = rest.slice(stop + 3);
	}
	out += decodeEntities(rest);
	return normalizeNewlines ? out.replace(/\r\n/g, "\n") : out;
}

/**
 * Escape a string for XML text content or a double-quoted attribute.
 * Control characters that XML cannot carry use the OOXML `_xHHHH_` notation, and
 * text already shaped like that notation has its underscore escaped.
 */
export function escapeXml(text: string): string {
	return text
		.replace(literalCodeRegex, "_x005F_")
		.replace(specialCharRegex, (char) => XML_ESCAPE_MAP[char])
		.replace(illegalCharRegex, (char) => "_x" + char.charCodeAt(0).toString(16).toUpperCase().padStart(4, "0") + "_");
}
