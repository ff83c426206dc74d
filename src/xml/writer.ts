import { escapeXml } from "./escape.js";

// Leading/trailing whitespace or embedded newlines require xml:space="preserve"
const wtregex = /(^\s|\s$|\n)/;

/** Attribute values to serialize; undefined entries are skipped */
export type XmlAttributeInput = Record<string, string | number | undefined>;

/**
 * Format a key-value record as XML attribute pairs, escaping each value.
 * @returns a string of ` key="value"` segments (with leading spaces)
 */
export function formatXmlAttributes(attributes: XmlAttributeInput): string {
	let out = "";
	for (const key of Object.keys(attributes)) {
		const value = attributes[key];
		if (value !== undefined) {
			out += " " + key + '="' + escapeXml(String(value)) + '"';
		}
	}
	return out;
}

/**
 * Write a text element, escaping the content.
 * Adds xml:space="preserve" when the content has leading/trailing whitespace
 * or embedded newlines.
 * @returns an XML string like `<t>content</t>`
 */
export function writeXmlTag(tagName: string, content: string): string {
	return "<" + tagName + (wtregex.test(content) ? ' xml:space="preserve"' : "") + ">" + escapeXml(content) + "</" + tagName + ">";
}

/**
 * Write an XML element with optional attributes and optional pre-serialized content.
 * When content is null/undefined, emits a self-closing tag (`<tag .../>`).
 * @param tagName - the XML element name
 * @param content - child markup, or null for a self-closing tag
 * @param attributes - optional attribute key-value pairs
 */
export function writeXmlElement(tagName: string, content?: string | null, attributes?: XmlAttributeInput | null): string {
	const attrs = attributes != null ? formatXmlAttributes(attributes) : "";
	return content != null ? "<" + tagName + attrs + ">" + content + "</" + tagName + ">" : "<" + tagName + attrs + "/>";
}
