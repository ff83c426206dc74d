import { unescapeXml } from "./escape.js";
import { XmlParseError } from "../errors.js";

// Matches attribute key="value" pairs within an XML tag. Captures the attribute
// name, then handles double-quoted, single-quoted, or unquoted values.
const attregexg = /\s([^"\s?>/]+)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^'">\s]+))/g;

// Strict XML tag regex: matches well-formed tags with optional attributes
const tagregex1 = /<[/?]?[a-zA-Z0-9:_.-]+(?:\s+[^"\s?<>/]+\s*=\s*(?:"[^"]*"|'[^']*'|[^'"<>\s=]+))*\s*[/?]?>/gm;
// Lenient fallback: matches anything between < and >
const tagregex2 = /<[^<>]*>/g;

/** Standard XML declaration header with UTF-8 encoding and Windows line ending */
export const XML_HEADER = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\r\n';

/**
 * The regex used to tokenize XML tags throughout the codebase.
 * Uses the strict pattern if it can match the XML header, otherwise falls back to the lenient one.
 */
export const XML_TAG_REGEX: RegExp = XML_HEADER.match(tagregex1) ? tagregex1 : tagregex2;

/** Attribute values by local name (namespace prefix removed), already unescaped */
export type XmlAttributes = Record<string, string>;

/** One tag found while scanning a part */
export interface XmlTag {
	/** Local name without namespace prefix, e.g. `cfRule` for `<x14:cfRule>` */
	name: string;
	/** Namespace prefix, or "" */
	prefix: string;
	kind: "open" | "close" | "empty";
	attrs: XmlAttributes;
	/** Offset of `<` in the source */
	start: number;
	/** Offset just past `>` */
	end: number;
}

/**
 * Parse XML attributes from a raw tag string.
 * Namespace prefixes are stripped (e.g. "r:id" becomes "id"), except `xmlns:foo`
 * which is kept as "xmlnsfoo". A prefixed attribute does not overwrite an
 * unprefixed one of the same local name.
 * @param tag - the raw XML tag string (e.g., `<Relationship Id="rId1" Target="..."/>`)
 */
export function parseXmlTag(tag: string): XmlAttributes {
	const attrs: XmlAttributes = {};
	const prefixed = new Set<string>();
	for (const m of tag.matchAll(attregexg)) {
		const rawName = m[1];
		const value = unescapeXml(m[2] ?? m[3] ?? m[4] ?? "");
		const colon = rawName.indexOf(":");
		if (colon === -1) {
			attrs[rawName] = value;
			prefixed.delete(rawName);
			continue;
		}
		const localName = (rawName.slice(0, colon) === "xmlns" ? "xmlns" : "") + rawName.slice(colon + 1);
		if (localName in attrs && !prefixed.has(localName)) {
			continue;
		}
		attrs[localName] = value;
		prefixed.add(localName);
	}
	return attrs;
}

/** Extract `[prefix, localName]` from the start of a raw tag */
function tagName(raw: string): [string, string] {
	let i = raw.charCodeAt(1) === 47 ? 2 : 1; // skip "</"
	const from = i;
	// Scan to the end of the name: space, tab, LF, CR, "/" or ">"
	for (; i < raw.length; i++) {
		const ch = raw.charCodeAt(i);
		if (ch === 32 || ch === 9 || ch === 10 || ch === 13 || ch === 47 || ch === 62) {
			break;
		}
	}
	const full = raw.slice(from, i);
	const colon = full.indexOf(":");
	return colon === -1 ? ["", full] : [full.slice(0, colon), full.slice(colon + 1)];
}

/**
 * Walk every element tag of a part in document order.
 *
 * Processing instructions are skipped. Open and close tags must balance; a stray
 * or mismatched close tag, or an element left open at the end of the part, is
 * reported as an {@link XmlParseError} naming `part`.
 *
 * @param data - XML text of the part
 * @param part - Part path used in error messages
 * @param visit - Called once per tag
 */
export function forEachXmlTag(data: string, part: string, visit: (tag: XmlTag) => void): void {
	const stack: string[] = [];
	for (const m of data.matchAll(XML_TAG_REGEX)) {
		const raw = m[0];
		if (raw.charCodeAt(1) === 63) {
			continue; // <?xml ... ?>
		}
		const start = m.index ?? 0;
		const [prefix, name] = tagName(raw);
		const qualified = prefix ? prefix + ":" + name : name;
		let kind: XmlTag["kind"];
		if (raw.charCodeAt(1) === 47) {
			kind = "close";
			const open = stack.pop();
			if (open !== qualified) {
				throw new XmlParseError(part, open === undefined ? `unexpected </${qualified}>` : `expected </${open}> but found </${qualified}>`);
			}
		} else if (raw.charCodeAt(raw.length - 2) === 47) {
			kind = "empty";
		} else {
			kind = "open";
			stack.push(qualified);
		}
		visit({ name, prefix, kind, attrs: kind === "close" ? {} : parseXmlTag(raw), start, end: start + raw.length });
	}
	if (stack.length > 0) {
		throw new XmlParseError(part, `unclosed <${stack[stack.length - 1]}>`);
	}
}

/**
 * Throw unless the part's first element is `root`.
 * @returns the attributes of the root element
 */
export function expectRoot(data: string, part: string, root: string): XmlAttributes {
	for (const m of data.matchAll(XML_TAG_REGEX)) {
		if (m[0].charCodeAt(1) === 63) {
			continue;
		}
		const [, name] = tagName(m[0]);
		if (name !== root) {
			throw new XmlParseError(part, `expected <${root}> root element but found <${name}>`);
		}
		return parseXmlTag(m[0]);
	}
	throw new XmlParseError(part, `missing <${root}> root element`);
}

/**
 * Parse xsd:boolean-compatible values to a native boolean.
 * Accepts "1" and "true" as truthy, "0" and "false" as falsy.
 * @param value - attribute value, possibly absent
 * @param fallback - result for absent or unrecognized values
 */
export function parseXmlBoolean(value: string | undefined, fallback = false): boolean {
	switch (value) {
		case "1":
		case "true":
			return true;
		case "0":
		case "false":
			return false;
	}
	return fallback;
}

/** Like {@link parseXmlBoolean} but keeps absence distinguishable. */
export function parseOptionalBoolean(value: string | undefined): boolean | undefined {
	return value === undefined ? undefined : parseXmlBoolean(value);
}

/** Parse a numeric attribute, returning undefined when absent or not a finite number */
export function parseXmlNumber(value: string | undefined): number | undefined {
	if (value === undefined || value.trim() === "") {
		return undefined;
	}
	const n = Number(value);
	return Number.isFinite(n) ? n : undefined;
}

/** Parse an integer attribute, returning undefined when absent or malformed */
export function parseXmlInt(value: string | undefined): number | undefined {
	const n = parseXmlNumber(value);
	return n === undefined ? undefined : Math.trunc(n);
}
