/**
 * Namespace URIs used by the package parts this library reads.
 */
export const XMLNS = {
	CT: "http://schemas.openxmlformats.org/package/2006/content-types",
	RELS: "http://schemas.openxmlformats.org/package/2006/relationships",
	main: "http://schemas.openxmlformats.org/spreadsheetml/2006/main",
	r: "http://schemas.openxmlformats.org/officeDocument/2006/relationships",
	x14: "http://schemas.microsoft.com/office/spreadsheetml/2009/9/main",
	xm: "http://schemas.microsoft.com/office/excel/2006/main",
} as const;

/**
 * OPC relationship type URIs, keyed by a short identifier.
 * Strict-conformance packages use the `purl.oclc.org` variants; {@link relTypeIs}
 * accepts both.
 */
export const RELS = {
	WB: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument",
	SHEET: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/worksheet",
	HLINK: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/hyperlink",
	CMNT: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/comments",
	SST: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/sharedStrings",
	STY: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/styles",
	THEME: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/theme",
	DRAWING: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/drawing",
	IMAGE: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/image",
	CHART: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/chart",
} as const;

const STRICT_REL_PREFIX = "http://purl.oclc.org/ooxml/officeDocument/relationships/";

/** True when `type` names the relationship `expected`, in transitional or strict form */
export function relTypeIs(type: string, expected: string): boolean {
	if (type === expected) {
		return true;
	}
	return type.startsWith(STRICT_REL_PREFIX) && expected.endsWith("/" + type.slice(STRICT_REL_PREFIX.length));
}
