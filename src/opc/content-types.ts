import { forEachXmlTag } from "../xml/parser.js";

/** Content types of the parts this library looks up by type */
export const CONTENT_TYPES = {
	workbook: [
		"application/vnd.openxmlformats-officedocument.spreadsheetml.sheet.main+xml",
		"application/vnd.ms-excel.sheet.macroEnabled.main+xml",
		"application/vnd.openxmlformats-officedocument.spreadsheetml.template.main+xml",
		"application/vnd.ms-excel.template.macroEnabled.main+xml",
	],
	worksheet: ["application/vnd.openxmlformats-officedocument.spreadsheetml.worksheet+xml"],
	sharedStrings: ["application/vnd.openxmlformats-officedocument.spreadsheetml.sharedStrings+xml"],
	styles: ["application/vnd.openxmlformats-officedocument.spreadsheetml.styles+xml"],
	theme: ["application/vnd.openxmlformats-officedocument.theme+xml"],
} as const;

/** Parsed `[Content_Types].xml` */
export interface ContentTypes {
	/** Default content type by lowercase file extension */
	defaults: Map<string, string>;
	/** Override content type by part path (no leading slash) */
	overrides: Map<string, string>;
}

/** Parse the `[Content_Types].xml` file from an OPC package. */
export function parseContentTypes(data: string): ContentTypes {
	const ct: ContentTypes = { defaults: new Map(), overrides: new Map() };
	forEachXmlTag(data, "[Content_Types].xml", (tag) => {
		if (tag.kind === "close") {
			return;
		}
		const { Extension, PartName, ContentType } = tag.attrs;
		if (tag.name === "Default" && Extension && ContentType) {
			ct.defaults.set(Extension.toLowerCase(), ContentType);
		} else if (tag.name === "Override" && PartName && ContentType) {
			ct.overrides.set(PartName.replace(/^\/+/, ""), ContentType);
		}
	});
	return ct;
}

/** Part paths whose override matches one of `types`, in document order */
export function partsOfType(ct: ContentTypes, types: readonly string[]): string[] {
	const found: string[] = [];
	for (const [path, type] of ct.overrides) {
		if (types.includes(type)) {
			found.push(path);
		}
	}
	return found;
}

/** Content type of a part: its override, else the default for its extension */
export function contentTypeOf(ct: ContentTypes, path: string): string | undefined {
	const override = ct.overrides.get(path.replace(/^\/+/, ""));
	if (override !== undefined) {
		return override;
	}
	const dot = path.lastIndexOf(".");
	return dot === -1 ? undefined : ct.defaults.get(path.slice(dot + 1).toLowerCase());
}
