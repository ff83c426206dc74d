import { expectRoot, forEachXmlTag, parseXmlBoolean, parseXmlInt } from "../xml/parser.js";
import { unescapeXml } from "../xml/escape.js";
import type { DefinedName, SheetState } from "../types.js";

/** A `<sheet>` entry of the workbook part */
export interface SheetEntry {
	name: string;
	sheetId: number;
	state: SheetState;
	/** Relationship id of the worksheet part */
	relId: string;
}

/** workbook.xml as declared */
export interface WorkbookFile {
	sheets: SheetEntry[];
	date1904: boolean;
	definedNames: DefinedName[];
	/** `workbookView/@activeTab` of the first view */
	activeTab: number;
}

function sheetState(value: string | undefined): SheetState {
	return value === "hidden" || value === "veryHidden" ? value : "visible";
}

/**
 * Decode the workbook part: sheet list, epoch, defined names and active tab.
 * @throws XmlParseError when the part is malformed
 */
export function parseWorkbook(data: string, part = "xl/workbook.xml"): WorkbookFile {
	expectRoot(data, part, "workbook");
	const wb: WorkbookFile = { sheets: [], date1904: false, definedNames: [], activeTab: 0 };
	let views = 0;
	let name: Omit<DefinedName, "value"> | undefined;
	let nameStart = 0;

	forEachXmlTag(data, part, (tag) => {
		const { attrs } = tag;
		switch (tag.name) {
			case "sheet":
				if (tag.kind === "close") {
					break;
				}
				wb.sheets.push({
					name: attrs.name ?? "",
					sheetId: parseXmlInt(attrs.sheetId) ?? wb.sheets.length + 1,
					state: sheetState(attrs.state),
					relId: attrs.id ?? "",
				});
				break;
			case "workbookPr":
				if (tag.kind !== "close") {
					wb.date1904 = parseXmlBoolean(attrs.date1904);
				}
				break;
			case "workbookView":
				if (tag.kind !== "close" && views++ === 0) {
					wb.activeTab = Math.max(0, parseXmlInt(attrs.activeTab) ?? 0);
				}
				break;
			case "definedName":
				if (tag.kind === "open") {
					name = {
						name: attrs.name ?? "",
						localSheetId: parseXmlInt(attrs.localSheetId),
						hidden: parseXmlBoolean(attrs.hidden),
					};
					nameStart = tag.end;
				} else if (tag.kind === "close" && name) {
					wb.definedNames.push({ ...name, value: unescapeXml(data.slice(nameStart, tag.start)) });
					name = undefined;
				}
				break;
		}
	});
	return wb;
}
