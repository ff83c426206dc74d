import { zipWrite } from "../../src/zip/index.js";
import { XML_HEADER } from "../../src/xml/parser.js";
import { escapeXml } from "../../src/xml/escape.js";
import { RELS, XMLNS } from "../../src/xml/namespaces.js";

export interface SheetFixture {
	name: string;
	/** Children of `<worksheet>`; must include `<sheetData>` */
	body: string;
	/** Relationships of the worksheet part as `[id, type, target, external]` */
	rels?: Rel[];
	state?: "hidden" | "veryHidden";
}

export interface WorkbookFixture {
	sheets: SheetFixture[];
	/** Full XML of xl/styles.xml */
	styles?: string;
	/** Plain shared strings, or the full XML of xl/sharedStrings.xml */
	sharedStrings?: string[] | string;
	/** Full XML of xl/theme/theme1.xml */
	theme?: string;
	date1904?: boolean;
	/** Extra children of `<workbook>` after `<sheets>` */
	workbookExtra?: string;
	/** Additional members by path */
	parts?: Record<string, string>;
	/** Deflate members (default true) */
	compress?: boolean;
}

type Rel = [string, string, string, boolean?];

const encoder = new TextEncoder();

function relsXml(rels: Rel[]): string {
	const items = rels.map(
		([id, type, target, external]) => `<Relationship Id="${id}" Type="${type}" Target="${escapeXml(target)}"${external ? ' TargetMode="External"' : ""}/>`,
	);
	return `${XML_HEADER}<Relationships xmlns="${XMLNS.RELS}">${items.join("")}</Relationships>`;
}

export function worksheetXml(body: string): string {
	return `${XML_HEADER}<worksheet xmlns="${XMLNS.main}" xmlns:r="${XMLNS.r}">${body}</worksheet>`;
}

export function stylesXml(inner: string): string {
	return `${XML_HEADER}<styleSheet xmlns="${XMLNS.main}">${inner}</styleSheet>`;
}

function sharedStringsXml(items: string[]): string {
	const si = items.map((text) => `<si><t xml:space="preserve">${escapeXml(text)}</t></si>`).join("");
	return `${XML_HEADER}<sst xmlns="${XMLNS.main}" count="${items.length}" uniqueCount="${items.length}">${si}</sst>`;
}

/** Build an `.xlsx` package in memory */
export function buildXlsx(fixture: WorkbookFixture): Uint8Array {
	const files: Record<string, string> = {};
	const overrides: string[] = [`<Override PartName="/xl/workbook.xml" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.sheet.main+xml"/>`];
	const wbRels: Rel[] = [];
	const sheetEntries: string[] = [];

	fixture.sheets.forEach((sheet, i) => {
		const path = `xl/worksheets/sheet${i + 1}.xml`;
		files[path] = worksheetXml(sheet.body);
		overrides.push(`<Override PartName="/${path}" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.worksheet+xml"/>`);
		wbRels.push([`rId${i + 1}`, RELS.SHEET, `worksheets/sheet${i + 1}.xml`]);
		const state = sheet.state ? ` state="${sheet.state}"` : "";
		sheetEntries.push(`<sheet name="${escapeXml(sheet.name)}" sheetId="${i + 1}"${state} r:id="rId${i + 1}"/>`);
		if (sheet.rels) {
			files[`xl/worksheets/_rels/sheet${i + 1}.xml.rels`] = relsXml(sheet.rels);
		}
	});

	let next = fixture.sheets.length + 1;
	if (fixture.styles !== undefined) {
		files["xl/styles.xml"] = fixture.styles;
		wbRels.push([`rId${next++}`, RELS.STY, "styles.xml"]);
	}
	if (fixture.sharedStrings !== undefined) {
		files["xl/sharedStrings.xml"] = typeof fixture.sharedStrings === "string" ? fixture.sharedStrings : sharedStringsXml(fixture.sharedStrings);
		wbRels.push([`rId${next++}`, RELS.SST, "sharedStrings.xml"]);
	}
	if (fixture.theme !== undefined) {
		files["xl/theme/theme1.xml"] = fixture.theme;
		wbRels.push([`rId${next++}`, RELS.THEME, "theme/theme1.xml"]);
	}

	const pr = fixture.date1904 ? `<workbookPr date1904="1"/>` : "";
	files["xl/workbook.xml"] =
		`${XML_HEADER}<workbook xmlns="${XMLNS.main}" xmlns:r="${XMLNS.r}">${pr}<sheets>${sheetEntries.join("")}</sheets>${fixture.workbookExtra ?? ""}</workbook>`;
	files["xl/_rels/workbook.xml.rels"] = relsXml(wbRels);
	files["_rels/.rels"] = relsXml([["rId1", RELS.WB, "xl/workbook.xml"]]);
	files["[Content_Types].xml"] =
		`${XML_HEADER}<Types xmlns="${XMLNS.CT}"><Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>` +
		`<Default Extension="xml" ContentType="application/xml"/>${overrides.join("")}</Types>`;
	Object.assign(files, fixture.parts);

	const encoded: Record<string, Uint8Array> = {};
	for (const [path, text] of Object.entries(files)) {
		encoded[path] = encoder.encode(text);
	}
	return zipWrite({ files: encoded }, { compress: fixture.compress ?? true });
}
