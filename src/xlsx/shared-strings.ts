import { expectRoot, forEachXmlTag, type XmlTag } from "../xml/parser.js";
import { unescapeXml } from "../xml/escape.js";
import { applyFontProperty, type RawFont } from "./styles.js";

/** A run of a rich string with its unresolved formatting */
export interface RawRun {
	text: string;
	font?: RawFont;
}

/** One `<si>`, `<is>` or comment `<text>` item */
export interface RawString {
	text: string;
	/** Present only for rich strings */
	runs?: RawRun[];
}

/**
 * Accumulates the text of a string item from the tags inside it.
 *
 * Feed every tag between the item's open and close tag to {@link visit}, then call
 * {@link finish}. Phonetic runs (`<rPh>`) do not contribute text.
 */
export class RichTextCollector {
	private plain = "";
	private readonly runs: RawRun[] = [];
	private run: RawRun | undefined;
	private font: RawFont | undefined;
	private phonetic = 0;
	private textStart = -1;

	constructor(private readonly data: string) {}

	visit(tag: XmlTag): void {
		const { name, kind } = tag;
		if (this.font && kind !== "close" && applyFontProperty(this.font, tag)) {
			return;
		}
		switch (name) {
			case "rPh":
				if (kind === "open") {
					this.phonetic++;
				} else if (kind === "close") {
					this.phonetic--;
				}
				break;
			case "r":
				if (kind === "open") {
					this.run = { text: "" };
				} else if (kind === "close" && this.run) {
					this.runs.push(this.run);
					this.run = undefined;
				}
				break;
			case "rPr":
				if (kind === "open") {
					this.font = {};
				} else {
					if (this.run && this.font) {
						this.run.font = this.font;
					}
					this.font = undefined;
				}
				break;
			case "t":
				if (kind === "open") {
					this.textStart = tag.end;
				} else if (kind === "close" && this.textStart >= 0) {
					this.append(unescapeXml(this.data.slice(this.textStart, tag.start)));
					this.textStart = -1;
				}
				break;
		}
	}

	private append(text: string): void {
		if (this.phonetic > 0) {
			return;
		}
		if (this.run) {
			this.run.text += text;
		} else {
			this.plain += text;
		}
	}

	finish(): RawString {
		if (this.runs.length === 0) {
			return { text: this.plain };
		}
		return { text: this.plain + this.runs.map((run) => run.text).join(""), runs: this.runs };
	}
}

/**
 * Decode the shared string table.
 * @returns items in index order
 */
export function parseSharedStrings(data: string, part = "xl/sharedStrings.xml"): RawString[] {
	expectRoot(data, part, "sst");
	const strings: RawString[] = [];
	let item: RichTextCollector | undefined;
	forEachXmlTag(data, part, (tag) => {
		if (tag.name === "si") {
			if (tag.kind === "open") {
				item = new RichTextCollector(data);
			} else {
				strings.push(item ? item.finish() : { text: "" });
				item = undefined;
			}
			return;
		}
		item?.visit(tag);
	});
	return strings;
}
