import { parseXmlBoolean, parseXmlNumber, type XmlTag } from "../xml/parser.js";
import { unescapeXml } from "../xml/escape.js";
import { parseColorSpec } from "./styles.js";
import type { ColorResolver } from "./conditional.js";
import type { SparklineGroup } from "../types.js";

type ColorField = "colorSeries" | "colorNegative" | "colorMarkers" | "colorHigh" | "colorLow" | "colorFirst" | "colorLast";

const COLOR_FIELDS: readonly ColorField[] = ["colorSeries", "colorNegative", "colorMarkers", "colorHigh", "colorLow", "colorFirst", "colorLast"];

/** Collects `<x14:sparklineGroups>` from a worksheet extension list */
export class SparklineCollector {
	readonly groups: SparklineGroup[] = [];
	private group: SparklineGroup | undefined;
	private formula = "";
	private textStart = -1;

	constructor(
		private readonly data: string,
		private readonly color: ColorResolver,
	) {}

	visit(tag: XmlTag): void {
		const { name, kind, attrs } = tag;
		if (kind === "close") {
			this.close(tag);
			return;
		}
		if (name === "sparklineGroup") {
			const { type, displayEmptyCellsAs: empty } = attrs;
			this.group = {
				type: type === "column" || type === "stacked" ? type : "line",
				markers: parseXmlBoolean(attrs.markers),
				high: parseXmlBoolean(attrs.high),
				low: parseXmlBoolean(attrs.low),
				first: parseXmlBoolean(attrs.first),
				last: parseXmlBoolean(attrs.last),
				negative: parseXmlBoolean(attrs.negative),
				displayEmptyCellsAs: empty === "gap" || empty === "span" ? empty : "zero",
				lineWeight: parseXmlNumber(attrs.lineWeight) ?? 0.75,
				sparklines: [],
			};
			return;
		}
		const field = COLOR_FIELDS.find((f) => f === name);
		if (field && this.group) {
			this.group[field] = this.color(parseColorSpec(attrs));
			return;
		}
		if (name === "sparkline") {
			this.formula = "";
		} else if ((name === "f" || name === "sqref") && kind === "open") {
			this.textStart = tag.end;
		}
	}

	private close(tag: XmlTag): void {
		switch (tag.name) {
			case "f":
				this.formula = this.text(tag);
				break;
			case "sqref": {
				const sqref = this.text(tag);
				this.group?.sparklines.push({ formula: this.formula, sqref });
				break;
			}
			case "sparklineGroup":
				if (this.group) {
					this.groups.push(this.group);
				}
				this.group = undefined;
				break;
		}
	}

	private text(tag: XmlTag): string {
		const text = this.textStart >= 0 ? unescapeXml(this.data.slice(this.textStart, tag.start)) : "";
		this.textStart = -1;
		return text;
	}
}
