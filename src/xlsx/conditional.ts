import { parseXmlBoolean, parseXmlInt, parseXmlNumber, type XmlAttributes, type XmlTag } from "../xml/parser.js";
import { unescapeXml } from "../xml/escape.js";
import { parseSqref } from "../utils/cell.js";
import { parseColorSpec } from "./styles.js";
import type { ColorSpec } from "../style/color.js";
import type { Logger } from "../logger.js";
import type { CellIsOperator, CfRule, Cfvo, CfvoType, ConditionalFormatting, DataBarRule, TimePeriod } from "../types.js";

/** Resolves a color reference against the workbook palettes */
export type ColorResolver = (spec: ColorSpec | undefined) => string | undefined;

const CFVO_TYPES: readonly CfvoType[] = ["num", "percent", "percentile", "min", "max", "formula", "autoMin", "autoMax"];
const OPERATORS: readonly CellIsOperator[] = [
	"lessThan",
	"lessThanOrEqual",
	"equal",
	"notEqual",
	"greaterThanOrEqual",
	"greaterThan",
	"between",
	"notBetween",
];
const TIME_PERIODS: readonly TimePeriod[] = [
	"today",
	"yesterday",
	"tomorrow",
	"last7Days",
	"thisWeek",
	"lastWeek",
	"nextWeek",
	"thisMonth",
	"lastMonth",
	"nextMonth",
];

/** Data bar fill when a rule names no color */
const DEFAULT_BAR_COLOR = "#638EC6";

interface RuleDraft {
	attrs: XmlAttributes;
	x14: boolean;
	/** colorScale, dataBar or iconSet child attributes */
	visual?: XmlAttributes;
	cfvos: Cfvo[];
	colors: ColorSpec[];
	formulas: string[];
	fillColor?: ColorSpec;
	negativeFillColor?: ColorSpec;
	axisColor?: ColorSpec;
	/** `<x14:id>` of a main rule, or `@id` of an x14 rule */
	extId?: string;
}

interface GroupDraft {
	x14: boolean;
	sqref: string;
	rules: RuleDraft[];
}

/**
 * Collects `<conditionalFormatting>` blocks, including the `x14` variants found in
 * the worksheet extension list.
 *
 * Feed every tag from a block's open tag through its close tag to {@link visit}.
 * After the sheet has been scanned, {@link finish} builds the rule groups in
 * document order and merges each x14 data bar extension into the main rule whose
 * extension id it carries.
 */
export class ConditionalFormattingCollector {
	private readonly groups: GroupDraft[] = [];
	private group: GroupDraft | undefined;
	private rule: RuleDraft | undefined;
	private cfvo: Cfvo | undefined;
	private textStart = -1;

	constructor(
		private readonly data: string,
		private readonly color: ColorResolver,
		private readonly logger: Logger,
	) {}

	visit(tag: XmlTag): void {
		const { name, kind, attrs } = tag;
		if (kind === "close") {
			this.close(tag);
			return;
		}
		switch (name) {
			case "conditionalFormatting":
				this.group = { x14: tag.prefix === "x14", sqref: attrs.sqref ?? "", rules: [] };
				if (kind === "empty") {
					this.close(tag);
				}
				break;
			case "cfRule":
				if (!this.group) {
					break;
				}
				this.rule = { attrs, x14: this.group.x14, cfvos: [], colors: [], formulas: [] };
				if (this.group.x14 && attrs.id) {
					this.rule.extId = attrs.id;
				}
				if (kind === "empty") {
					this.close(tag);
				}
				break;
			case "colorScale":
			case "dataBar":
			case "iconSet":
				if (this.rule) {
					this.rule.visual = attrs;
				}
				break;
			case "cfvo":
				if (!this.rule) {
					break;
				}
				this.cfvo = {
					type: CFVO_TYPES.find((t) => t === attrs.type) ?? "num",
					value: attrs.val,
					gte: parseXmlBoolean(attrs.gte, true),
				};
				if (kind === "empty") {
					this.close(tag);
				}
				break;
			case "color":
				this.colorChild(attrs, (rule, spec) => rule.colors.push(spec));
				break;
			case "fillColor":
				this.colorChild(attrs, (rule, spec) => (rule.fillColor = spec));
				break;
			case "negativeFillColor":
				this.colorChild(attrs, (rule, spec) => (rule.negativeFillColor = spec));
				break;
			case "axisColor":
				this.colorChild(attrs, (rule, spec) => (rule.axisColor = spec));
				break;
			case "formula":
			case "f":
			case "sqref":
			case "id":
				if (kind === "open") {
					this.textStart = tag.end;
				}
				break;
		}
	}

	private colorChild(attrs: XmlAttributes, set: (rule: RuleDraft, spec: ColorSpec) => void): void {
		const spec = parseColorSpec(attrs);
		if (this.rule && spec) {
			set(this.rule, spec);
		}
	}

	private text(tag: XmlTag): string {
		const text = this.textStart >= 0 ? unescapeXml(this.data.slice(this.textStart, tag.start)) : "";
		this.textStart = -1;
		return text;
	}

	private close(tag: XmlTag): void {
		switch (tag.name) {
			case "formula":
			case "f": {
				const text = this.text(tag);
				if (this.cfvo) {
					this.cfvo.value = text;
				} else {
					this.rule?.formulas.push(text);
				}
				break;
			}
			case "sqref": {
				const text = this.text(tag);
				if (this.group && !this.rule) {
					this.group.sqref = text;
				}
				break;
			}
			case "id": {
				const text = this.text(tag);
				if (this.rule && !this.rule.x14) {
					this.rule.extId = text;
				}
				break;
			}
			case "cfvo":
				if (this.rule && this.cfvo) {
					this.rule.cfvos.push(this.cfvo);
				}
				this.cfvo = undefined;
				break;
			case "cfRule":
				if (this.group && this.rule) {
					this.group.rules.push(this.rule);
				}
				this.rule = undefined;
				break;
			case "conditionalFormatting":
				if (this.group) {
					this.groups.push(this.group);
				}
				this.group = undefined;
				break;
		}
	}

	/** Build the rule groups; call once after the scan */
	finish(): ConditionalFormatting[] {
		const result: ConditionalFormatting[] = [];
		const bars = new Map<string, DataBarRule>();
		const pending: { group: ConditionalFormatting; extensions: RuleDraft[] }[] = [];

		for (const draft of this.groups) {
			const group: ConditionalFormatting = { sqref: draft.sqref, ranges: parseSqref(draft.sqref), rules: [] };
			const extensions: RuleDraft[] = [];
			for (const ruleDraft of draft.rules) {
				if (draft.x14 && ruleDraft.extId !== undefined) {
					extensions.push(ruleDraft);
					continue;
				}
				const rule = this.build(ruleDraft);
				if (rule) {
					group.rules.push(rule);
					if (rule.type === "dataBar" && rule.extId !== undefined) {
						bars.set(rule.extId, rule);
					}
				}
			}
			pending.push({ group, extensions });
		}

		for (const { group, extensions } of pending) {
			for (const ext of extensions) {
				const bar = ext.extId !== undefined ? bars.get(ext.extId) : undefined;
				if (bar && ext.attrs.type === "dataBar") {
					this.extendDataBar(bar, ext);
					continue;
				}
				const rule = this.build(ext);
				if (rule) {
					group.rules.push(rule);
				}
			}
			if (group.rules.length > 0 && group.ranges.length > 0) {
				result.push(group);
			}
		}
		return result;
	}

	private extendDataBar(bar: DataBarRule, ext: RuleDraft): void {
		const visual = ext.visual ?? {};
		bar.negativeFillColor = this.color(ext.negativeFillColor) ?? bar.negativeFillColor;
		bar.axisColor = this.color(ext.axisColor) ?? bar.axisColor;
		bar.axisPosition = axisPosition(visual.axisPosition);
		bar.minLength = parseXmlNumber(visual.minLength) ?? 0;
		bar.maxLength = parseXmlNumber(visual.maxLength) ?? 100;
		bar.gradient = parseXmlBoolean(visual.gradient, true);
	}

	private build(draft: RuleDraft): CfRule | undefined {
		const { attrs } = draft;
		const base = {
			priority: parseXmlInt(attrs.priority) ?? 0,
			stopIfTrue: parseXmlBoolean(attrs.stopIfTrue),
			dxfId: parseXmlInt(attrs.dxfId),
		};
		const visual = draft.visual ?? {};
		const type = attrs.type;
		switch (type) {
			case "colorScale":
				return {
					...base,
					type: "colorScale",
					cfvos: draft.cfvos,
					colors: draft.colors.map((spec) => this.color(spec) ?? "#000000"),
				};
			case "dataBar":
				return {
					...base,
					type: "dataBar",
					cfvos: draft.cfvos.slice(0, 2),
					color: this.color(draft.colors[0] ?? draft.fillColor) ?? DEFAULT_BAR_COLOR,
					negativeFillColor: this.color(draft.negativeFillColor),
					axisColor: this.color(draft.axisColor),
					axisPosition: axisPosition(visual.axisPosition),
					minLength: parseXmlNumber(visual.minLength) ?? (draft.x14 ? 0 : 10),
					maxLength: parseXmlNumber(visual.maxLength) ?? (draft.x14 ? 100 : 90),
					showValue: parseXmlBoolean(visual.showValue, true),
					gradient: parseXmlBoolean(visual.gradient, true),
					extId: draft.extId,
				};
			case "iconSet":
				return {
					...base,
					type: "iconSet",
					iconSet: visual.iconSet ?? "3TrafficLights1",
					cfvos: draft.cfvos,
					reverse: parseXmlBoolean(visual.reverse),
					showValue: parseXmlBoolean(visual.showValue, true),
				};
			case "cellIs":
				return {
					...base,
					type: "cellIs",
					operator: OPERATORS.find((op) => op === attrs.operator) ?? "equal",
					formulas: draft.formulas,
				};
			case "top10":
				return {
					...base,
					type: "top10",
					rank: parseXmlInt(attrs.rank) ?? 10,
					percent: parseXmlBoolean(attrs.percent),
					bottom: parseXmlBoolean(attrs.bottom),
				};
			case "aboveAverage":
				return {
					...base,
					type: "aboveAverage",
					aboveAverage: parseXmlBoolean(attrs.aboveAverage, true),
					equalAverage: parseXmlBoolean(attrs.equalAverage),
					stdDev: parseXmlInt(attrs.stdDev) ?? 0,
				};
			case "containsText":
			case "notContainsText":
			case "beginsWith":
			case "endsWith":
				return { ...base, type, text: attrs.text ?? "" };
			case "timePeriod":
				return {
					...base,
					type: "timePeriod",
					timePeriod: TIME_PERIODS.find((p) => p === attrs.timePeriod) ?? "today",
				};
			case "expression":
				return { ...base, type: "expression", formulas: draft.formulas };
			case "duplicateValues":
			case "uniqueValues":
			case "containsBlanks":
			case "notContainsBlanks":
			case "containsErrors":
			case "notContainsErrors":
				return { ...base, type };
		}
		this.logger.warn({ type }, "cf_rule_unsupported");
		return undefined;
	}
}

function axisPosition(value: string | undefined): DataBarRule["axisPosition"] {
	return value === "middle" || value === "none" ? value : "automatic";
}
