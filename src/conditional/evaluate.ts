import { MAX_COL, rangeContains } from "../utils/cell.js";
import { dateToSerialNumber, serialToDateParts } from "../utils/date.js";
import type {
	Cell,
	CellIsRule,
	CfRule,
	Cfvo,
	ColorScaleRule,
	DataBarRule,
	DxfStyle,
	IconSetRule,
	Sheet,
	TimePeriod,
	Top10Rule,
	AboveAverageRule,
} from "../types.js";

export interface EvaluateOptions {
	/** Differential styles by dxfId, usually `Workbook.dxfStyles` */
	dxfStyles?: readonly DxfStyle[];
	date1904?: boolean;
	/** Reference time for time period rules; its local date is "today" */
	now?: Date;
}

/** Bar geometry in percent of the cell width */
export interface DataBarResult {
	/** Left edge of the bar */
	start: number;
	width: number;
	color: string;
	negative: boolean;
	/** Position of the zero axis, when the range has negative values */
	axis?: number;
	axisColor?: string;
	showValue: boolean;
	gradient: boolean;
}

export interface IconResult {
	iconSet: string;
	/** 0 is the icon for the lowest values unless the set is reversed */
	index: number;
	showValue: boolean;
}

/** Formatting conditional rules contribute to one cell */
export interface ConditionalFormatResult {
	/** Differential style merged from matching rules, higher priority first */
	dxf?: DxfStyle;
	/** Background from a color scale */
	colorScale?: string;
	dataBar?: DataBarResult;
	icon?: IconResult;
	/** Priorities of the rules that applied, in evaluation order */
	priorities: number[];
}

interface Aggregates {
	/** Numeric values ascending */
	sorted: number[];
	min: number;
	max: number;
	mean: number;
	stdDev: number;
	/** Occurrences of each non-blank value key */
	counts: Map<string, number>;
}

type Operand = number | string | undefined;

const DXF_KEYS = ["fontColor", "bold", "italic", "underline", "strikethrough", "fillColor", "borderColor", "borderStyle", "numberFormat"] as const;

function numericValue(cell: Cell | undefined): number | undefined {
	if (!cell || cell.t !== "n" || cell.v === undefined) {
		return undefined;
	}
	const n = Number(cell.v);
	return Number.isFinite(n) ? n : undefined;
}

function isBlank(cell: Cell | undefined): boolean {
	return !cell || cell.t === "z" || cell.v === undefined || (cell.t === "s" && cell.v.trim() === "");
}

function valueKey(cell: Cell | undefined): string | undefined {
	if (isBlank(cell) || !cell?.v) {
		return undefined;
	}
	const n = numericValue(cell);
	return n !== undefined ? "n:" + n : cell.t + ":" + cell.v.toLowerCase();
}

/** A numeric or quoted string literal; anything else cannot be evaluated */
export function parseOperand(formula: string): Operand {
	const text = formula.trim();
	const quoted = /^"((?:[^"]|"")*)"$/.exec(text);
	if (quoted) {
		return quoted[1].replace(/""/g, '"');
	}
	if (/^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i.test(text)) {
		return Number(text);
	}
	return undefined;
}

function percentile(sorted: readonly number[], p: number): number {
	if (sorted.length === 0) {
		return 0;
	}
	const rank = (Math.min(100, Math.max(0, p)) / 100) * (sorted.length - 1);
	const lower = Math.floor(rank);
	const upper = Math.min(lower + 1, sorted.length - 1);
	return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}

function lerpColor(from: string, to: string, t: number): string {
	let out = "#";
	for (let i = 1; i < 7; i += 2) {
		const a = parseInt(from.slice(i, i + 2), 16);
		const b = parseInt(to.slice(i, i + 2), 16);
		out += Math.round(a + (b - a) * t)
			.toString(16)
			.toUpperCase()
			.padStart(2, "0");
	}
	return out;
}

function mergeDxf(target: DxfStyle, source: DxfStyle): void {
	for (const key of DXF_KEYS) {
		if (target[key] === undefined && source[key] !== undefined) {
			Object.assign(target, { [key]: source[key] });
		}
	}
}

/**
 * Evaluates the conditional formatting of one sheet cell by cell.
 *
 * Range statistics are computed once per rule group and reused. Rules covering
 * a cell run in ascending priority; a matching `stopIfTrue` rule ends the run.
 */
export class ConditionalFormatEvaluator {
	private readonly cells = new Map<number, Cell>();
	private readonly aggregates = new Map<number, Aggregates>();
	private readonly dxfStyles: readonly DxfStyle[];
	private readonly date1904: boolean;
	private readonly now: Date;

	constructor(
		private readonly sheet: Sheet,
		options: EvaluateOptions = {},
	) {
		for (const { r, c, cell } of sheet.cells) {
			this.cells.set(r * (MAX_COL + 1) + c, cell);
		}
		this.dxfStyles = options.dxfStyles ?? [];
		this.date1904 = options.date1904 ?? false;
		this.now = options.now ?? new Date();
	}

	private cell(r: number, c: number): Cell | undefined {
		return this.cells.get(r * (MAX_COL + 1) + c);
	}

	private stats(groupIndex: number): Aggregates {
		const cached = this.aggregates.get(groupIndex);
		if (cached) {
			return cached;
		}
		const { ranges } = this.sheet.conditionalFormatting[groupIndex];
		const values: number[] = [];
		const counts = new Map<string, number>();
		for (const { r, c, cell } of this.sheet.cells) {
			if (!ranges.some((range) => rangeContains(range, r, c))) {
				continue;
			}
			const n = numericValue(cell);
			if (n !== undefined) {
				values.push(n);
			}
			const key = valueKey(cell);
			if (key !== undefined) {
				counts.set(key, (counts.get(key) ?? 0) + 1);
			}
		}
		values.sort((a, b) => a - b);
		const mean = values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
		const variance = values.length > 0 ? values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length : 0;
		const stats: Aggregates = {
			sorted: values,
			min: values.length > 0 ? values[0] : 0,
			max: values.length > 0 ? values[values.length - 1] : 0,
			mean,
			stdDev: Math.sqrt(variance),
			counts,
		};
		this.aggregates.set(groupIndex, stats);
		return stats;
	}

	/** Conditional formatting of the cell at zero-based (row, col), or undefined when no rule applies */
	evaluate(row: number, col: number): ConditionalFormatResult | undefined {
		const candidates: { rule: CfRule; group: number }[] = [];
		this.sheet.conditionalFormatting.forEach((cf, group) => {
			if (cf.ranges.some((range) => rangeContains(range, row, col))) {
				for (const rule of cf.rules) {
					candidates.push({ rule, group });
				}
			}
		});
		if (candidates.length === 0) {
			return undefined;
		}
		candidates.sort((a, b) => a.rule.priority - b.rule.priority);

		const cell = this.cell(row, col);
		const result: ConditionalFormatResult = { priorities: [] };
		for (const { rule, group } of candidates) {
			const matched = this.apply(rule, cell, group, result);
			if (!matched) {
				continue;
			}
			result.priorities.push(rule.priority);
			if (rule.stopIfTrue) {
				break;
			}
		}
		return result.priorities.length > 0 ? result : undefined;
	}

	private apply(rule: CfRule, cell: Cell | undefined, group: number, result: ConditionalFormatResult): boolean {
		switch (rule.type) {
			case "colorScale": {
				const color = this.colorScale(rule, cell, group);
				if (color === undefined) {
					return false;
				}
				result.colorScale ??= color;
				return true;
			}
			case "dataBar": {
				const bar = this.dataBar(rule, cell, group);
				if (!bar) {
					return false;
				}
				result.dataBar ??= bar;
				return true;
			}
			case "iconSet": {
				const icon = this.iconSet(rule, cell, group);
				if (!icon) {
					return false;
				}
				result.icon ??= icon;
				return true;
			}
		}
		if (!this.matches(rule, cell, group)) {
			return false;
		}
		const dxf = rule.dxfId !== undefined ? this.dxfStyles[rule.dxfId] : undefined;
		if (dxf) {
			result.dxf ??= {};
			mergeDxf(result.dxf, dxf);
		}
		return true;
	}

	private cfvoValue(cfvo: Cfvo | undefined, stats: Aggregates, fallback: number): number {
		if (!cfvo) {
			return fallback;
		}
		const value = cfvo.value !== undefined ? parseOperand(cfvo.value) : undefined;
		const n = typeof value === "number" ? value : undefined;
		switch (cfvo.type) {
			case "min":
				return stats.min;
			case "max":
				return stats.max;
			case "autoMin":
				return Math.min(0, stats.min);
			case "autoMax":
				return Math.max(0, stats.max);
			case "percent":
				return stats.min + ((stats.max - stats.min) * (n ?? 0)) / 100;
			case "percentile":
				return percentile(stats.sorted, n ?? 0);
			case "num":
			case "formula":
				return n ?? fallback;
		}
	}

	private colorScale(rule: ColorScaleRule, cell: Cell | undefined, group: number): string | undefined {
		const v = numericValue(cell);
		if (v === undefined || rule.cfvos.length < 2 || rule.colors.length < rule.cfvos.length) {
			return undefined;
		}
		const stats = this.stats(group);
		const stops = rule.cfvos.map((cfvo, i) => this.cfvoValue(cfvo, stats, i === 0 ? stats.min : stats.max));
		if (v <= stops[0]) {
			return rule.colors[0];
		}
		for (let i = 1; i < stops.length; i++) {
			if (v <= stops[i]) {
				const span = stops[i] - stops[i - 1];
				return lerpColor(rule.colors[i - 1], rule.colors[i], span > 0 ? (v - stops[i - 1]) / span : 1);
			}
		}
		return rule.colors[stops.length - 1];
	}

	private dataBar(rule: DataBarRule, cell: Cell | undefined, group: number): DataBarResult | undefined {
		const raw = numericValue(cell);
		if (raw === undefined) {
			return undefined;
		}
		const stats = this.stats(group);
		const min = this.cfvoValue(rule.cfvos[0], stats, stats.min);
		const max = Math.max(min, this.cfvoValue(rule.cfvos[1], stats, stats.max));
		const v = Math.min(max, Math.max(min, raw));
		const base = { showValue: rule.showValue, gradient: rule.gradient, axisColor: rule.axisColor };

		if (min >= 0 || rule.axisPosition === "none") {
			const ratio = max > min ? (v - min) / (max - min) : 1;
			const width = rule.minLength + (rule.maxLength - rule.minLength) * ratio;
			return { ...base, start: 0, width, color: rule.color, negative: false, axisColor: undefined };
		}

		let axis: number;
		let positiveScale: number;
		let negativeScale: number;
		if (rule.axisPosition === "middle") {
			const extent = Math.max(-min, max);
			axis = 50;
			positiveScale = 50 / extent;
			negativeScale = 50 / extent;
		} else {
			axis = max > 0 ? (100 * -min) / (max - min) : 100;
			positiveScale = max > 0 ? (100 - axis) / max : 0;
			negativeScale = axis / -min;
		}
		if (v >= 0) {
			return { ...base, start: axis, width: v * positiveScale, color: rule.color, negative: false, axis };
		}
		const width = -v * negativeScale;
		return { ...base, start: axis - width, width, color: rule.negativeFillColor ?? rule.color, negative: true, axis };
	}

	private iconSet(rule: IconSetRule, cell: Cell | undefined, group: number): IconResult | undefined {
		const v = numericValue(cell);
		if (v === undefined || rule.cfvos.length === 0) {
			return undefined;
		}
		const stats = this.stats(group);
		let index = 0;
		rule.cfvos.forEach((cfvo, i) => {
			const threshold = this.cfvoValue(cfvo, stats, stats.min);
			if (cfvo.gte ? v >= threshold : v > threshold) {
				index = i;
			}
		});
		if (rule.reverse) {
			index = rule.cfvos.length - 1 - index;
		}
		return { iconSet: rule.iconSet, index, showValue: rule.showValue };
	}

	private matches(rule: CfRule, cell: Cell | undefined, group: number): boolean {
		switch (rule.type) {
			case "cellIs":
				return this.cellIs(rule, cell);
			case "top10":
				return this.top10(rule, cell, group);
			case "aboveAverage":
				return this.aboveAverage(rule, cell, group);
			case "containsText":
			case "notContainsText":
			case "beginsWith":
			case "endsWith": {
				const text = isBlank(cell) ? "" : (cell?.v ?? "").toLowerCase();
				const needle = rule.text.toLowerCase();
				if (rule.type === "containsText") {
					return text !== "" && text.includes(needle);
				}
				if (rule.type === "notContainsText") {
					return !text.includes(needle) || needle === "";
				}
				if (rule.type === "beginsWith") {
					return text !== "" && text.startsWith(needle);
				}
				return text !== "" && text.endsWith(needle);
			}
			case "duplicateValues":
			case "uniqueValues": {
				const key = valueKey(cell);
				if (key === undefined) {
					return false;
				}
				const count = this.stats(group).counts.get(key) ?? 0;
				return rule.type === "duplicateValues" ? count > 1 : count === 1;
			}
			case "containsBlanks":
				return isBlank(cell);
			case "notContainsBlanks":
				return !isBlank(cell);
			case "containsErrors":
				return cell?.t === "e";
			case "notContainsErrors":
				return cell?.t !== "e";
			case "timePeriod":
				return this.timePeriod(rule.timePeriod, cell);
		}
		// expressions and visual rules
		return false;
	}

	private cellIs(rule: CellIsRule, cell: Cell | undefined): boolean {
		const operands = rule.formulas.map(parseOperand);
		const a = operands[0];
		if (a === undefined || isBlank(cell) || !cell?.v) {
			return false;
		}
		const n = numericValue(cell);
		const v: number | string = n ?? cell.v.toLowerCase();
		const compare = (x: Operand): number | undefined => {
			if (typeof x === "number" && typeof v === "number") {
				return v - x;
			}
			if (typeof x === "string" && typeof v === "string") {
				return v.localeCompare(x.toLowerCase());
			}
			return undefined;
		};
		const d = compare(a);
		switch (rule.operator) {
			case "equal":
				return d === 0;
			case "notEqual":
				return d !== 0;
			case "greaterThan":
				return d !== undefined && d > 0;
			case "greaterThanOrEqual":
				return d !== undefined && d >= 0;
			case "lessThan":
				return d !== undefined && d < 0;
			case "lessThanOrEqual":
				return d !== undefined && d <= 0;
			case "between":
			case "notBetween": {
				const b = operands[1];
				if (typeof a !== "number" || typeof b !== "number" || typeof v !== "number") {
					return false;
				}
				const inside = v >= Math.min(a, b) && v <= Math.max(a, b);
				return rule.operator === "between" ? inside : !inside;
			}
		}
	}

	private top10(rule: Top10Rule, cell: Cell | undefined, group: number): boolean {
		const v = numericValue(cell);
		const { sorted } = this.stats(group);
		if (v === undefined || sorted.length === 0) {
			return false;
		}
		const n = Math.min(sorted.length, rule.percent ? Math.max(1, Math.floor((sorted.length * rule.rank) / 100)) : Math.max(1, rule.rank));
		return rule.bottom ? v <= sorted[n - 1] : v >= sorted[sorted.length - n];
	}

	private aboveAverage(rule: AboveAverageRule, cell: Cell | undefined, group: number): boolean {
		const v = numericValue(cell);
		if (v === undefined) {
			return false;
		}
		const { mean, stdDev } = this.stats(group);
		const offset = rule.stdDev * stdDev;
		if (rule.aboveAverage) {
			const threshold = mean + offset;
			return rule.equalAverage ? v >= threshold : v > threshold;
		}
		const threshold = mean - offset;
		return rule.equalAverage ? v <= threshold : v < threshold;
	}

	private timePeriod(period: TimePeriod, cell: Cell | undefined): boolean {
		const v = numericValue(cell);
		if (v === undefined) {
			return false;
		}
		const day = Math.floor(v);
		const now = this.now;
		const today = Math.floor(dateToSerialNumber(new Date(Date.UTC(now.getFullYear(), now.getMonth(), now.getDate())), this.date1904));
		const weekStart = today - serialToDateParts(today, this.date1904).weekday;
		const monthIndex = (serial: number): number => {
			const parts = serialToDateParts(serial, this.date1904);
			return parts.year * 12 + parts.month - 1;
		};
		switch (period) {
			case "today":
				return day === today;
			case "yesterday":
				return day === today - 1;
			case "tomorrow":
				return day === today + 1;
			case "last7Days":
				return day >= today - 6 && day <= today;
			case "thisWeek":
				return day >= weekStart && day < weekStart + 7;
			case "lastWeek":
				return day >= weekStart - 7 && day < weekStart;
			case "nextWeek":
				return day >= weekStart + 7 && day < weekStart + 14;
			case "thisMonth":
				return monthIndex(day) === monthIndex(today);
			case "lastMonth":
				return monthIndex(day) === monthIndex(today) - 1;
			case "nextMonth":
				return monthIndex(day) === monthIndex(today) + 1;
		}
	}
}

/**
 * Evaluate every cell covered by a sheet's conditional formatting.
 * @returns results keyed by `"row:col"`, zero-based
 */
export function evaluateSheet(sheet: Sheet, options: EvaluateOptions = {}): Map<string, ConditionalFormatResult> {
	const evaluator = new ConditionalFormatEvaluator(sheet, options);
	const results = new Map<string, ConditionalFormatResult>();
	const visited = new Set<string>();
	for (const cf of sheet.conditionalFormatting) {
		for (const { r, c } of sheet.cells) {
			const key = `${r}:${c}`;
			if (visited.has(key) || !cf.ranges.some((range) => rangeContains(range, r, c))) {
				continue;
			}
			visited.add(key);
			const result = evaluator.evaluate(r, c);
			if (result) {
				results.set(key, result);
			}
		}
	}
	return results;
}
