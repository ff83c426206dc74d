/*
 * Number format engine: renders numeric values according to Excel number
 * format codes (ECMA-376 Part 1, 18.8.31).
 *
 * A code holds up to 4 semicolon-separated sections:
 *   positive ; negative ; zero ; text
 * Each section mixes literal text, date/time tokens (y, m, d, h, s), number
 * placeholders (0, #, ?) and bracketed modifiers ([Red], [>100], [$€-407], [h]).
 */

import { MAX_DATE_SERIAL, serialToDateParts } from "../utils/date.js";

type Item =
	| { kind: "lit"; text: string }
	| { kind: "ch"; ch: string }
	| { kind: "elapsed"; unit: "h" | "m" | "s"; len: number }
	| { kind: "ampm"; text: string }
	| { kind: "general" }
	| { kind: "text" };

interface Condition {
	op: "<" | "<=" | ">" | ">=" | "=" | "<>";
	operand: number;
}

interface Section {
	items: Item[];
	color?: string;
	condition?: Condition;
	isDate: boolean;
	hasText: boolean;
}

/** A format code split into sections, ready to render values */
export interface CompiledFormat {
	code: string;
	sections: Section[];
}

/** Rendered text plus the color modifier of the section that produced it */
export interface FormattedValue {
	text: string;
	color?: string;
}

const COLOR_NAMES = ["Black", "Blue", "Cyan", "Green", "Magenta", "Red", "White", "Yellow"];
const MONTHS = ["January", "February", "March", "April", "May", "June", "July", "August", "September", "October", "November", "December"];
const DAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

const conditionRegex = /^(<=|>=|<>|<|>|=)\s*(-?\d+(?:\.\d*)?(?:[eE][+-]?\d+)?)$/;

const isCh = (item: Item | undefined, ...chars: string[]): boolean => item?.kind === "ch" && chars.includes(item.ch);
const isPlaceholder = (item: Item | undefined): boolean => isCh(item, "0", "#", "?");

/** Split a code on `;` outside quotes, escapes and brackets */
function splitSections(code: string): string[] {
	const out: string[] = [];
	let start = 0;
	for (let i = 0; i < code.length; i++) {
		const c = code[i];
		if (c === '"') {
			const close = code.indexOf('"', i + 1);
			i = close === -1 ? code.length : close;
		} else if (c === "\\" || c === "_" || c === "*") {
			i++;
		} else if (c === "[") {
			const close = code.indexOf("]", i + 1);
			i = close === -1 ? code.length : close;
		} else if (c === ";") {
			out.push(code.slice(start, i));
			start = i + 1;
		}
	}
	out.push(code.slice(start));
	return out;
}

/** Classify the content of a `[...]` modifier and add it to the section */
function applyBracket(content: string, section: Section): void {
	if (/^(h+|m+|s+)$/i.test(content)) {
		const unit = content[0].toLowerCase();
		if (unit === "h" || unit === "m" || unit === "s") {
			section.items.push({ kind: "elapsed", unit, len: content.length });
		}
		return;
	}
	const color = COLOR_NAMES.find((name) => name.toLowerCase() === content.toLowerCase());
	if (color) {
		section.color = color;
		return;
	}
	const indexed = /^color\s*(\d+)$/i.exec(content);
	if (indexed) {
		section.color = "Color" + indexed[1];
		return;
	}
	const cond = conditionRegex.exec(content);
	if (cond) {
		const op = cond[1];
		if (op === "<" || op === "<=" || op === ">" || op === ">=" || op === "=" || op === "<>") {
			section.condition = { op, operand: Number(cond[2]) };
		}
		return;
	}
	if (content.startsWith("$")) {
		// [$€-407]: currency symbol before the locale id
		const dash = content.indexOf("-");
		const symbol = content.slice(1, dash === -1 ? undefined : dash);
		if (symbol) {
			section.items.push({ kind: "lit", text: symbol });
		}
	}
	// Other modifiers (locale, calendar, DBNum) do not change the text
}

function lexSection(body: string): Section {
	const section: Section = { items: [], isDate: false, hasText: false };
	const { items } = section;
	for (let i = 0; i < body.length; ) {
		const c = body[i];
		if (c === '"') {
			const close = body.indexOf('"', i + 1);
			const end = close === -1 ? body.length : close;
			items.push({ kind: "lit", text: body.slice(i + 1, end) });
			i = end + 1;
		} else if (c === "\\") {
			items.push({ kind: "lit", text: body.charAt(i + 1) });
			i += 2;
		} else if (c === "_") {
			items.push({ kind: "lit", text: " " });
			i += 2;
		} else if (c === "*") {
			i += 2;
		} else if (c === "[") {
			const close = body.indexOf("]", i + 1);
			if (close === -1) {
				items.push({ kind: "lit", text: body.slice(i) });
				break;
			}
			applyBracket(body.slice(i + 1, close), section);
			i = close + 1;
		} else if (body.slice(i, i + 7).toLowerCase() === "general") {
			items.push({ kind: "general" });
			i += 7;
		} else if (body.slice(i, i + 5).toUpperCase() === "AM/PM") {
			items.push({ kind: "ampm", text: "AM/PM" });
			i += 5;
		} else if (body.slice(i, i + 3).toUpperCase() === "A/P") {
			items.push({ kind: "ampm", text: body.slice(i, i + 3) });
			i += 3;
		} else if (c === "@") {
			items.push({ kind: "text" });
			section.hasText = true;
			i++;
		} else {
			items.push({ kind: "ch", ch: c });
			i++;
		}
	}
	section.isDate = items.some(
		(item) => item.kind === "elapsed" || item.kind === "ampm" || (item.kind === "ch" && "ymdhsYMDHS".includes(item.ch)),
	);
	return section;
}

/** Parse a format code once for repeated rendering */
export function compileFormat(code: string): CompiledFormat {
	return { code, sections: splitSections(code).map(lexSection) };
}

/**
 * True iff the code holds date or time tokens (`y m d h s`, `AM/PM`, `A/P`,
 * elapsed `[h] [m] [s]`) outside quoted literals, escapes and bracketed modifiers.
 */
export function isDateFormat(code: string): boolean {
	return compileFormat(code).sections.some((s) => s.isDate);
}

function testCondition(cond: Condition, v: number): boolean {
	switch (cond.op) {
		case "<":
			return v < cond.operand;
		case "<=":
			return v <= cond.operand;
		case ">":
			return v > cond.operand;
		case ">=":
			return v >= cond.operand;
		case "=":
			return v === cond.operand;
		case "<>":
			return v !== cond.operand;
	}
}

/** Round to a fixed number of decimals without the binary error of `toFixed` */
function roundFixed(x: number, digits: number): string {
	const shifted = Math.round(Number(`${x}e${digits}`));
	if (!Number.isFinite(shifted) || String(shifted).includes("e")) {
		return x.toFixed(digits);
	}
	return Number(`${shifted}e-${digits}`).toFixed(digits);
}

/**
 * Render a value the way the `General` format does: integers below 1e11 in
 * full, very large or small magnitudes in 6-significant-digit scientific form,
 * anything else with up to 10 decimals.
 */
export function formatGeneral(v: number): string {
	if (v === 0) {
		return "0";
	}
	const abs = Math.abs(v);
	if (Number.isInteger(v) && abs < 1e11) {
		return String(v);
	}
	if (abs >= 1e11 || abs < 1e-4) {
		let exp = Math.floor(Math.log10(abs));
		let mantissa = roundFixed(abs / 10 ** exp, 5);
		if (Number(mantissa) >= 10) {
			exp += 1;
			mantissa = roundFixed(abs / 10 ** exp, 5);
		}
		const trimmed = mantissa.replace(/\.?0+$/, "");
		return (v < 0 ? "-" : "") + trimmed + "E" + (exp < 0 ? "-" : "+") + String(Math.abs(exp)).padStart(2, "0");
	}
	return String(Number(v.toFixed(10)));
}

function itemText(item: Item): string {
	switch (item.kind) {
		case "lit":
			return item.text;
		case "ch":
			return item.ch;
		case "ampm":
			return item.text;
		default:
			return "";
	}
}

/** Fixed-point rendering of a non-negative value */
function formatFixed(value: number, source: Item[]): string {
	let lastPh = -1;
	for (let i = 0; i < source.length; i++) {
		if (isPlaceholder(source[i])) {
			lastPh = i;
		}
	}
	const sourceDot = source.findIndex((item) => isCh(item, "."));
	const intEnd = sourceDot === -1 ? source.length : sourceDot;

	// Commas right after the last placeholder scale by 1000; commas between
	// integer placeholders switch on grouping; any other comma is literal.
	let scale = 0;
	let grouping = false;
	const items: Item[] = [];
	for (let i = 0; i < source.length; i++) {
		const item = source[i];
		if (!isCh(item, ",")) {
			items.push(item);
			continue;
		}
		if (lastPh !== -1 && i > lastPh && source.slice(lastPh + 1, i + 1).every((x) => isCh(x, ","))) {
			scale++;
		} else if (i < intEnd && source.slice(0, i).some(isPlaceholder) && source.slice(i + 1, intEnd).some(isPlaceholder)) {
			grouping = true;
		} else {
			items.push({ kind: "lit", text: "," });
		}
	}

	const dot = items.findIndex((item) => isCh(item, "."));
	const intPart = dot === -1 ? items : items.slice(0, dot);
	const fracPart = dot === -1 ? [] : items.slice(dot + 1);
	const decimals = fracPart.filter(isPlaceholder).length;
	const [intStr, fracStr = ""] = roundFixed(value / 1000 ** scale, decimals).split(".");
	const intDigits = intStr === "0" ? "" : intStr;

	const firstIntPh = intPart.findIndex(isPlaceholder);
	let out = "";
	let di = intDigits.length;
	let count = 0;
	const emit = (digit: string): void => {
		if (grouping && count > 0 && count % 3 === 0) {
			out = "," + out;
		}
		out = digit + out;
		count++;
	};
	const pad = (ph: string): void => {
		if (ph === "0") {
			emit("0");
		} else if (ph === "?") {
			out = " " + out;
		}
	};
	for (let i = intPart.length - 1; i >= 0; i--) {
		const item = intPart[i];
		if (item.kind === "ch" && isPlaceholder(item)) {
			if (i === firstIntPh) {
				if (di === 0) {
					pad(item.ch);
				}
				while (di > 0) {
					emit(intDigits[--di]);
				}
			} else if (di > 0) {
				emit(intDigits[--di]);
			} else {
				pad(item.ch);
			}
		} else {
			out = itemText(item) + out;
		}
	}
	if (firstIntPh === -1 && lastPh !== -1) {
		// No integer placeholders, as in ".00": digits go before the decimal point
		out += intDigits;
	}
	if (dot === -1) {
		return out;
	}

	let lastNonZero = -1;
	for (let k = 0; k < fracStr.length; k++) {
		if (fracStr[k] !== "0") {
			lastNonZero = k;
		}
	}
	out += ".";
	let k = 0;
	for (const item of fracPart) {
		if (item.kind === "ch" && isPlaceholder(item)) {
			out += k <= lastNonZero ? fracStr[k] : item.ch === "0" ? "0" : item.ch === "?" ? " " : "";
			k++;
		} else {
			out += itemText(item);
		}
	}
	return out;
}

/** Scientific and engineering notation, e.g. `0.00E+00` or `##0.0E+0` */
function formatScientific(value: number, items: Item[], eIdx: number): string {
	const mantissaItems = items.slice(0, eIdx);
	const signItem = items[eIdx + 1];
	const expItems = items.slice(eIdx + 2);
	const dot = mantissaItems.findIndex((item) => isCh(item, "."));
	const intItems = dot === -1 ? mantissaItems : mantissaItems.slice(0, dot);
	const intPh = intItems.filter(isPlaceholder).length;
	const decimals = dot === -1 ? 0 : mantissaItems.slice(dot + 1).filter(isPlaceholder).length;
	// Engineering notation: exponent is a multiple of the integer placeholder count
	const step = intPh > 1 && intItems.some((item) => isCh(item, "#")) ? intPh : 1;
	const width = step > 1 ? step : Math.max(intPh, 1);

	let exp = value === 0 ? 0 : Math.floor(Math.log10(value));
	if (step > 1) {
		exp = Math.floor(exp / step) * step;
	} else {
		exp -= width - 1;
	}
	let mantissa = roundFixed(value / 10 ** exp, decimals);
	if (value !== 0 && Number(mantissa) >= 10 ** width) {
		exp += step;
		mantissa = roundFixed(value / 10 ** exp, decimals);
	}

	const expDigits = expItems.filter(isPlaceholder).length;
	const sign = exp < 0 ? "-" : isCh(signItem, "+") ? "+" : "";
	const eChar = items[eIdx].kind === "ch" ? itemText(items[eIdx]) : "E";
	const tail = expItems.filter((item) => !isPlaceholder(item)).map(itemText).join("");
	return formatFixed(Number(mantissa), mantissaItems) + eChar + sign + String(Math.abs(exp)).padStart(expDigits, "0") + tail;
}

/** Best rational approximation of x in [0, ...) with denominator at most maxDen */
export function approximateFraction(x: number, maxDen: number): [number, number] {
	let [p0, q0, p1, q1] = [0, 1, 1, 0];
	let y = x;
	for (;;) {
		const a = Math.floor(y);
		const p2 = a * p1 + p0;
		const q2 = a * q1 + q0;
		if (q2 > maxDen) {
			break;
		}
		[p0, q0, p1, q1] = [p1, q1, p2, q2];
		const rest = y - a;
		if (rest < 1e-12) {
			return [p1, q1];
		}
		y = 1 / rest;
	}
	// Semiconvergent with the largest allowed denominator
	const k = Math.floor((maxDen - q0) / q1);
	const p = p0 + k * p1;
	const q = q0 + k * q1;
	return Math.abs(p / q - x) < Math.abs(p1 / q1 - x) ? [p, q] : [p1, q1];
}

/** Fractions such as `# ?/?`, `# ??/??`, `?/8` */
function formatFraction(value: number, items: Item[], slash: number): string {
	const left = items.slice(0, slash);
	const right = items.slice(slash + 1);
	let numStart = left.length;
	while (numStart > 0 && isPlaceholder(left[numStart - 1])) {
		numStart--;
	}
	const before = left.slice(0, numStart);
	const hasWhole = before.some(isPlaceholder);

	let denText = "";
	let k = 0;
	for (; k < right.length; k++) {
		const item = right[k];
		if (item.kind !== "ch" || !/[0-9?#]/.test(item.ch)) {
			break;
		}
		denText += item.ch;
	}
	const after = right.slice(k).map(itemText).join("");
	const fixed = /^[0-9]+$/.test(denText) && Number(denText) > 0 ? Number(denText) : undefined;

	let whole = hasWhole ? Math.floor(value) : 0;
	let num: number;
	let den: number;
	if (fixed !== undefined) {
		num = Math.round((value - whole) * fixed);
		den = fixed;
	} else {
		[num, den] = approximateFraction(value - whole, 10 ** Math.max(denText.length, 1) - 1);
	}
	if (hasWhole && num === den) {
		whole += 1;
		num = 0;
	}

	let head = "";
	let wroteWhole = false;
	for (const item of before) {
		if (isPlaceholder(item)) {
			if (!wroteWhole && (whole > 0 || num === 0)) {
				head += String(whole);
			}
			wroteWhole = true;
		} else {
			head += itemText(item);
		}
	}
	if (num === 0) {
		return (hasWhole ? head : head + "0").trim() + after;
	}
	return (head + num + "/" + den + after).trim();
}

function formatNumeric(value: number, items: Item[]): string {
	const percent = items.filter((item) => isCh(item, "%")).length;
	const scaled = value * 100 ** percent;
	const eIdx = items.findIndex((item, i) => isCh(item, "E", "e") && isCh(items[i + 1], "+", "-"));
	if (eIdx !== -1) {
		return formatScientific(scaled, items, eIdx);
	}
	const slash = items.findIndex((item, i) => isCh(item, "/") && isPlaceholder(items[i - 1]));
	if (slash !== -1) {
		return formatFraction(scaled, items, slash);
	}
	return formatFixed(scaled, items);
}

type DateToken =
	| { t: "y" | "M" | "d" | "h" | "m"; n: number }
	| { t: "s"; n: number; frac: number }
	| { t: "elapsed"; unit: "h" | "m" | "s"; n: number; frac: number }
	| { t: "ampm"; text: string }
	| { t: "lit"; text: string };

/** Count `.000` digits following a seconds token */
function fractionDigitsAt(items: Item[], i: number): number {
	if (!isCh(items[i], ".")) {
		return 0;
	}
	let n = 0;
	while (isCh(items[i + 1 + n], "0")) {
		n++;
	}
	return n;
}

function tokenizeDate(items: Item[]): DateToken[] {
	const tokens: DateToken[] = [];
	for (let i = 0; i < items.length; ) {
		const item = items[i];
		if (item.kind === "elapsed") {
			const frac = item.unit === "s" ? fractionDigitsAt(items, i + 1) : 0;
			tokens.push({ t: "elapsed", unit: item.unit, n: item.len, frac });
			i += 1 + (frac > 0 ? frac + 1 : 0);
			continue;
		}
		if (item.kind === "ampm") {
			tokens.push({ t: "ampm", text: item.text });
			i++;
			continue;
		}
		if (item.kind !== "ch") {
			tokens.push({ t: "lit", text: itemText(item) });
			i++;
			continue;
		}
		const lower = item.ch.toLowerCase();
		if (!"ymdhse".includes(lower)) {
			tokens.push({ t: "lit", text: item.ch });
			i++;
			continue;
		}
		let n = 1;
		while (items[i + n]?.kind === "ch" && itemText(items[i + n]).toLowerCase() === lower) {
			n++;
		}
		i += n;
		if (lower === "s") {
			const frac = fractionDigitsAt(items, i);
			tokens.push({ t: "s", n, frac });
			i += frac > 0 ? frac + 1 : 0;
		} else if (lower === "e") {
			tokens.push({ t: "y", n: 4 });
		} else {
			tokens.push({ t: lower === "m" ? "M" : lower === "y" ? "y" : lower === "d" ? "d" : "h", n });
		}
	}

	// m/mm means minutes right after an hour token or right before a seconds token
	const significant = tokens.filter((tok) => tok.t !== "lit");
	significant.forEach((tok, idx) => {
		if (tok.t !== "M" || tok.n > 2) {
			return;
		}
		const prev = significant[idx - 1];
		const next = significant[idx + 1];
		const afterHour = prev !== undefined && (prev.t === "h" || (prev.t === "elapsed" && prev.unit === "h"));
		const beforeSecond = next !== undefined && (next.t === "s" || (next.t === "elapsed" && next.unit === "s"));
		if (afterHour || beforeSecond) {
			tok.t = "m";
		}
	});
	return tokens;
}

const pad2 = (n: number): string => String(n).padStart(2, "0");

function formatDate(serial: number, items: Item[], date1904: boolean): string {
	const tokens = tokenizeDate(items);
	let fractionDigits = 0;
	for (const tok of tokens) {
		if (tok.t === "s" || tok.t === "elapsed") {
			fractionDigits = Math.max(fractionDigits, Math.min(tok.frac, 3));
		}
	}
	const parts = serialToDateParts(serial, date1904, fractionDigits);
	const twelveHour = tokens.some((tok) => tok.t === "ampm");
	const fraction = (digits: number): string =>
		digits > 0 ? "." + String(parts.subseconds).padStart(fractionDigits, "0").slice(0, digits) : "";

	let out = "";
	for (const tok of tokens) {
		switch (tok.t) {
			case "lit":
				out += tok.text;
				break;
			case "y":
				out += tok.n <= 2 ? pad2(parts.year % 100) : String(parts.year).padStart(4, "0");
				break;
			case "M":
				out +=
					tok.n === 1
						? String(parts.month)
						: tok.n === 2
							? pad2(parts.month)
							: tok.n === 3
								? MONTHS[parts.month - 1].slice(0, 3)
								: tok.n === 5
									? MONTHS[parts.month - 1][0]
									: MONTHS[parts.month - 1];
				break;
			case "d":
				out +=
					tok.n === 1
						? String(parts.day)
						: tok.n === 2
							? pad2(parts.day)
							: tok.n === 3
								? DAYS[parts.weekday].slice(0, 3)
								: DAYS[parts.weekday];
				break;
			case "h": {
				const h = twelveHour ? parts.hours % 12 || 12 : parts.hours;
				out += tok.n === 1 ? String(h) : pad2(h);
				break;
			}
			case "m":
				out += tok.n === 1 ? String(parts.minutes) : pad2(parts.minutes);
				break;
			case "s":
				out += (tok.n === 1 ? String(parts.seconds) : pad2(parts.seconds)) + fraction(tok.frac);
				break;
			case "elapsed": {
				const hours = parts.days * 24 + parts.hours;
				const total = tok.unit === "h" ? hours : tok.unit === "m" ? hours * 60 + parts.minutes : (hours * 60 + parts.minutes) * 60 + parts.seconds;
				out += String(total).padStart(tok.n, "0") + (tok.unit === "s" ? fraction(tok.frac) : "");
				break;
			}
			case "ampm":
				if (tok.text === "AM/PM") {
					out += parts.hours < 12 ? "AM" : "PM";
				} else {
					const letter = parts.hours < 12 ? tok.text[0] : tok.text[2];
					out += letter;
				}
				break;
		}
	}
	return out;
}

function pickSection(sections: Section[], value: number): { section?: Section; v: number; negate: boolean } {
	if (sections.some((s) => s.condition)) {
		for (const s of sections) {
			if (s.condition && testCondition(s.condition, value)) {
				return { section: s, v: Math.abs(value), negate: value < 0 };
			}
		}
		const fallback = sections.find((s, i) => i > 0 && !s.condition && !(s.hasText && !s.isDate));
		return { section: fallback, v: Math.abs(value), negate: value < 0 };
	}
	const numeric = Math.min(sections.length, 3);
	if (value < 0 && numeric >= 2) {
		return { section: sections[1], v: -value, negate: false };
	}
	if (value === 0 && numeric >= 3) {
		return { section: sections[2], v: 0, negate: false };
	}
	return { section: sections[0], v: Math.abs(value), negate: value < 0 };
}

/** Render a number with a compiled format */
export function formatCompiled(format: CompiledFormat, value: number, date1904 = false): FormattedValue {
	if (!Number.isFinite(value)) {
		return { text: String(value) };
	}
	const { section, v, negate } = pickSection(format.sections, value);
	if (!section || (section.hasText && !section.isDate && !section.items.some(isPlaceholder))) {
		return { text: formatGeneral(value), color: section?.color };
	}
	const color = section.color;
	if (section.isDate) {
		if (value < 0 || value > MAX_DATE_SERIAL) {
			return { text: formatGeneral(value), color };
		}
		return { text: formatDate(value, section.items, date1904), color };
	}
	if (section.items.some((item) => item.kind === "general")) {
		const text = section.items.map((item) => (item.kind === "general" ? formatGeneral(v) : itemText(item))).join("");
		return { text: (negate ? "-" : "") + text, color };
	}
	return { text: (negate ? "-" : "") + formatNumeric(v, section.items), color };
}

/**
 * Format a number with an Excel format code.
 * @param date1904 - serials count from 1904-01-01 instead of 1900-01-00
 */
export function formatNumber(value: number, formatCode: string, date1904 = false): string {
	return formatCompiled(compileFormat(formatCode), value, date1904).text;
}

/**
 * Format a string with the text section of a format code: the fourth section,
 * or a first section containing `@`. Other codes leave the text unchanged.
 */
export function formatText(text: string, formatCode: string | CompiledFormat): string {
	const { sections } = typeof formatCode === "string" ? compileFormat(formatCode) : formatCode;
	const section = sections.length >= 4 ? sections[3] : sections[0].hasText ? sections[0] : undefined;
	if (!section) {
		return text;
	}
	return section.items.map((item) => (item.kind === "text" ? text : itemText(item))).join("");
}
