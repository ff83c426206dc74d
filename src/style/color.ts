import { readFileSync } from "node:fs";

/**
 * A color reference as written in SpreadsheetML (`<color>`, `<fgColor>`, `<tabColor>`, ...).
 * Several fields may be present; resolution prefers rgb, then theme, then indexed.
 */
export interface ColorSpec {
	/** `AARRGGBB` or `RRGGBB` */
	rgb?: string;
	theme?: number;
	indexed?: number;
	/** -1 (darken to black) to 1 (lighten to white) */
	tint?: number;
	auto?: boolean;
}

/** Palettes a color reference is resolved against */
export interface ColorContext {
	/** Theme colors in SpreadsheetML slot order */
	themeColors: readonly string[];
	/** Workbook `<indexedColors>` override of the legacy palette */
	indexedColors?: readonly string[];
}

/** Office default theme: lt1, dk1, lt2, dk2, accent1-6, hlink, folHlink */
export const DEFAULT_THEME_COLORS: readonly string[] = [
	"#FFFFFF",
	"#000000",
	"#E7E6E6",
	"#44546A",
	"#4472C4",
	"#ED7D31",
	"#A5A5A5",
	"#FFC000",
	"#5B9BD5",
	"#70AD47",
	"#0563C1",
	"#954F72",
];

/** System foreground (64) and background (65) of the indexed palette */
const SYSTEM_FOREGROUND = "#000000";
const SYSTEM_BACKGROUND = "#FFFFFF";

const hexRegex = /^#[0-9A-F]{6}$/;

let indexedTable: readonly string[] | undefined;

/** The legacy 64-entry indexed palette, read once from the data directory */
export function defaultIndexedColors(): readonly string[] {
	if (indexedTable === undefined) {
		const raw: unknown = JSON.parse(readFileSync(new URL("../../data/indexed-colors.json", import.meta.url), "utf8"));
		if (!Array.isArray(raw) || raw.length !== 64) {
			throw new Error("data/indexed-colors.json must hold 64 colors");
		}
		const colors: string[] = [];
		for (const entry of raw) {
			if (typeof entry !== "string" || !hexRegex.test(entry)) {
				throw new Error(`data/indexed-colors.json has an invalid color: ${String(entry)}`);
			}
			colors.push(entry);
		}
		indexedTable = colors;
	}
	return indexedTable;
}

/** Normalize `AARRGGBB`, `RRGGBB` or `#RRGGBB` to `#RRGGBB`; undefined when malformed */
export function normalizeRgb(value: string): string | undefined {
	const hex = value.replace(/^#/, "").toUpperCase();
	if (/^[0-9A-F]{8}$/.test(hex)) {
		return "#" + hex.slice(2);
	}
	return /^[0-9A-F]{6}$/.test(hex) ? "#" + hex : undefined;
}

function rgbToHsl(r: number, g: number, b: number): [number, number, number] {
	const max = Math.max(r, g, b);
	const min = Math.min(r, g, b);
	const l = (max + min) / 2;
	if (max === min) {
		return [0, 0, l];
	}
	const d = max - min;
	const s = l > 0.5 ? d / (2 - max - min) : d / (max + min);
	let h: number;
	if (max === r) {
		h = (g - b) / d + (g < b ? 6 : 0);
	} else if (max === g) {
		h = (b - r) / d + 2;
	} else {
		h = (r - g) / d + 4;
	}
	return [h / 6, s, l];
}

function hueToRgb(p: number, q: number, t: number): number {
	if (t < 0) {
		t += 1;
	}
	if (t > 1) {
		t -= 1;
	}
	if (t < 1 / 6) {
		return p + (q - p) * 6 * t;
	}
	if (t < 1 / 2) {
		return q;
	}
	if (t < 2 / 3) {
		return p + (q - p) * (2 / 3 - t) * 6;
	}
	return p;
}

function hslToRgb(h: number, s: number, l: number): [number, number, number] {
	if (s === 0) {
		return [l, l, l];
	}
	const q = l < 0.5 ? l * (1 + s) : l + s - l * s;
	const p = 2 * l - q;
	return [hueToRgb(p, q, h + 1 / 3), hueToRgb(p, q, h), hueToRgb(p, q, h - 1 / 3)];
}

const toHex = (channel: number): string =>
	Math.round(Math.min(1, Math.max(0, channel)) * 255)
		.toString(16)
		.toUpperCase()
		.padStart(2, "0");

/**
 * Lighten (tint > 0) or darken (tint < 0) a `#RRGGBB` color in HSL luminance.
 */
export function applyTint(hex: string, tint: number): string {
	if (tint === 0) {
		return hex;
	}
	const r = parseInt(hex.slice(1, 3), 16) / 255;
	const g = parseInt(hex.slice(3, 5), 16) / 255;
	const b = parseInt(hex.slice(5, 7), 16) / 255;
	const [h, s, l] = rgbToHsl(r, g, b);
	const lum = tint < 0 ? l * (1 + tint) : l + (1 - l) * tint;
	const [r2, g2, b2] = hslToRgb(h, s, lum);
	return "#" + toHex(r2) + toHex(g2) + toHex(b2);
}

function indexedColor(index: number, ctx: ColorContext): string | undefined {
	const custom = ctx.indexedColors;
	if (custom && index >= 0 && index < custom.length) {
		return custom[index];
	}
	if (index === 64) {
		return SYSTEM_FOREGROUND;
	}
	if (index === 65) {
		return SYSTEM_BACKGROUND;
	}
	return defaultIndexedColors()[index];
}

/**
 * Resolve a color reference to `#RRGGBB`.
 * @returns undefined for automatic colors and references that resolve to nothing
 */
export function resolveColor(spec: ColorSpec | undefined, ctx: ColorContext): string | undefined {
	if (!spec) {
		return undefined;
	}
	let base: string | undefined;
	if (spec.rgb !== undefined) {
		base = normalizeRgb(spec.rgb);
	}
	if (base === undefined && spec.theme !== undefined) {
		base = ctx.themeColors[spec.theme] ?? DEFAULT_THEME_COLORS[spec.theme];
	}
	if (base === undefined && spec.indexed !== undefined) {
		base = indexedColor(spec.indexed, ctx);
	}
	if (base === undefined) {
		return undefined;
	}
	return spec.tint ? applyTint(base, spec.tint) : base;
}
