import { describe, it, expect } from "vitest";
import { applyTint, DEFAULT_THEME_COLORS, defaultIndexedColors, normalizeRgb, resolveColor } from "./color.js";

const ctx = { themeColors: DEFAULT_THEME_COLORS };

describe("normalizeRgb", () => {
	it("drops the alpha channel and uppercases", () => {
		expect(normalizeRgb("FF112233")).toBe("#112233");
		expect(normalizeRgb("aabbcc")).toBe("#AABBCC");
		expect(normalizeRgb("#0a0B0c")).toBe("#0A0B0C");
	});

	it("rejects malformed values", () => {
		expect(normalizeRgb("12345")).toBeUndefined();
		expect(normalizeRgb("GG0000")).toBeUndefined();
	});
});

describe("applyTint", () => {
	it("lightens toward white", () => {
		expect(applyTint("#000000", 0.5)).toBe("#808080");
		expect(applyTint("#000000", 1)).toBe("#FFFFFF");
	});

	it("darkens toward black", () => {
		expect(applyTint("#FFFFFF", -0.5)).toBe("#808080");
		expect(applyTint("#FF0000", -1)).toBe("#000000");
	});

	it("keeps hue and saturation", () => {
		// red has l = 0.5; +0.5 tint gives l = 0.75
		expect(applyTint("#FF0000", 0.5)).toBe("#FF8080");
	});

	it("returns the input for zero tint", () => {
		expect(applyTint("#123456", 0)).toBe("#123456");
	});
});

describe("resolveColor", () => {
	it("prefers rgb over theme and indexed", () => {
		expect(resolveColor({ rgb: "FF112233", theme: 4, indexed: 2 }, ctx)).toBe("#112233");
	});

	it("looks up theme slots", () => {
		expect(resolveColor({ theme: 1 }, ctx)).toBe("#000000");
		expect(resolveColor({ theme: 4 }, ctx)).toBe("#4472C4");
		expect(resolveColor({ theme: 1, tint: 0.5 }, ctx)).toBe("#808080");
	});

	it("falls back to the default theme for missing slots", () => {
		expect(resolveColor({ theme: 10 }, { themeColors: ["#FFFFFF", "#000000"] })).toBe("#0563C1");
	});

	it("looks up the legacy indexed palette", () => {
		expect(resolveColor({ indexed: 2 }, ctx)).toBe("#FF0000");
		expect(resolveColor({ indexed: 64 }, ctx)).toBe("#000000");
		expect(resolveColor({ indexed: 65 }, ctx)).toBe("#FFFFFF");
		expect(resolveColor({ indexed: 99 }, ctx)).toBeUndefined();
	});

	it("prefers a workbook palette for indexed colors", () => {
		expect(resolveColor({ indexed: 1 }, { ...ctx, indexedColors: ["#000000", "#ABCDEF"] })).toBe("#ABCDEF");
	});

	it("treats automatic colors and empty specs as absent", () => {
		expect(resolveColor({ auto: true }, ctx)).toBeUndefined();
		expect(resolveColor(undefined, ctx)).toBeUndefined();
	});
});

describe("defaultIndexedColors", () => {
	it("holds the 64 legacy colors", () => {
		const colors = defaultIndexedColors();
		expect(colors).toHaveLength(64);
		expect(colors[0]).toBe("#000000");
		expect(colors[1]).toBe("#FFFFFF");
	});
});
