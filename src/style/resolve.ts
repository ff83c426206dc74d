import { getFormatCode } from "../ssf/table.js";
import { silentLogger, type Logger } from "../logger.js";
import { resolveColor, type ColorContext, type ColorSpec } from "./color.js";
import type { RawAlignment, RawBorder, RawBorderEdge, RawDxf, RawFill, RawFont, RawProtection, RawXf, StyleSheet } from "../xlsx/styles.js";
import type { BorderEdge, DxfStyle, HorizontalAlignment, RunFont, Style, Theme, VerticalAlignment } from "../types.js";

const HORIZONTAL: readonly HorizontalAlignment[] = ["general", "left", "center", "right", "fill", "justify", "centerContinuous", "distributed"];
const VERTICAL: readonly VerticalAlignment[] = ["top", "center", "bottom", "justify", "distributed"];

type Category = "font" | "fill" | "border" | "numFmt" | "alignment" | "protection";

/** Whether an xf entry's own value replaces the inherited one */
function shouldApply(flag: boolean | undefined, present: boolean): boolean {
	return flag ?? present;
}

/**
 * Resolves `cellXfs` indices of one stylesheet into final {@link Style} values.
 *
 * Each index is resolved once; cells sharing an index share the same object.
 * Indices that point past the end of a collection fall back to that collection's
 * first entry and are logged at `warn`.
 */
export class StyleResolver {
	private readonly cache = new Map<number, Style>();
	private readonly colorContext: ColorContext;
	private defaults: Style | undefined;

	constructor(
		private readonly styles: StyleSheet,
		private readonly theme: Theme,
		private readonly logger: Logger = silentLogger(),
	) {
		this.colorContext = { themeColors: theme.colors, indexedColors: styles.indexedColors };
	}

	get size(): number {
		return this.styles.cellXfs.length;
	}

	color(spec: ColorSpec | undefined): string | undefined {
		return resolveColor(spec, this.colorContext);
	}

	/** Final style of a `cellXfs` index */
	resolve(index: number): Style {
		let style = this.cache.get(index);
		if (style) {
			return style;
		}
		const xf = this.styles.cellXfs[index];
		if (xf) {
			const base = xf.xfId !== undefined ? this.resolveBase(xf.xfId, new Set()) : this.baseline();
			style = this.merge(base, xf, false);
		} else {
			this.outOfRange("cellXfs", index);
			style = this.baseline();
		}
		this.cache.set(index, style);
		return style;
	}

	/** Differential format used by conditional formatting rules */
	resolveDxf(index: number): DxfStyle | undefined {
		const dxf = this.styles.dxfs[index];
		return dxf ? this.dxfStyle(dxf) : undefined;
	}

	/** All differential formats, in `dxfId` order */
	resolveDxfs(): DxfStyle[] {
		return this.styles.dxfs.map((dxf) => this.dxfStyle(dxf));
	}

	/** Character formatting of a rich text run; only properties the run sets */
	resolveRunFont(raw: RawFont): RunFont {
		const font: RunFont = {};
		const family = this.fontFamily(raw);
		if (family !== undefined) {
			font.fontFamily = family;
		}
		if (raw.size !== undefined) {
			font.fontSize = raw.size;
		}
		const color = this.color(raw.color);
		if (color !== undefined) {
			font.fontColor = color;
		}
		if (raw.bold !== undefined) {
			font.bold = raw.bold;
		}
		if (raw.italic !== undefined) {
			font.italic = raw.italic;
		}
		if (raw.underline !== undefined) {
			font.underline = raw.underline;
		}
		if (raw.strike !== undefined) {
			font.strikethrough = raw.strike;
		}
		if (raw.vertAlign !== undefined) {
			font.vertAlign = raw.vertAlign;
		}
		return font;
	}

	private outOfRange(category: Category | "cellXfs" | "cellStyleXfs", index: number): void {
		this.logger.warn({ category, index }, "style_index_out_of_range");
	}

	/** Font 0, fill 0, border 0, General, default alignment, locked */
	private baseline(): Style {
		if (!this.defaults) {
			const style: Style = {
				fontFamily: this.theme.minorFont,
				fontSize: 11,
				bold: false,
				italic: false,
				underline: "none",
				strikethrough: false,
				vertAlign: "baseline",
				patternType: "none",
				diagonalUp: false,
				diagonalDown: false,
				wrap: false,
				shrinkToFit: false,
				rotation: 0,
				indent: 0,
				readingOrder: 0,
				locked: true,
				hidden: false,
				numFmtId: 0,
				numberFormat: "General",
			};
			this.applyFont(style, 0);
			this.applyFill(style, 0);
			this.applyBorder(style, 0);
			this.defaults = style;
		}
		return { ...this.defaults };
	}

	/** Resolve a cellStyleXfs entry; in these every category applies unless disabled */
	private resolveBase(index: number, visiting: Set<number>): Style {
		const xf = this.styles.cellStyleXfs[index];
		if (!xf) {
			this.outOfRange("cellStyleXfs", index);
			return this.baseline();
		}
		visiting.add(index);
		const parent = xf.xfId;
		const base = parent !== undefined && parent !== index && !visiting.has(parent) ? this.resolveBase(parent, visiting) : this.baseline();
		return this.merge(base, xf, true);
	}

	private merge(base: Style, xf: RawXf, applyByDefault: boolean): Style {
		const style: Style = { ...base };
		const present = (id: number | undefined): boolean => applyByDefault || (id !== undefined && id !== 0);
		if (shouldApply(xf.applyFont, present(xf.fontId))) {
			this.applyFont(style, xf.fontId ?? 0);
		}
		if (shouldApply(xf.applyFill, present(xf.fillId))) {
			this.applyFill(style, xf.fillId ?? 0);
		}
		if (shouldApply(xf.applyBorder, present(xf.borderId))) {
			this.applyBorder(style, xf.borderId ?? 0);
		}
		if (shouldApply(xf.applyNumberFormat, present(xf.numFmtId))) {
			this.applyNumFmt(style, xf.numFmtId ?? 0);
		}
		if (shouldApply(xf.applyAlignment, applyByDefault || xf.alignment !== undefined)) {
			applyAlignment(style, xf.alignment ?? {});
		}
		if (shouldApply(xf.applyProtection, applyByDefault || xf.protection !== undefined)) {
			applyProtection(style, xf.protection ?? {});
		}
		return style;
	}

	private entry<T>(list: readonly T[], category: Category, index: number): T | undefined {
		if (index >= 0 && index < list.length) {
			return list[index];
		}
		if (list.length > 0) {
			this.outOfRange(category, index);
		}
		return list[0];
	}

	private fontFamily(raw: RawFont): string | undefined {
		if (raw.scheme === "minor") {
			return this.theme.minorFont;
		}
		if (raw.scheme === "major") {
			return this.theme.majorFont;
		}
		return raw.name;
	}

	private applyFont(style: Style, index: number): void {
		const font = this.entry(this.styles.fonts, "font", index);
		if (!font) {
			return;
		}
		style.fontFamily = this.fontFamily(font) ?? this.theme.minorFont;
		style.fontSize = font.size ?? 11;
		style.fontColor = this.color(font.color);
		style.bold = font.bold ?? false;
		style.italic = font.italic ?? false;
		style.underline = font.underline ?? "none";
		style.strikethrough = font.strike ?? false;
		style.vertAlign = font.vertAlign ?? "baseline";
	}

	private applyFill(style: Style, index: number): void {
		const fill: RawFill | undefined = this.entry(this.styles.fills, "fill", index);
		style.patternType = fill?.patternType ?? "none";
		style.bgColor = undefined;
		style.fgColor = undefined;
		style.gradient = undefined;
		if (!fill) {
			return;
		}
		if (fill.gradient) {
			const { stops, ...geometry } = fill.gradient;
			style.gradient = {
				...geometry,
				stops: stops.flatMap((stop) => {
					const color = this.color(stop.color);
					return color === undefined ? [] : [{ position: stop.position, color }];
				}),
			};
			return;
		}
		if (style.patternType === "solid") {
			style.bgColor = this.color(fill.fgColor) ?? this.color(fill.bgColor);
		} else if (style.patternType !== "none") {
			style.fgColor = this.color(fill.fgColor);
			style.bgColor = this.color(fill.bgColor);
		}
	}

	private edge(raw: RawBorderEdge | undefined): BorderEdge | undefined {
		if (!raw?.style || raw.style === "none") {
			return undefined;
		}
		const color = this.color(raw.color);
		return color === undefined ? { style: raw.style } : { style: raw.style, color };
	}

	private applyBorder(style: Style, index: number): void {
		const border: RawBorder | undefined = this.entry(this.styles.borders, "border", index);
		style.borderTop = this.edge(border?.top);
		style.borderRight = this.edge(border?.right);
		style.borderBottom = this.edge(border?.bottom);
		style.borderLeft = this.edge(border?.left);
		style.borderDiagonal = this.edge(border?.diagonal);
		style.diagonalUp = border?.diagonalUp ?? false;
		style.diagonalDown = border?.diagonalDown ?? false;
	}

	private applyNumFmt(style: Style, id: number): void {
		if (id >= 164 && !this.styles.numFmts.has(id)) {
			this.logger.warn({ numFmtId: id }, "number_format_missing");
		}
		style.numFmtId = id;
		style.numberFormat = getFormatCode(id, this.styles.numFmts);
	}

	private dxfStyle(dxf: RawDxf): DxfStyle {
		const out: DxfStyle = {};
		if (dxf.font) {
			const font = this.resolveRunFont(dxf.font);
			if (font.fontColor !== undefined) {
				out.fontColor = font.fontColor;
			}
			if (font.bold !== undefined) {
				out.bold = font.bold;
			}
			if (font.italic !== undefined) {
				out.italic = font.italic;
			}
			if (font.underline !== undefined) {
				out.underline = font.underline;
			}
			if (font.strikethrough !== undefined) {
				out.strikethrough = font.strikethrough;
			}
		}
		if (dxf.fill) {
			// dxf solid fills conventionally carry their color in bgColor
			const fillColor = this.color(dxf.fill.bgColor) ?? this.color(dxf.fill.fgColor);
			if (fillColor !== undefined) {
				out.fillColor = fillColor;
			}
		}
		if (dxf.border) {
			const { left, right, top, bottom } = dxf.border;
			const edge = [top, right, bottom, left].find((e) => e?.style && e.style !== "none");
			if (edge?.style) {
				out.borderStyle = edge.style;
				const color = this.color(edge.color);
				if (color !== undefined) {
					out.borderColor = color;
				}
			}
		}
		if (dxf.numFmt) {
			out.numberFormat = dxf.numFmt.code || getFormatCode(dxf.numFmt.id ?? 0, this.styles.numFmts);
		}
		return out;
	}
}

function applyAlignment(style: Style, raw: RawAlignment): void {
	const horizontal = HORIZONTAL.find((h) => h === raw.horizontal);
	style.alignH = horizontal === "general" ? undefined : horizontal;
	style.alignV = VERTICAL.find((v) => v === raw.vertical);
	style.wrap = raw.wrapText ?? false;
	style.shrinkToFit = !style.wrap && (raw.shrinkToFit ?? false);
	const rotation = raw.textRotation ?? 0;
	style.rotation = (rotation >= 0 && rotation <= 180) || rotation === 255 ? rotation : 0;
	style.indent = Math.max(0, raw.indent ?? 0);
	style.readingOrder = raw.readingOrder === 1 || raw.readingOrder === 2 ? raw.readingOrder : 0;
}

function applyProtection(style: Style, raw: RawProtection): void {
	style.locked = raw.locked ?? true;
	style.hidden = raw.hidden ?? false;
}
