import { expectRoot, forEachXmlTag, parseOptionalBoolean, parseXmlBoolean, parseXmlInt, parseXmlNumber, type XmlAttributes, type XmlTag } from "../xml/parser.js";
import { normalizeRgb, type ColorSpec } from "../style/color.js";
import type { UnderlineStyle, VerticalTextAlignment } from "../types.js";

/** A `<font>` or rich text `<rPr>` as written; absent fields take ECMA defaults later */
export interface RawFont {
	name?: string;
	size?: number;
	color?: ColorSpec;
	bold?: boolean;
	italic?: boolean;
	underline?: UnderlineStyle;
	strike?: boolean;
	vertAlign?: VerticalTextAlignment;
	/** `major` or `minor` binds the typeface to the theme fonts */
	scheme?: string;
}

export interface RawGradientStop {
	position: number;
	color: ColorSpec;
}

export interface RawGradient {
	type: "linear" | "path";
	degree: number;
	left: number;
	right: number;
	top: number;
	bottom: number;
	stops: RawGradientStop[];
}

export interface RawFill {
	/** Absent inside a dxf means solid */
	patternType?: string;
	fgColor?: ColorSpec;
	bgColor?: ColorSpec;
	gradient?: RawGradient;
}

export interface RawBorderEdge {
	style?: string;
	color?: ColorSpec;
}

export type BorderEdgeName = "left" | "right" | "top" | "bottom" | "diagonal";

export interface RawBorder {
	left?: RawBorderEdge;
	right?: RawBorderEdge;
	top?: RawBorderEdge;
	bottom?: RawBorderEdge;
	diagonal?: RawBorderEdge;
	diagonalUp?: boolean;
	diagonalDown?: boolean;
}

export interface RawAlignment {
	horizontal?: string;
	vertical?: string;
	wrapText?: boolean;
	shrinkToFit?: boolean;
	textRotation?: number;
	indent?: number;
	readingOrder?: number;
}

export interface RawProtection {
	locked?: boolean;
	hidden?: boolean;
}

/** One `<xf>` of cellXfs or cellStyleXfs */
export interface RawXf {
	numFmtId?: number;
	fontId?: number;
	fillId?: number;
	borderId?: number;
	/** Parent cellStyleXfs entry (cellXfs only) */
	xfId?: number;
	applyNumberFormat?: boolean;
	applyFont?: boolean;
	applyFill?: boolean;
	applyBorder?: boolean;
	applyAlignment?: boolean;
	applyProtection?: boolean;
	alignment?: RawAlignment;
	protection?: RawProtection;
}

/** A differential format from `<dxfs>` */
export interface RawDxf {
	font?: RawFont;
	fill?: RawFill;
	border?: RawBorder;
	numFmt?: { id?: number; code: string };
}

export interface RawCellStyle {
	name: string;
	xfId: number;
	builtinId?: number;
}

/** Everything `xl/styles.xml` declares, unresolved */
export interface StyleSheet {
	numFmts: Map<number, string>;
	fonts: RawFont[];
	fills: RawFill[];
	borders: RawBorder[];
	cellStyleXfs: RawXf[];
	cellXfs: RawXf[];
	cellStyles: RawCellStyle[];
	dxfs: RawDxf[];
	/** Replacement for the legacy indexed palette */
	indexedColors?: string[];
}

export function emptyStyleSheet(): StyleSheet {
	return { numFmts: new Map(), fonts: [], fills: [], borders: [], cellStyleXfs: [], cellXfs: [], cellStyles: [], dxfs: [] };
}

/** Read the attributes of a `<color>`-like element */
export function parseColorSpec(attrs: XmlAttributes): ColorSpec | undefined {
	const spec: ColorSpec = {};
	if (attrs.rgb !== undefined) {
		spec.rgb = attrs.rgb;
	}
	const theme = parseXmlInt(attrs.theme);
	if (theme !== undefined) {
		spec.theme = theme;
	}
	const indexed = parseXmlInt(attrs.indexed);
	if (indexed !== undefined) {
		spec.indexed = indexed;
	}
	const tint = parseXmlNumber(attrs.tint);
	if (tint !== undefined && tint !== 0) {
		spec.tint = tint;
	}
	if (parseXmlBoolean(attrs.auto)) {
		spec.auto = true;
	}
	return Object.keys(spec).length > 0 ? spec : undefined;
}

const UNDERLINES: readonly UnderlineStyle[] = ["none", "single", "double", "singleAccounting", "doubleAccounting"];
const VERT_ALIGNS: readonly VerticalTextAlignment[] = ["baseline", "superscript", "subscript"];

/**
 * Apply one child element of `<font>` or `<rPr>` to a font.
 * @returns false when the tag is not a font property
 */
export function applyFontProperty(font: RawFont, tag: XmlTag): boolean {
	const { val } = tag.attrs;
	switch (tag.name) {
		case "name":
		case "rFont":
			if (val !== undefined) {
				font.name = val;
			}
			return true;
		case "sz": {
			const size = parseXmlNumber(val);
			if (size !== undefined) {
				font.size = size;
			}
			return true;
		}
		case "b":
			font.bold = parseXmlBoolean(val, true);
			return true;
		case "i":
			font.italic = parseXmlBoolean(val, true);
			return true;
		case "strike":
			font.strike = parseXmlBoolean(val, true);
			return true;
		case "u":
			font.underline = UNDERLINES.find((u) => u === (val ?? "single")) ?? "single";
			return true;
		case "vertAlign":
			font.vertAlign = VERT_ALIGNS.find((v) => v === val);
			return true;
		case "scheme":
			font.scheme = val;
			return true;
		case "color":
			font.color = parseColorSpec(tag.attrs);
			return true;
	}
	return false;
}

function parseXf(attrs: XmlAttributes): RawXf {
	return {
		numFmtId: parseXmlInt(attrs.numFmtId),
		fontId: parseXmlInt(attrs.fontId),
		fillId: parseXmlInt(attrs.fillId),
		borderId: parseXmlInt(attrs.borderId),
		xfId: parseXmlInt(attrs.xfId),
		applyNumberFormat: parseOptionalBoolean(attrs.applyNumberFormat),
		applyFont: parseOptionalBoolean(attrs.applyFont),
		applyFill: parseOptionalBoolean(attrs.applyFill),
		applyBorder: parseOptionalBoolean(attrs.applyBorder),
		applyAlignment: parseOptionalBoolean(attrs.applyAlignment),
		applyProtection: parseOptionalBoolean(attrs.applyProtection),
	};
}

function isEdgeName(name: string): BorderEdgeName | undefined {
	switch (name) {
		case "left":
		case "start":
			return "left";
		case "right":
		case "end":
			return "right";
		case "top":
		case "bottom":
		case "diagonal":
			return name;
	}
	return undefined;
}

/**
 * Decode `xl/styles.xml`.
 * @throws XmlParseError when the part is not a balanced `<styleSheet>` document
 */
export function parseStyleSheet(data: string, part = "xl/styles.xml"): StyleSheet {
	expectRoot(data, part, "styleSheet");
	const sheet = emptyStyleSheet();
	const stack: string[] = [];
	let font: RawFont | undefined;
	let fill: RawFill | undefined;
	let gradientStop: number | undefined;
	let border: RawBorder | undefined;
	let edge: RawBorderEdge | undefined;
	let xf: RawXf | undefined;
	let dxf: RawDxf | undefined;

	const open = (tag: XmlTag): void => {
		const { name, attrs } = tag;
		const section = stack[1];
		const parent = stack[stack.length - 1];
		if (font && applyFontProperty(font, tag)) {
			return;
		}
		switch (name) {
			case "numFmt": {
				const id = parseXmlInt(attrs.numFmtId);
				const code = attrs.formatCode ?? "";
				if (dxf) {
					dxf.numFmt = { id, code };
				} else if (id !== undefined) {
					sheet.numFmts.set(id, code);
				}
				break;
			}
			case "font":
				font = {};
				break;
			case "fill":
				fill = {};
				break;
			case "patternFill":
				if (fill && attrs.patternType !== undefined) {
					fill.patternType = attrs.patternType;
				}
				break;
			case "fgColor":
			case "bgColor":
				if (fill && parent === "patternFill") {
					fill[name] = parseColorSpec(attrs);
				}
				break;
			case "gradientFill":
				if (fill) {
					fill.gradient = {
						type: attrs.type === "path" ? "path" : "linear",
						degree: parseXmlNumber(attrs.degree) ?? 0,
						left: parseXmlNumber(attrs.left) ?? 0,
						right: parseXmlNumber(attrs.right) ?? 0,
						top: parseXmlNumber(attrs.top) ?? 0,
						bottom: parseXmlNumber(attrs.bottom) ?? 0,
						stops: [],
					};
				}
				break;
			case "stop":
				gradientStop = parseXmlNumber(attrs.position) ?? 0;
				break;
			case "color": {
				const color = parseColorSpec(attrs);
				if (gradientStop !== undefined && fill?.gradient && color) {
					fill.gradient.stops.push({ position: gradientStop, color });
				} else if (edge) {
					edge.color = color;
				}
				break;
			}
			case "border":
				border = {
					diagonalUp: parseOptionalBoolean(attrs.diagonalUp),
					diagonalDown: parseOptionalBoolean(attrs.diagonalDown),
				};
				break;
			case "xf":
				if (section === "cellXfs" || section === "cellStyleXfs") {
					xf = parseXf(attrs);
				}
				break;
			case "alignment":
				if (xf) {
					xf.alignment = {
						horizontal: attrs.horizontal,
						vertical: attrs.vertical,
						wrapText: parseOptionalBoolean(attrs.wrapText),
						shrinkToFit: parseOptionalBoolean(attrs.shrinkToFit),
						textRotation: parseXmlInt(attrs.textRotation),
						indent: parseXmlInt(attrs.indent),
						readingOrder: parseXmlInt(attrs.readingOrder),
					};
				}
				break;
			case "protection":
				if (xf) {
					xf.protection = { locked: parseOptionalBoolean(attrs.locked), hidden: parseOptionalBoolean(attrs.hidden) };
				}
				break;
			case "cellStyle":
				sheet.cellStyles.push({
					name: attrs.name ?? "",
					xfId: parseXmlInt(attrs.xfId) ?? 0,
					builtinId: parseXmlInt(attrs.builtinId),
				});
				break;
			case "dxf":
				dxf = {};
				break;
			case "rgbColor":
				if (section === "colors" && parent === "indexedColors") {
					const rgb = normalizeRgb(attrs.rgb ?? "");
					(sheet.indexedColors ??= []).push(rgb ?? "#000000");
				}
				break;
			default:
				if (border && isEdgeName(name)) {
					edge = { style: attrs.style };
				}
		}
	};

	const close = (name: string): void => {
		const section = stack[1];
		switch (name) {
			case "font":
				if (font) {
					if (dxf) {
						dxf.font = font;
					} else if (section === "fonts") {
						sheet.fonts.push(font);
					}
				}
				font = undefined;
				break;
			case "fill":
				if (fill) {
					if (dxf) {
						dxf.fill = fill;
					} else if (section === "fills") {
						sheet.fills.push(fill);
					}
				}
				fill = undefined;
				break;
			case "stop":
				gradientStop = undefined;
				break;
			case "border":
				if (border) {
					if (dxf) {
						dxf.border = border;
					} else if (section === "borders") {
						sheet.borders.push(border);
					}
				}
				border = undefined;
				break;
			case "xf":
				if (xf) {
					(section === "cellXfs" ? sheet.cellXfs : sheet.cellStyleXfs).push(xf);
				}
				xf = undefined;
				break;
			case "dxf":
				if (dxf) {
					sheet.dxfs.push(dxf);
				}
				dxf = undefined;
				break;
			default: {
				const edgeName = border && edge ? isEdgeName(name) : undefined;
				if (border && edge && edgeName) {
					border[edgeName] = edge;
					edge = undefined;
				}
			}
		}
	};

	forEachXmlTag(data, part, (tag) => {
		if (tag.kind === "close") {
			stack.pop();
			close(tag.name);
			return;
		}
		open(tag);
		if (tag.kind === "open") {
			stack.push(tag.name);
		} else {
			// <font/>, <xf .../>, <left/> end where they start
			close(tag.name);
		}
	});
	return sheet;
}
