import { expectRoot, forEachXmlTag } from "../xml/parser.js";
import { DEFAULT_THEME_COLORS, normalizeRgb } from "../style/color.js";
import type { Theme } from "../types.js";

/** Office default theme, used when the package has no theme part */
export function defaultTheme(): Theme {
	return { colors: [...DEFAULT_THEME_COLORS], majorFont: "Calibri Light", minorFont: "Calibri" };
}

// clrScheme children by SpreadsheetML slot: light before dark
const SLOTS: Record<string, number> = {
	lt1: 0,
	dk1: 1,
	lt2: 2,
	dk2: 3,
	accent1: 4,
	accent2: 5,
	accent3: 6,
	accent4: 7,
	accent5: 8,
	accent6: 9,
	hlink: 10,
	folHlink: 11,
};

/** Parse `xl/theme/theme1.xml`; slots the part leaves out keep the Office defaults */
export function parseTheme(data: string, part = "xl/theme/theme1.xml"): Theme {
	expectRoot(data, part, "theme");
	const theme = defaultTheme();
	let slot: number | undefined;
	let fontKind: "majorFont" | "minorFont" | undefined;

	forEachXmlTag(data, part, (tag) => {
		const { name, kind, attrs } = tag;
		if (kind === "close") {
			if (SLOTS[name] !== undefined) {
				slot = undefined;
			}
			if (name === fontKind) {
				fontKind = undefined;
			}
			return;
		}
		if (kind === "open" && Object.hasOwn(SLOTS, name)) {
			slot = SLOTS[name];
			return;
		}
		if (name === "majorFont" || name === "minorFont") {
			fontKind = kind === "open" ? name : undefined;
			return;
		}
		if (slot !== undefined && (name === "srgbClr" || name === "sysClr")) {
			const rgb = normalizeRgb((name === "sysClr" ? attrs.lastClr : undefined) ?? attrs.val ?? "");
			if (rgb) {
				theme.colors[slot] = rgb;
			}
			return;
		}
		if (fontKind && name === "latin" && attrs.typeface) {
			theme[fontKind] = attrs.typeface;
		}
	});
	return theme;
}
