/**
 * Built-in number formats defined by ECMA-376 (Part 1, 18.8.30).
 *
 * IDs 5-8, 23-36 and 50-58 are locale-dependent and not part of the table;
 * they resolve through {@link DEFAULT_FORMAT_MAP}.
 */
export const BUILTIN_FORMATS: Readonly<Record<number, string>> = {
	0: "General",
	1: "0",
	2: "0.00",
	3: "#,##0",
	4: "#,##0.00",
	9: "0%",
	10: "0.00%",
	11: "0.00E+00",
	12: "# ?/?",
	13: "# ??/??",
	14: "m/d/yy",
	15: "d-mmm-yy",
	16: "d-mmm",
	17: "mmm-yy",
	18: "h:mm AM/PM",
	19: "h:mm:ss AM/PM",
	20: "h:mm",
	21: "h:mm:ss",
	22: "m/d/yy h:mm",
	37: "#,##0 ;(#,##0)",
	38: "#,##0 ;[Red](#,##0)",
	39: "#,##0.00;(#,##0.00)",
	40: "#,##0.00;[Red](#,##0.00)",
	41: '_(* #,##0_);_(* (#,##0);_(* "-"_);_(@_)',
	42: '_($* #,##0_);_($* (#,##0);_($* "-"_);_(@_)',
	43: '_(* #,##0.00_);_(* (#,##0.00);_(* "-"??_);_(@_)',
	44: '_($* #,##0.00_);_($* (#,##0.00);_($* "-"??_);_(@_)',
	45: "mm:ss",
	46: "[h]:mm:ss",
	47: "mmss.0",
	48: "##0.0E+0",
	49: "@",
};

/**
 * Mapping from locale-dependent format IDs to their base-table equivalents.
 *
 * Accounting formats 5-8 map to the parenthesized number formats 37-40,
 * CJK formats 23-26 to General, and locale date formats 27-36 and 50-58
 * to the short date (14).
 */
export const DEFAULT_FORMAT_MAP: Readonly<Record<number, number>> = {
	5: 37,
	6: 38,
	7: 39,
	8: 40,
	23: 0,
	24: 0,
	25: 0,
	26: 0,
	27: 14,
	28: 14,
	29: 14,
	30: 14,
	31: 14,
	32: 14,
	33: 14,
	34: 14,
	35: 14,
	36: 14,
	50: 14,
	51: 14,
	52: 14,
	53: 14,
	54: 14,
	55: 14,
	56: 14,
	57: 14,
	58: 14,
};

/**
 * Look up the format code for a number format id.
 *
 * Custom codes from the workbook's `<numFmts>` win over the built-in table;
 * unknown ids fall back to `General`.
 */
export function getFormatCode(numFmtId: number, customFormats?: ReadonlyMap<number, string>): string {
	const custom = customFormats?.get(numFmtId);
	if (custom !== undefined) {
		return custom;
	}
	if (numFmtId in BUILTIN_FORMATS) {
		return BUILTIN_FORMATS[numFmtId];
	}
	if (numFmtId in DEFAULT_FORMAT_MAP) {
		return BUILTIN_FORMATS[DEFAULT_FORMAT_MAP[numFmtId]];
	}
	return "General";
}
