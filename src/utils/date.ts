const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Largest serial Excel displays as a date (9999-12-31) */
export const MAX_DATE_SERIAL = 2958465;

/** Calendar and clock fields of a serial date */
export interface DateParts {
	/** Whole days after rounding the time of day, used for elapsed-time tokens */
	days: number;
	year: number;
	/** 1-12 */
	month: number;
	/** 0-31; day 0 only for serial 0 in the 1900 system */
	day: number;
	/** 0 = Sunday */
	weekday: number;
	hours: number;
	minutes: number;
	seconds: number;
	/** Fractional seconds scaled to the requested digits, e.g. 25 for .25 with 2 digits */
	subseconds: number;
}

/**
 * Convert a JavaScript Date to an Excel serial date number.
 *
 * In the 1900 system serial 1 is 1900-01-01 and serial 60 is the fictitious
 * 1900-02-29 inherited from Lotus 1-2-3, so dates before 1900-03-01 are one
 * lower than a plain day count from 1899-12-30. The 1904 system counts days
 * from 1904-01-01 (serial 0).
 *
 * @param v - Date whose UTC fields hold the wall-clock time
 */
export function dateToSerialNumber(v: Date, date1904 = false): number {
	if (date1904) {
		return (v.getTime() - Date.UTC(1904, 0, 1)) / MS_PER_DAY;
	}
	const days = (v.getTime() - Date.UTC(1899, 11, 30)) / MS_PER_DAY;
	return days < 61 ? days - 1 : days;
}

/**
 * Convert an Excel serial date number to a JavaScript Date (UTC fields).
 *
 * The 1900 system's serial 60 has no real date and maps to 1900-03-01.
 */
export function serialNumberToDate(v: number, date1904 = false): Date {
	if (date1904) {
		return new Date(Date.UTC(1904, 0, 1) + v * MS_PER_DAY);
	}
	const base = v < 61 ? Date.UTC(1899, 11, 31) : Date.UTC(1899, 11, 30);
	return new Date(base + v * MS_PER_DAY);
}

/**
 * Split a serial into calendar and clock fields.
 *
 * The time of day is rounded to `fractionDigits` decimals of a second; a time
 * that rounds up to 24:00:00 moves to the next day. In the 1900 system serial 0
 * is 1900-01-00 and serial 60 is 1900-02-29.
 */
export function serialToDateParts(serial: number, date1904 = false, fractionDigits = 0): DateParts {
	const scale = 10 ** fractionDigits;
	let days = Math.floor(serial);
	let ticks = Math.round((serial - days) * 86400 * scale);
	if (ticks >= 86400 * scale) {
		days += 1;
		ticks -= 86400 * scale;
	}
	const totalSeconds = Math.floor(ticks / scale);
	const parts: DateParts = {
		days,
		year: 1900,
		month: 1,
		day: 0,
		weekday: 6,
		hours: Math.floor(totalSeconds / 3600),
		minutes: Math.floor((totalSeconds % 3600) / 60),
		seconds: totalSeconds % 60,
		subseconds: ticks % scale,
	};

	if (date1904) {
		const d = new Date(Date.UTC(1904, 0, 1) + days * MS_PER_DAY);
		return { ...parts, year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate(), weekday: d.getUTCDay() };
	}
	// 1900-01-01 is treated as a Sunday, continuing through the fictitious leap day
	const weekday = (((days + 6) % 7) + 7) % 7;
	if (days === 0) {
		return parts;
	}
	if (days === 60) {
		return { ...parts, month: 2, day: 29, weekday };
	}
	const d = new Date((days < 60 ? Date.UTC(1899, 11, 31) : Date.UTC(1899, 11, 30)) + days * MS_PER_DAY);
	return { ...parts, year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate(), weekday };
}
