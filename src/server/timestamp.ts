/**
 * Wall-clock time as written in a syslog header, together with its UTC
 * offset. A `Date` would drop both the sub-millisecond fraction and the
 * sender's offset, so parsed timestamps keep every field.
 */
export interface SyslogTimestamp {
	year: number;
	month: number;
	day: number;
	hour: number;
	minute: number;
	second: number;
	nanosecond: number;
	/** Minutes east of UTC. */
	offsetMinutes: number;
}

const MONTHS = [
	"jan",
	"feb",
	"mar",
	"apr",
	"may",
	"jun",
	"jul",
	"aug",
	"sep",
	"oct",
	"nov",
	"dec",
];

const RFC3339_NANO =
	/^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d{1,9})(Z|[+-]\d{2}:\d{2})$/;
const RFC3339 =
	/^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(Z|[+-]\d{2}:\d{2})$/;
const STAMP = /^([A-Za-z]{3}) ( \d|\d\d) (\d{2}):(\d{2}):(\d{2})$/;

function isLeapYear(year: number): boolean {
	return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
	if (month === 2) {
		return isLeapYear(year) ? 29 : 28;
	}
	return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function isValid(ts: SyslogTimestamp): boolean {
	return (
		ts.month >= 1 &&
		ts.month <= 12 &&
		ts.day >= 1 &&
		ts.day <= daysInMonth(ts.year, ts.month) &&
		ts.hour < 24 &&
		ts.minute < 60 &&
		ts.second < 60
	);
}

function parseOffset(zone: string): number | undefined {
	if (zone === "Z") {
		return 0;
	}

	const hours = Number(zone.slice(1, 3));
	const minutes = Number(zone.slice(4, 6));
	if (hours >= 24 || minutes >= 60) {
		return undefined;
	}

	const sign = zone.startsWith("-") ? -1 : 1;
	return sign * (hours * 60 + minutes);
}

function fromRfc3339Match(
	date: string[],
	fraction: string,
	zone: string,
): SyslogTimestamp | undefined {
	const [year = "", month = "", day = "", hour = "", minute = "", second = ""] =
		date;
	const offsetMinutes = parseOffset(zone);
	if (offsetMinutes === undefined) {
		return undefined;
	}

	const ts: SyslogTimestamp = {
		year: Number(year),
		month: Number(month),
		day: Number(day),
		hour: Number(hour),
		minute: Number(minute),
		second: Number(second),
		nanosecond: fraction ? Number(fraction.padEnd(9, "0")) : 0,
		offsetMinutes,
	};

	return isValid(ts) ? ts : undefined;
}

/** RFC3339 with a 1-9 digit fractional second, e.g. `2015-12-15T11:54:41.946675-08:00`. */
export function parseRfc3339Nano(token: string): SyslogTimestamp | undefined {
	const match = RFC3339_NANO.exec(token);
	if (!match) {
		return undefined;
	}
	return fromRfc3339Match(match.slice(1, 7), match[7] ?? "", match[8] ?? "");
}

/** RFC3339 without a fractional second, e.g. `2015-12-15T11:54:41Z`. */
export function parseRfc3339(token: string): SyslogTimestamp | undefined {
	const match = RFC3339.exec(token);
	if (!match) {
		return undefined;
	}
	return fromRfc3339Match(match.slice(1, 7), "", match[7] ?? "");
}

/**
 * Parses the fixed-width BSD syslog stamp `Mmm _d hh:mm:ss`. There is no
 * year and no zone in the format, so the result is year 0, UTC.
 */
export function parseStamp(token: string): SyslogTimestamp | undefined {
	const match = STAMP.exec(token);
	if (!match) {
		return undefined;
	}

	const [, monthName = "", day = "", hour = "", minute = "", second = ""] =
		match;
	const month = MONTHS.indexOf(monthName.toLowerCase()) + 1;
	if (month === 0) {
		return undefined;
	}

	const ts: SyslogTimestamp = {
		year: 0,
		month,
		day: Number(day.trim()),
		hour: Number(hour),
		minute: Number(minute),
		second: Number(second),
		nanosecond: 0,
		offsetMinutes: 0,
	};

	return isValid(ts) ? ts : undefined;
}

export function timestampFromDate(date: Date): SyslogTimestamp {
	return {
		year: date.getUTCFullYear(),
		month: date.getUTCMonth() + 1,
		day: date.getUTCDate(),
		hour: date.getUTCHours(),
		minute: date.getUTCMinutes(),
		second: date.getUTCSeconds(),
		nanosecond: date.getUTCMilliseconds() * 1_000_000,
		offsetMinutes: 0,
	};
}

function pad(value: number, width: number): string {
	return String(value).padStart(width, "0");
}

export function formatTimestamp(ts: SyslogTimestamp): string {
	const date = `${pad(ts.year, 4)}-${pad(ts.month, 2)}-${pad(ts.day, 2)}`;
	const time = `${pad(ts.hour, 2)}:${pad(ts.minute, 2)}:${pad(ts.second, 2)}`;
	const fraction =
		ts.nanosecond > 0 ? `.${pad(ts.nanosecond, 9).replace(/0+$/, "")}` : "";

	let zone = "Z";
	if (ts.offsetMinutes !== 0) {
		const sign = ts.offsetMinutes < 0 ? "-" : "+";
		const abs = Math.abs(ts.offsetMinutes);
		zone = `${sign}${pad(Math.floor(abs / 60), 2)}:${pad(abs % 60, 2)}`;
	}

	return `${date}T${time}${fraction}${zone}`;
}
