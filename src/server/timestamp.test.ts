import { describe, expect, it } from "vitest";
import {
	formatTimestamp,
	parseRfc3339,
	parseRfc3339Nano,
	parseStamp,
	timestampFromDate,
} from "./timestamp";

describe("parseRfc3339Nano", () => {
	it("keeps the full fraction and the offset", () => {
		expect(parseRfc3339Nano("2015-12-15T11:54:41.946675-08:00")).toEqual({
			year: 2015,
			month: 12,
			day: 15,
			hour: 11,
			minute: 54,
			second: 41,
			nanosecond: 946_675_000,
			offsetMinutes: -480,
		});
	});

	it("reads nine fractional digits as nanoseconds", () => {
		expect(parseRfc3339Nano("2020-01-01T00:00:00.123456789Z")?.nanosecond).toBe(
			123_456_789,
		);
	});

	it("requires a fraction", () => {
		expect(parseRfc3339Nano("2020-01-01T00:00:00Z")).toBeUndefined();
	});
});

describe("parseRfc3339", () => {
	it("parses a whole-second timestamp", () => {
		expect(parseRfc3339("2020-01-01T00:00:00+01:00")).toEqual({
			year: 2020,
			month: 1,
			day: 1,
			hour: 0,
			minute: 0,
			second: 0,
			nanosecond: 0,
			offsetMinutes: 60,
		});
	});

	it("checks leap days", () => {
		expect(parseRfc3339("2015-02-29T00:00:00Z")).toBeUndefined();
		expect(parseRfc3339("2016-02-29T00:00:00Z")?.day).toBe(29);
	});

	it.each([
		"-",
		"2020-01-01 00:00:00Z",
		"2020-01-01T24:00:00Z",
		"2020-01-01T00:60:00Z",
		"2020-01-01T00:00:60Z",
		"2020-00-01T00:00:00Z",
		"2020-01-01T00:00:00+24:00",
		"2020-01-01T00:00:00",
	])("rejects %s", (token) => {
		expect(parseRfc3339(token)).toBeUndefined();
	});
});

describe("parseStamp", () => {
	it("parses a two-digit day in year 0 UTC", () => {
		expect(parseStamp("Dec 15 11:55:02")).toEqual({
			year: 0,
			month: 12,
			day: 15,
			hour: 11,
			minute: 55,
			second: 2,
			nanosecond: 0,
			offsetMinutes: 0,
		});
	});

	it("accepts space and zero padded days", () => {
		expect(parseStamp("Jan  7 00:00:00")?.day).toBe(7);
		expect(parseStamp("Jan 07 00:00:00")?.day).toBe(7);
	});

	it("matches month names without regard to case", () => {
		expect(parseStamp("dec 15 11:55:02")?.month).toBe(12);
	});

	it("allows Feb 29 because year 0 is a leap year", () => {
		expect(parseStamp("Feb 29 00:00:00")?.day).toBe(29);
	});

	it.each(["Foo 15 11:55:02", "Dec 32 11:55:02", "Dec 15 25:55:02", "Dec 15 11:55"])(
		"rejects %s",
		(token) => {
			expect(parseStamp(token)).toBeUndefined();
		},
	);
});

describe("formatTimestamp", () => {
	it("writes the fraction without trailing zeros and the offset", () => {
		const ts = parseRfc3339Nano("2015-12-15T11:54:41.946675-08:00");
		expect(ts && formatTimestamp(ts)).toBe("2015-12-15T11:54:41.946675-08:00");
	});

	it("writes Z for UTC and pads the year", () => {
		const ts = parseStamp("Dec 15 11:55:02");
		expect(ts && formatTimestamp(ts)).toBe("0000-12-15T11:55:02Z");
	});

	it("writes positive offsets", () => {
		const ts = parseRfc3339("2020-06-01T10:00:00+05:30");
		expect(ts && formatTimestamp(ts)).toBe("2020-06-01T10:00:00+05:30");
	});
});

describe("timestampFromDate", () => {
	it("reads the UTC fields of a clock reading", () => {
		expect(timestampFromDate(new Date("2026-01-02T03:04:05.678Z"))).toEqual({
			year: 2026,
			month: 1,
			day: 2,
			hour: 3,
			minute: 4,
			second: 5,
			nanosecond: 678_000_000,
			offsetMinutes: 0,
		});
	});
});
