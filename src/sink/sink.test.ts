import { describe, expect, it } from "vitest";
import { fixedClock } from "../server/clock";
import { SyslogParser } from "../server/syslog-parser";
import { ConsoleSink } from "./console-sink";
import { toSinkRecord } from "./sink";

const parser = new SyslogParser(fixedClock(new Date("2026-01-02T03:04:05Z")));

describe("toSinkRecord", () => {
	it("maps a structured message to body, priority and fields", () => {
		const record = toSinkRecord(
			parser.parse(
				'<13>1 2015-12-15T11:54:41.946675-08:00 host.domain.com user - - [timeQuality tzKnown="1"] message',
				"127.0.0.1:51000",
			),
		);

		expect(record).toEqual({
			message: "message",
			priority: 5,
			fields: {
				SYSLOG_VERSION: "1",
				SYSLOG_FACILITY: "1",
				SYSLOG_SEVERITY: "5",
				SYSLOG_IDENTIFIER: "host.domain.com user - -",
				SYSLOG_TIMESTAMP: "2015-12-15T11:54:41.946675-08:00",
				SYSLOG_HOSTNAME: "host.domain.com",
				SYSLOG_SOURCE: "127.0.0.1:51000",
				SYSLOG_STRUCTURED_DATA: '[timeQuality tzKnown="1"',
			},
		});
	});

	it("omits empty hostname and structured data", () => {
		const record = toSinkRecord(
			parser.parse("<11>1 - host user - - - message", "127.0.0.1:51000"),
		);

		expect(record.priority).toBe(3);
		expect(record.fields).toEqual({
			SYSLOG_VERSION: "1",
			SYSLOG_FACILITY: "1",
			SYSLOG_SEVERITY: "3",
			SYSLOG_IDENTIFIER: " ",
			SYSLOG_TIMESTAMP: "2026-01-02T03:04:05Z",
			SYSLOG_SOURCE: "127.0.0.1:51000",
		});
	});
});

describe("ConsoleSink", () => {
	it("writes one line per message", async () => {
		const lines: string[] = [];
		const sink = new ConsoleSink(parser, false, (line) => lines.push(line));

		await sink.deliver(
			parser.parse("<13>Dec 15 11:55:02 host user: message", "127.0.0.1"),
		);

		expect(lines).toEqual(["0000-12-15T11:55:02Z host user: [NOTICE] message"]);
	});

	it("adds the fields in debug mode", async () => {
		const lines: string[] = [];
		const sink = new ConsoleSink(parser, true, (line) => lines.push(line));

		await sink.deliver(parser.parse("hello", "src"));

		expect(lines).toEqual([
			"2026-01-02T03:04:05Z src - [NOTICE] hello",
			'   {"SYSLOG_VERSION":"0","SYSLOG_FACILITY":"0","SYSLOG_SEVERITY":"5","SYSLOG_IDENTIFIER":"src ","SYSLOG_TIMESTAMP":"2026-01-02T03:04:05Z","SYSLOG_HOSTNAME":"src","SYSLOG_SOURCE":"src"}',
		]);
	});
});
