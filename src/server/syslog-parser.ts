import { type Clock, systemClock } from "./clock";
import {
	parseRfc3339,
	parseRfc3339Nano,
	parseStamp,
	type SyslogTimestamp,
	timestampFromDate,
} from "./timestamp";

// RFC5424: MUST receive 480-octet messages, SHOULD accept 2048-octet messages
export const PACKET_SIZE = 2048;

export interface ParsedMessage {
	version: 0 | 1;
	facility: number;
	severity: number;
	timestamp: SyslogTimestamp;
	hostname: string;
	tag: string;
	structuredData: string;
	message: string;
	source: string;
}

type Draft = Omit<ParsedMessage, "timestamp" | "message"> & {
	timestamp?: SyslogTimestamp;
};

const SEVERITY_NAMES: Record<number, string> = {
	0: "emerg",
	1: "alert",
	2: "crit",
	3: "err",
	4: "warning",
	5: "notice",
	6: "info",
	7: "debug",
};

const MAX_PRI = 191;

/** Go-style SplitN: at most `n` parts, the last one holding the remainder. */
function splitN(value: string, separator: string, n: number): string[] {
	const parts: string[] = [];
	let rest = value;

	while (parts.length < n - 1) {
		const index = rest.indexOf(separator);
		if (index < 0) {
			break;
		}
		parts.push(rest.substring(0, index));
		rest = rest.substring(index + separator.length);
	}

	parts.push(rest);
	return parts;
}

function parsePri(buf: string): { pri: number; end: number } | undefined {
	if (!buf.startsWith("<")) {
		return undefined;
	}

	const end = buf.indexOf(">");
	if (end <= 1 || end >= 5) {
		return undefined;
	}

	const digits = buf.substring(1, end);
	if (!/^\d+$/.test(digits)) {
		return undefined;
	}

	const pri = parseInt(digits, 10);
	return pri <= MAX_PRI ? { pri, end } : undefined;
}

/**
 * Best-effort decoder for RFC3164 and RFC5424 packets. Every stage that
 * fails leaves the fields set so far in place and hands whatever was not
 * consumed to `message`; parsing never throws.
 */
export class SyslogParser {
	constructor(private clock: Clock = systemClock) {}

	parse(buf: string, source: string): ParsedMessage {
		// As a relay we fill in RFC3164 defaults before passing the message on.
		const draft: Draft = {
			version: 0,
			facility: 0,
			severity: 5,
			hostname: source,
			tag: "",
			structuredData: "",
			source,
		};

		let rest = buf;
		const header = parsePri(buf);

		if (header) {
			draft.facility = header.pri >> 3;
			draft.severity = header.pri & 7;
			rest = buf.substring(header.end + 1);

			if (rest.startsWith("1 ")) {
				draft.version = 1;
				draft.hostname = "";
				rest = this.parseRFC5424(draft, rest.substring(2));
			} else {
				rest = this.parseRFC3164(draft, rest);
			}
		}

		return {
			...draft,
			timestamp: draft.timestamp ?? timestampFromDate(this.clock.now()),
			message: rest,
		};
	}

	private parseRFC5424(draft: Draft, content: string): string {
		const tsEnd = content.indexOf(" ");
		if (tsEnd < 0) {
			return content;
		}

		const token = content.substring(0, tsEnd);
		const timestamp = parseRfc3339Nano(token) ?? parseRfc3339(token);
		if (!timestamp) {
			return content;
		}
		draft.timestamp = timestamp;

		let rest = content.substring(tsEnd + 1);

		// HOSTNAME, then APP-NAME PROCID MSGID as the tag
		const parts = splitN(rest, " ", 5);
		if (parts.length !== 5) {
			return rest;
		}
		const [hostname = "", appName = "", procId = "", msgId = "", remainder = ""] =
			parts;
		draft.hostname = hostname;
		draft.tag = [appName, procId, msgId].join(" ");
		rest = remainder;

		if (!rest.startsWith("[")) {
			return rest;
		}

		const sdEnd = rest.indexOf("]");
		if (sdEnd <= 1) {
			return rest;
		}

		draft.structuredData = rest.substring(0, sdEnd);

		const messageStart = rest.charAt(sdEnd + 1) === " " ? sdEnd + 2 : sdEnd + 1;
		return rest.substring(messageStart);
	}

	private parseRFC3164(draft: Draft, content: string): string {
		if (content.length < 15) {
			return content;
		}

		const timestamp = parseStamp(content.substring(0, 15));
		if (!timestamp) {
			return content;
		}
		draft.timestamp = timestamp;

		const rest = content.substring(16);

		const parts = splitN(rest, " ", 3);
		if (parts.length !== 3) {
			return rest;
		}
		const [hostname = "", tag = "", message = ""] = parts;
		draft.hostname = hostname;
		draft.tag = tag;
		return message;
	}

	getSeverityName(severity: number): string {
		return SEVERITY_NAMES[severity] || `severity${severity}`;
	}
}
