import type { ParsedMessage } from "../server/syslog-parser";
import { formatTimestamp } from "../server/timestamp";

/**
 * Where parsed messages end up. `deliver` may be called concurrently from
 * many tasks; a failed delivery rejects with a `SinkError`.
 */
export interface Sink {
	deliver(message: ParsedMessage): Promise<void>;
	close(): void;
}

export interface SinkRecord {
	message: string;
	priority: number;
	fields: Record<string, string>;
}

export function toSinkRecord(msg: ParsedMessage): SinkRecord {
	const fields: Record<string, string> = {
		SYSLOG_VERSION: String(msg.version),
		SYSLOG_FACILITY: String(msg.facility),
		SYSLOG_SEVERITY: String(msg.severity),

		// Without the hostname, the tag isn't a complete identifier.
		SYSLOG_IDENTIFIER: `${msg.hostname} ${msg.tag}`,
		SYSLOG_TIMESTAMP: formatTimestamp(msg.timestamp),
	};

	if (msg.hostname) {
		fields.SYSLOG_HOSTNAME = msg.hostname;
	}

	if (msg.source) {
		fields.SYSLOG_SOURCE = msg.source;
	}

	if (msg.structuredData) {
		fields.SYSLOG_STRUCTURED_DATA = msg.structuredData;
	}

	return {
		message: msg.message,
		priority: msg.severity,
		fields,
	};
}
