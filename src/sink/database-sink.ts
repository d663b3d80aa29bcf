import { SinkError } from "../errors";
import { type Clock, systemClock } from "../server/clock";
import type { ParsedMessage } from "../server/syslog-parser";
import { formatTimestamp } from "../server/timestamp";
import type { LogDatabase } from "../storage/database";
import type { Sink } from "./sink";

export class DatabaseSink implements Sink {
	constructor(
		private db: LogDatabase,
		private clock: Clock = systemClock,
	) {}

	async deliver(message: ParsedMessage): Promise<void> {
		try {
			this.db.insertLog({
				receivedAt: this.clock.now(),
				timestamp: formatTimestamp(message.timestamp),
				version: message.version,
				facility: message.facility,
				severity: message.severity,
				hostname: message.hostname,
				tag: message.tag,
				structuredData: message.structuredData,
				message: message.message,
				source: message.source,
			});
		} catch (error) {
			throw new SinkError("Failed to store syslog message", { cause: error });
		}
	}

	close(): void {
		this.db.close();
	}
}
