import type { ParsedMessage, SyslogParser } from "../server/syslog-parser";
import { type Sink, toSinkRecord } from "./sink";

export class ConsoleSink implements Sink {
	constructor(
		private parser: SyslogParser,
		private debug: boolean = false,
		private write: (line: string) => void = (line) => console.log(line),
	) {}

	async deliver(message: ParsedMessage): Promise<void> {
		const record = toSinkRecord(message);
		const severity = this.parser.getSeverityName(record.priority).toUpperCase();
		const when = record.fields.SYSLOG_TIMESTAMP ?? "-";

		this.write(
			`${when} ${message.hostname || "-"} ${message.tag || "-"} [${severity}] ${record.message}`,
		);

		if (this.debug) {
			this.write(`   ${JSON.stringify(record.fields)}`);
		}
	}

	close(): void {}
}
