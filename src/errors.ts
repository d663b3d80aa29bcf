export type SyslogIngestErrorCode =
	| "NO_SOCKETS"
	| "SOCKET_READ_FAILED"
	| "SINK_DELIVERY_FAILED";

/**
 * Base error for the ingest service. Only `NO_SOCKETS` is fatal; the other
 * codes are logged per unit of work and the unit is dropped.
 */
export class SyslogIngestError extends Error {
	readonly code: SyslogIngestErrorCode;

	/**
	 * Original error that caused this, if any (socket error, SQLite error, etc.)
	 */
	override cause?: unknown;

	constructor(
		message: string,
		options: { code: SyslogIngestErrorCode; cause?: unknown },
	) {
		super(message);
		this.name = "SyslogIngestError";
		this.code = options.code;
		if (options.cause !== undefined) {
			this.cause = options.cause;
		}
		Object.setPrototypeOf(this, SyslogIngestError.prototype);
	}
}

export class SyslogServerError extends SyslogIngestError {
	/** Peer address of the failed unit, when there is one. */
	source?: string;

	constructor(
		message: string,
		options: {
			code: "NO_SOCKETS" | "SOCKET_READ_FAILED";
			cause?: unknown;
			source?: string;
		},
	) {
		super(message, options);
		this.name = "SyslogServerError";
		this.source = options.source;
		Object.setPrototypeOf(this, SyslogServerError.prototype);
	}
}

export class SinkError extends SyslogIngestError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, { code: "SINK_DELIVERY_FAILED", cause: options?.cause });
		this.name = "SinkError";
		Object.setPrototypeOf(this, SinkError.prototype);
	}
}
