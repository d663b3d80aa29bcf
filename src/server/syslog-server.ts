import type { RemoteInfo, Socket as DatagramSocket } from "node:dgram";
import type { Server, Socket } from "node:net";
import { SyslogServerError } from "../errors";
import type { Sink } from "../sink/sink";
import { PACKET_SIZE, SyslogParser } from "./syslog-parser";
import { type TaskRunner, UnboundedTaskRunner } from "./task-runner";

export interface SyslogServerOptions {
	datagramSockets: DatagramSocket[];
	streamListeners: Server[];
	sink: Sink;
	parser?: SyslogParser;
	runner?: TaskRunner;
	/** Deadline for the single read on a stream connection; 0 disables it. */
	readTimeoutMs?: number;
	debug?: boolean;
}

export function formatAddress(host: string | undefined, port?: number): string {
	if (!host) {
		return "";
	}
	const printable = host.includes(":") ? `[${host}]` : host;
	return port === undefined ? printable : `${printable}:${port}`;
}

/**
 * Cuts `buf` to at most `maxBytes` without splitting a UTF-8 sequence, so a
 * character straddling the limit is dropped whole instead of decoding to U+FFFD.
 */
export function truncateUtf8(buf: Buffer, maxBytes: number): Buffer {
	if (buf.byteLength <= maxBytes) {
		return buf;
	}

	// A sequence is at most 4 bytes, so at most 3 continuation bytes to back over.
	let end = maxBytes;
	while (end > 0 && end > maxBytes - 3 && (buf.readUInt8(end) & 0xc0) === 0x80) {
		end--;
	}
	if ((buf.readUInt8(end) & 0xc0) === 0x80) {
		end = maxBytes;
	}

	return buf.subarray(0, end);
}

/**
 * Resolves with the first chunk the peer sends, truncated to `maxBytes`.
 * Rejects if the peer closes or errors before sending anything, or when
 * `timeoutMs` elapses first. A socket that already failed or closed while
 * waiting to be read rejects straight away. The caller owns closing the socket.
 */
export function readOnce(
	socket: Socket,
	maxBytes: number,
	timeoutMs: number = 0,
	source: string = formatAddress(socket.remoteAddress, socket.remotePort),
): Promise<Buffer> {
	return new Promise((resolve, reject) => {
		const cleanup = () => {
			socket.off("data", onData);
			socket.off("end", onEnd);
			socket.off("close", onEnd);
			socket.off("error", onError);
			socket.off("timeout", onTimeout);
			socket.setTimeout(0);
		};

		const fail = (message: string, cause?: unknown) => {
			cleanup();
			reject(
				new SyslogServerError(message, {
					code: "SOCKET_READ_FAILED",
					cause,
					source,
				}),
			);
		};

		const onData = (chunk: Buffer) => {
			cleanup();
			socket.pause();
			resolve(truncateUtf8(chunk, maxBytes));
		};
		const onEnd = () => fail(`Connection from ${source} closed before sending data`);
		const onError = (error: Error) =>
			fail(`Read from ${source} failed: ${error.message}`, error);
		const onTimeout = () =>
			fail(`No data from ${source} within ${timeoutMs}ms`);

		// close, error and timeout events have already gone by for these
		if (socket.errored) {
			onError(socket.errored);
			return;
		}
		if (socket.destroyed || socket.readableEnded) {
			onEnd();
			return;
		}

		socket.on("data", onData);
		socket.on("end", onEnd);
		socket.on("close", onEnd);
		socket.on("error", onError);

		if (timeoutMs > 0) {
			socket.setTimeout(timeoutMs);
			socket.on("timeout", onTimeout);
		}
	});
}

/**
 * Fans already-open sockets out into parse-and-deliver tasks. Each datagram
 * and each accepted connection is an independent unit: a failure is logged
 * and only that unit is lost.
 */
export class SyslogServer {
	private parser: SyslogParser;
	private sink: Sink;
	private runner: TaskRunner;
	private datagramSockets: DatagramSocket[];
	private streamListeners: Server[];
	private connections: Set<Socket> = new Set();
	private readTimeoutMs: number;
	private debug: boolean;
	private started = false;

	constructor(options: SyslogServerOptions) {
		this.datagramSockets = options.datagramSockets;
		this.streamListeners = options.streamListeners;
		this.sink = options.sink;
		this.parser = options.parser ?? new SyslogParser();
		this.runner = options.runner ?? new UnboundedTaskRunner();
		this.readTimeoutMs = options.readTimeoutMs ?? 0;
		this.debug = options.debug ?? false;
	}

	start(): void {
		if (this.datagramSockets.length === 0 && this.streamListeners.length === 0) {
			throw new SyslogServerError("No UDP or TCP sockets supplied", {
				code: "NO_SOCKETS",
			});
		}

		for (const socket of this.datagramSockets) {
			this.handlePackets(socket);
		}

		for (const server of this.streamListeners) {
			this.handleListener(server);
		}

		this.started = true;
	}

	private handlePackets(socket: DatagramSocket): void {
		socket.on("message", (data: Buffer, rinfo: RemoteInfo) => {
			const source = formatAddress(rinfo.address, rinfo.port);

			if (this.debug) {
				console.log(`📨 Received ${data.byteLength} bytes from ${source}`);
			}

			const packet = truncateUtf8(data, PACKET_SIZE).toString("utf8");
			this.runner.run(() => this.ingestMessage(packet, source));
		});

		socket.on("error", (error) => {
			console.error("❌ UDP socket error:", error);
		});
	}

	private handleListener(server: Server): void {
		server.on("connection", (socket: Socket) => {
			const source = formatAddress(socket.remoteAddress, socket.remotePort);

			this.connections.add(socket);
			socket.once("close", () => this.connections.delete(socket));
			// The connection may sit in the runner's queue before anything reads
			// it; the error stays on `socket.errored` and fails the read.
			socket.on("error", (error) => {
				if (this.debug) {
					console.log(`⚠️  Connection from ${source} errored: ${error.message}`);
				}
			});

			if (this.debug) {
				console.log(`New connection from ${source}`);
			}

			this.runner.run(() => this.handleConnection(socket, source));
		});

		server.on("error", (error) => {
			console.error("❌ TCP listener error:", error);
		});
	}

	private async handleConnection(socket: Socket, source: string): Promise<void> {
		let data: Buffer;

		try {
			data = await readOnce(socket, PACKET_SIZE, this.readTimeoutMs, source);
		} catch (error) {
			console.error("❌ Error reading syslog connection:", error);
			return;
		} finally {
			socket.destroy();
		}

		if (this.debug) {
			console.log(`📨 Received ${data.byteLength} bytes from ${source}`);
		}

		await this.ingestMessage(data.toString("utf8"), source);
	}

	/** Parses one packet and hands it to the sink. Never rejects. */
	async ingestMessage(buf: string, source: string): Promise<void> {
		if (this.debug) {
			console.log(
				`🔍 Processing raw message: ${buf.substring(0, 100)}${buf.length > 100 ? "..." : ""}`,
			);
		}

		const parsed = this.parser.parse(buf, source);

		if (this.debug) {
			console.log(
				`📋 Parsed: version=${parsed.version}, severity=${parsed.severity}, host=${parsed.hostname}, tag=${parsed.tag}`,
			);
		}

		try {
			await this.sink.deliver(parsed);

			if (this.debug) {
				console.log(
					`✅ Delivered [${this.parser.getSeverityName(parsed.severity).toUpperCase()}] ${parsed.hostname} ${parsed.tag}: ${parsed.message}`,
				);
			}
		} catch (error) {
			console.error(`❌ Error delivering syslog message from ${source}:`, error);
		}
	}

	async stop(): Promise<void> {
		if (!this.started) {
			return;
		}
		this.started = false;

		for (const socket of this.connections) {
			socket.destroy();
		}

		await Promise.all([
			...this.datagramSockets.map(
				(socket) => new Promise<void>((resolve) => socket.close(() => resolve())),
			),
			...this.streamListeners.map(
				(server) => new Promise<void>((resolve) => server.close(() => resolve())),
			),
		]);

		await this.runner.onIdle();
		console.log("Syslog server stopped");
	}
}
