import { ConfigManager } from "./config/config";
import { SyslogIngestError } from "./errors";
import { systemClock } from "./server/clock";
import { acquireSockets } from "./server/socket-activation";
import { SyslogParser } from "./server/syslog-parser";
import { SyslogServer } from "./server/syslog-server";
import {
	QueuedTaskRunner,
	type TaskRunner,
	UnboundedTaskRunner,
} from "./server/task-runner";
import { ConsoleSink } from "./sink/console-sink";
import { DatabaseSink } from "./sink/database-sink";
import type { Sink } from "./sink/sink";
import { LogDatabase } from "./storage/database";

class SyslogIngestService {
	private configManager: ConfigManager;
	private parser: SyslogParser;
	private db: LogDatabase | null = null;
	private sink: Sink;
	private syslogServer: SyslogServer | null = null;
	private cleanupInterval: NodeJS.Timeout | null = null;

	constructor() {
		console.log("🚀 syslog-ingest - RFC3164/RFC5424 Syslog Relay");
		console.log("=".repeat(60));

		this.configManager = new ConfigManager();
		const config = this.configManager.getConfig();

		this.parser = new SyslogParser(systemClock);

		if (config.sink.type === "sqlite") {
			this.db = new LogDatabase(this.configManager.getDbPath());
			this.sink = new DatabaseSink(this.db, systemClock);
			this.setupCleanup(this.db);
		} else {
			this.sink = new ConsoleSink(this.parser, config.debug);
		}
	}

	private setupCleanup(db: LogDatabase): void {
		const runCleanup = () => {
			const retentionDays = this.configManager.getRetentionDays();
			const deleted = db.cleanOldLogs(retentionDays);
			if (deleted > 0) {
				console.log(
					`🗑️  Cleaned up ${deleted} old log entries (retention: ${retentionDays} days)`,
				);
			}
		};

		runCleanup();

		this.cleanupInterval = setInterval(runCleanup, 24 * 60 * 60 * 1000);

		const retentionDays = this.configManager.getRetentionDays();
		console.log(
			`♻️  Log rotation: Daily cleanup, ${retentionDays} days retention`,
		);
	}

	async start(): Promise<void> {
		const config = this.configManager.getConfig();

		try {
			const sockets = await acquireSockets(config.listeners, {
				socketActivation: config.socketActivation,
			});

			const maxConcurrency = config.ingest.maxConcurrency;
			const runner: TaskRunner = maxConcurrency
				? new QueuedTaskRunner(maxConcurrency)
				: new UnboundedTaskRunner();

			this.syslogServer = new SyslogServer({
				...sockets,
				sink: this.sink,
				parser: this.parser,
				runner,
				readTimeoutMs: config.ingest.readTimeoutMs,
				debug: config.debug,
			});
			this.syslogServer.start();

			console.log("\n✅ Service started successfully!");
			console.log(
				`📥 Sockets: ${sockets.datagramSockets.length} UDP, ${sockets.streamListeners.length} TCP`,
			);

			if (this.db) {
				console.log(
					`🗄️  Database: ${this.configManager.getDbPath()} (${this.db.countLogs()} entries)`,
				);
				console.log(
					`📊 Retention: ${this.configManager.getRetentionDays()} days`,
				);
			} else {
				console.log("🖥️  Sink: console");
			}

			console.log(
				maxConcurrency
					? `⚙️  Concurrency: at most ${maxConcurrency} tasks`
					: "⚙️  Concurrency: unbounded",
			);

			if (config.debug) {
				console.log("🐛 Debug: Enabled");

				for (const log of this.db?.getRecentLogs(5) ?? []) {
					console.log(
						`   #${log.id} ${log.timestamp} ${log.hostname || "-"} ${log.tag || "-"}: ${log.message}`,
					);
				}
			}

			this.setupSignalHandlers();
		} catch (error) {
			if (error instanceof SyslogIngestError && error.code === "NO_SOCKETS") {
				console.error(
					"❌ No UDP or TCP sockets supplied (socket activation or configured listeners)",
				);
			} else {
				console.error("❌ Failed to start service:", error);
			}
			this.shutdownResources();
			process.exit(1);
		}
	}

	private shutdownResources(): void {
		if (this.cleanupInterval) {
			clearInterval(this.cleanupInterval);
		}

		this.sink.close();
	}

	private setupSignalHandlers(): void {
		const shutdown = async (signal: string) => {
			console.log(`\n📛 Received ${signal}, shutting down...`);

			await this.syslogServer?.stop();

			this.shutdownResources();

			console.log("👋 Goodbye!");
			process.exit(0);
		};

		const onSignal = (signal: string) => {
			shutdown(signal).catch((error) => {
				console.error("❌ Error during shutdown:", error);
				process.exit(1);
			});
		};

		process.on("SIGINT", () => onSignal("SIGINT"));
		process.on("SIGTERM", () => onSignal("SIGTERM"));

		process.on("uncaughtException", (error) => {
			console.error("❌ Uncaught exception:", error);
			onSignal("uncaughtException");
		});

		process.on("unhandledRejection", (reason, promise) => {
			console.error("❌ Unhandled rejection at:", promise, "reason:", reason);
		});
	}
}

new SyslogIngestService().start().catch((error) => {
	console.error("❌ Fatal error:", error);
	process.exit(1);
});
