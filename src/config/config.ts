import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";

const ListenerSchema = z.object({
	protocol: z.enum(["udp", "tcp"]),
	host: z.string().default("0.0.0.0"),
	port: z.number().int().min(0).max(65535),
});

const SinkSchema = z.discriminatedUnion("type", [
	z.object({
		type: z.literal("sqlite"),
		path: z.string().optional(),
		retentionDays: z.number().positive().default(7),
	}),
	z.object({
		type: z.literal("console"),
	}),
]);

const ConfigSchema = z.object({
	listeners: z.array(ListenerSchema).default(() => []),
	socketActivation: z.boolean().default(true),
	ingest: z
		.object({
			maxConcurrency: z
				.number()
				.int()
				.positive()
				.optional()
				.describe("Bound on concurrent parse-and-deliver tasks; unbounded when absent."),
			readTimeoutMs: z.number().int().nonnegative().default(0),
		})
		.default(() => ({ readTimeoutMs: 0 })),
	sink: SinkSchema.default(() => ({ type: "sqlite" as const, retentionDays: 7 })),
	debug: z.boolean().default(false),
});

export type Listener = z.infer<typeof ListenerSchema>;
export type SinkConfig = z.infer<typeof SinkSchema>;
export type Config = z.infer<typeof ConfigSchema>;

export const CONFIG_FILE = "syslog-ingest.json";

function parseIntEnv(value: string | undefined): number | undefined {
	if (value === undefined || value === "") {
		return undefined;
	}
	const parsed = parseInt(value, 10);
	return Number.isNaN(parsed) ? undefined : parsed;
}

export class ConfigManager {
	private config: Config;

	constructor(
		private env: NodeJS.ProcessEnv = process.env,
		private cwd: string = process.cwd(),
	) {
		if (env.CONFIG_JSON) {
			try {
				const rawConfig = JSON.parse(env.CONFIG_JSON);
				this.config = ConfigSchema.parse(rawConfig);
				console.log(
					"Loaded configuration from CONFIG_JSON environment variable",
				);
			} catch (error) {
				console.error("Error parsing CONFIG_JSON:", error);
				this.config = this.getDefaultConfig();
			}
		} else {
			const path = join(cwd, CONFIG_FILE);

			if (existsSync(path)) {
				try {
					const rawConfig = JSON.parse(readFileSync(path, "utf-8"));
					this.config = ConfigSchema.parse(rawConfig);
					console.log(`Loaded configuration from ${path}`);
				} catch (error) {
					console.error("Error loading configuration:", error);
					this.config = this.getDefaultConfig();
				}
			} else {
				console.log("No configuration file found, using defaults");
				this.config = this.getDefaultConfig();
			}
		}

		this.loadEnvironmentOverrides();
	}

	private getDefaultConfig(): Config {
		return ConfigSchema.parse({});
	}

	private loadEnvironmentOverrides() {
		const env = this.env;
		const host = env.SYSLOG_HOST || "0.0.0.0";

		const udpPort = parseIntEnv(env.SYSLOG_UDP_PORT);
		if (udpPort !== undefined) {
			this.config.listeners.push({ protocol: "udp", host, port: udpPort });
		}

		const tcpPort = parseIntEnv(env.SYSLOG_TCP_PORT);
		if (tcpPort !== undefined) {
			this.config.listeners.push({ protocol: "tcp", host, port: tcpPort });
		}

		if (env.SOCKET_ACTIVATION) {
			this.config.socketActivation = env.SOCKET_ACTIVATION === "true";
		}

		if (env.SINK === "console") {
			this.config.sink = { type: "console" };
		} else if (env.SINK === "sqlite" && this.config.sink.type !== "sqlite") {
			this.config.sink = { type: "sqlite", retentionDays: 7 };
		}

		if (this.config.sink.type === "sqlite") {
			if (env.DB_PATH) {
				this.config.sink.path = env.DB_PATH;
			}

			const retentionDays = parseIntEnv(env.RETENTION_DAYS);
			if (retentionDays !== undefined && retentionDays > 0) {
				this.config.sink.retentionDays = retentionDays;
			}
		}

		const maxConcurrency = parseIntEnv(env.MAX_CONCURRENCY);
		if (maxConcurrency !== undefined && maxConcurrency > 0) {
			this.config.ingest.maxConcurrency = maxConcurrency;
		}

		const readTimeoutMs = parseIntEnv(env.READ_TIMEOUT_MS);
		if (readTimeoutMs !== undefined && readTimeoutMs >= 0) {
			this.config.ingest.readTimeoutMs = readTimeoutMs;
		}

		if (env.DEBUG) {
			this.config.debug = env.DEBUG === "true";
		}
	}

	getConfig(): Config {
		return this.config;
	}

	getDbPath(): string {
		if (this.config.sink.type !== "sqlite") {
			return "";
		}
		return this.config.sink.path || join(this.cwd, "data", "logs.db");
	}

	getRetentionDays(): number {
		return this.config.sink.type === "sqlite" ? this.config.sink.retentionDays : 0;
	}
}
