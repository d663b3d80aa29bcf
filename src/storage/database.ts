import { existsSync, mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import Database from "better-sqlite3";

export interface LogEntry {
	id?: number;
	receivedAt: Date;
	timestamp: string;
	version: number;
	facility: number;
	severity: number;
	hostname: string;
	tag: string;
	structuredData: string;
	message: string;
	source: string;
}

interface LogRow {
	id: number;
	received_at: string;
	timestamp: string;
	version: number;
	facility: number;
	severity: number;
	hostname: string;
	tag: string;
	structured_data: string;
	message: string;
	source: string;
}

type InsertParams = Omit<LogRow, "id">;

const IN_MEMORY = ":memory:";

export class LogDatabase {
	private db: Database.Database;

	constructor(dbPath?: string) {
		const defaultPath = join(process.cwd(), "data", "logs.db");
		const finalPath = dbPath || defaultPath;

		if (finalPath !== IN_MEMORY) {
			const dbDir = dirname(finalPath);
			if (!existsSync(dbDir)) {
				mkdirSync(dbDir, { recursive: true });
			}
		}

		this.db = new Database(finalPath);
		this.db.pragma("journal_mode = WAL");
		this.db.pragma("busy_timeout = 5000");
		this.initSchema();
	}

	private initSchema() {
		this.db.exec(`
      CREATE TABLE IF NOT EXISTS logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        received_at DATETIME NOT NULL,
        timestamp TEXT NOT NULL,
        version INTEGER NOT NULL,
        facility INTEGER NOT NULL,
        severity INTEGER NOT NULL,
        hostname TEXT NOT NULL,
        tag TEXT NOT NULL,
        structured_data TEXT NOT NULL,
        message TEXT NOT NULL,
        source TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_received_at ON logs(received_at);
      CREATE INDEX IF NOT EXISTS idx_severity ON logs(severity);
      CREATE INDEX IF NOT EXISTS idx_hostname ON logs(hostname);
    `);
	}

	insertLog(log: Omit<LogEntry, "id">): number {
		const stmt = this.db.prepare<InsertParams>(`
      INSERT INTO logs (received_at, timestamp, version, facility, severity, hostname, tag, structured_data, message, source)
      VALUES ($received_at, $timestamp, $version, $facility, $severity, $hostname, $tag, $structured_data, $message, $source)
    `);

		const result = stmt.run({
			received_at: log.receivedAt.toISOString(),
			timestamp: log.timestamp,
			version: log.version,
			facility: log.facility,
			severity: log.severity,
			hostname: log.hostname,
			tag: log.tag,
			structured_data: log.structuredData,
			message: log.message,
			source: log.source,
		});

		return Number(result.lastInsertRowid);
	}

	getRecentLogs(limit: number = 50): LogEntry[] {
		const stmt = this.db.prepare<{ limit: number }, LogRow>(`
      SELECT * FROM logs
      ORDER BY id DESC
      LIMIT $limit
    `);

		return stmt.all({ limit }).map((row) => ({
			id: row.id,
			receivedAt: new Date(row.received_at),
			timestamp: row.timestamp,
			version: row.version,
			facility: row.facility,
			severity: row.severity,
			hostname: row.hostname,
			tag: row.tag,
			structuredData: row.structured_data,
			message: row.message,
			source: row.source,
		}));
	}

	countLogs(): number {
		const row = this.db
			.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM logs")
			.get();
		return row?.count ?? 0;
	}

	cleanOldLogs(retentionDays: number = 7, now: Date = new Date()): number {
		const cutoffDate = new Date(now.getTime());
		cutoffDate.setDate(cutoffDate.getDate() - retentionDays);

		const stmt = this.db.prepare<{ cutoff: string }>(`
      DELETE FROM logs WHERE received_at < $cutoff
    `);

		const deleted = stmt.run({ cutoff: cutoffDate.toISOString() }).changes;

		if (deleted > 0) {
			this.db.pragma("optimize");
			this.db.exec("VACUUM");
		}

		return deleted;
	}

	close() {
		this.db.close();
	}
}
