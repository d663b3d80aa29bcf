import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { type AcquiredSockets, acquireSockets, listenFdsFromEnv } from "./socket-activation";

describe("listenFdsFromEnv", () => {
	it("ignores descriptors meant for another process", () => {
		expect(
			listenFdsFromEnv({ LISTEN_PID: "100", LISTEN_FDS: "2" }, 200),
		).toEqual([]);
	});

	it("ignores a missing or zero count", () => {
		expect(listenFdsFromEnv({ LISTEN_PID: "100" }, 100)).toEqual([]);
		expect(listenFdsFromEnv({ LISTEN_PID: "100", LISTEN_FDS: "0" }, 100)).toEqual([]);
	});

	it("numbers descriptors from 3 and classifies them by name", () => {
		expect(
			listenFdsFromEnv(
				{
					LISTEN_PID: "100",
					LISTEN_FDS: "3",
					LISTEN_FDNAMES: "syslog-udp:syslog-tcp:journal-DGRAM",
				},
				100,
			),
		).toEqual([
			{ fd: 3, name: "syslog-udp", kind: "datagram" },
			{ fd: 4, name: "syslog-tcp", kind: "stream" },
			{ fd: 5, name: "journal-DGRAM", kind: "datagram" },
		]);
	});

	it("treats unnamed descriptors as stream listeners", () => {
		expect(listenFdsFromEnv({ LISTEN_PID: "7", LISTEN_FDS: "1" }, 7)).toEqual([
			{ fd: 3, name: "unknown", kind: "stream" },
		]);
	});
});

describe("acquireSockets", () => {
	let acquired: AcquiredSockets | null = null;

	beforeEach(() => {
		vi.spyOn(console, "log").mockImplementation(() => {});
	});

	afterEach(async () => {
		if (acquired) {
			const { datagramSockets, streamListeners } = acquired;
			await Promise.all([
				...datagramSockets.map(
					(socket) => new Promise<void>((resolve) => socket.close(() => resolve())),
				),
				...streamListeners.map(
					(server) => new Promise<void>((resolve) => server.close(() => resolve())),
				),
			]);
			acquired = null;
		}
		vi.restoreAllMocks();
	});

	it("binds every configured listener", async () => {
		acquired = await acquireSockets(
			[
				{ protocol: "udp", host: "127.0.0.1", port: 0 },
				{ protocol: "tcp", host: "127.0.0.1", port: 0 },
				{ protocol: "udp", host: "127.0.0.1", port: 0 },
			],
			{ socketActivation: true, env: {} },
		);

		expect(acquired.datagramSockets).toHaveLength(2);
		expect(acquired.streamListeners).toHaveLength(1);
		expect(acquired.streamListeners[0]?.listening).toBe(true);
	});

	it("returns nothing when there is nothing to open", async () => {
		acquired = await acquireSockets([], { socketActivation: true, env: {} });

		expect(acquired).toEqual({ datagramSockets: [], streamListeners: [] });
	});
});
