import { createSocket, type Socket as DatagramSocket } from "node:dgram";
import { createServer, type Server } from "node:net";
import type { Listener } from "../config/config";

// sd_listen_fds(3): inherited descriptors start right after stdio
const SD_LISTEN_FDS_START = 3;

export interface InheritedFd {
	fd: number;
	name: string;
	kind: "datagram" | "stream";
}

export interface AcquiredSockets {
	datagramSockets: DatagramSocket[];
	streamListeners: Server[];
}

/**
 * Reads the systemd socket-activation variables. Descriptors are only
 * ours when LISTEN_PID names this process. Node cannot ask a descriptor
 * for its socket type, so a name containing "udp" or "dgram" marks a
 * datagram socket and everything else is treated as a stream listener.
 */
export function listenFdsFromEnv(
	env: NodeJS.ProcessEnv,
	pid: number = process.pid,
): InheritedFd[] {
	if (!env.LISTEN_PID || parseInt(env.LISTEN_PID, 10) !== pid) {
		return [];
	}

	const count = parseInt(env.LISTEN_FDS ?? "", 10);
	if (!Number.isInteger(count) || count <= 0) {
		return [];
	}

	const names = (env.LISTEN_FDNAMES ?? "").split(":");
	const fds: InheritedFd[] = [];

	for (let i = 0; i < count; i++) {
		const name = names[i] || "unknown";
		fds.push({
			fd: SD_LISTEN_FDS_START + i,
			name,
			kind: /udp|dgram/i.test(name) ? "datagram" : "stream",
		});
	}

	return fds;
}

function bindDatagram(
	options: { fd: number } | { host: string; port: number },
): Promise<DatagramSocket> {
	const type = "host" in options && options.host.includes(":") ? "udp6" : "udp4";
	const socket = createSocket(type);

	return new Promise((resolve, reject) => {
		socket.once("error", reject);
		const onListening = () => {
			socket.off("error", reject);
			resolve(socket);
		};

		if ("fd" in options) {
			socket.bind({ fd: options.fd }, onListening);
		} else {
			socket.bind({ port: options.port, address: options.host }, onListening);
		}
	});
}

function listenStream(
	options: { fd: number } | { host: string; port: number },
): Promise<Server> {
	const server = createServer();

	return new Promise((resolve, reject) => {
		server.once("error", reject);
		server.listen(options, () => {
			server.off("error", reject);
			resolve(server);
		});
	});
}

/**
 * Opens every socket the dispatcher will serve: inherited descriptors
 * first, then the configured listeners. Fails if any of them cannot be
 * bound.
 */
export async function acquireSockets(
	listeners: Listener[],
	options: { socketActivation: boolean; env?: NodeJS.ProcessEnv },
): Promise<AcquiredSockets> {
	const acquired: AcquiredSockets = { datagramSockets: [], streamListeners: [] };

	if (options.socketActivation) {
		for (const inherited of listenFdsFromEnv(options.env ?? process.env)) {
			if (inherited.kind === "datagram") {
				acquired.datagramSockets.push(await bindDatagram({ fd: inherited.fd }));
			} else {
				acquired.streamListeners.push(await listenStream({ fd: inherited.fd }));
			}
			console.log(`🔌 Inherited ${inherited.kind} socket fd=${inherited.fd} (${inherited.name})`);
		}
	}

	for (const listener of listeners) {
		if (listener.protocol === "udp") {
			acquired.datagramSockets.push(await bindDatagram(listener));
		} else {
			acquired.streamListeners.push(await listenStream(listener));
		}
		console.log(
			`📥 Syslog ${listener.protocol.toUpperCase()} listening on ${listener.host}:${listener.port}`,
		);
	}

	return acquired;
}
