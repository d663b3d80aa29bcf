import PQueue from "p-queue";

export type Task = () => Promise<void>;

/**
 * Spawning policy for per-datagram and per-connection work. `run` must not
 * block the caller; `onIdle` resolves once every started task has settled.
 */
export interface TaskRunner {
	run(task: Task): void;
	onIdle(): Promise<void>;
}

function logTaskFailure(error: unknown) {
	console.error("❌ Ingest task failed:", error);
}

/** One task per unit of work, no admission control. */
export class UnboundedTaskRunner implements TaskRunner {
	private inFlight: Set<Promise<void>> = new Set();

	run(task: Task): void {
		const pending = task()
			.catch(logTaskFailure)
			.finally(() => {
				this.inFlight.delete(pending);
			});
		this.inFlight.add(pending);
	}

	async onIdle(): Promise<void> {
		while (this.inFlight.size > 0) {
			await Promise.all(this.inFlight);
		}
	}

	get size(): number {
		return this.inFlight.size;
	}
}

/** At most `concurrency` tasks at once; the rest wait in a FIFO queue. */
export class QueuedTaskRunner implements TaskRunner {
	private queue: PQueue;

	constructor(concurrency: number) {
		this.queue = new PQueue({ concurrency });
	}

	run(task: Task): void {
		this.queue.add(task).catch(logTaskFailure);
	}

	onIdle(): Promise<void> {
		return this.queue.onIdle();
	}

	get size(): number {
		return this.queue.size + this.queue.pending;
	}
}
