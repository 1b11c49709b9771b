/**
 * DataIngestionLoop: single consumer between market data and the system.
 *
 * Points are handed to the sink strictly one at a time in arrival order.
 * A sink failure is logged and reported on the `error` event; the loop
 * keeps going. Stopping ends the loop after the point in flight, leaving
 * anything still queued in place.
 */

import { TypedEmitter } from "../lib/events/index.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { InvalidStateError, classifyError, errorMessage } from "../shared/errors.js";
import { AsyncQueue } from "./async-queue.js";

export type IngestionSink<T> = (item: T) => Promise<void>;

export type IngestionEvents<T> = {
	processed: (item: T) => void;
	error: (error: Error, item: T) => void;
	stopped: () => void;
};

export interface DataIngestionLoopOptions {
	readonly logger?: Logger;
}

export class DataIngestionLoop<T> extends TypedEmitter<IngestionEvents<T>> {
	private readonly sink: IngestionSink<T>;
	private readonly queue = new AsyncQueue<T>();
	private readonly logger: Logger;
	private controller: AbortController | null = null;
	private loop: Promise<void> | null = null;
	private processedCount = 0;
	private failedCount = 0;
	/** Enqueued and not yet handled, including the item in flight */
	private outstanding = 0;

	constructor(sink: IngestionSink<T>, options: DataIngestionLoopOptions = {}) {
		super();
		this.sink = sink;
		this.logger = (options.logger ?? silentLogger()).child({ component: "ingestion-loop" });
	}

	/** Queue a point; it is processed once the loop runs. */
	enqueue(item: T): void {
		this.queue.push(item);
		this.outstanding++;
	}

	get pending(): number {
		return this.queue.size;
	}

	get processed(): number {
		return this.processedCount;
	}

	get failed(): number {
		return this.failedCount;
	}

	get isRunning(): boolean {
		return this.loop !== null;
	}

	/** Resolves once nothing is queued or in flight, or the loop stops. */
	whenIdle(): Promise<void> {
		if (!this.isRunning || this.isIdle()) return Promise.resolve();
		return new Promise((resolve) => {
			const done = (): void => {
				this.off("processed", check);
				this.off("error", check);
				this.off("stopped", done);
				resolve();
			};
			const check = (): void => {
				if (this.isIdle()) done();
			};
			this.on("processed", check);
			this.on("error", check);
			this.on("stopped", done);
		});
	}

	/**
	 * Run in the background until stop().
	 * @throws InvalidStateError if already running
	 */
	start(): void {
		if (this.loop !== null) {
			throw new InvalidStateError("Ingestion loop already running");
		}
		const controller = new AbortController();
		this.controller = controller;
		this.loop = this.run(controller.signal).finally(() => {
			this.controller = null;
			this.loop = null;
		});
	}

	/** Cancel and wait for the point in flight, if any. */
	async stop(): Promise<void> {
		this.controller?.abort();
		await this.loop;
	}

	/** Consume until `signal` aborts. Resolves once the loop has exited. */
	async run(signal: AbortSignal): Promise<void> {
		this.logger.info("ingestion loop started");
		while (!signal.aborted) {
			const item = await this.queue.next(signal);
			if (item === null) break;
			await this.handle(item);
		}
		this.logger.info(
			{ processed: this.processedCount, failed: this.failedCount, pending: this.queue.size },
			"ingestion loop stopped",
		);
		this.emit("stopped");
	}

	private isIdle(): boolean {
		return this.outstanding === 0;
	}

	private async handle(item: T): Promise<void> {
		try {
			await this.sink(item);
		} catch (error: unknown) {
			this.outstanding--;
			this.failedCount++;
			this.logger.error({ error: errorMessage(error) }, "sink failed");
			this.emit("error", classifyError(error), item);
			return;
		}
		this.outstanding--;
		this.processedCount++;
		this.emit("processed", item);
	}
}
