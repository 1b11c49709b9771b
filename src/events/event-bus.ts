/**
 * EventBus: typed pub/sub with a bounded per-type history.
 *
 * Handlers of one emit run concurrently and are awaited together with
 * Promise.allSettled; a handler that throws or rejects is logged and
 * reported in the EmitReport, never to the caller of emit().
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { DEFAULT_CORE_CONFIG } from "../shared/config.js";
import { ValidationError, classifyError } from "../shared/errors.js";
import { type Clock, SystemClock, toIso } from "../shared/time.js";
import { type BusEvent, type EventPayload, type EventType, isEventType } from "./event-types.js";

export type EventHandler = (event: BusEvent) => void | Promise<void>;

/** Optional callback invoked when a handler throws during dispatch. */
export type HandlerErrorCallback = (error: unknown, event: BusEvent) => void;

export interface EmitReport {
	/** Handlers that completed */
	readonly delivered: number;
	readonly failures: readonly unknown[];
}

export interface EventBusOptions {
	/** Ring buffer capacity per event type */
	readonly historyLimit?: number;
	readonly clock?: Clock;
	readonly logger?: Logger;
	readonly onHandlerError?: HandlerErrorCallback;
}

export class EventBus {
	private readonly handlers = new Map<EventType, Set<EventHandler>>();
	private readonly history = new Map<EventType, BusEvent[]>();
	private readonly historyLimit: number;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly onHandlerError: HandlerErrorCallback | null;

	constructor(options: EventBusOptions = {}) {
		this.historyLimit = options.historyLimit ?? DEFAULT_CORE_CONFIG.events.historyLimit;
		if (!Number.isInteger(this.historyLimit) || this.historyLimit <= 0) {
			throw new ValidationError("historyLimit must be a positive integer", [
				{ path: ["historyLimit"], message: `got ${this.historyLimit}` },
			]);
		}
		this.clock = options.clock ?? SystemClock;
		this.logger = (options.logger ?? silentLogger()).child({ component: "event-bus" });
		this.onHandlerError = options.onHandlerError ?? null;
	}

	// ── Subscriptions ──────────────────────────────────────────────

	/**
	 * Register a handler for one event type. Registering the same handler
	 * again is a no-op.
	 * @returns a function that removes the handler
	 * @throws ValidationError for an unknown event type
	 */
	subscribe(type: EventType, handler: EventHandler): () => void {
		assertKnown(type);
		const set = this.handlers.get(type) ?? new Set<EventHandler>();
		set.add(handler);
		this.handlers.set(type, set);
		return () => {
			this.unsubscribe(type, handler);
		};
	}

	/** False if handler was not registered. */
	unsubscribe(type: EventType, handler: EventHandler): boolean {
		return this.handlers.get(type)?.delete(handler) ?? false;
	}

	subscriberCount(type: EventType): number {
		return this.handlers.get(type)?.size ?? 0;
	}

	// ── Emit ───────────────────────────────────────────────────────

	/**
	 * Record the event and fan it out to a snapshot of the current handlers.
	 * Resolves once every handler has completed or failed.
	 * @throws ValidationError for an unknown event type
	 */
	async emit(type: EventType, payload: EventPayload = {}): Promise<EmitReport> {
		assertKnown(type);
		const event: BusEvent = {
			eventType: type,
			timestamp: toIso(this.clock.now()),
			payload,
		};
		this.record(event);

		const handlers = [...(this.handlers.get(type) ?? [])];
		if (handlers.length === 0) {
			return { delivered: 0, failures: [] };
		}

		const settled = await Promise.allSettled(
			handlers.map(async (handler) => {
				await handler(event);
			}),
		);

		const failures: unknown[] = [];
		for (const outcome of settled) {
			if (outcome.status === "rejected") {
				failures.push(outcome.reason);
				this.reportFailure(outcome.reason, event);
			}
		}
		return { delivered: handlers.length - failures.length, failures };
	}

	// ── History ────────────────────────────────────────────────────

	/**
	 * Most recent events of one type, oldest first.
	 * @param limit - how many to return; omitted or 0 means all
	 */
	getHistory(type: EventType, limit?: number): readonly BusEvent[] {
		assertKnown(type);
		const buffer = this.history.get(type) ?? [];
		if (limit === undefined || limit <= 0 || limit >= buffer.length) {
			return [...buffer];
		}
		return buffer.slice(buffer.length - limit);
	}

	/** Empty the buffer of one type, or every buffer. */
	clearHistory(type?: EventType): void {
		if (type === undefined) {
			this.history.clear();
		} else {
			this.history.delete(type);
		}
	}

	// ── Internal ──────────────────────────────────────────────────

	private record(event: BusEvent): void {
		const buffer = this.history.get(event.eventType) ?? [];
		buffer.push(event);
		const excess = buffer.length - this.historyLimit;
		if (excess > 0) {
			buffer.splice(0, excess);
		}
		this.history.set(event.eventType, buffer);
	}

	private reportFailure(error: unknown, event: BusEvent): void {
		this.logger.error(
			{ err: classifyError(error), eventType: event.eventType },
			"event handler failed",
		);
		try {
			this.onHandlerError?.(error, event);
		} catch (callbackError: unknown) {
			this.logger.warn(
				{ err: classifyError(callbackError), eventType: event.eventType },
				"handler error callback threw",
			);
		}
	}
}

function assertKnown(type: string): void {
	if (!isEventType(type)) {
		throw new ValidationError(`Unknown event type: ${type}`, [
			{ path: ["eventType"], message: "not a known event type" },
		]);
	}
}
