/**
 * PositionLedger: authoritative record of positions.
 *
 * Same write-through discipline as the OrderLedger: store first, then cache.
 * openPositions() and listPositions() cover positions this process created
 * or has loaded by id.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { InvalidStateError, NotFoundError } from "../shared/errors.js";
import { type PositionId, newPositionId } from "../shared/identifiers.js";
import type { Metadata } from "../shared/json.js";
import { unwrap } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { readRecord, writeRecord } from "../store/store-access.js";
import { type StateStore, positionKey } from "../store/types.js";
import { decodePosition, encodePosition } from "./codec.js";
import { computePnl, isStopLossBreached } from "./pnl.js";
import { isLivePosition, transitionPosition } from "./position-status.js";
import { type CreatePositionInput, type Position, PositionStatus } from "./types.js";

export interface PositionLedgerOptions {
	readonly store: StateStore;
	readonly clock?: Clock;
	readonly logger?: Logger;
	readonly newPositionId?: () => PositionId;
}

export class PositionLedger {
	private readonly positions = new Map<string, Position>();
	private readonly store: StateStore;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly nextPositionId: () => PositionId;

	constructor(options: PositionLedgerOptions) {
		this.store = options.store;
		this.clock = options.clock ?? SystemClock;
		this.logger = (options.logger ?? silentLogger()).child({ component: "position-ledger" });
		this.nextPositionId = options.newPositionId ?? newPositionId;
	}

	/** New OPEN position priced at its entry, with zero PnL. */
	async createPosition(input: CreatePositionInput): Promise<Position> {
		const now = this.clock.now();
		const position: Position = {
			id: this.nextPositionId(),
			symbol: input.symbol,
			side: input.side,
			size: input.size,
			entryPrice: input.entryPrice,
			currentPrice: input.entryPrice,
			status: PositionStatus.Open,
			unrealizedPnl: 0,
			realizedPnl: 0,
			stopLoss: input.stopLoss ?? null,
			entryTimeMs: now,
			lastUpdateMs: now,
			metadata: input.metadata ?? {},
		};
		await this.save(position);
		this.logger.info(
			{
				positionId: position.id,
				symbol: position.symbol,
				side: position.side,
				entryPrice: position.entryPrice,
			},
			"position opened",
		);
		return position;
	}

	/**
	 * Reprice a live position. An OPEN position whose stop-loss is breached
	 * moves to CLOSING; closing it is the engine's job.
	 * @throws NotFoundError if the position is unknown
	 * @throws InvalidStateError if the position is CLOSED
	 */
	async markPrice(id: PositionId, currentPrice: number, metadata?: Metadata): Promise<Position> {
		const current = await this.requirePosition(id);
		if (!isLivePosition(current.status)) {
			throw new InvalidStateError(`Position ${id} is closed`, {
				positionId: id,
				status: current.status,
			});
		}

		const breached =
			current.status === PositionStatus.Open &&
			current.stopLoss !== null &&
			isStopLossBreached(current.side, current.stopLoss, currentPrice);
		const status = breached
			? unwrap(transitionPosition(current.status, PositionStatus.Closing))
			: current.status;

		const updated: Position = {
			...current,
			currentPrice,
			unrealizedPnl: computePnl(current.side, current.entryPrice, currentPrice, current.size),
			status,
			lastUpdateMs: this.clock.now(),
			metadata: metadata ? { ...current.metadata, ...metadata } : current.metadata,
		};
		await this.save(updated);
		if (breached) {
			this.logger.warn(
				{ positionId: id, stopLoss: current.stopLoss, price: currentPrice },
				"stop-loss triggered",
			);
		}
		return updated;
	}

	/**
	 * Close at `closePrice`: realized PnL is booked, unrealized zeroed.
	 * @throws NotFoundError if the position is unknown
	 * @throws InvalidStateError if the position is already CLOSED
	 */
	async closePosition(id: PositionId, closePrice: number, metadata?: Metadata): Promise<Position> {
		const current = await this.requirePosition(id);
		const status = unwrap(transitionPosition(current.status, PositionStatus.Closed));
		const updated: Position = {
			...current,
			currentPrice: closePrice,
			realizedPnl: computePnl(current.side, current.entryPrice, closePrice, current.size),
			unrealizedPnl: 0,
			status,
			lastUpdateMs: this.clock.now(),
			metadata: metadata ? { ...current.metadata, ...metadata } : current.metadata,
		};
		await this.save(updated);
		this.logger.info({ positionId: id, realizedPnl: updated.realizedPnl }, "position closed");
		return updated;
	}

	async getPosition(id: PositionId): Promise<Position | null> {
		const cached = this.positions.get(id);
		if (cached) return cached;

		const raw = await readRecord(this.store, positionKey(id), this.logger);
		if (raw === null) return null;
		const position = unwrap(decodePosition(raw));
		this.positions.set(id, position);
		return position;
	}

	/** OPEN and CLOSING positions, optionally for one symbol, oldest first. */
	openPositions(symbol?: string): readonly Position[] {
		return this.listPositions().filter(
			(p) => isLivePosition(p.status) && (symbol === undefined || p.symbol === symbol),
		);
	}

	listPositions(): readonly Position[] {
		return [...this.positions.values()].sort((a, b) => a.entryTimeMs - b.entryTimeMs);
	}

	// ── Internal ──────────────────────────────────────────────────

	private async requirePosition(id: PositionId): Promise<Position> {
		const position = await this.getPosition(id);
		if (position === null) {
			throw new NotFoundError("Position", id);
		}
		return position;
	}

	private async save(position: Position): Promise<void> {
		await writeRecord(this.store, positionKey(position.id), encodePosition(position), this.logger);
		this.positions.set(position.id, position);
	}
}
