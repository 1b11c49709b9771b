/**
 * Position records persisted under `position:{id}`.
 */

import { validate, z } from "../lib/validation/index.js";
import type { ValidationError } from "../shared/errors.js";
import { positionId } from "../shared/identifiers.js";
import { jsonObjectSchema } from "../shared/json.js";
import type { Result } from "../shared/result.js";
import { sideSchema } from "../shared/side.js";
import { fromIso, toIso } from "../shared/time.js";
import type { StoreValue } from "../store/types.js";
import { type Position, PositionStatus } from "./types.js";

const isoSchema = z.string().datetime();

const positionRecordSchema = z
	.object({
		id: z.string().min(1),
		symbol: z.string().min(1),
		side: sideSchema,
		size: z.number().positive(),
		entryPrice: z.number().positive(),
		currentPrice: z.number(),
		status: z.nativeEnum(PositionStatus),
		unrealizedPnl: z.number(),
		realizedPnl: z.number(),
		stopLoss: z.number().nullable(),
		entryTime: isoSchema,
		lastUpdate: isoSchema,
		metadata: jsonObjectSchema,
	})
	.transform(
		(r): Position => ({
			id: positionId(r.id),
			symbol: r.symbol,
			side: r.side,
			size: r.size,
			entryPrice: r.entryPrice,
			currentPrice: r.currentPrice,
			status: r.status,
			unrealizedPnl: r.unrealizedPnl,
			realizedPnl: r.realizedPnl,
			stopLoss: r.stopLoss,
			entryTimeMs: fromIso(r.entryTime),
			lastUpdateMs: fromIso(r.lastUpdate),
			metadata: r.metadata,
		}),
	);

export function encodePosition(position: Position): StoreValue {
	return {
		id: position.id,
		symbol: position.symbol,
		side: position.side,
		size: position.size,
		entryPrice: position.entryPrice,
		currentPrice: position.currentPrice,
		status: position.status,
		unrealizedPnl: position.unrealizedPnl,
		realizedPnl: position.realizedPnl,
		stopLoss: position.stopLoss,
		entryTime: toIso(position.entryTimeMs),
		lastUpdate: toIso(position.lastUpdateMs),
		metadata: position.metadata,
	};
}

export function decodePosition(value: unknown): Result<Position, ValidationError> {
	return validate(positionRecordSchema, value, "Invalid position record");
}
