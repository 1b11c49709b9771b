/**
 * Order/trade records: the flat maps persisted under `order:{id}` and
 * `trade:{id}`. Enumerations are stored as their lowercase tokens and
 * timestamps as ISO-8601 UTC; decode validates with zod.
 */

import { validate, z } from "../lib/validation/index.js";
import type { ValidationError } from "../shared/errors.js";
import { orderId, positionId, tradeId } from "../shared/identifiers.js";
import { jsonObjectSchema } from "../shared/json.js";
import type { Result } from "../shared/result.js";
import { sideSchema } from "../shared/side.js";
import { fromIso, toIso } from "../shared/time.js";
import type { StoreValue } from "../store/types.js";
import { type Order, OrderKind, OrderStatus, type Trade } from "./types.js";

const isoSchema = z.string().datetime();

const orderRecordSchema = z
	.object({
		id: z.string().min(1),
		symbol: z.string().min(1),
		side: sideSchema,
		size: z.number().positive(),
		price: z.number().nullable(),
		kind: z.nativeEnum(OrderKind),
		status: z.nativeEnum(OrderStatus),
		submittedAt: isoSchema,
		filledPrice: z.number().nullable(),
		filledSize: z.number().nullable(),
		filledAt: isoSchema.nullable(),
		error: z.string().nullable(),
		metadata: jsonObjectSchema,
	})
	.transform(
		(r): Order => ({
			id: orderId(r.id),
			symbol: r.symbol,
			side: r.side,
			size: r.size,
			price: r.price,
			kind: r.kind,
			status: r.status,
			submittedAtMs: fromIso(r.submittedAt),
			filledPrice: r.filledPrice,
			filledSize: r.filledSize,
			filledAtMs: r.filledAt === null ? null : fromIso(r.filledAt),
			error: r.error,
			metadata: r.metadata,
		}),
	);

const tradeRecordSchema = z
	.object({
		id: z.string().min(1),
		orderId: z.string().min(1),
		positionId: z.string().min(1).nullable(),
		symbol: z.string().min(1),
		side: sideSchema,
		size: z.number().positive(),
		price: z.number().positive(),
		fee: z.number().min(0),
		timestamp: isoSchema,
		metadata: jsonObjectSchema,
	})
	.transform(
		(r): Trade => ({
			id: tradeId(r.id),
			orderId: orderId(r.orderId),
			positionId: r.positionId === null ? null : positionId(r.positionId),
			symbol: r.symbol,
			side: r.side,
			size: r.size,
			price: r.price,
			fee: r.fee,
			timestampMs: fromIso(r.timestamp),
			metadata: r.metadata,
		}),
	);

export function encodeOrder(order: Order): StoreValue {
	return {
		id: order.id,
		symbol: order.symbol,
		side: order.side,
		size: order.size,
		price: order.price,
		kind: order.kind,
		status: order.status,
		submittedAt: toIso(order.submittedAtMs),
		filledPrice: order.filledPrice,
		filledSize: order.filledSize,
		filledAt: order.filledAtMs === null ? null : toIso(order.filledAtMs),
		error: order.error,
		metadata: order.metadata,
	};
}

export function decodeOrder(value: unknown): Result<Order, ValidationError> {
	return validate(orderRecordSchema, value, "Invalid order record");
}

export function encodeTrade(trade: Trade): StoreValue {
	return {
		id: trade.id,
		orderId: trade.orderId,
		positionId: trade.positionId,
		symbol: trade.symbol,
		side: trade.side,
		size: trade.size,
		price: trade.price,
		fee: trade.fee,
		timestamp: toIso(trade.timestampMs),
		metadata: trade.metadata,
	};
}

export function decodeTrade(value: unknown): Result<Trade, ValidationError> {
	return validate(tradeRecordSchema, value, "Invalid trade record");
}
