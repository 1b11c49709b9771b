/**
 * Event types: the closed set of variants the EventBus accepts.
 *
 * Every variant belongs to exactly one category. External callers
 * (a dashboard transport, a CLI) pass raw strings through parseEventType().
 */

import { ValidationError } from "../shared/errors.js";

export const EventType = {
	// trade
	TradeExecuted: "trade_executed",
	// order
	OrderPlaced: "order_placed",
	OrderFilled: "order_filled",
	OrderFailed: "order_failed",
	OrderCancelled: "order_cancelled",
	// position
	PositionOpened: "position_opened",
	PositionUpdated: "position_updated",
	PositionClosing: "position_closing",
	PositionClosed: "position_closed",
	// strategy
	StrategyStarted: "strategy_started",
	StrategyStopped: "strategy_stopped",
	StrategyUpdated: "strategy_updated",
	StrategySignal: "strategy_signal",
	// system
	SystemError: "system_error",
	SystemWarning: "system_warning",
	SystemStatus: "system_status",
	// market
	PriceUpdate: "price_update",
	VolumeSpike: "volume_spike",
	VolatilityAlert: "volatility_alert",
	// risk
	RiskLimitBreach: "risk_limit_breach",
	MarginCall: "margin_call",
	AccountValueUpdate: "account_value_update",
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

export const EventCategory = {
	Trade: "trade",
	Order: "order",
	Position: "position",
	Strategy: "strategy",
	System: "system",
	Market: "market",
	Risk: "risk",
} as const;

export type EventCategory = (typeof EventCategory)[keyof typeof EventCategory];

export const ALL_EVENT_TYPES: readonly EventType[] = Object.values(EventType);

const EVENT_TYPE_SET: ReadonlySet<string> = new Set(ALL_EVENT_TYPES);

/** Type guard for raw strings arriving from outside the type system. */
export function isEventType(value: string): value is EventType {
	return EVENT_TYPE_SET.has(value);
}

/** @throws ValidationError for a string outside the closed set */
export function parseEventType(raw: string): EventType {
	if (!isEventType(raw)) {
		throw new ValidationError(`Unknown event type: ${raw}`, [
			{ path: ["eventType"], message: `expected one of ${ALL_EVENT_TYPES.join(", ")}` },
		]);
	}
	return raw;
}

export function categoryOf(type: EventType): EventCategory {
	switch (type) {
		case EventType.TradeExecuted:
			return EventCategory.Trade;
		case EventType.OrderPlaced:
		case EventType.OrderFilled:
		case EventType.OrderFailed:
		case EventType.OrderCancelled:
			return EventCategory.Order;
		case EventType.PositionOpened:
		case EventType.PositionUpdated:
		case EventType.PositionClosing:
		case EventType.PositionClosed:
			return EventCategory.Position;
		case EventType.StrategyStarted:
		case EventType.StrategyStopped:
		case EventType.StrategyUpdated:
		case EventType.StrategySignal:
			return EventCategory.Strategy;
		case EventType.SystemError:
		case EventType.SystemWarning:
		case EventType.SystemStatus:
			return EventCategory.System;
		case EventType.PriceUpdate:
		case EventType.VolumeSpike:
		case EventType.VolatilityAlert:
			return EventCategory.Market;
		case EventType.RiskLimitBreach:
		case EventType.MarginCall:
		case EventType.AccountValueUpdate:
			return EventCategory.Risk;
	}
}

/** All event types in one category, in declaration order. */
export function typesInCategory(category: EventCategory): readonly EventType[] {
	return ALL_EVENT_TYPES.filter((t) => categoryOf(t) === category);
}

// ── Event shape ──────────────────────────────────────────────────────

/** Flat payload map; ledgers emit their serialized records here. */
export type EventPayload = Readonly<Record<string, unknown>>;

export interface BusEvent {
	readonly eventType: EventType;
	/** ISO-8601 UTC, stamped by the bus at emit time */
	readonly timestamp: string;
	readonly payload: EventPayload;
}
