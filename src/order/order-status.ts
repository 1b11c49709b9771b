/**
 * Order status machine: validated, forward-only transitions.
 */

import { InvalidStateError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import { OrderStatus } from "./types.js";

const VALID_TRANSITIONS: ReadonlyMap<OrderStatus, readonly OrderStatus[]> = new Map([
	[OrderStatus.Pending, [OrderStatus.Filled, OrderStatus.Failed, OrderStatus.Cancelled]],
	[OrderStatus.Filled, []],
	[OrderStatus.Failed, []],
	[OrderStatus.Cancelled, []],
]);

/**
 * Terminal statuses admit no further transition.
 *
 * @example
 * ```ts
 * isTerminalOrderStatus(OrderStatus.Filled); // true
 * isTerminalOrderStatus(OrderStatus.Pending); // false
 * ```
 */
export function isTerminalOrderStatus(status: OrderStatus): boolean {
	switch (status) {
		case OrderStatus.Pending:
			return false;
		case OrderStatus.Filled:
		case OrderStatus.Failed:
		case OrderStatus.Cancelled:
			return true;
	}
}

export function canTransitionOrder(from: OrderStatus, to: OrderStatus): boolean {
	return VALID_TRANSITIONS.get(from)?.includes(to) ?? false;
}

/** Validate `from → to`; the error carries both statuses. */
export function transitionOrder(
	from: OrderStatus,
	to: OrderStatus,
): Result<OrderStatus, InvalidStateError> {
	if (!canTransitionOrder(from, to)) {
		return err(
			new InvalidStateError(`Invalid order transition: ${from} -> ${to}`, {
				from,
				to,
			}),
		);
	}
	return ok(to);
}
