import { InvalidStateError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import { PositionStatus } from "./types.js";

const VALID_TRANSITIONS: ReadonlyMap<PositionStatus, readonly PositionStatus[]> = new Map([
	[PositionStatus.Open, [PositionStatus.Closing, PositionStatus.Closed]],
	[PositionStatus.Closing, [PositionStatus.Closed]],
	[PositionStatus.Closed, []],
]);

/** OPEN and CLOSING positions still carry exposure. */
export function isLivePosition(status: PositionStatus): boolean {
	switch (status) {
		case PositionStatus.Open:
		case PositionStatus.Closing:
			return true;
		case PositionStatus.Closed:
			return false;
	}
}

export function canTransitionPosition(from: PositionStatus, to: PositionStatus): boolean {
	return VALID_TRANSITIONS.get(from)?.includes(to) ?? false;
}

export function transitionPosition(
	from: PositionStatus,
	to: PositionStatus,
): Result<PositionStatus, InvalidStateError> {
	if (!canTransitionPosition(from, to)) {
		return err(
			new InvalidStateError(`Invalid position transition: ${from} -> ${to}`, {
				from,
				to,
			}),
		);
	}
	return ok(to);
}
