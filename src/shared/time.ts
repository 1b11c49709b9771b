/**
 * Time source and the ISO-8601 boundary.
 *
 * Core code asks a Clock for epoch milliseconds and never calls Date.now()
 * directly. Records store timestamps as ISO strings.
 */

export interface Clock {
	now(): number;
}

export const SystemClock: Clock = { now: () => Date.now() };

/** Clock that only moves when told to. */
export class FakeClock implements Clock {
	constructor(private current = 0) {}

	now(): number {
		return this.current;
	}

	advance(ms: number): void {
		this.current += ms;
	}

	set(ms: number): void {
		this.current = ms;
	}
}

export const toIso = (ms: number): string => new Date(ms).toISOString();

/** @throws Error if `iso` does not parse */
export function fromIso(iso: string): number {
	const ms = Date.parse(iso);
	if (Number.isNaN(ms)) throw new Error(`Invalid ISO-8601 timestamp: ${iso}`);
	return ms;
}
