import { NotFoundError } from "../shared/errors.js";
import type { MaCrossoverParams } from "./strategies/ma-crossover.js";

/**
 * Named parameter sets for the MA crossover.
 * Conservative matches default; aggressive trades faster averages, a lower
 * volume floor and a larger risk budget.
 */
export const MA_CROSSOVER_PRESETS = {
	default: { fastPeriod: 20, slowPeriod: 50, minVolume: 1_000_000, riskFactor: 0.02 },
	conservative: { fastPeriod: 20, slowPeriod: 50, minVolume: 1_000_000, riskFactor: 0.02 },
	aggressive: { fastPeriod: 10, slowPeriod: 21, minVolume: 500_000, riskFactor: 0.05 },
} as const satisfies Record<string, MaCrossoverParams>;

export type MaCrossoverPreset = keyof typeof MA_CROSSOVER_PRESETS;

function isPreset(name: string): name is MaCrossoverPreset {
	return Object.hasOwn(MA_CROSSOVER_PRESETS, name);
}

/**
 * Preset parameters with `overrides` applied on top.
 * @throws NotFoundError for an unknown preset name
 */
export function maCrossoverPreset(
	name: string,
	overrides: Partial<MaCrossoverParams> = {},
): MaCrossoverParams {
	if (!isPreset(name)) {
		throw new NotFoundError("Preset", name);
	}
	return { ...MA_CROSSOVER_PRESETS[name], ...overrides };
}
