/**
 * Core configuration.
 *
 * Defaults live in DEFAULT_CORE_CONFIG; environment overrides are read from
 * TRADEPILOT_* variables and merged with resolveConfig(), which validates
 * the final shape. Loading files or templates is left to the host process.
 */

import { formatIssues, validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface TradingConfig {
	/** Notional account size used by risk-budget position sizing */
	readonly accountSize: number;
	/** Stop distance assumed by position sizing (0.05 = 5%) */
	readonly assumedStopLossFraction: number;
	/** Stop-loss placed on positions opened from entry signals (0.05 = 5%) */
	readonly defaultStopLossPercent: number;
	/** Signals sized below this are dropped */
	readonly minPositionSize: number;
	/** Signal sizes are clamped to this */
	readonly maxPositionSize: number;
}

export interface EventsConfig {
	/** Ring buffer capacity per event type */
	readonly historyLimit: number;
}

export interface CoreConfig {
	readonly trading: TradingConfig;
	readonly events: EventsConfig;
	readonly logLevel: LogLevel;
}

export const DEFAULT_CORE_CONFIG: CoreConfig = {
	trading: {
		accountSize: 1_000,
		assumedStopLossFraction: 0.05,
		defaultStopLossPercent: 0.05,
		minPositionSize: 0,
		maxPositionSize: Number.POSITIVE_INFINITY,
	},
	events: {
		historyLimit: 1_000,
	},
	logLevel: "info",
};

/** Partial override accepted by resolveConfig(). */
export interface CoreConfigOverrides {
	readonly trading?: Partial<TradingConfig>;
	readonly events?: Partial<EventsConfig>;
	readonly logLevel?: LogLevel;
}

const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

const coreConfigSchema = z
	.object({
		trading: z.object({
			accountSize: z.number().positive(),
			assumedStopLossFraction: z.number().positive().max(1),
			defaultStopLossPercent: z.number().min(0).max(1),
			minPositionSize: z.number().min(0),
			maxPositionSize: z.number().positive(),
		}),
		events: z.object({
			historyLimit: z.number().int().positive(),
		}),
		logLevel: logLevelSchema,
	})
	.refine((c) => c.trading.minPositionSize <= c.trading.maxPositionSize, {
		message: "minPositionSize must not exceed maxPositionSize",
		path: ["trading", "minPositionSize"],
	});

/**
 * Merge overrides onto the defaults and validate the result.
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(overrides: CoreConfigOverrides = {}): CoreConfig {
	const merged: CoreConfig = {
		trading: { ...DEFAULT_CORE_CONFIG.trading, ...overrides.trading },
		events: { ...DEFAULT_CORE_CONFIG.events, ...overrides.events },
		logLevel: overrides.logLevel ?? DEFAULT_CORE_CONFIG.logLevel,
	};
	const result = validate(coreConfigSchema, merged);
	if (!result.ok) {
		throw new ConfigError(`Invalid configuration: ${formatIssues(result.error.issues)}`, {
			cause: result.error,
		});
	}
	return result.value;
}

// ── Environment ──────────────────────────────────────────────────────

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Reads overrides from TRADEPILOT_* environment variables.
 * Supported: TRADEPILOT_LOG_LEVEL, TRADEPILOT_ACCOUNT_SIZE,
 * TRADEPILOT_ASSUMED_STOP_LOSS, TRADEPILOT_DEFAULT_STOP_LOSS,
 * TRADEPILOT_MIN_POSITION_SIZE, TRADEPILOT_MAX_POSITION_SIZE,
 * TRADEPILOT_EVENT_HISTORY_LIMIT.
 * @throws ConfigError if a variable holds a malformed value
 */
export function configFromEnv(env: Env = process.env): CoreConfigOverrides {
	const trading: Partial<Record<keyof TradingConfig, number>> = {};
	const events: Partial<Record<keyof EventsConfig, number>> = {};

	setNumber(env, "TRADEPILOT_ACCOUNT_SIZE", (n) => {
		trading.accountSize = n;
	});
	setNumber(env, "TRADEPILOT_ASSUMED_STOP_LOSS", (n) => {
		trading.assumedStopLossFraction = n;
	});
	setNumber(env, "TRADEPILOT_DEFAULT_STOP_LOSS", (n) => {
		trading.defaultStopLossPercent = n;
	});
	setNumber(env, "TRADEPILOT_MIN_POSITION_SIZE", (n) => {
		trading.minPositionSize = n;
	});
	setNumber(env, "TRADEPILOT_MAX_POSITION_SIZE", (n) => {
		trading.maxPositionSize = n;
	});
	setNumber(env, "TRADEPILOT_EVENT_HISTORY_LIMIT", (n) => {
		if (!Number.isInteger(n)) {
			throw new ConfigError(`Invalid TRADEPILOT_EVENT_HISTORY_LIMIT: "${n}" must be an integer`);
		}
		events.historyLimit = n;
	});

	const overrides: {
		trading?: Partial<TradingConfig>;
		events?: Partial<EventsConfig>;
		logLevel?: LogLevel;
	} = {};
	if (Object.keys(trading).length > 0) overrides.trading = trading;
	if (Object.keys(events).length > 0) overrides.events = events;

	const rawLevel = env.TRADEPILOT_LOG_LEVEL;
	if (rawLevel !== undefined && rawLevel !== "") {
		const level = logLevelSchema.safeParse(rawLevel.trim().toLowerCase());
		if (!level.success) {
			throw new ConfigError(`Invalid TRADEPILOT_LOG_LEVEL: "${rawLevel}"`);
		}
		overrides.logLevel = level.data;
	}

	return overrides;
}

function setNumber(env: Env, key: string, assign: (n: number) => void): void {
	const raw = env[key];
	if (raw === undefined || raw.trim() === "") return;
	const parsed = Number(raw.trim());
	if (!Number.isFinite(parsed)) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be a finite number`);
	}
	assign(parsed);
}
