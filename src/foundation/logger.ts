/**
 * @file Structured JSON logger shared by the service and boot layers.
 */

import pino, { type DestinationStream, type Logger } from "pino";

/**
 * Environment variable selecting the log level.
 */
export const LOG_LEVEL_ENV = "VEX_MATCH_LOG_LEVEL" as const;

/**
 * Environment variable forcing debug logging when set to `1`.
 */
export const DEBUG_ENV = "VEX_MATCH_DEBUG" as const;

const DEFAULT_LOG_LEVEL = "info";

/**
 * Resolve the log level from the environment.
 */
export const resolveLogLevel = (
	env: Readonly<Record<string, string | undefined>> = process.env,
): string => {
	if (env[DEBUG_ENV] === "1") return "debug";
	const level = env[LOG_LEVEL_ENV];
	return level && level.length > 0 ? level : DEFAULT_LOG_LEVEL;
};

/**
 * Options accepted when creating a logger.
 */
export type CreateLoggerOptions = {
	readonly level?: string;
	/** Defaults to stderr so that stdout only carries results. */
	readonly destination?: DestinationStream;
};

/**
 * Create a named logger.
 */
export const createLogger = (
	name: string,
	options: CreateLoggerOptions = {},
): Logger =>
	pino(
		{ name, level: options.level ?? resolveLogLevel() },
		options.destination ?? pino.destination(2),
	);

/**
 * Logger discarding every record, used as the default for library callers.
 */
export const createSilentLogger = (): Logger => pino({ level: "silent" });

export type { Logger };
