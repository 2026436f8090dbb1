/**
 * @file Port definitions describing runtime configuration for a match run.
 */

/**
 * Literal identifier for listing every matching statement.
 */
export const MATCH_MODE_ALL = "all" as const;

/**
 * Literal identifier for reporting only the authoritative statement.
 */
export const MATCH_MODE_LATEST = "latest" as const;

/**
 * Represents output modes recognised by the boot layer.
 */
export type MatchMode = typeof MATCH_MODE_ALL | typeof MATCH_MODE_LATEST;

/**
 * Represents the combined runtime configuration of a match run.
 */
export type MatchRuntimeConfig = {
	readonly documentPath: string;
	readonly vulnerability: string;
	readonly product: string;
	readonly subcomponents: ReadonlyArray<string>;
	readonly mode: MatchMode;
	/** Reject documents holding statements that fail validation. */
	readonly strict: boolean;
	/** Effective time for statements when the document carries no timestamp. */
	readonly fallbackTime: Date | null;
};
