/**
 * @file Parser for translating CLI arguments into match runtime configuration.
 */

import {
	MATCH_MODE_ALL,
	MATCH_MODE_LATEST,
	type MatchMode,
	type MatchRuntimeConfig,
} from "../ports/matchConfigPort";
import { err, ok, type Result } from "../types/result";

/**
 * Options taking a value, as `--option value` or `--option=value`.
 */
const VALUE_OPTIONS = new Set([
	"--document",
	"--vulnerability",
	"--product",
	"--subcomponent",
	"--fallback-time",
]);

/**
 * Options acting as boolean switches.
 */
const FLAG_OPTIONS = new Set(["--latest", "--strict"]);

/**
 * Options that must be supplied.
 */
const REQUIRED_OPTIONS = ["--document", "--vulnerability", "--product"] as const;

/**
 * Error identifier for unknown CLI options.
 */
export const CLI_ARGS_ERROR_UNKNOWN_OPTION = "unknown-option" as const;

/**
 * Error identifier for options missing a value.
 */
export const CLI_ARGS_ERROR_MISSING_VALUE = "missing-value" as const;

/**
 * Error identifier for required options that were not supplied.
 */
export const CLI_ARGS_ERROR_MISSING_OPTION = "missing-option" as const;

/**
 * Error identifier for flags given a value.
 */
export const CLI_ARGS_ERROR_UNEXPECTED_VALUE = "unexpected-value" as const;

/**
 * Error identifier for fallback times that are not RFC 3339 instants.
 */
export const CLI_ARGS_ERROR_INVALID_TIME = "invalid-time" as const;

/**
 * Error variants produced while parsing CLI arguments.
 */
export type ParseCliArgsError =
	| {
			readonly type: typeof CLI_ARGS_ERROR_UNKNOWN_OPTION;
			readonly option: string;
	  }
	| {
			readonly type: typeof CLI_ARGS_ERROR_MISSING_VALUE;
			readonly option: string;
	  }
	| {
			readonly type: typeof CLI_ARGS_ERROR_MISSING_OPTION;
			readonly option: string;
	  }
	| {
			readonly type: typeof CLI_ARGS_ERROR_UNEXPECTED_VALUE;
			readonly option: string;
	  }
	| {
			readonly type: typeof CLI_ARGS_ERROR_INVALID_TIME;
			readonly value: string;
	  };

const RFC3339_PATTERN =
	/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/i;

/**
 * Parse CLI arguments into a match runtime configuration.
 */
export const parseCliArgs = (
	argv: ReadonlyArray<string>,
): Result<MatchRuntimeConfig, ParseCliArgsError> => {
	const values = new Map<string, string>();
	const subcomponents: string[] = [];
	let mode: MatchMode = MATCH_MODE_ALL;
	let strict = false;

	for (let index = 0; index < argv.length; index += 1) {
		const token = argv[index] ?? "";
		if (!token.startsWith("--")) {
			return err({ type: CLI_ARGS_ERROR_UNKNOWN_OPTION, option: token });
		}

		const { option, inlineValue } = splitOption(token);

		if (FLAG_OPTIONS.has(option)) {
			if (inlineValue !== null) {
				return err({ type: CLI_ARGS_ERROR_UNEXPECTED_VALUE, option });
			}
			if (option === "--latest") mode = MATCH_MODE_LATEST;
			if (option === "--strict") strict = true;
			continue;
		}

		if (!VALUE_OPTIONS.has(option)) {
			return err({ type: CLI_ARGS_ERROR_UNKNOWN_OPTION, option });
		}

		let value = inlineValue;
		if (value === null) {
			const next = argv[index + 1];
			if (!next || next.startsWith("--")) {
				return err({ type: CLI_ARGS_ERROR_MISSING_VALUE, option });
			}
			value = next;
			index += 1;
		}

		if (option === "--subcomponent") {
			subcomponents.push(value);
		} else {
			values.set(option, value);
		}
	}

	for (const option of REQUIRED_OPTIONS) {
		if (!values.get(option)) {
			return err({ type: CLI_ARGS_ERROR_MISSING_OPTION, option });
		}
	}

	let fallbackTime: Date | null = null;
	const rawFallbackTime = values.get("--fallback-time");
	if (rawFallbackTime !== undefined) {
		const parsed = new Date(rawFallbackTime);
		if (
			!RFC3339_PATTERN.test(rawFallbackTime) ||
			Number.isNaN(parsed.getTime())
		) {
			return err({ type: CLI_ARGS_ERROR_INVALID_TIME, value: rawFallbackTime });
		}
		fallbackTime = parsed;
	}

	return ok({
		documentPath: values.get("--document") ?? "",
		vulnerability: values.get("--vulnerability") ?? "",
		product: values.get("--product") ?? "",
		subcomponents,
		mode,
		strict,
		fallbackTime,
	});
};

/**
 * Split a CLI option token into the option name and inline value when present.
 */
const splitOption = (
	token: string,
): { readonly option: string; readonly inlineValue: string | null } => {
	const equalIndex = token.indexOf("=");
	if (equalIndex <= 0) {
		return { option: token, inlineValue: null };
	}

	return {
		option: token.slice(0, equalIndex),
		inlineValue: token.slice(equalIndex + 1),
	};
};

/**
 * Convert CLI argument parse errors into human-readable descriptions.
 */
export const describeCliArgsError = (error: ParseCliArgsError): string => {
	switch (error.type) {
		case CLI_ARGS_ERROR_UNKNOWN_OPTION:
			return `unknown option ${error.option}`;
		case CLI_ARGS_ERROR_MISSING_VALUE:
			return `missing value for ${error.option}`;
		case CLI_ARGS_ERROR_MISSING_OPTION:
			return `missing required option ${error.option}`;
		case CLI_ARGS_ERROR_UNEXPECTED_VALUE:
			return `option ${error.option} takes no value`;
		case CLI_ARGS_ERROR_INVALID_TIME:
			return `invalid fallback time '${error.value}'`;
	}
};
