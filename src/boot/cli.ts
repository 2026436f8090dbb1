/**
 * @file Bootstraps the `vex-match` command with real adapters.
 *
 * Reads an OpenVEX document from disk, resolves the statements answering the
 * queried vulnerability/product/subcomponents, and prints one JSON line per
 * statement to stdout, the authoritative one last.
 *
 * Exit codes: 0 when statements matched, 1 when none did, 2 on usage or load errors.
 */

import { readFile } from "node:fs/promises";

import {
	createMatchService,
	type MatchService,
	type MatchServiceError,
	type StatementMatch,
} from "../app/matchService";
import { describeStatementValidationError } from "../core/statementValidation";
import {
	describeCliArgsError,
	parseCliArgs,
} from "../foundation/cliArgs";
import { createLogger, type Logger } from "../foundation/logger";
import type { ParseOpenVexJsonError } from "../foundation/openVexJson";
import type {
	DocumentReadError,
	DocumentReader,
} from "../ports/documentReaderPort";
import {
	MATCH_MODE_LATEST,
	type MatchRuntimeConfig,
} from "../ports/matchConfigPort";
import { causeMessage, err, ok, tryResultAsync } from "../types/result";

export const EXIT_CODE_MATCHED = 0 as const;
export const EXIT_CODE_NO_MATCH = 1 as const;
export const EXIT_CODE_ERROR = 2 as const;

export type ExitCode =
	| typeof EXIT_CODE_MATCHED
	| typeof EXIT_CODE_NO_MATCH
	| typeof EXIT_CODE_ERROR;

/**
 * Default implementation of the document reader loading files from disk.
 */
const defaultReadDocument: DocumentReader = async (source) => {
	const text = await tryResultAsync(() => readFile(source, "utf8"));
	if (text.ok) return ok(text.data);

	const cause = text.error;
	if (cause instanceof Error && "code" in cause && cause.code === "ENOENT") {
		return err({ type: "document-not-found", source });
	}
	return err({
		type: "document-read-error",
		source,
		message: causeMessage(cause),
	});
};

/**
 * Options accepted when constructing the CLI.
 */
export type CreateCliOptions = {
	readonly readDocument?: DocumentReader;
	readonly matchService?: MatchService;
	readonly logger?: Logger;
	readonly writeOut?: (line: string) => void;
	readonly writeErr?: (line: string) => void;
};

/**
 * Represents the command line program.
 */
export type Cli = {
	readonly run: (argv: ReadonlyArray<string>) => Promise<ExitCode>;
};

/**
 * Create the `vex-match` program.
 */
export const createCli = (options: CreateCliOptions = {}): Cli => {
	const logger = options.logger ?? createLogger("vex-match");
	const matchService =
		options.matchService ??
		createMatchService({
			readDocument: options.readDocument ?? defaultReadDocument,
			logger,
		});
	const writeOut =
		options.writeOut ?? ((line: string) => process.stdout.write(`${line}\n`));
	const writeErr =
		options.writeErr ?? ((line: string) => process.stderr.write(`${line}\n`));

	return {
		async run(argv) {
			const parsed = parseCliArgs(argv);
			if (!parsed.ok) {
				writeErr(`vex-match: ${describeCliArgsError(parsed.error)}`);
				writeErr(USAGE);
				return EXIT_CODE_ERROR;
			}

			const config = parsed.data;
			const request = {
				vulnerability: config.vulnerability,
				product: config.product,
				subcomponents: config.subcomponents,
				strict: config.strict,
				fallbackTime: config.fallbackTime,
			};

			const result = await matchService.query(config.documentPath, request);
			if (!result.ok) {
				for (const line of describeServiceError(result.error)) {
					writeErr(`vex-match: ${line}`);
				}
				return EXIT_CODE_ERROR;
			}

			const selected = selectMatches(result.data, config);
			logger.debug(
				{
					document: config.documentPath,
					mode: config.mode,
					matches: result.data.length,
					printed: selected.length,
				},
				"query finished",
			);

			for (const match of selected) {
				writeOut(JSON.stringify(toOutputRecord(match)));
			}

			return selected.length > 0 ? EXIT_CODE_MATCHED : EXIT_CODE_NO_MATCH;
		},
	};
};

const USAGE =
	"usage: vex-match --document <path> --vulnerability <id> --product <id> [--subcomponent <id>]... [--latest] [--strict] [--fallback-time <rfc3339>]";

/**
 * Keep only the authoritative statement in latest mode.
 */
const selectMatches = (
	matches: ReadonlyArray<StatementMatch>,
	config: MatchRuntimeConfig,
): ReadonlyArray<StatementMatch> => {
	if (config.mode !== MATCH_MODE_LATEST) return matches;
	const last = matches.at(-1);
	return last ? [last] : [];
};

/**
 * Shape of the JSON line printed for a statement.
 */
export type StatementOutputRecord = {
	readonly id: string;
	readonly vulnerability: string;
	readonly status: string;
	readonly justification?: string;
	readonly impact_statement?: string;
	readonly action_statement?: string;
	readonly effective_time: string;
};

const toOutputRecord = ({
	statement,
	effectiveTime,
}: StatementMatch): StatementOutputRecord => ({
	id: statement.id,
	vulnerability: statement.vulnerability.name,
	status: statement.status,
	...(statement.justification !== ""
		? { justification: statement.justification }
		: {}),
	...(statement.impactStatement !== ""
		? { impact_statement: statement.impactStatement }
		: {}),
	...(statement.actionStatement !== ""
		? { action_statement: statement.actionStatement }
		: {}),
	effective_time: effectiveTime.toISOString(),
});

/**
 * Convert service-level errors into human-readable descriptions.
 */
const describeServiceError = (
	error: MatchServiceError,
): ReadonlyArray<string> => {
	switch (error.type) {
		case "document-read-error":
			return [describeDocumentReadError(error.error)];
		case "document-parse-error":
			return describeParseError(error.error);
		case "document-validation-error":
			return error.issues.map(
				(issue) =>
					`invalid statement #${issue.index}${
						issue.statementId ? ` (${issue.statementId})` : ""
					}: ${describeStatementValidationError(issue.error)}`,
			);
	}
};

const describeDocumentReadError = (error: DocumentReadError): string => {
	switch (error.type) {
		case "document-not-found":
			return `document ${error.source} not found`;
		case "document-read-error":
			return `failed to read ${error.source}: ${error.message}`;
	}
};

const describeParseError = (
	error: ParseOpenVexJsonError,
): ReadonlyArray<string> => {
	switch (error.type) {
		case "invalid-json":
			return [`document is not valid JSON: ${error.message}`];
		case "invalid-document":
			return error.issues.map((issue) => `invalid document: ${issue}`);
	}
};
