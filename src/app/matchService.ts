/**
 * @file Application service composing document loading, validation, and statement resolution.
 */

import {
	findTimedMatches,
	type StatementMatch,
} from "../core/documentResolver";
import type { StatementQuery } from "../core/statementMatcher";
import {
	type DocumentValidationIssue,
	validateDocument,
} from "../core/statementValidation";
import { createSilentLogger, type Logger } from "../foundation/logger";
import {
	type ParseOpenVexJsonError,
	parseOpenVexJson,
} from "../foundation/openVexJson";
import type {
	DocumentReadError,
	DocumentReader,
} from "../ports/documentReaderPort";
import { err, ok, type Result } from "../types/result";
import type { VexDocument } from "../types/vex";

/**
 * Dependencies required to answer match requests.
 */
export type MatchServiceDependencies = {
	readonly readDocument: DocumentReader;
	readonly decodeDocument?: (
		json: string,
	) => Result<VexDocument, ParseOpenVexJsonError>;
	readonly logger?: Logger;
};

/**
 * Represents a match request against one document source.
 */
export type MatchRequest = StatementQuery & {
	readonly strict?: boolean;
	readonly fallbackTime?: Date | null;
};

export type { StatementMatch };

/**
 * Error variants produced by the match service.
 */
export type MatchServiceError =
	| { readonly type: "document-read-error"; readonly error: DocumentReadError }
	| {
			readonly type: "document-parse-error";
			readonly error: ParseOpenVexJsonError;
	  }
	| {
			readonly type: "document-validation-error";
			readonly issues: ReadonlyArray<DocumentValidationIssue>;
	  };

/**
 * Represents the capability of resolving statements from document sources.
 */
export type MatchService = {
	/** Every matching statement, the authoritative one last. */
	readonly query: (
		source: string,
		request: MatchRequest,
	) => Promise<Result<ReadonlyArray<StatementMatch>, MatchServiceError>>;
	/** The authoritative matching statement, or `null`. */
	readonly latest: (
		source: string,
		request: MatchRequest,
	) => Promise<Result<StatementMatch | null, MatchServiceError>>;
};

/**
 * Create the application service wiring document reading, decoding and matching together.
 */
export const createMatchService = (
	dependencies: MatchServiceDependencies,
): MatchService => {
	const decode = dependencies.decodeDocument ?? parseOpenVexJson;
	const logger = dependencies.logger ?? createSilentLogger();

	const loadDocument = async (
		source: string,
		strict: boolean,
	): Promise<Result<VexDocument, MatchServiceError>> => {
		const text = await dependencies.readDocument(source);
		if (!text.ok) {
			return err({ type: "document-read-error", error: text.error });
		}

		const decoded = decode(text.data);
		if (!decoded.ok) {
			return err({ type: "document-parse-error", error: decoded.error });
		}

		if (strict) {
			const issues = validateDocument(decoded.data);
			if (issues.length > 0) {
				return err({ type: "document-validation-error", issues });
			}
		}

		logger.debug(
			{ source, statements: decoded.data.statements.length },
			"document loaded",
		);
		return ok(decoded.data);
	};

	const query: MatchService["query"] = async (source, request) => {
		const loaded = await loadDocument(source, request.strict ?? false);
		if (!loaded.ok) return loaded;

		const matches = findTimedMatches(
			loaded.data,
			request.vulnerability,
			request.product,
			request.subcomponents,
			{ fallbackTime: request.fallbackTime ?? undefined },
		);

		logger.debug(
			{
				source,
				vulnerability: request.vulnerability,
				product: request.product,
				subcomponents: request.subcomponents.length,
				matches: matches.length,
			},
			"statements matched",
		);
		return ok(matches);
	};

	return {
		query,
		async latest(source, request) {
			const matches = await query(source, request);
			if (!matches.ok) return matches;
			return ok(matches.data.at(-1) ?? null);
		},
	};
};
