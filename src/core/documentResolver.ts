/**
 * @file Core logic resolving which statements of a document answer a query.
 */

import type { Statement, VexDocument } from "../types/vex";
import { statementMatches } from "./statementMatcher";
import {
	DEFAULT_FALLBACK_TIME,
	documentFallbackTime,
	effectiveTime,
	sortStatements,
} from "./statementOrder";

/**
 * Options accepted by the document queries.
 */
export type ResolveOptions = {
	/** Effective time for statements when the document has no timestamp either. */
	readonly fallbackTime?: Date;
};

/**
 * A matching statement together with the instant it took effect.
 */
export type StatementMatch = {
	readonly statement: Statement;
	readonly effectiveTime: Date;
};

/**
 * Find every statement of the document matching the query with its effective
 * time, ordered ascending: the authoritative statement is the last element.
 */
export const findTimedMatches = (
	document: VexDocument,
	vulnIdentifier: string,
	productIdentifier: string,
	subcomponentIdentifiers: ReadonlyArray<string>,
	options: ResolveOptions = {},
): ReadonlyArray<StatementMatch> => {
	const statements = document.statements ?? [];
	const matches = statements.filter((statement) =>
		statementMatches(
			statement,
			vulnIdentifier,
			productIdentifier,
			subcomponentIdentifiers,
		),
	);
	const fallback = documentFallbackTime(
		document,
		options.fallbackTime ?? DEFAULT_FALLBACK_TIME,
	);

	return sortStatements(matches, fallback).map((statement) => ({
		statement,
		effectiveTime: effectiveTime(statement, fallback),
	}));
};

/**
 * Find every statement of the document matching the query, ordered ascending by
 * effective time: the authoritative statement is the last element.
 */
export const findMatches = (
	document: VexDocument,
	vulnIdentifier: string,
	productIdentifier: string,
	subcomponentIdentifiers: ReadonlyArray<string>,
	options: ResolveOptions = {},
): ReadonlyArray<Statement> =>
	findTimedMatches(
		document,
		vulnIdentifier,
		productIdentifier,
		subcomponentIdentifiers,
		options,
	).map(({ statement }) => statement);

/**
 * Find the statement holding the latest data about the vulnerability's impact on
 * the product, or `null` when no statement matches.
 */
export const findLatest = (
	document: VexDocument,
	vulnIdentifier: string,
	productIdentifier: string,
	subcomponentIdentifiers: ReadonlyArray<string>,
	options: ResolveOptions = {},
): Statement | null => {
	const matches = findMatches(
		document,
		vulnIdentifier,
		productIdentifier,
		subcomponentIdentifiers,
		options,
	);
	return matches.at(-1) ?? null;
};
