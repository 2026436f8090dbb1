/**
 * @file Core logic ordering statements by the time they took effect.
 */

import type { Statement, VexDocument } from "../types/vex";

/**
 * Instant used when neither the statement nor the document carries a timestamp.
 */
export const DEFAULT_FALLBACK_TIME = new Date(0);

/**
 * Resolve the instant a statement took effect: its own update or issue time,
 * else the supplied fallback.
 */
export const effectiveTime = (statement: Statement, fallback: Date): Date =>
	statement.lastUpdated ?? statement.timestamp ?? fallback;

/**
 * Resolve the fallback instant for statements of a document.
 */
export const documentFallbackTime = (
	document: Pick<VexDocument, "timestamp" | "lastUpdated">,
	fallback: Date = DEFAULT_FALLBACK_TIME,
): Date => document.lastUpdated ?? document.timestamp ?? fallback;

/**
 * Return a copy of the statements sorted ascending by effective time, the most
 * recent last. Statements with the same effective time keep their input order,
 * so a later statement stays after an earlier one.
 */
export const sortStatements = (
	statements: ReadonlyArray<Statement>,
	fallback: Date = DEFAULT_FALLBACK_TIME,
): ReadonlyArray<Statement> =>
	statements
		.map((statement, index) => ({
			statement,
			index,
			time: effectiveTime(statement, fallback).getTime(),
		}))
		.sort((left, right) => left.time - right.time || left.index - right.index)
		.map(({ statement }) => statement);
