/**
 * @file Core rules checking that a statement carries the data its status requires.
 */

import { err, ok, type Result } from "../types/result";
import {
	JUSTIFICATIONS,
	type Justification,
	STATUS_AFFECTED,
	STATUS_NOT_AFFECTED,
	type Statement,
	type VexDocument,
} from "../types/vex";

/**
 * Error variants produced while validating a statement.
 */
export type StatementValidationError =
	| { readonly type: "missing-vulnerability-name" }
	| { readonly type: "missing-products" }
	| { readonly type: "missing-not-affected-reason" }
	| { readonly type: "missing-action-statement" }
	| {
			readonly type: "unexpected-justification";
			readonly status: Statement["status"];
	  }
	| { readonly type: "unknown-justification"; readonly value: string };

/**
 * Validation failure of a statement inside a document.
 */
export type DocumentValidationIssue = {
	readonly index: number;
	readonly statementId: string;
	readonly error: StatementValidationError;
};

const KNOWN_JUSTIFICATIONS = new Set<string>(JUSTIFICATIONS);

/**
 * Determine whether the raw value is one of the OpenVEX justifications.
 */
export const isJustification = (value: string): value is Justification =>
	KNOWN_JUSTIFICATIONS.has(value);

/**
 * Check a statement against the status rules:
 * `not_affected` needs a justification or an impact statement, `affected` needs
 * an action statement, and only `not_affected` may carry a justification.
 */
export const validateStatement = (
	statement: Statement,
): Result<Statement, StatementValidationError> => {
	if (statement.vulnerability.name === "") {
		return err({ type: "missing-vulnerability-name" });
	}

	if (statement.products.length === 0) {
		return err({ type: "missing-products" });
	}

	if (statement.justification !== "") {
		if (!isJustification(statement.justification)) {
			return err({
				type: "unknown-justification",
				value: statement.justification,
			});
		}
		if (statement.status !== STATUS_NOT_AFFECTED) {
			return err({
				type: "unexpected-justification",
				status: statement.status,
			});
		}
	}

	if (
		statement.status === STATUS_NOT_AFFECTED &&
		statement.justification === "" &&
		statement.impactStatement === ""
	) {
		return err({ type: "missing-not-affected-reason" });
	}

	if (
		statement.status === STATUS_AFFECTED &&
		statement.actionStatement === ""
	) {
		return err({ type: "missing-action-statement" });
	}

	return ok(statement);
};

/**
 * Validate every statement of a document, collecting the failures.
 */
export const validateDocument = (
	document: VexDocument,
): ReadonlyArray<DocumentValidationIssue> => {
	const issues: DocumentValidationIssue[] = [];

	document.statements.forEach((statement, index) => {
		const result = validateStatement(statement);
		if (result.ok) return;
		issues.push({ index, statementId: statement.id, error: result.error });
	});

	return issues;
};

/**
 * Convert a statement validation error into a human-readable description.
 */
export const describeStatementValidationError = (
	error: StatementValidationError,
): string => {
	switch (error.type) {
		case "missing-vulnerability-name":
			return "vulnerability name is empty";
		case "missing-products":
			return "statement lists no products";
		case "missing-not-affected-reason":
			return "not_affected statement needs a justification or an impact statement";
		case "missing-action-statement":
			return "affected statement needs an action statement";
		case "unexpected-justification":
			return `justification is only allowed on not_affected statements, got ${error.status}`;
		case "unknown-justification":
			return `unknown justification '${error.value}'`;
	}
};
