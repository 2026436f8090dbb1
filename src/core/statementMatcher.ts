/**
 * @file Core logic deciding whether a statement answers a (vulnerability, product, subcomponents) query.
 */

import type { Statement } from "../types/vex";
import { productMatches } from "./componentMatcher";
import { vulnerabilityMatches } from "./vulnerabilityMatcher";

/**
 * Represents a statement query. An empty subcomponent list queries the bare product.
 */
export type StatementQuery = {
	readonly vulnerability: string;
	readonly product: string;
	readonly subcomponents: ReadonlyArray<string>;
};

/**
 * Determine whether the statement matches the vulnerability, the product and any
 * of the subcomponent identifiers.
 */
export const statementMatches = (
	statement: Statement,
	vulnIdentifier: string,
	productIdentifier: string,
	subcomponentIdentifiers: ReadonlyArray<string>,
): boolean => {
	if (!vulnerabilityMatches(statement.vulnerability, vulnIdentifier)) {
		return false;
	}

	return statement.products.some((product) => {
		if (subcomponentIdentifiers.length === 0) {
			return productMatches(product, productIdentifier, "");
		}
		return subcomponentIdentifiers.some((candidate) =>
			productMatches(product, productIdentifier, candidate),
		);
	});
};

/**
 * Query-object variant of {@link statementMatches}.
 */
export const statementMatchesQuery = (
	statement: Statement,
	query: StatementQuery,
): boolean =>
	statementMatches(
		statement,
		query.vulnerability,
		query.product,
		query.subcomponents,
	);
