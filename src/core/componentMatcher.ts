/**
 * @file Core logic deciding whether identifiers denote a component or product.
 */

import { hasPurlScheme } from "../foundation/packageUrl";
import {
	IDENTIFIER_TYPE_PURL,
	type Component,
	type Product,
} from "../types/vex";
import { purlMatches } from "./purlMatcher";

/**
 * Determine whether the identifier (opaque ID, purl or hash) names the component.
 *
 * Checked in order: the component ID (exactly, or as a general purl), the typed
 * identifiers (exactly, or as general purls for the `purl` type) and finally the
 * hashes. The empty identifier never matches.
 */
export const componentMatches = (
	component: Component,
	identifier: string,
): boolean => {
	if (identifier === "") return false;

	if (component.id === identifier) return true;
	if (hasPurlScheme(component.id) && purlMatches(component.id, identifier)) {
		return true;
	}

	for (const [type, value] of sortedEntries(component.identifiers)) {
		if (value === identifier) return true;
		if (
			type === IDENTIFIER_TYPE_PURL &&
			hasPurlScheme(identifier) &&
			purlMatches(value, identifier)
		) {
			return true;
		}
	}

	for (const [, hash] of sortedEntries(component.hashes)) {
		if (hash === identifier) return true;
	}

	return false;
};

/**
 * Determine whether the product matches the product identifier and, when the
 * product declares subcomponents, the subcomponent identifier.
 *
 * A product without subcomponents matches on its own component alone. A product
 * with subcomponents requires a non-empty subcomponent identifier naming one of
 * them: an empty one does not match.
 */
export const productMatches = (
	product: Product,
	productIdentifier: string,
	subcomponentIdentifier: string,
): boolean => {
	if (!componentMatches(product.component, productIdentifier)) return false;

	if (product.subcomponents.length === 0) return true;

	if (subcomponentIdentifier === "") return false;

	return product.subcomponents.some((subcomponent) =>
		componentMatches(subcomponent.component, subcomponentIdentifier),
	);
};

/**
 * List the non-empty values of an identifier or hash record in key order.
 */
const sortedEntries = (
	record: Readonly<Partial<Record<string, string>>>,
): ReadonlyArray<readonly [string, string]> => {
	const entries: Array<readonly [string, string]> = [];
	for (const key of Object.keys(record).sort()) {
		const value = record[key];
		if (value === undefined || value === "") continue;
		entries.push([key, value]);
	}
	return entries;
};
