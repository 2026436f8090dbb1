/**
 * @file Core logic matching a vulnerability query against a statement's vulnerability.
 */

import type { Vulnerability } from "../types/vex";

/**
 * Determine whether the identifier equals the vulnerability IRI, its name or one of its aliases.
 */
export const vulnerabilityMatches = (
	vulnerability: Vulnerability,
	identifier: string,
): boolean => {
	if (identifier === "") return false;
	if (vulnerability.id === identifier) return true;
	if (vulnerability.name === identifier) return true;
	return vulnerability.aliases.includes(identifier);
};
