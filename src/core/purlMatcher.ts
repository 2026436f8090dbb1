/**
 * @file Core logic for comparing a general package URL against a more specific one.
 */

import { type PackageUrl, parsePackageUrl } from "../foundation/packageUrl";

/**
 * Determine whether `general` matches the more specific `specific` purl.
 *
 * - type, namespace and name must be identical;
 * - a version on `general` must be present and identical on `specific`, an
 *   unversioned `general` matches every version;
 * - every qualifier of `general` must appear with the same value on `specific`,
 *   which may carry additional qualifiers.
 *
 * The relation is asymmetric. Unparseable operands never match. Version ranges
 * are not supported.
 */
export const purlMatches = (general: string, specific: string): boolean => {
	const generalPurl = parsePackageUrl(general);
	if (!generalPurl.ok) return false;

	const specificPurl = parsePackageUrl(specific);
	if (!specificPurl.ok) return false;

	return packageUrlMatches(generalPurl.data, specificPurl.data);
};

/**
 * Apply the general/specific relation to already parsed package URLs.
 */
export const packageUrlMatches = (
	general: PackageUrl,
	specific: PackageUrl,
): boolean => {
	if (general.type !== specific.type) return false;
	if (general.namespace !== specific.namespace) return false;
	if (general.name !== specific.name) return false;

	if (general.version !== "" && general.version !== specific.version) {
		return false;
	}

	for (const [key, value] of Object.entries(general.qualifiers)) {
		if (!Object.hasOwn(specific.qualifiers, key)) return false;
		if (specific.qualifiers[key] !== value) return false;
	}

	return true;
};
