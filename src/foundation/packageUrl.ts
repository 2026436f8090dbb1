/**
 * @file Parser and formatter for package URL (purl) strings.
 *
 * Grammar: `pkg:type/namespace/name@version?qualifiers#subpath`. Absent parts are
 * represented by the empty string (or an empty qualifier record) so that callers
 * can compare parts directly.
 */

import { err, ok, type Result } from "../types/result";

/**
 * Scheme prefix every package URL starts with.
 */
export const PURL_SCHEME_PREFIX = "pkg:" as const;

/**
 * Represents the decoded components of a package URL.
 */
export type PackageUrl = {
	readonly type: string;
	readonly namespace: string;
	readonly name: string;
	readonly version: string;
	readonly qualifiers: Readonly<Record<string, string>>;
	readonly subpath: string;
};

/**
 * Error variants produced while parsing a package URL.
 */
export type PackageUrlParseError =
	| { readonly type: "missing-scheme" }
	| { readonly type: "missing-type" }
	| { readonly type: "invalid-type"; readonly value: string }
	| { readonly type: "missing-name" }
	| { readonly type: "invalid-qualifier"; readonly value: string }
	| { readonly type: "invalid-encoding"; readonly value: string };

const TYPE_PATTERN = /^[a-z.+-][a-z0-9.+-]*$/;
const QUALIFIER_KEY_PATTERN = /^[a-z.\-_][a-z0-9.\-_]*$/;

/**
 * Parse a package URL string into its decoded components.
 */
export const parsePackageUrl = (
	value: string,
): Result<PackageUrl, PackageUrlParseError> => {
	const trimmed = value.trim();
	const colonIndex = trimmed.indexOf(":");
	if (colonIndex < 0 || trimmed.slice(0, colonIndex).toLowerCase() !== "pkg") {
		return err({ type: "missing-scheme" });
	}

	let remainder = trimmed.slice(colonIndex + 1);

	let subpath = "";
	const hashIndex = remainder.lastIndexOf("#");
	if (hashIndex >= 0) {
		const decoded = decodeSegments(remainder.slice(hashIndex + 1));
		if (!decoded.ok) return decoded;
		subpath = decoded.data;
		remainder = remainder.slice(0, hashIndex);
	}

	let qualifiers: Readonly<Record<string, string>> = {};
	const questionIndex = remainder.indexOf("?");
	if (questionIndex >= 0) {
		const parsed = parseQualifiers(remainder.slice(questionIndex + 1));
		if (!parsed.ok) return parsed;
		qualifiers = parsed.data;
		remainder = remainder.slice(0, questionIndex);
	}

	const segments = remainder.split("/").filter((segment) => segment !== "");

	const rawType = segments.shift();
	if (rawType === undefined) {
		return err({ type: "missing-type" });
	}
	const type = rawType.toLowerCase();
	if (!TYPE_PATTERN.test(type)) {
		return err({ type: "invalid-type", value: rawType });
	}

	const lastSegment = segments.pop();
	if (lastSegment === undefined) {
		return err({ type: "missing-name" });
	}

	let version = "";
	let rawName = lastSegment;
	const atIndex = lastSegment.lastIndexOf("@");
	if (atIndex >= 0) {
		const decodedVersion = decodeComponent(lastSegment.slice(atIndex + 1));
		if (!decodedVersion.ok) return decodedVersion;
		version = decodedVersion.data;
		rawName = lastSegment.slice(0, atIndex);
	}

	const name = decodeComponent(rawName);
	if (!name.ok) return name;
	if (name.data.length === 0) {
		return err({ type: "missing-name" });
	}

	const namespace = decodeSegments(segments.join("/"));
	if (!namespace.ok) return namespace;

	return ok({
		type,
		namespace: namespace.data,
		name: name.data,
		version,
		qualifiers,
		subpath,
	});
};

/**
 * Build the canonical string form of a package URL. Qualifiers are sorted by key
 * and entries with empty values are omitted.
 */
export const formatPackageUrl = (
	parts: Pick<PackageUrl, "type" | "name"> & Partial<PackageUrl>,
): string => {
	const path = [parts.type.toLowerCase()];
	if (parts.namespace) {
		path.push(encodeSegments(parts.namespace));
	}
	path.push(encodeURIComponent(parts.name));

	let purl = `${PURL_SCHEME_PREFIX}${path.join("/")}`;
	if (parts.version) {
		purl += `@${encodeURIComponent(parts.version)}`;
	}

	const qualifiers = Object.entries(parts.qualifiers ?? {})
		.filter(([, value]) => value.length > 0)
		.sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
		.map(
			([key, value]) =>
				`${key.toLowerCase()}=${encodeURIComponent(value)}`,
		);
	if (qualifiers.length > 0) {
		purl += `?${qualifiers.join("&")}`;
	}

	if (parts.subpath) {
		purl += `#${encodeSegments(parts.subpath)}`;
	}

	return purl;
};

/**
 * Determine whether the string carries the package URL scheme prefix.
 */
export const hasPurlScheme = (value: string): boolean =>
	value.startsWith(PURL_SCHEME_PREFIX);

/**
 * Parse the `key=value&key=value` qualifier section.
 */
const parseQualifiers = (
	text: string,
): Result<Readonly<Record<string, string>>, PackageUrlParseError> => {
	const qualifiers = new Map<string, string>();

	for (const pair of text.split("&")) {
		if (pair.length === 0) continue;

		const equalIndex = pair.indexOf("=");
		if (equalIndex <= 0) {
			return err({ type: "invalid-qualifier", value: pair });
		}

		const key = pair.slice(0, equalIndex).toLowerCase();
		if (!QUALIFIER_KEY_PATTERN.test(key) || qualifiers.has(key)) {
			return err({ type: "invalid-qualifier", value: pair });
		}

		const decoded = decodeComponent(pair.slice(equalIndex + 1));
		if (!decoded.ok) return decoded;
		if (decoded.data.length === 0) continue;

		qualifiers.set(key, decoded.data);
	}

	return ok(Object.fromEntries(qualifiers));
};

/**
 * Decode a slash separated path, dropping empty segments.
 */
const decodeSegments = (
	text: string,
): Result<string, PackageUrlParseError> => {
	const decoded: string[] = [];
	for (const segment of text.split("/")) {
		if (segment === "" || segment === "." || segment === "..") continue;
		const result = decodeComponent(segment);
		if (!result.ok) return result;
		decoded.push(result.data);
	}
	return ok(decoded.join("/"));
};

/**
 * Percent-decode a single component.
 */
const decodeComponent = (
	text: string,
): Result<string, PackageUrlParseError> => {
	try {
		return ok(decodeURIComponent(text));
	} catch {
		return err({ type: "invalid-encoding", value: text });
	}
};

/**
 * Percent-encode each segment of a slash separated path.
 */
const encodeSegments = (text: string): string =>
	text
		.split("/")
		.filter((segment) => segment !== "")
		.map((segment) => encodeURIComponent(segment))
		.join("/");
