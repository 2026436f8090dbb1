/**
 * @file Domain types for VEX documents, statements, products and vulnerabilities.
 *
 * Every structure is a read-only view: the matchers only read these values and
 * reorder copies of statement lists.
 */

/**
 * Literal identifier type for package URLs.
 */
export const IDENTIFIER_TYPE_PURL = "purl" as const;

/**
 * Literal identifier type for CPE 2.2 names.
 */
export const IDENTIFIER_TYPE_CPE22 = "cpe22" as const;

/**
 * Literal identifier type for CPE 2.3 names.
 */
export const IDENTIFIER_TYPE_CPE23 = "cpe23" as const;

/**
 * Known identifier types. Documents may carry any other custom string.
 */
export type KnownIdentifierType =
	| typeof IDENTIFIER_TYPE_PURL
	| typeof IDENTIFIER_TYPE_CPE22
	| typeof IDENTIFIER_TYPE_CPE23;

/**
 * Represents the key of a component identifier mapping.
 */
export type IdentifierType = KnownIdentifierType | string;

/**
 * Hash algorithm names recognised in OpenVEX documents.
 */
export const HASH_ALGORITHMS = [
	"md5",
	"sha1",
	"sha-256",
	"sha-384",
	"sha-512",
	"sha3-224",
	"sha3-256",
	"sha3-384",
	"sha3-512",
	"blake2s-256",
	"blake2b-256",
	"blake2b-512",
] as const;

export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

export const HASH_ALGORITHM_SHA1 = "sha1" as const satisfies HashAlgorithm;
export const HASH_ALGORITHM_SHA256 = "sha-256" as const satisfies HashAlgorithm;

/**
 * Represents a digest value, hex encoded and without algorithm prefix.
 */
export type HashValue = string;

/**
 * Represents an artifact reference addressable by ID, typed identifiers or hashes.
 */
export type Component = {
	readonly id: string;
	/** Keyed by {@link IdentifierType}. */
	readonly identifiers: Readonly<Record<IdentifierType, string>>;
	readonly hashes: Readonly<Partial<Record<HashAlgorithm, HashValue>>>;
};

/**
 * Represents a constituent artifact of a product (e.g. a package inside an image).
 */
export type Subcomponent = {
	readonly component: Component;
};

/**
 * Represents a product a statement talks about, optionally narrowed to subcomponents.
 */
export type Product = {
	readonly component: Component;
	readonly subcomponents: ReadonlyArray<Subcomponent>;
};

/**
 * Represents the vulnerability a statement refers to.
 */
export type Vulnerability = {
	/** IRI identifying the vulnerability entry, usually empty. */
	readonly id: string;
	readonly name: string;
	readonly description: string;
	readonly aliases: ReadonlyArray<string>;
};

export const STATUS_NOT_AFFECTED = "not_affected" as const;
export const STATUS_AFFECTED = "affected" as const;
export const STATUS_FIXED = "fixed" as const;
export const STATUS_UNDER_INVESTIGATION = "under_investigation" as const;

export const STATUSES = [
	STATUS_NOT_AFFECTED,
	STATUS_AFFECTED,
	STATUS_FIXED,
	STATUS_UNDER_INVESTIGATION,
] as const;

/**
 * Represents the impact status a statement declares.
 */
export type Status = (typeof STATUSES)[number];

export const JUSTIFICATIONS = [
	"component_not_present",
	"vulnerable_code_not_present",
	"vulnerable_code_not_in_execute_path",
	"vulnerable_code_cannot_be_controlled_by_adversary",
	"inline_mitigations_already_exist",
] as const;

/**
 * Represents the reason a product is declared not affected.
 */
export type Justification = (typeof JUSTIFICATIONS)[number];

/**
 * Represents a single claim of impact or non-impact.
 */
export type Statement = {
	readonly id: string;
	readonly version: number | null;
	readonly vulnerability: Vulnerability;
	readonly products: ReadonlyArray<Product>;
	readonly status: Status;
	readonly statusNotes: string;
	/** Kept as the raw string so that unknown values reach validation. */
	readonly justification: string;
	readonly impactStatement: string;
	readonly actionStatement: string;
	readonly supplier: string;
	readonly timestamp: Date | null;
	readonly lastUpdated: Date | null;
};

/**
 * Represents a parsed VEX document.
 */
export type VexDocument = {
	readonly id: string;
	readonly author: string;
	readonly role: string;
	readonly version: number;
	readonly tooling: string;
	readonly timestamp: Date | null;
	readonly lastUpdated: Date | null;
	readonly statements: ReadonlyArray<Statement>;
};
