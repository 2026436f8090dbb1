/**
 * @file Decoder translating OpenVEX JSON documents into the VEX domain model.
 *
 * Both the current layout (vulnerability and product objects) and the legacy
 * one (vulnerability and product strings, statement level subcomponents) are
 * accepted and normalized into the same structures.
 */

import { z } from "zod";
import {
	causeMessage,
	err,
	ok,
	type Result,
	tryResult,
} from "../types/result";
import {
	HASH_ALGORITHMS,
	type HashAlgorithm,
	type HashValue,
	type Component,
	type Product,
	STATUSES,
	type Statement,
	type VexDocument,
	type Vulnerability,
} from "../types/vex";

/**
 * Error identifier returned when the text is not JSON.
 */
export const PARSE_OPENVEX_ERROR_INVALID_JSON = "invalid-json" as const;

/**
 * Error identifier returned when the JSON value is not an OpenVEX document.
 */
export const PARSE_OPENVEX_ERROR_INVALID_DOCUMENT = "invalid-document" as const;

/**
 * Error variants produced while decoding an OpenVEX document.
 */
export type ParseOpenVexJsonError =
	| {
			readonly type: typeof PARSE_OPENVEX_ERROR_INVALID_JSON;
			readonly message: string;
	  }
	| {
			readonly type: typeof PARSE_OPENVEX_ERROR_INVALID_DOCUMENT;
			readonly issues: ReadonlyArray<string>;
	  };

const timestampSchema = z
	.string()
	.datetime({ offset: true })
	.transform((value) => new Date(value));

const componentSchema = z.object({
	"@id": z.string().default(""),
	identifiers: z.record(z.string()).default({}),
	hashes: z.record(z.string()).default({}),
});

const productSchema = componentSchema.extend({
	subcomponents: z.array(z.union([z.string(), componentSchema])).default([]),
});

const vulnerabilitySchema = z.object({
	"@id": z.string().default(""),
	name: z.string().default(""),
	description: z.string().default(""),
	aliases: z.array(z.string()).default([]),
});

const statementSchema = z.object({
	"@id": z.string().default(""),
	version: z.number().int().nonnegative().optional(),
	vulnerability: z.union([z.string(), vulnerabilitySchema]),
	products: z.array(z.union([z.string(), productSchema])).default([]),
	subcomponents: z.array(z.string()).default([]),
	status: z.enum(STATUSES),
	status_notes: z.string().default(""),
	justification: z.string().default(""),
	impact_statement: z.string().default(""),
	action_statement: z.string().default(""),
	supplier: z.string().default(""),
	timestamp: timestampSchema.optional(),
	last_updated: timestampSchema.optional(),
});

const documentSchema = z.object({
	"@context": z.string().optional(),
	"@id": z.string().default(""),
	author: z.string().default(""),
	role: z.string().default(""),
	version: z.number().int().nonnegative().default(1),
	tooling: z.string().default(""),
	timestamp: timestampSchema.optional(),
	last_updated: timestampSchema.optional(),
	statements: z.array(statementSchema).nullish(),
});

type ComponentJson = z.infer<typeof componentSchema>;
type ProductJson = z.infer<typeof productSchema>;
type StatementJson = z.infer<typeof statementSchema>;

/**
 * Parse an OpenVEX JSON string into a VEX document.
 */
export const parseOpenVexJson = (
	json: string,
): Result<VexDocument, ParseOpenVexJsonError> => {
	const value = tryResult((): unknown => JSON.parse(json));
	if (!value.ok) {
		return err({
			type: PARSE_OPENVEX_ERROR_INVALID_JSON,
			message: causeMessage(value.error),
		});
	}

	return loadOpenVexDocument(value.data);
};

/**
 * Decode an already parsed JSON value into a VEX document.
 */
export const loadOpenVexDocument = (
	value: unknown,
): Result<VexDocument, ParseOpenVexJsonError> => {
	const parsed = documentSchema.safeParse(value);
	if (!parsed.success) {
		return err({
			type: PARSE_OPENVEX_ERROR_INVALID_DOCUMENT,
			issues: parsed.error.issues.map(
				(issue) =>
					`${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`,
			),
		});
	}

	const document = parsed.data;
	return ok({
		id: document["@id"],
		author: document.author,
		role: document.role,
		version: document.version,
		tooling: document.tooling,
		timestamp: document.timestamp ?? null,
		lastUpdated: document.last_updated ?? null,
		statements: (document.statements ?? []).map(toStatement),
	});
};

/**
 * Convert a decoded statement into the domain model.
 */
const toStatement = (statement: StatementJson): Statement => {
	const legacySubcomponents = statement.subcomponents.map(componentFromId);

	return {
		id: statement["@id"],
		version: statement.version ?? null,
		vulnerability: toVulnerability(statement.vulnerability),
		products: statement.products.map((product) =>
			toProduct(product, legacySubcomponents),
		),
		status: statement.status,
		statusNotes: statement.status_notes,
		justification: statement.justification,
		impactStatement: statement.impact_statement,
		actionStatement: statement.action_statement,
		supplier: statement.supplier,
		timestamp: statement.timestamp ?? null,
		lastUpdated: statement.last_updated ?? null,
	};
};

/**
 * Convert a vulnerability object, or a legacy vulnerability name, into the domain model.
 */
const toVulnerability = (
	vulnerability: StatementJson["vulnerability"],
): Vulnerability => {
	if (typeof vulnerability === "string") {
		return { id: "", name: vulnerability, description: "", aliases: [] };
	}
	return {
		id: vulnerability["@id"],
		name: vulnerability.name,
		description: vulnerability.description,
		aliases: vulnerability.aliases,
	};
};

/**
 * Convert a product entry into the domain model. Statement level subcomponents
 * of the legacy layout apply to every product without its own.
 */
const toProduct = (
	product: string | ProductJson,
	legacySubcomponents: ReadonlyArray<Component>,
): Product => {
	if (typeof product === "string") {
		return {
			component: componentFromId(product),
			subcomponents: legacySubcomponents.map((component) => ({ component })),
		};
	}

	const own = product.subcomponents.map((subcomponent) =>
		typeof subcomponent === "string"
			? componentFromId(subcomponent)
			: toComponent(subcomponent),
	);
	const subcomponents = own.length > 0 ? own : legacySubcomponents;

	return {
		component: toComponent(product),
		subcomponents: subcomponents.map((component) => ({ component })),
	};
};

const toComponent = (component: ComponentJson): Component => ({
	id: component["@id"],
	identifiers: component.identifiers,
	hashes: pickKnownHashes(component.hashes),
});

const componentFromId = (id: string): Component => ({
	id,
	identifiers: {},
	hashes: {},
});

const KNOWN_HASH_ALGORITHMS = new Set<string>(HASH_ALGORITHMS);

const isHashAlgorithm = (value: string): value is HashAlgorithm =>
	KNOWN_HASH_ALGORITHMS.has(value);

/**
 * Keep the hashes whose algorithm is known, dropping the rest.
 */
const pickKnownHashes = (
	hashes: Readonly<Record<string, string>>,
): Partial<Record<HashAlgorithm, HashValue>> => {
	const known: Partial<Record<HashAlgorithm, HashValue>> = {};
	for (const [algorithm, value] of Object.entries(hashes)) {
		if (isHashAlgorithm(algorithm)) {
			known[algorithm] = value;
		}
	}
	return known;
};
