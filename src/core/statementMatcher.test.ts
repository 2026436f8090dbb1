import { describe, expect, test } from "vitest";
import type { Product, Statement } from "../types/vex";
import { statementMatches, statementMatchesQuery } from "./statementMatcher";

const IMAGE = "pkg:oci/alpine@sha256%3A9a8b7c6d5e4f";
const OTHER_IMAGE = "pkg:oci/busybox@sha256%3A1a2b3c4d5e6f";
const LIBCRYPTO = "pkg:apk/alpine/libcrypto3@3.0.8-r3";
const LIBSSL = "pkg:apk/alpine/libssl3@3.0.8-r3";

const product = (
	id: string,
	subcomponentIds: ReadonlyArray<string> = [],
): Product => ({
	component: { id, identifiers: {}, hashes: {} },
	subcomponents: subcomponentIds.map((subId) => ({
		component: { id: subId, identifiers: {}, hashes: {} },
	})),
});

const statement = (products: ReadonlyArray<Product>): Statement => ({
	id: "",
	version: null,
	vulnerability: {
		id: "",
		name: "CVE-2023-1255",
		description: "",
		aliases: ["GHSA-test-0001"],
	},
	products,
	status: "under_investigation",
	statusNotes: "",
	justification: "",
	impactStatement: "",
	actionStatement: "",
	supplier: "",
	timestamp: null,
	lastUpdated: null,
});

describe("statementMatches", () => {
	test("fails when the vulnerability does not match", () => {
		expect(
			statementMatches(statement([product(IMAGE)]), "CVE-2023-0464", IMAGE, []),
		).toBe(false);
	});

	test("matches a bare product when no subcomponents are queried", () => {
		const sut = statement([product(IMAGE)]);
		expect(statementMatches(sut, "CVE-2023-1255", IMAGE, [])).toBe(true);
		expect(statementMatches(sut, "GHSA-test-0001", IMAGE, [])).toBe(true);
	});

	test("matches when any queried subcomponent is declared", () => {
		const sut = statement([product(IMAGE, [LIBCRYPTO, LIBSSL])]);
		expect(
			statementMatches(sut, "CVE-2023-1255", IMAGE, [
				"pkg:apk/alpine/busybox@1.36.0-r9",
				LIBSSL,
			]),
		).toBe(true);
		expect(
			statementMatches(sut, "CVE-2023-1255", IMAGE, [
				"pkg:apk/alpine/busybox@1.36.0-r9",
			]),
		).toBe(false);
	});

	test("does not match products with subcomponents when none are queried", () => {
		expect(
			statementMatches(
				statement([product(IMAGE, [LIBCRYPTO])]),
				"CVE-2023-1255",
				IMAGE,
				[],
			),
		).toBe(false);
	});

	test("matches on any listed product", () => {
		const sut = statement([product(OTHER_IMAGE), product(IMAGE, [LIBCRYPTO])]);
		expect(statementMatches(sut, "CVE-2023-1255", IMAGE, [LIBCRYPTO])).toBe(
			true,
		);
		expect(statementMatches(sut, "CVE-2023-1255", OTHER_IMAGE, [])).toBe(true);
	});

	test("fails for a statement without products", () => {
		expect(statementMatches(statement([]), "CVE-2023-1255", IMAGE, [])).toBe(
			false,
		);
	});
});

describe("statementMatchesQuery", () => {
	test("delegates to the positional matcher", () => {
		const sut = statement([product(IMAGE, [LIBCRYPTO])]);
		expect(
			statementMatchesQuery(sut, {
				vulnerability: "CVE-2023-1255",
				product: IMAGE,
				subcomponents: [LIBCRYPTO],
			}),
		).toBe(true);
	});
});
