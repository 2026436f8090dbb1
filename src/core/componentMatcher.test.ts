import { describe, expect, test } from "vitest";
import type { Component, Product } from "../types/vex";
import { componentMatches, productMatches } from "./componentMatcher";

const IMAGE =
	"pkg:oci/alpine@sha256%3A0f3e4d5c6b7a89012345678901234567890abcdef0123456789abcdef012345";
const LIBCRYPTO = "pkg:apk/alpine/libcrypto3@3.0.8-r3";
const LIBSSL = "pkg:apk/alpine/libssl3@3.0.8-r3";
const SHA1 = "0123456789abcdef0123456789abcdef01234567";

const component = (overrides: Partial<Component> = {}): Component => ({
	id: "",
	identifiers: {},
	hashes: {},
	...overrides,
});

const product = (
	id: string,
	subcomponentIds: ReadonlyArray<string> = [],
): Product => ({
	component: component({ id }),
	subcomponents: subcomponentIds.map((subId) => ({
		component: component({ id: subId }),
	})),
});

describe("componentMatches", () => {
	test("matches an IRI identifier exactly", () => {
		const iri = "https://example.com/document.spdx.json#node";
		expect(componentMatches(component({ id: iri }), iri)).toBe(true);
		expect(componentMatches(component({ id: iri }), `${iri}2`)).toBe(false);
	});

	test("matches a purl ID as a general pattern", () => {
		const sut = component({ id: "pkg:oci/curl" });
		expect(componentMatches(sut, "pkg:oci/curl@sha256:abc123")).toBe(true);
		expect(componentMatches(sut, "pkg:oci/wget@sha256:abc123")).toBe(false);
	});

	test("matches custom identifiers exactly", () => {
		const sut = component({
			identifiers: { customIdentifier: "madeup-2023-12345" },
		});
		expect(componentMatches(sut, "madeup-2023-12345")).toBe(true);
		expect(componentMatches(sut, "madeup-2023-54321")).toBe(false);
	});

	test("compares purl identifiers as general patterns", () => {
		const general = component({ identifiers: { purl: "pkg:oci/curl" } });
		expect(componentMatches(general, "pkg:oci/curl@sha256:abc123")).toBe(true);

		const specific = component({
			identifiers: { purl: "pkg:oci/curl@sha256:abc123" },
		});
		expect(componentMatches(specific, "pkg:oci/curl")).toBe(false);
		expect(componentMatches(specific, "pkg:oci/curl@sha256:abc123")).toBe(
			true,
		);
	});

	test("does not purl-compare identifiers of other types", () => {
		const sut = component({ identifiers: { cpe23: "pkg:oci/curl" } });
		expect(componentMatches(sut, "pkg:oci/curl@sha256:abc123")).toBe(false);
		expect(componentMatches(sut, "pkg:oci/curl")).toBe(true);
	});

	test("matches hashes exactly", () => {
		const sut = component({ hashes: { sha1: SHA1 } });
		expect(componentMatches(sut, SHA1)).toBe(true);
		expect(componentMatches(sut, SHA1.toUpperCase())).toBe(false);
		expect(componentMatches(sut, "fedcba9876543210fedcba9876543210fedcba98")).toBe(
			false,
		);
	});

	test("never matches the empty identifier", () => {
		expect(componentMatches(component(), "")).toBe(false);
		expect(
			componentMatches(
				component({ identifiers: { custom: "" }, hashes: { md5: "" } }),
				"",
			),
		).toBe(false);
	});
});

describe("productMatches", () => {
	test("matches a product by ID alone", () => {
		expect(productMatches(product(LIBCRYPTO), LIBCRYPTO, "")).toBe(true);
	});

	test("matches a product by purl identifier", () => {
		const sut: Product = {
			component: component({ identifiers: { purl: "pkg:apk/alpine/libcrypto3" } }),
			subcomponents: [],
		};
		expect(productMatches(sut, LIBCRYPTO, "")).toBe(true);
	});

	test("fails when the product identifier does not match", () => {
		expect(productMatches(product(IMAGE, [LIBCRYPTO]), LIBSSL, LIBCRYPTO)).toBe(
			false,
		);
	});

	test("matches any declared subcomponent", () => {
		const sut = product(IMAGE, [LIBCRYPTO, LIBSSL]);
		expect(productMatches(sut, IMAGE, LIBCRYPTO)).toBe(true);
		expect(productMatches(sut, IMAGE, LIBSSL)).toBe(true);
		expect(productMatches(sut, IMAGE, "pkg:apk/alpine/busybox@1.36.0-r9")).toBe(
			false,
		);
	});

	test("does not match a product with subcomponents when no subcomponent is queried", () => {
		expect(productMatches(product(IMAGE, [LIBCRYPTO]), IMAGE, "")).toBe(false);
	});

	test("matches a product without subcomponents whatever subcomponent is queried", () => {
		expect(productMatches(product(IMAGE), IMAGE, LIBCRYPTO)).toBe(true);
	});
});
