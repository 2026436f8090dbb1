import { describe, expect, test } from "vitest";
import type { Statement } from "../types/vex";
import {
	DEFAULT_FALLBACK_TIME,
	documentFallbackTime,
	effectiveTime,
	sortStatements,
} from "./statementOrder";

const statement = (
	id: string,
	timestamp: string | null,
	lastUpdated: string | null = null,
): Statement => ({
	id,
	version: null,
	vulnerability: { id: "", name: "CVE-2023-1255", description: "", aliases: [] },
	products: [],
	status: "under_investigation",
	statusNotes: "",
	justification: "",
	impactStatement: "",
	actionStatement: "",
	supplier: "",
	timestamp: timestamp === null ? null : new Date(timestamp),
	lastUpdated: lastUpdated === null ? null : new Date(lastUpdated),
});

describe("effectiveTime", () => {
	const fallback = new Date("2020-01-01T00:00:00Z");

	test("prefers the last update over the issue time", () => {
		expect(
			effectiveTime(
				statement("a", "2023-01-01T00:00:00Z", "2023-02-01T00:00:00Z"),
				fallback,
			).toISOString(),
		).toBe("2023-02-01T00:00:00.000Z");
	});

	test("uses the issue time when never updated", () => {
		expect(
			effectiveTime(statement("a", "2023-01-01T00:00:00Z"), fallback).toISOString(),
		).toBe("2023-01-01T00:00:00.000Z");
	});

	test("falls back when the statement carries no time", () => {
		expect(effectiveTime(statement("a", null), fallback)).toBe(fallback);
	});
});

describe("documentFallbackTime", () => {
	test("prefers the document update, then its timestamp, then the supplied instant", () => {
		const updated = new Date("2023-03-01T00:00:00Z");
		const issued = new Date("2023-02-01T00:00:00Z");
		const supplied = new Date("2023-01-01T00:00:00Z");

		expect(
			documentFallbackTime({ timestamp: issued, lastUpdated: updated }, supplied),
		).toBe(updated);
		expect(
			documentFallbackTime({ timestamp: issued, lastUpdated: null }, supplied),
		).toBe(issued);
		expect(
			documentFallbackTime({ timestamp: null, lastUpdated: null }, supplied),
		).toBe(supplied);
		expect(documentFallbackTime({ timestamp: null, lastUpdated: null })).toBe(
			DEFAULT_FALLBACK_TIME,
		);
	});
});

describe("sortStatements", () => {
	test("orders ascending by effective time", () => {
		const t3 = statement("t3", "2023-03-01T00:00:00Z");
		const t1 = statement("t1", "2023-01-01T00:00:00Z");
		const t2 = statement("t2", "2022-12-01T00:00:00Z", "2023-02-01T00:00:00Z");

		expect(sortStatements([t3, t1, t2]).map(({ id }) => id)).toEqual([
			"t1",
			"t2",
			"t3",
		]);
	});

	test("keeps input order among equal times", () => {
		const first = statement("first", "2023-01-01T00:00:00Z");
		const second = statement("second", "2023-01-01T00:00:00Z");
		const untimed = statement("untimed", null);

		expect(
			sortStatements(
				[first, untimed, second],
				new Date("2023-01-01T00:00:00Z"),
			).map(({ id }) => id),
		).toEqual(["first", "untimed", "second"]);
	});

	test("does not reorder the input list", () => {
		const input = [
			statement("b", "2023-02-01T00:00:00Z"),
			statement("a", "2023-01-01T00:00:00Z"),
		];
		sortStatements(input);
		expect(input.map(({ id }) => id)).toEqual(["b", "a"]);
	});
});
