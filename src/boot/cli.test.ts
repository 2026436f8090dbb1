import { readFile } from "node:fs/promises";
import { describe, expect, test } from "vitest";
import { createSilentLogger } from "../foundation/logger";
import { createStubDocumentReader } from "../ports/documentReaderPort";
import {
	createCli,
	EXIT_CODE_ERROR,
	EXIT_CODE_MATCHED,
	EXIT_CODE_NO_MATCH,
} from "./cli";

const ALPINE =
	"pkg:oci/alpine@sha256%3A124c7d2707904eea7431fffe91522a01e5a861a624ee31d03372cc1d138a3126";
const HISTORY_ID = "https://example.com/vex/libcrypto-history";

const QUERY = [
	"--document",
	"history.json",
	"--vulnerability",
	"CVE-2023-1255",
	"--product",
	ALPINE,
	"--subcomponent",
	"pkg:apk/alpine/libcrypto3@3.0.8-r3",
];

const createTestCli = async () => {
	const out: string[] = [];
	const errors: string[] = [];
	const cli = createCli({
		readDocument: createStubDocumentReader({
			"history.json": await readFile(
				"fixtures/openvex/libcrypto-history.json",
				"utf8",
			),
			"invalid.json": await readFile(
				"fixtures/openvex/invalid-statement.json",
				"utf8",
			),
		}),
		logger: createSilentLogger(),
		writeOut: (line) => out.push(line),
		writeErr: (line) => errors.push(line),
	});
	return { cli, out, errors };
};

describe("createCli", () => {
	test("prints every matching statement as a JSON line", async () => {
		const { cli, out, errors } = await createTestCli();

		const exitCode = await cli.run(QUERY);

		expect(exitCode).toBe(EXIT_CODE_MATCHED);
		expect(errors).toEqual([]);
		expect(out.map((line) => JSON.parse(line))).toEqual([
			{
				id: `${HISTORY_ID}#investigating`,
				vulnerability: "CVE-2023-1255",
				status: "under_investigation",
				effective_time: "2023-06-02T10:00:00.000Z",
			},
			{
				id: `${HISTORY_ID}#not-affected`,
				vulnerability: "CVE-2023-1255",
				status: "not_affected",
				justification: "vulnerable_code_not_in_execute_path",
				effective_time: "2023-06-05T10:00:00.000Z",
			},
		]);
	});

	test("prints only the authoritative statement with --latest", async () => {
		const { cli, out } = await createTestCli();

		const exitCode = await cli.run([...QUERY, "--latest"]);

		expect(exitCode).toBe(EXIT_CODE_MATCHED);
		expect(out).toHaveLength(1);
		expect(JSON.parse(out[0] ?? "{}")).toMatchObject({
			id: `${HISTORY_ID}#not-affected`,
		});
	});

	test("includes the action statement of affected statements", async () => {
		const { cli, out } = await createTestCli();

		await cli.run([
			"--document",
			"history.json",
			"--vulnerability",
			"CVE-2023-0464",
			"--product",
			ALPINE,
		]);

		expect(out.map((line) => JSON.parse(line))).toEqual([
			{
				id: `${HISTORY_ID}#other-cve`,
				vulnerability: "CVE-2023-0464",
				status: "affected",
				action_statement: "Upgrade the image",
				effective_time: "2023-06-07T10:00:00.000Z",
			},
		]);
	});

	test("exits with the no-match code when nothing matches", async () => {
		const { cli, out } = await createTestCli();

		const exitCode = await cli.run([
			"--document",
			"history.json",
			"--vulnerability",
			"CVE-2099-0001",
			"--product",
			ALPINE,
		]);

		expect(exitCode).toBe(EXIT_CODE_NO_MATCH);
		expect(out).toEqual([]);
	});

	test("reports usage errors", async () => {
		const { cli, errors } = await createTestCli();

		const exitCode = await cli.run([
			"--document",
			"history.json",
			"--vulnerability",
			"CVE-2023-1255",
		]);

		expect(exitCode).toBe(EXIT_CODE_ERROR);
		expect(errors[0]).toBe("vex-match: missing required option --product");
		expect(errors[1]).toMatch(/^usage: vex-match /);
	});

	test("reports missing documents", async () => {
		const { cli, errors } = await createTestCli();

		const exitCode = await cli.run([
			"--document",
			"missing.json",
			"--vulnerability",
			"CVE-2023-1255",
			"--product",
			ALPINE,
		]);

		expect(exitCode).toBe(EXIT_CODE_ERROR);
		expect(errors).toEqual(["vex-match: document missing.json not found"]);
	});

	test("reports invalid statements in strict mode", async () => {
		const { cli, errors } = await createTestCli();

		const exitCode = await cli.run([
			"--document",
			"invalid.json",
			"--vulnerability",
			"CVE-2023-0001",
			"--product",
			"pkg:npm/left-pad@1.3.0",
			"--strict",
		]);

		expect(exitCode).toBe(EXIT_CODE_ERROR);
		expect(errors).toEqual([
			"vex-match: invalid statement #0 (https://example.com/vex/invalid-statement#1): affected statement needs an action statement",
		]);
	});
});
