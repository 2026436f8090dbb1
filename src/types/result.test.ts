import { describe, expect, test } from "vitest";
import { causeMessage, tryResult, tryResultAsync } from "./result";

describe("tryResult", () => {
	test("captures the value or the thrown error", () => {
		expect(tryResult(() => JSON.parse("[1]"))).toEqual({ ok: true, data: [1] });

		const failed = tryResult(() => {
			throw new Error("boom");
		});
		expect(failed.ok).toBe(false);
		if (failed.ok) return;
		expect(causeMessage(failed.error)).toBe("boom");
	});

	test("captures rejections", async () => {
		expect(await tryResultAsync(async () => "done")).toEqual({
			ok: true,
			data: "done",
		});
		expect(await tryResultAsync(() => Promise.reject("offline"))).toEqual({
			ok: false,
			error: "offline",
		});
	});
});

describe("causeMessage", () => {
	test("stringifies values that are not errors", () => {
		expect(causeMessage(42)).toBe("42");
	});
});
