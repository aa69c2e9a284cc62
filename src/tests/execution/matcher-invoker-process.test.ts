import { describe, expect, test } from "vitest";
import { MatcherInvoker } from "../../core/execution/index";

describe("MatcherInvoker with a real child process", () => {
	test("should resolve with the child's exit code", async () => {
		const result = await new MatcherInvoker().invoke({
			command: process.execPath,
			args: ["-e", "process.exit(3)"],
		});

		expect(result).toEqual({ ok: true, value: { exitCode: 3, signal: null } });
	});

	test("should report a missing executable as a spawn error", async () => {
		const result = await new MatcherInvoker().invoke({
			command: "./bin/does-not-exist",
			args: [],
		});

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toContain("ENOENT");
		}
	});
});
