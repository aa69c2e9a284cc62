import { spawn } from "node:child_process";
import type { Result } from "../../types/misc";
import type { IMatcherInvoker, Invocation, InvocationOutcome } from "./types";

/**
 * Launches the external matcher and waits for it to exit. The child shares
 * the parent's standard streams, so its output is passed through untouched.
 */
export class MatcherInvoker implements IMatcherInvoker {
	invoke(invocation: Invocation): Promise<Result<InvocationOutcome>> {
		return new Promise((resolve) => {
			const child = spawn(invocation.command, [...invocation.args], {
				stdio: "inherit",
			});

			child.on("error", (error) => {
				resolve({ ok: false, error });
			});

			child.on("close", (exitCode, signal) => {
				resolve({ ok: true, value: { exitCode, signal } });
			});
		});
	}
}
