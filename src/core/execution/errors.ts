import { constants } from "node:os";
import type { ExamplePair } from "@core/discovery";
import { DemoError } from "../errors";
import type { InvocationOutcome } from "./types";

const SIGNAL_NUMBERS = new Map<string, number>(
	Object.entries(constants.signals),
);

export class InvocationError extends DemoError {
	constructor(
		message: string,
		public readonly pair: ExamplePair,
		public readonly commandLine: string,
		public readonly exitCode: number | null = null,
		public readonly signal: NodeJS.Signals | null = null,
		cause?: Error,
	) {
		super(message, cause);
		this.name = "InvocationError";
	}

	static fromOutcome(
		pair: ExamplePair,
		commandLine: string,
		outcome: InvocationOutcome,
	): InvocationError {
		const reason =
			outcome.signal !== null
				? `was terminated by ${outcome.signal}`
				: `exited with code ${outcome.exitCode}`;

		return new InvocationError(
			`Matcher ${reason} on '${pair.name}'`,
			pair,
			commandLine,
			outcome.exitCode,
			outcome.signal,
		);
	}

	static fromSpawnFailure(
		pair: ExamplePair,
		commandLine: string,
		cause: Error,
	): InvocationError {
		return new InvocationError(
			`Failed to start matcher on '${pair.name}': ${cause.message}`,
			pair,
			commandLine,
			null,
			null,
			cause,
		);
	}

	/**
	 * Process exit status a shell would report for this failure
	 */
	get exitStatus(): number {
		if (this.exitCode !== null && this.exitCode > 0) {
			return this.exitCode;
		}
		if (this.signal !== null) {
			const signalNumber = SIGNAL_NUMBERS.get(this.signal);
			if (signalNumber !== undefined) {
				return 128 + signalNumber;
			}
		}
		return 1;
	}
}
