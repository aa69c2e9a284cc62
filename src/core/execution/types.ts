import type { ExamplePair } from "@core/discovery";
import type { Result } from "../../types/misc";

/**
 * One process launch: the executable and its argument vector.
 */
export interface Invocation {
	readonly command: string;
	readonly args: readonly string[];
}

export interface InvocationOptions {
	readonly matcherPath: string;
	readonly patternFlag: string;
	readonly documentFlag: string;
}

export interface RunnerOptions extends InvocationOptions {
	/** Echo the command lines without launching the matcher */
	readonly dryRun: boolean;
}

export interface InvocationOutcome {
	readonly exitCode: number | null;
	readonly signal: NodeJS.Signals | null;
}

export interface IMatcherInvoker {
	invoke(invocation: Invocation): Promise<Result<InvocationOutcome>>;
}

export interface PairSource {
	findPairs(): Promise<readonly ExamplePair[]>;
}

export interface RunSummary {
	readonly pairs: readonly ExamplePair[];
	readonly invoked: number;
	readonly dryRun: boolean;
}
