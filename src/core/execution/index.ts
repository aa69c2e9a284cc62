export { DemoRunner } from "./demo-runner";
export { MatcherInvoker } from "./matcher-invoker";
export { InvocationError } from "./errors";
export {
	buildInvocation,
	formatCommandLine,
	quoteArgument,
} from "./command-line";
export { DEFAULT_RUNNER_OPTIONS, ECHO_PREFIX } from "./config";

export type {
	IMatcherInvoker,
	Invocation,
	InvocationOptions,
	InvocationOutcome,
	PairSource,
	RunnerOptions,
	RunSummary,
} from "./types";
