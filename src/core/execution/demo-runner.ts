import { consoleLogger, type Logger } from "@core/logger";
import type { ExamplePair } from "@core/discovery";
import type { Result } from "../../types/misc";
import { DemoError } from "../errors";
import { buildInvocation, formatCommandLine } from "./command-line";
import { DEFAULT_RUNNER_OPTIONS, ECHO_PREFIX } from "./config";
import { InvocationError } from "./errors";
import { MatcherInvoker } from "./matcher-invoker";
import type {
	IMatcherInvoker,
	PairSource,
	RunnerOptions,
	RunSummary,
} from "./types";

/**
 * Runs the matcher over every example pair, one at a time, echoing each
 * command line before launching it. The first failing pair ends the run.
 */
export class DemoRunner {
	private readonly options: RunnerOptions;

	constructor(
		private readonly pairs: PairSource,
		options: Partial<RunnerOptions> = {},
		private readonly invoker: IMatcherInvoker = new MatcherInvoker(),
		private readonly logger: Logger = consoleLogger,
	) {
		this.options = { ...DEFAULT_RUNNER_OPTIONS, ...options };
	}

	async run(): Promise<Result<RunSummary, DemoError>> {
		let pairs: readonly ExamplePair[];
		try {
			pairs = await this.pairs.findPairs();
		} catch (error) {
			if (error instanceof DemoError) {
				return { ok: false, error };
			}
			throw error;
		}

		let invoked = 0;
		for (const pair of pairs) {
			const invocation = buildInvocation(pair, this.options);
			const commandLine = formatCommandLine(invocation);

			this.logger.log(`${ECHO_PREFIX}${commandLine}`);

			if (this.options.dryRun) {
				continue;
			}

			const result = await this.invoker.invoke(invocation);
			if (!result.ok) {
				return {
					ok: false,
					error: InvocationError.fromSpawnFailure(pair, commandLine, result.error),
				};
			}

			invoked++;
			if (result.value.exitCode !== 0) {
				return {
					ok: false,
					error: InvocationError.fromOutcome(pair, commandLine, result.value),
				};
			}
		}

		return {
			ok: true,
			value: { pairs, invoked, dryRun: this.options.dryRun },
		};
	}
}
