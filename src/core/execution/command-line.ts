import type { ExamplePair } from "@core/discovery";
import type { Invocation, InvocationOptions } from "./types";

const SHELL_SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

export function buildInvocation(
	pair: ExamplePair,
	options: InvocationOptions,
): Invocation {
	return {
		command: options.matcherPath,
		args: [
			options.patternFlag,
			pair.patternPath,
			options.documentFlag,
			pair.documentPath,
		],
	};
}

/**
 * Single-quotes an argument unless it is made only of characters a POSIX
 * shell leaves alone.
 */
export function quoteArgument(argument: string): string {
	if (SHELL_SAFE.test(argument)) {
		return argument;
	}
	return `'${argument.replace(/'/g, "'\\''")}'`;
}

export function formatCommandLine(invocation: Invocation): string {
	return [invocation.command, ...invocation.args].map(quoteArgument).join(" ");
}
