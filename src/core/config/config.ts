/**
 * Resolves the runner configuration: built-in defaults, then an optional JSON
 * config file, then explicit overrides (usually from the command line).
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import type { Result } from "../../types/misc";
import {
	BOOLEAN_CONFIG_KEYS,
	DEFAULT_CONFIG,
	DEFAULT_CONFIG_FILE,
	STRING_CONFIG_KEYS,
} from "./defaults";
import { ConfigError } from "./errors";
import type {
	BooleanConfigKey,
	ConfigOptions,
	ConfigRootOptions,
	StringConfigKey,
} from "./types/core";

function isStringKey(key: string): key is StringConfigKey {
	return STRING_CONFIG_KEYS.some((known) => known === key);
}

function isBooleanKey(key: string): key is BooleanConfigKey {
	return BOOLEAN_CONFIG_KEYS.some((known) => known === key);
}

export function parseConfigFile(
	raw: unknown,
	source: string,
): Result<Partial<ConfigOptions>, ConfigError> {
	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
		return {
			ok: false,
			error: new ConfigError(`${source}: expected a JSON object`),
		};
	}

	const parsed: Partial<ConfigOptions> = {};
	for (const [key, value] of Object.entries(raw)) {
		if (isStringKey(key)) {
			if (typeof value !== "string") {
				return {
					ok: false,
					error: new ConfigError(`${source}: '${key}' must be a string`),
				};
			}
			parsed[key] = value;
		} else if (isBooleanKey(key)) {
			if (typeof value !== "boolean") {
				return {
					ok: false,
					error: new ConfigError(`${source}: '${key}' must be a boolean`),
				};
			}
			parsed[key] = value;
		} else {
			return {
				ok: false,
				error: new ConfigError(`${source}: unknown option '${key}'`),
			};
		}
	}

	return { ok: true, value: parsed };
}

/**
 * Rejects a configuration with any missing or empty value, so a
 * misconfigured run stops before anything is discovered or invoked.
 */
export function validateConfig(
	config: Partial<ConfigOptions>,
): Result<ConfigOptions, ConfigError> {
	for (const key of STRING_CONFIG_KEYS) {
		if (!config[key]) {
			return {
				ok: false,
				error: new ConfigError(
					`Configuration value '${key}' is undefined or empty`,
				),
			};
		}
	}
	for (const key of BOOLEAN_CONFIG_KEYS) {
		if (typeof config[key] !== "boolean") {
			return {
				ok: false,
				error: new ConfigError(`Configuration value '${key}' is undefined`),
			};
		}
	}

	return {
		ok: true,
		value: {
			examplesDir: config.examplesDir ?? DEFAULT_CONFIG.examplesDir,
			matcherPath: config.matcherPath ?? DEFAULT_CONFIG.matcherPath,
			patternFlag: config.patternFlag ?? DEFAULT_CONFIG.patternFlag,
			documentFlag: config.documentFlag ?? DEFAULT_CONFIG.documentFlag,
			patternExtension:
				config.patternExtension ?? DEFAULT_CONFIG.patternExtension,
			documentExtension:
				config.documentExtension ?? DEFAULT_CONFIG.documentExtension,
			sort: config.sort ?? DEFAULT_CONFIG.sort,
			dryRun: config.dryRun ?? DEFAULT_CONFIG.dryRun,
		},
	};
}

export class Config {
	private config: ConfigOptions = { ...DEFAULT_CONFIG };
	private overrides: Partial<ConfigOptions> = {};

	constructor(private readonly root: ConfigRootOptions) {}

	/**
	 * Values that win over the config file. Keys set to `undefined` are kept,
	 * and fail validation.
	 */
	withOverrides(overrides: Partial<ConfigOptions>): this {
		this.overrides = { ...this.overrides, ...overrides };
		return this;
	}

	async load(): Promise<Result<ConfigOptions, ConfigError>> {
		const fileValues = await this.readConfigFile();
		if (!fileValues.ok) {
			return fileValues;
		}

		const validated = validateConfig({
			...DEFAULT_CONFIG,
			...fileValues.value,
			...this.overrides,
		});
		if (validated.ok) {
			this.config = validated.value;
		}
		return validated;
	}

	public get(): ConfigOptions {
		return this.config;
	}

	private async readConfigFile(): Promise<
		Result<Partial<ConfigOptions>, ConfigError>
	> {
		const explicit = this.root.configFile !== undefined;
		const filePath = path.resolve(
			this.root.workingDir,
			this.root.configFile ?? DEFAULT_CONFIG_FILE,
		);

		if (!existsSync(filePath)) {
			if (explicit) {
				return {
					ok: false,
					error: new ConfigError(`Config file not found: ${filePath}`),
				};
			}
			return { ok: true, value: {} };
		}

		let raw: unknown;
		try {
			raw = JSON.parse(await readFile(filePath, "utf-8"));
		} catch (error) {
			return {
				ok: false,
				error: new ConfigError(
					`Failed to read config file ${filePath}`,
					error instanceof Error ? error : undefined,
				),
			};
		}

		return parseConfigFile(raw, filePath);
	}
}
