export interface ConfigRootOptions {
	workingDir: string;
	/** Explicit config file; when absent the default file is read if present */
	configFile?: string;
}

export interface ConfigOptions {
	examplesDir: string;
	matcherPath: string;
	patternFlag: string;
	documentFlag: string;
	patternExtension: string;
	documentExtension: string;
	sort: boolean;
	dryRun: boolean;
}

export type StringConfigKey = {
	[K in keyof ConfigOptions]: ConfigOptions[K] extends string ? K : never;
}[keyof ConfigOptions];

export type BooleanConfigKey = Exclude<keyof ConfigOptions, StringConfigKey>;
