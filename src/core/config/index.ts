export { Config, parseConfigFile, validateConfig } from "./config";
export { ConfigError } from "./errors";
export { DEFAULT_CONFIG, DEFAULT_CONFIG_FILE } from "./defaults";

export type { ConfigOptions, ConfigRootOptions } from "./types/core";
