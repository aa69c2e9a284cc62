export * from "./core/config/index";
export * from "./core/discovery/index";
export * from "./core/execution/index";
export { DemoError } from "./core/errors";
export { consoleLogger, type Logger } from "./core/logger";
export type { Result } from "./types/misc";

import packageJson from "../package.json";

// Version info
export const VERSION = packageJson.version;
