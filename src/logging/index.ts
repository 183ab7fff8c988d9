/**
 * Logging for the package, built on LogTape.
 *
 * @example
 * ```typescript
 * import { configureSizeLogging, getSizeLogger } from "exactbytes/logging";
 *
 * await configureSizeLogging({ lowestLevel: "debug" });
 * getSizeLogger("config").debug("Default value config replaced", { base: 10 });
 * ```
 *
 * @packageDocumentation
 */

export { DEFAULT_LOG_LEVEL, type LogLevel, ROOT_CATEGORY } from './config.js'
export {
	configureSizeLogging,
	getSizeLogger,
	resetSizeLogging,
	type SizeLoggingOptions,
} from './factory.js'
