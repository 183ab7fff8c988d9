/**
 * Logger access and opt-in LogTape configuration.
 *
 * Importing the package never configures LogTape; host applications that
 * want the package's log records call {@link configureSizeLogging} once at
 * startup, or route the "exactbytes" category from their own configuration.
 */

import {
	configure,
	getConsoleSink,
	getLogger,
	type Logger,
	reset,
	type Sink,
} from '@logtape/logtape'
import { DEFAULT_LOG_LEVEL, type LogLevel, ROOT_CATEGORY } from './config.js'

/**
 * Options for {@link configureSizeLogging}.
 */
export interface SizeLoggingOptions {
	/** Lowest level to route. Defaults to "info". */
	lowestLevel?: LogLevel

	/** Sinks to route to, keyed by name. Defaults to a console sink. */
	sinks?: Record<string, Sink>
}

let isInitialized = false

/**
 * Logger for the package root or one of its subsystems.
 *
 * @param subsystem - e.g. "config"
 * @returns Logger for ["exactbytes"] or ["exactbytes", subsystem]
 */
export function getSizeLogger(subsystem?: string): Logger {
	return getLogger(subsystem ? [ROOT_CATEGORY, subsystem] : [ROOT_CATEGORY])
}

/**
 * Configure LogTape to route the package's records.
 *
 * Safe to call multiple times - only configures once. A LogTape already
 * configured by the host is left as it is.
 *
 * @example
 * ```typescript
 * import { configureSizeLogging } from "exactbytes/logging";
 *
 * await configureSizeLogging({ lowestLevel: "debug" });
 * ```
 */
export async function configureSizeLogging(
	options: SizeLoggingOptions = {},
): Promise<void> {
	if (isInitialized) return

	const { lowestLevel = DEFAULT_LOG_LEVEL, sinks = { console: getConsoleSink() } } =
		options
	const sinkNames = Object.keys(sinks)

	try {
		await configure({
			sinks,
			loggers: [
				{ category: [ROOT_CATEGORY], sinks: sinkNames, lowestLevel },
				{ category: ['logtape', 'meta'], sinks: sinkNames, lowestLevel: 'error' },
			],
		})
	} catch (error: unknown) {
		// The host configured LogTape first; keep its setup.
		if (error instanceof Error && error.message.includes('Already configured')) {
			isInitialized = true
			return
		}
		throw error
	}

	isInitialized = true
	getSizeLogger().info('Logging initialized', { lowestLevel, sinks: sinkNames })
}

/**
 * Undo {@link configureSizeLogging} and reset LogTape.
 */
export async function resetSizeLogging(): Promise<void> {
	await reset()
	isInitialized = false
}
