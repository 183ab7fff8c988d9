/**
 * Value config, display config and numeral renderer used by
 * `Size.getString`.
 *
 * @module config/string-config
 */

import {
	createRadixDisplay,
	type DisplayConfig,
	type RadixDisplayFactory,
} from '../radix/index.js'
import { createDisplayConfig, describeDisplayConfig } from './display-config.js'
import {
	createValueConfig,
	describeValueConfig,
	type ValueConfig,
} from './value-config.js'

export interface StringConfig {
	readonly valueConfig: ValueConfig
	readonly displayConfig: DisplayConfig
	/** Builds the renderer for `displayConfig`. */
	readonly displayFactory: RadixDisplayFactory
}

export interface StringConfigOptions {
	valueConfig?: ValueConfig
	displayConfig?: DisplayConfig
	displayFactory?: RadixDisplayFactory
}

/**
 * Pair a value config and a display config with a renderer.
 *
 * @example
 * ```ts
 * const config = createStringConfig({
 *   valueConfig: createValueConfig({ binaryUnits: false }),
 * });
 * new Size(1500).getString(config); // "1.5 kB"
 * ```
 */
export function createStringConfig(
	options: StringConfigOptions = {},
): StringConfig {
	return Object.freeze({
		valueConfig: options.valueConfig ?? createValueConfig(),
		displayConfig: options.displayConfig ?? createDisplayConfig(),
		displayFactory: options.displayFactory ?? createRadixDisplay,
	})
}

export function describeStringConfig(config: StringConfig): string {
	return `StringConfig(${describeValueConfig(config.valueConfig)}, ${describeDisplayConfig(config.displayConfig)})`
}
