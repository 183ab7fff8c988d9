/**
 * Configuration objects and the process-wide defaults.
 *
 * @example
 * ```ts
 * import { createValueConfig, setDefaultValueConfig } from "exactbytes/config";
 *
 * setDefaultValueConfig(createValueConfig({ binaryUnits: false }));
 * ```
 *
 * @module config
 */

export {
	DEFAULT_STRING_CONFIG,
	getDefaultDisplayConfig,
	getDefaultStringConfig,
	getDefaultValueConfig,
	isStrict,
	resetDefaults,
	setDefaultDisplayConfig,
	setDefaultStringConfig,
	setDefaultValueConfig,
	setStrict,
} from './defaults.js'
export {
	createDisplayConfig,
	type DisplayConfigOptions,
	describeDisplayConfig,
	parseDisplayConfig,
} from './display-config.js'
export { parseConfig } from './parse.js'
export {
	createStringConfig,
	describeStringConfig,
	type StringConfig,
	type StringConfigOptions,
} from './string-config.js'
export {
	createValueConfig,
	describeValueConfig,
	parseValueConfig,
	type ValueConfig,
	type ValueConfigOptions,
} from './value-config.js'
