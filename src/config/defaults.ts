/**
 * Process-wide defaults used when a caller omits a configuration.
 *
 * Nothing here synchronizes access: hosts set the defaults once at startup,
 * or serialize their own updates.
 *
 * @module config/defaults
 */

import { getSizeLogger } from '../logging/index.js'
import type { DisplayConfig } from '../radix/index.js'
import { describeDisplayConfig } from './display-config.js'
import {
	createStringConfig,
	describeStringConfig,
	type StringConfig,
} from './string-config.js'
import { describeValueConfig, type ValueConfig } from './value-config.js'

const logger = getSizeLogger('config')

/** Defaults in effect before any setter runs. */
export const DEFAULT_STRING_CONFIG: StringConfig = createStringConfig()

let current: StringConfig = DEFAULT_STRING_CONFIG
let strict = false

export function getDefaultStringConfig(): StringConfig {
	return current
}

export function getDefaultValueConfig(): ValueConfig {
	return current.valueConfig
}

export function getDefaultDisplayConfig(): DisplayConfig {
	return current.displayConfig
}

export function setDefaultStringConfig(config: StringConfig): void {
	current = config
	logger.debug('Default string config replaced', {
		config: describeStringConfig(config),
	})
}

export function setDefaultValueConfig(config: ValueConfig): void {
	current = createStringConfig({ ...current, valueConfig: config })
	logger.debug('Default value config replaced', {
		config: describeValueConfig(config),
	})
}

export function setDefaultDisplayConfig(config: DisplayConfig): void {
	current = createStringConfig({ ...current, displayConfig: config })
	logger.debug('Default display config replaced', {
		config: describeDisplayConfig(config),
	})
}

/**
 * Whether sizes must hold a whole number of bytes.
 */
export function isStrict(): boolean {
	return strict
}

/**
 * Turn strict mode on or off. While on, constructing a size with a
 * fractional magnitude throws SizeFractionalResultError.
 */
export function setStrict(flag: boolean): void {
	if (flag === strict) return
	strict = flag
	logger.info('Strict mode {state}', { state: flag ? 'enabled' : 'disabled' })
}

/**
 * Restore the initial defaults and turn strict mode off.
 */
export function resetDefaults(): void {
	current = DEFAULT_STRING_CONFIG
	strict = false
	logger.debug('Defaults reset')
}
