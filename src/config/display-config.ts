/**
 * How a rendered numeral is shown.
 *
 * @module config/display-config
 */

import { z } from 'zod'
import type { DisplayConfig } from '../radix/index.js'
import { parseConfig } from './parse.js'

const displayConfigSchema = z.object({
	showApproxStr: z.boolean().default(true),
	baseConfig: z
		.object({
			usePrefix: z.boolean().default(false),
			useSubscript: z.boolean().default(false),
		})
		.default({}),
	digitsConfig: z
		.object({
			separator: z.string().default('~'),
			useCaps: z.boolean().default(false),
			useLetters: z.boolean().default(true),
		})
		.default({}),
	stripConfig: z
		.object({
			strip: z.boolean().default(false),
			stripExact: z.boolean().default(false),
			stripWhole: z.boolean().default(true),
		})
		.default({}),
})

export type DisplayConfigOptions = z.input<typeof displayConfigSchema>

/**
 * Build a validated, frozen display config; omitted fields take defaults.
 *
 * @example
 * ```ts
 * createDisplayConfig({ showApproxStr: false, stripConfig: { strip: true } });
 * ```
 */
export function createDisplayConfig(
	options: DisplayConfigOptions = {},
): DisplayConfig {
	return parseDisplayConfig(options)
}

/**
 * Validate untyped input, e.g. settings read from a file, as a display
 * config.
 *
 * @throws SizeValueError naming the first offending field
 */
export function parseDisplayConfig(input: unknown): DisplayConfig {
	const parsed = parseConfig(displayConfigSchema, input ?? {}, 'displayConfig')
	return Object.freeze({
		showApproxStr: parsed.showApproxStr,
		baseConfig: Object.freeze(parsed.baseConfig),
		digitsConfig: Object.freeze(parsed.digitsConfig),
		stripConfig: Object.freeze(parsed.stripConfig),
	})
}

export function describeDisplayConfig(config: DisplayConfig): string {
	const { baseConfig, digitsConfig, stripConfig } = config
	return (
		`DisplayConfig(showApproxStr=${config.showApproxStr}, ` +
		`baseConfig=(usePrefix=${baseConfig.usePrefix}, useSubscript=${baseConfig.useSubscript}), ` +
		`digitsConfig=(separator=${JSON.stringify(digitsConfig.separator)}, useCaps=${digitsConfig.useCaps}, useLetters=${digitsConfig.useLetters}), ` +
		`stripConfig=(strip=${stripConfig.strip}, stripExact=${stripConfig.stripExact}, stripWhole=${stripConfig.stripWhole}))`
	)
}
