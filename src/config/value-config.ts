/**
 * How a size is turned into a number and a unit for display.
 *
 * @module config/value-config
 */

import { z } from 'zod'
import {
	type PreciseNumber,
	Rational,
	RoundingMethod,
} from '../rational/index.js'
import { Unit } from '../units/index.js'
import { parseConfig } from './parse.js'

const preciseNumber = z.custom<PreciseNumber>(
	(value) => Rational.isPrecise(value),
	{ message: 'must be an exact number' },
)

const valueConfigSchema = z.object({
	base: z.number().int().min(2).default(10),
	binaryUnits: z.boolean().default(true),
	exactValue: z.boolean().default(false),
	maxPlaces: z.number().int().min(0).nullable().default(2),
	minValue: preciseNumber
		.default(1)
		.transform((value) => Rational.from(value))
		.refine((value) => value.ge(0), { message: 'must not be negative' }),
	roundingMethod: z
		.nativeEnum(RoundingMethod)
		.default(RoundingMethod.ROUND_HALF_ZERO),
	unit: z.instanceof(Unit, { message: 'must be a named unit' }).nullable().default(null),
})

export type ValueConfigOptions = z.input<typeof valueConfigSchema>

export interface ValueConfig {
	/** Base of the rendered numeral. */
	readonly base: number
	/** Choose from the binary (1024) family rather than the decimal one. */
	readonly binaryUnits: boolean
	/** Prefer a unit in which the numeral renders exactly. */
	readonly exactValue: boolean
	/** Fractional digits to render, null for the exact expansion. */
	readonly maxPlaces: number | null
	/**
	 * Smallest value wanted in front of the radix point; a unit is coarse
	 * enough once the value in it is below `base * minValue`.
	 */
	readonly minValue: Rational
	readonly roundingMethod: RoundingMethod
	/** Force this unit instead of searching. */
	readonly unit: Unit | null
}

/**
 * Build a validated, frozen value config.
 *
 * @throws SizeValueError on a negative or inexact minValue, a base below 2,
 * or a unit that is not a named unit
 *
 * @example
 * ```ts
 * createValueConfig({ binaryUnits: false, maxPlaces: 3 });
 * createValueConfig({ unit: MiB });
 * ```
 */
export function createValueConfig(options: ValueConfigOptions = {}): ValueConfig {
	return Object.freeze(parseConfig(valueConfigSchema, options, 'valueConfig'))
}

/**
 * Validate untyped input, e.g. settings read from a file, as a value config.
 *
 * @throws SizeValueError naming the first offending field
 */
export function parseValueConfig(input: unknown): ValueConfig {
	return Object.freeze(parseConfig(valueConfigSchema, input ?? {}, 'valueConfig'))
}

export function describeValueConfig(config: ValueConfig): string {
	return (
		`ValueConfig(base=${config.base}, binaryUnits=${config.binaryUnits}, ` +
		`exactValue=${config.exactValue}, maxPlaces=${config.maxPlaces}, ` +
		`minValue=${config.minValue}, roundingMethod=${config.roundingMethod}, ` +
		`unit=${config.unit ?? 'null'})`
	)
}
