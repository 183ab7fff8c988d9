/**
 * Rounding methods for mapping an exact rational onto an integer.
 *
 * @module rational/rounding
 */

/**
 * Supported rounding methods.
 *
 * - ROUND_UP: toward positive infinity
 * - ROUND_DOWN: toward negative infinity
 * - ROUND_TO_ZERO: toward zero
 * - ROUND_HALF_UP: nearest, ties toward positive infinity
 * - ROUND_HALF_DOWN: nearest, ties toward negative infinity
 * - ROUND_HALF_ZERO: nearest, ties toward zero
 * - ROUND_HALF_EVEN: nearest, ties to the even neighbour
 */
export const RoundingMethod = {
	ROUND_UP: 'ROUND_UP',
	ROUND_DOWN: 'ROUND_DOWN',
	ROUND_TO_ZERO: 'ROUND_TO_ZERO',
	ROUND_HALF_UP: 'ROUND_HALF_UP',
	ROUND_HALF_DOWN: 'ROUND_HALF_DOWN',
	ROUND_HALF_ZERO: 'ROUND_HALF_ZERO',
	ROUND_HALF_EVEN: 'ROUND_HALF_EVEN',
} as const

export type RoundingMethod = (typeof RoundingMethod)[keyof typeof RoundingMethod]

export const ROUND_UP = RoundingMethod.ROUND_UP
export const ROUND_DOWN = RoundingMethod.ROUND_DOWN
export const ROUND_TO_ZERO = RoundingMethod.ROUND_TO_ZERO
export const ROUND_HALF_UP = RoundingMethod.ROUND_HALF_UP
export const ROUND_HALF_DOWN = RoundingMethod.ROUND_HALF_DOWN
export const ROUND_HALF_ZERO = RoundingMethod.ROUND_HALF_ZERO
export const ROUND_HALF_EVEN = RoundingMethod.ROUND_HALF_EVEN

/**
 * All rounding methods, in declaration order.
 */
export function ROUNDING_METHODS(): RoundingMethod[] {
	return Object.values(RoundingMethod)
}

/**
 * Type guard for rounding method names.
 */
export function isRoundingMethod(value: unknown): value is RoundingMethod {
	return ROUNDING_METHODS().some((method) => method === value)
}

/**
 * Relation of a rounded result to the exact value: -1 when the result is
 * below it, 0 when equal, 1 when above.
 */
export type Relation = -1 | 0 | 1
