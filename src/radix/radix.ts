/**
 * Positional numerals for exact rationals in an arbitrary base.
 *
 * @module radix/radix
 */

import {
	Rational,
	type Relation,
	type RoundingMethod,
	roundToInt,
} from '../rational/index.js'

/**
 * A rational written out in a base. Digit arrays hold numbers below `base`,
 * most significant first. `repeatingPart` follows `nonRepeatingPart` and
 * repeats forever; it is empty for terminating numerals.
 */
export interface Radix {
	readonly positive: boolean
	readonly integerPart: readonly number[]
	readonly nonRepeatingPart: readonly number[]
	readonly repeatingPart: readonly number[]
	readonly base: number
}

function toDigits(value: bigint, base: bigint): number[] {
	if (value === 0n) return [0]
	const digits: number[] = []
	let rest = value
	while (rest > 0n) {
		digits.push(Number(rest % base))
		rest /= base
	}
	return digits.reverse()
}

/** Exactly `width` digits of a value below `base ** width`. */
function padDigits(value: bigint, base: bigint, width: number): number[] {
	if (width === 0) return []
	const digits = toDigits(value, base)
	return [...new Array<number>(width - digits.length).fill(0), ...digits]
}

function makeRadix(
	positive: boolean,
	integerPart: number[],
	nonRepeatingPart: number[],
	repeatingPart: number[],
	base: number,
): Radix {
	return Object.freeze({
		positive,
		integerPart,
		nonRepeatingPart,
		repeatingPart,
		base,
	})
}

/**
 * Full expansion of `numerator / denominator` (both non-negative),
 * detecting the repeating cycle from recurring remainders.
 */
function expand(
	numerator: bigint,
	denominator: bigint,
	base: bigint,
): [number[], number[], number[]] {
	const integerPart = toDigits(numerator / denominator, base)
	const fraction: number[] = []
	const seen = new Map<bigint, number>()
	let remainder = numerator % denominator

	while (remainder !== 0n && !seen.has(remainder)) {
		seen.set(remainder, fraction.length)
		remainder *= base
		fraction.push(Number(remainder / denominator))
		remainder %= denominator
	}

	const start = remainder === 0n ? fraction.length : (seen.get(remainder) ?? 0)
	return [integerPart, fraction.slice(0, start), fraction.slice(start)]
}

/**
 * Write `value` in `base` with at most `maxPlaces` fractional digits.
 *
 * A value whose expansion terminates within `maxPlaces` digits is returned
 * exactly, without padding. Otherwise the value is rounded at `maxPlaces`
 * digits with `method` and the result carries exactly `maxPlaces` digits.
 * With `maxPlaces` null the exact expansion is returned, repeating part
 * included.
 *
 * @returns the numeral and its relation to `value`
 *
 * @example
 * ```ts
 * fromRational(Rational.of(3n, 2n), 10, 2, ROUND_HALF_ZERO);
 * // [{ positive: true, integerPart: [1], nonRepeatingPart: [5], ... }, 0]
 * fromRational(Rational.of(2n, 3n), 10, 2, ROUND_HALF_ZERO);
 * // [{ integerPart: [0], nonRepeatingPart: [6, 7], ... }, 1]
 * ```
 */
export function fromRational(
	value: Rational,
	base: number,
	maxPlaces: number | null,
	method: RoundingMethod,
): [Radix, Relation] {
	if (!Number.isSafeInteger(base) || base < 2) {
		throw new RangeError(`base ${base} is not an integer of at least 2`)
	}
	if (maxPlaces !== null && (!Number.isSafeInteger(maxPlaces) || maxPlaces < 0)) {
		throw new RangeError(`maxPlaces ${maxPlaces} is not a non-negative integer`)
	}

	const b = BigInt(base)
	const positive = value.sign() >= 0
	const magnitude = value.abs()
	const [integerPart, nonRepeating, repeating] = expand(
		magnitude.numerator,
		magnitude.denominator,
		b,
	)

	if (
		maxPlaces === null ||
		(repeating.length === 0 && nonRepeating.length <= maxPlaces)
	) {
		return [makeRadix(positive, integerPart, nonRepeating, repeating, base), 0]
	}

	const scale = b ** BigInt(maxPlaces)
	const [rounded, relation] = roundToInt(value.mul(scale), method)
	const absolute = rounded < 0n ? -rounded : rounded

	return [
		makeRadix(
			rounded >= 0n,
			toDigits(absolute / scale, b),
			padDigits(absolute % scale, b, maxPlaces),
			[],
			base,
		),
		relation,
	]
}

/**
 * Value denoted by a radix, for checks and tests.
 */
export function toRational(radix: Radix): Rational {
	const b = BigInt(radix.base)
	const fold = (digits: readonly number[]) =>
		digits.reduce((acc, d) => acc * b + BigInt(d), 0n)

	const whole = fold(radix.integerPart)
	const nonRepLength = BigInt(radix.nonRepeatingPart.length)
	let value = Rational.of(whole).add(
		Rational.of(fold(radix.nonRepeatingPart), b ** nonRepLength),
	)
	if (radix.repeatingPart.length > 0) {
		const cycle = b ** BigInt(radix.repeatingPart.length) - 1n
		value = value.add(
			Rational.of(fold(radix.repeatingPart), cycle * b ** nonRepLength),
		)
	}
	return radix.positive ? value : value.neg()
}
