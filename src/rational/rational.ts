/**
 * Exact rational numbers over bigint.
 *
 * Every value is kept in lowest terms with a positive denominator, so two
 * equal rationals always have identical numerator and denominator.
 *
 * @module rational/rational
 */

import { type Relation, RoundingMethod } from './rounding.js'

/**
 * Numbers accepted where an exact value is required: a bigint, a safe
 * integer, or a Rational. Floating-point numbers are never precise.
 */
export type PreciseNumber = bigint | number | Rational

const FRACTION_RE = /^([+-]?)(\d+)\s*\/\s*(\d+)$/
const DECIMAL_RE = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/

function gcd(a: bigint, b: bigint): bigint {
	let x = a < 0n ? -a : a
	let y = b < 0n ? -b : b
	while (y !== 0n) {
		const t = y
		y = x % y
		x = t
	}
	return x
}

/** Floor division of two bigints (bigint `/` truncates). */
function floorQuotient(n: bigint, d: bigint): bigint {
	const q = n / d
	return n % d !== 0n && n < 0n !== d < 0n ? q - 1n : q
}

function sign(value: bigint): Relation {
	return value > 0n ? 1 : value < 0n ? -1 : 0
}

/**
 * Immutable arbitrary-precision fraction.
 */
export class Rational {
	static readonly ZERO = new Rational(0n, 1n)
	static readonly ONE = new Rational(1n, 1n)

	private constructor(
		readonly numerator: bigint,
		readonly denominator: bigint,
	) {}

	/**
	 * Build a rational from numerator and denominator, reducing it.
	 *
	 * @throws RangeError if the denominator is zero
	 */
	static of(numerator: bigint, denominator = 1n): Rational {
		if (denominator === 0n) {
			throw new RangeError(`zero denominator in ${numerator}/0`)
		}
		let p = numerator
		let q = denominator
		if (q < 0n) {
			p = -p
			q = -q
		}
		const g = gcd(p, q)
		return g > 1n ? new Rational(p / g, q / g) : new Rational(p, q)
	}

	/**
	 * Convert a precise number or a numeral string to a rational.
	 *
	 * Numeral strings are `p/q` or decimals with an optional exponent,
	 * optionally signed and surrounded by whitespace.
	 *
	 * @throws TypeError for a number that is not a safe integer
	 * @throws RangeError for malformed text or a zero denominator
	 *
	 * @example
	 * ```ts
	 * Rational.from("1.5").toString(); // "3/2"
	 * Rational.from("-6/4").toString(); // "-3/2"
	 * Rational.from("2e3").toString(); // "2000"
	 * ```
	 */
	static from(value: PreciseNumber | string): Rational {
		if (value instanceof Rational) return value
		if (typeof value === 'bigint') return new Rational(value, 1n)
		if (typeof value === 'number') {
			if (!Number.isSafeInteger(value)) {
				throw new TypeError(`${value} is not an exact integer`)
			}
			return new Rational(BigInt(value), 1n)
		}
		return Rational.parse(value)
	}

	private static parse(text: string): Rational {
		const trimmed = text.trim()

		const fraction = FRACTION_RE.exec(trimmed)
		if (fraction) {
			const [, sign = '', num = '', den = ''] = fraction
			const p = BigInt(num)
			return Rational.of(sign === '-' ? -p : p, BigInt(den))
		}

		const decimal = DECIMAL_RE.exec(trimmed)
		if (decimal) {
			const [, sign = '', whole = '', frac = '', exp = '0'] = decimal
			if (whole.length + frac.length > 0) {
				const digits = BigInt(`${whole}${frac}`)
				const p = sign === '-' ? -digits : digits
				const shift = BigInt(exp) - BigInt(frac.length)
				return shift >= 0n
					? Rational.of(p * 10n ** shift)
					: Rational.of(p, 10n ** -shift)
			}
		}

		throw new RangeError(`invalid numeral ${JSON.stringify(text)}`)
	}

	/**
	 * Type guard for {@link PreciseNumber}.
	 */
	static isPrecise(value: unknown): value is PreciseNumber {
		return (
			value instanceof Rational ||
			typeof value === 'bigint' ||
			(typeof value === 'number' && Number.isSafeInteger(value))
		)
	}

	/**
	 * Integer power with a non-negative exponent.
	 */
	static pow(base: PreciseNumber, exponent: number): Rational {
		if (!Number.isSafeInteger(exponent) || exponent < 0) {
			throw new RangeError(`exponent ${exponent} is not a non-negative integer`)
		}
		const b = Rational.from(base)
		const e = BigInt(exponent)
		return new Rational(b.numerator ** e, b.denominator ** e)
	}

	add(other: PreciseNumber): Rational {
		const o = Rational.from(other)
		return Rational.of(
			this.numerator * o.denominator + o.numerator * this.denominator,
			this.denominator * o.denominator,
		)
	}

	sub(other: PreciseNumber): Rational {
		return this.add(Rational.from(other).neg())
	}

	mul(other: PreciseNumber): Rational {
		const o = Rational.from(other)
		return Rational.of(
			this.numerator * o.numerator,
			this.denominator * o.denominator,
		)
	}

	/**
	 * @throws RangeError when dividing by zero
	 */
	div(other: PreciseNumber): Rational {
		const o = Rational.from(other)
		if (o.numerator === 0n) throw new RangeError('division by zero')
		return Rational.of(
			this.numerator * o.denominator,
			this.denominator * o.numerator,
		)
	}

	/**
	 * Largest integer not greater than `this / other`.
	 *
	 * @throws RangeError when dividing by zero
	 */
	floorDiv(other: PreciseNumber): bigint {
		const o = Rational.from(other)
		if (o.numerator === 0n) throw new RangeError('division by zero')
		return floorQuotient(
			this.numerator * o.denominator,
			this.denominator * o.numerator,
		)
	}

	/**
	 * Remainder of floor division; carries the sign of the divisor.
	 *
	 * @throws RangeError when dividing by zero
	 */
	mod(other: PreciseNumber): Rational {
		const o = Rational.from(other)
		return this.sub(o.mul(this.floorDiv(o)))
	}

	/**
	 * Floor quotient and remainder, `this = other * quotient + remainder`.
	 */
	divmod(other: PreciseNumber): [bigint, Rational] {
		const o = Rational.from(other)
		const quotient = this.floorDiv(o)
		return [quotient, this.sub(o.mul(quotient))]
	}

	neg(): Rational {
		return new Rational(-this.numerator, this.denominator)
	}

	abs(): Rational {
		return this.numerator < 0n ? this.neg() : this
	}

	sign(): Relation {
		return sign(this.numerator)
	}

	isZero(): boolean {
		return this.numerator === 0n
	}

	isInteger(): boolean {
		return this.denominator === 1n
	}

	compare(other: PreciseNumber): Relation {
		const o = Rational.from(other)
		return sign(this.numerator * o.denominator - o.numerator * this.denominator)
	}

	equals(other: PreciseNumber): boolean {
		return this.compare(other) === 0
	}

	lt(other: PreciseNumber): boolean {
		return this.compare(other) < 0
	}

	le(other: PreciseNumber): boolean {
		return this.compare(other) <= 0
	}

	gt(other: PreciseNumber): boolean {
		return this.compare(other) > 0
	}

	ge(other: PreciseNumber): boolean {
		return this.compare(other) >= 0
	}

	floor(): bigint {
		return floorQuotient(this.numerator, this.denominator)
	}

	ceil(): bigint {
		return -floorQuotient(-this.numerator, this.denominator)
	}

	/** Truncate toward zero. */
	trunc(): bigint {
		return this.numerator / this.denominator
	}

	/**
	 * Nearest double; loses precision for large or non-dyadic values.
	 */
	toNumber(): number {
		return Number(this.numerator) / Number(this.denominator)
	}

	toString(): string {
		return this.isInteger()
			? `${this.numerator}`
			: `${this.numerator}/${this.denominator}`
	}

	toJSON(): string {
		return this.toString()
	}
}

/**
 * Round a rational to an integer.
 *
 * @returns the rounded integer and its relation to `value`
 *
 * @example
 * ```ts
 * roundToInt(Rational.of(5n, 2n), ROUND_HALF_EVEN); // [2n, -1]
 * roundToInt(Rational.of(-5n, 2n), ROUND_HALF_ZERO); // [-2n, 1]
 * ```
 */
export function roundToInt(
	value: Rational,
	method: RoundingMethod,
): [bigint, Relation] {
	if (value.isInteger()) return [value.numerator, 0]

	const floor = value.floor()
	const ceil = floor + 1n
	const down: [bigint, Relation] = [floor, -1]
	const up: [bigint, Relation] = [ceil, 1]
	const positive = value.sign() > 0

	switch (method) {
		case RoundingMethod.ROUND_UP:
			return up
		case RoundingMethod.ROUND_DOWN:
			return down
		case RoundingMethod.ROUND_TO_ZERO:
			return positive ? down : up
	}

	const half = value.sub(floor).compare(Rational.of(1n, 2n))
	if (half < 0) return down
	if (half > 0) return up

	switch (method) {
		case RoundingMethod.ROUND_HALF_UP:
			return up
		case RoundingMethod.ROUND_HALF_DOWN:
			return down
		case RoundingMethod.ROUND_HALF_ZERO:
			return positive ? down : up
		case RoundingMethod.ROUND_HALF_EVEN:
			return floor % 2n === 0n ? down : up
	}
}
