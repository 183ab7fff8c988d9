import { describe, expect, test } from 'vitest'
import { Rational, roundToInt } from './rational.js'
import {
	isRoundingMethod,
	ROUND_DOWN,
	ROUND_HALF_DOWN,
	ROUND_HALF_EVEN,
	ROUND_HALF_UP,
	ROUND_HALF_ZERO,
	ROUND_TO_ZERO,
	ROUND_UP,
	ROUNDING_METHODS,
} from './rounding.js'

const r = (p: bigint, q = 1n) => Rational.of(p, q)

describe('Rational.of', () => {
	test('reduces to lowest terms with a positive denominator', () => {
		const value = r(6n, -4n)
		expect(value.numerator).toBe(-3n)
		expect(value.denominator).toBe(2n)
	})

	test('rejects a zero denominator', () => {
		expect(() => r(1n, 0n)).toThrow(RangeError)
	})
})

describe('Rational.from', () => {
	test('accepts bigints and safe integers', () => {
		expect(Rational.from(5n).toString()).toBe('5')
		expect(Rational.from(-12).toString()).toBe('-12')
	})

	test('rejects floating-point numbers', () => {
		expect(() => Rational.from(1.5)).toThrow(TypeError)
		expect(() => Rational.from(Number.NaN)).toThrow(TypeError)
		expect(() => Rational.from(2 ** 60)).toThrow(TypeError)
	})

	test('parses fraction strings', () => {
		expect(Rational.from('-6/4').toString()).toBe('-3/2')
		expect(Rational.from(' 3 / 9 ').toString()).toBe('1/3')
		expect(() => Rational.from('1/0')).toThrow(RangeError)
	})

	test('parses decimal strings', () => {
		expect(Rational.from('1.5').toString()).toBe('3/2')
		expect(Rational.from('.25').toString()).toBe('1/4')
		expect(Rational.from('7.').toString()).toBe('7')
		expect(Rational.from('+2e3').toString()).toBe('2000')
		expect(Rational.from('-1.5E-2').toString()).toBe('-3/200')
		expect(Rational.from('  42  ').toString()).toBe('42')
	})

	test('rejects malformed strings', () => {
		for (const text of ['', '.', '-', 'abc', '1.2.3', '1/2/3', '0x10', 'e5']) {
			expect(() => Rational.from(text)).toThrow(RangeError)
		}
	})

	test('returns Rational instances unchanged', () => {
		const value = r(1n, 3n)
		expect(Rational.from(value)).toBe(value)
	})
})

describe('isPrecise', () => {
	test('classifies precise numbers', () => {
		expect(Rational.isPrecise(3)).toBe(true)
		expect(Rational.isPrecise(3n)).toBe(true)
		expect(Rational.isPrecise(r(1n, 2n))).toBe(true)
		expect(Rational.isPrecise(0.5)).toBe(false)
		expect(Rational.isPrecise('3')).toBe(false)
		expect(Rational.isPrecise(null)).toBe(false)
	})
})

describe('arithmetic', () => {
	test('add, sub, mul, div', () => {
		const half = r(1n, 2n)
		const third = r(1n, 3n)
		expect(half.add(third).toString()).toBe('5/6')
		expect(half.sub(third).toString()).toBe('1/6')
		expect(half.mul(third).toString()).toBe('1/6')
		expect(half.div(third).toString()).toBe('3/2')
		expect(() => half.div(0)).toThrow(RangeError)
	})

	test('floorDiv floors toward negative infinity', () => {
		expect(r(7n).floorDiv(2)).toBe(3n)
		expect(r(-7n).floorDiv(2)).toBe(-4n)
		expect(r(7n).floorDiv(-2)).toBe(-4n)
		expect(r(-7n).floorDiv(-2)).toBe(3n)
		expect(r(7n, 2n).floorDiv(r(1n, 3n))).toBe(10n)
		expect(() => r(1n).floorDiv(0n)).toThrow(RangeError)
	})

	test('mod carries the sign of the divisor', () => {
		expect(r(7n).mod(3).toString()).toBe('1')
		expect(r(-7n).mod(3).toString()).toBe('2')
		expect(r(7n).mod(-3).toString()).toBe('-2')
		expect(r(7n, 2n).mod(r(1n, 3n)).toString()).toBe('1/6')
	})

	test('divmod satisfies a = b * q + r', () => {
		const [q, rem] = r(-10n).divmod(3)
		expect(q).toBe(-4n)
		expect(rem.toString()).toBe('2')
	})

	test('pow', () => {
		expect(Rational.pow(1024, 3).toString()).toBe('1073741824')
		expect(Rational.pow(r(2n, 3n), 2).toString()).toBe('4/9')
		expect(Rational.pow(1000, 0).toString()).toBe('1')
		expect(() => Rational.pow(2, -1)).toThrow(RangeError)
	})
})

describe('inspection', () => {
	test('floor, ceil, trunc', () => {
		expect(r(-7n, 2n).floor()).toBe(-4n)
		expect(r(-7n, 2n).ceil()).toBe(-3n)
		expect(r(-7n, 2n).trunc()).toBe(-3n)
		expect(r(7n, 2n).trunc()).toBe(3n)
		expect(r(4n).ceil()).toBe(4n)
	})

	test('comparison', () => {
		expect(r(1n, 3n).compare(r(1n, 2n))).toBe(-1)
		expect(r(2n, 4n).equals(r(1n, 2n))).toBe(true)
		expect(r(1n).gt(0)).toBe(true)
		expect(r(1n).ge(1n)).toBe(true)
		expect(r(-1n).lt(0)).toBe(true)
		expect(r(0n).le(0)).toBe(true)
	})

	test('text and number forms', () => {
		expect(r(3n, 4n).toString()).toBe('3/4')
		expect(r(3n, 4n).toNumber()).toBe(0.75)
		expect(JSON.stringify({ v: r(-1n, 2n) })).toBe('{"v":"-1/2"}')
	})

	test('abs, neg, sign', () => {
		expect(r(-3n, 2n).abs().toString()).toBe('3/2')
		expect(r(3n, 2n).neg().toString()).toBe('-3/2')
		expect(r(0n).sign()).toBe(0)
		expect(r(0n).isZero()).toBe(true)
	})
})

describe('roundToInt', () => {
	test('integers are returned exactly', () => {
		for (const method of ROUNDING_METHODS()) {
			expect(roundToInt(r(-4n), method)).toEqual([-4n, 0])
		}
	})

	test('directed methods', () => {
		expect(roundToInt(r(7n, 3n), ROUND_UP)).toEqual([3n, 1])
		expect(roundToInt(r(7n, 3n), ROUND_DOWN)).toEqual([2n, -1])
		expect(roundToInt(r(-7n, 3n), ROUND_UP)).toEqual([-2n, 1])
		expect(roundToInt(r(-7n, 3n), ROUND_DOWN)).toEqual([-3n, -1])
		expect(roundToInt(r(7n, 3n), ROUND_TO_ZERO)).toEqual([2n, -1])
		expect(roundToInt(r(-7n, 3n), ROUND_TO_ZERO)).toEqual([-2n, 1])
	})

	test('nearest methods away from ties', () => {
		for (const method of [
			ROUND_HALF_UP,
			ROUND_HALF_DOWN,
			ROUND_HALF_ZERO,
			ROUND_HALF_EVEN,
		]) {
			expect(roundToInt(r(7n, 3n), method)).toEqual([2n, -1])
			expect(roundToInt(r(8n, 3n), method)).toEqual([3n, 1])
		}
	})

	test('ties', () => {
		const posTie = r(5n, 2n)
		const negTie = r(-5n, 2n)
		expect(roundToInt(posTie, ROUND_HALF_UP)).toEqual([3n, 1])
		expect(roundToInt(negTie, ROUND_HALF_UP)).toEqual([-2n, 1])
		expect(roundToInt(posTie, ROUND_HALF_DOWN)).toEqual([2n, -1])
		expect(roundToInt(negTie, ROUND_HALF_DOWN)).toEqual([-3n, -1])
		expect(roundToInt(posTie, ROUND_HALF_ZERO)).toEqual([2n, -1])
		expect(roundToInt(negTie, ROUND_HALF_ZERO)).toEqual([-2n, 1])
		expect(roundToInt(posTie, ROUND_HALF_EVEN)).toEqual([2n, -1])
		expect(roundToInt(r(7n, 2n), ROUND_HALF_EVEN)).toEqual([4n, 1])
		expect(roundToInt(negTie, ROUND_HALF_EVEN)).toEqual([-2n, 1])
	})
})

describe('rounding method names', () => {
	test('isRoundingMethod', () => {
		expect(isRoundingMethod('ROUND_UP')).toBe(true)
		expect(isRoundingMethod('ROUND_SIDEWAYS')).toBe(false)
		expect(isRoundingMethod(1)).toBe(false)
	})

	test('lists seven methods', () => {
		expect(ROUNDING_METHODS()).toHaveLength(7)
	})
})
