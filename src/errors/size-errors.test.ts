import { describe, expect, test } from 'vitest'
import {
	describeValue,
	isSizeError,
	SizeError,
	SizeFractionalResultError,
	SizeNonsensicalBinOpError,
	SizeNonsensicalBinOpValueError,
	SizePowerResultError,
	SizeValueError,
} from './size-errors.js'
import { StructuredError } from './structured-error.js'

describe('describeValue', () => {
	test('quotes strings and marks bigints', () => {
		expect(describeValue('1.5x')).toBe('"1.5x"')
		expect(describeValue(12n)).toBe('12n')
		expect(describeValue(7)).toBe('7')
		expect(describeValue(null)).toBe('null')
		expect(describeValue([1, 'a'])).toBe('[1, "a"]')
	})
})

describe('SizeValueError', () => {
	test('names the parameter and the value', () => {
		const error = new SizeValueError('abc', 'value')

		expect(error.message).toBe(
			'value "abc" for parameter value is unacceptable',
		)
		expect(error.param).toBe('value')
		expect(error.value).toBe('abc')
		expect(error.code).toBe('SIZE_VALUE')
		expect(error.category).toBe('VALUE')
		expect(error.context).toEqual({ param: 'value', value: '"abc"' })
	})

	test('appends the detail', () => {
		const error = new SizeValueError(-3n, 'factor', 'can not convert')

		expect(error.message).toBe(
			'value -3n for parameter factor is unacceptable: can not convert',
		)
	})

	test('keeps the cause', () => {
		const cause = new RangeError('bad numeral')
		expect(new SizeValueError('x', 'value', undefined, cause).cause).toBe(cause)
	})
})

describe('binary operation errors', () => {
	test('type error names the operator and operand type', () => {
		const error = new SizeNonsensicalBinOpError('+', 3)

		expect(error.message).toBe(
			'nonsensical operation + with operand 3 of type number',
		)
		expect(error.operator).toBe('+')
		expect(error.other).toBe(3)
		expect(error.category).toBe('TYPE')
	})

	test('value error is distinct from type error', () => {
		const error = new SizeNonsensicalBinOpValueError('divmod', 0)

		expect(error).not.toBeInstanceOf(SizeNonsensicalBinOpError)
		expect(error.code).toBe('SIZE_NONSENSICAL_BINOP_VALUE')
		expect(error.message).toBe('nonsensical operation divmod with value 0')
	})
})

describe('hierarchy', () => {
	test('every error is a non-recoverable SizeError', () => {
		const errors: SizeError[] = [
			new SizeValueError(1, 'x'),
			new SizeFractionalResultError('1/2'),
			new SizeNonsensicalBinOpError('*', 'a'),
			new SizeNonsensicalBinOpValueError('%', 0),
			new SizePowerResultError(),
		]

		for (const error of errors) {
			expect(error).toBeInstanceOf(StructuredError)
			expect(isSizeError(error)).toBe(true)
			expect(error.recoverable).toBe(false)
		}
	})

	test('fractional result error records the magnitude', () => {
		expect(new SizeFractionalResultError('3/2').context).toEqual({
			magnitude: '3/2',
		})
		expect(new SizeFractionalResultError().context).toEqual({})
	})

	test('isSizeError rejects plain errors', () => {
		expect(isSizeError(new Error('x'))).toBe(false)
		expect(
			isSizeError(new StructuredError('x', 'VALUE', 'X', false)),
		).toBe(false)
	})
})
