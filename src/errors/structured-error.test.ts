import { describe, expect, test } from 'vitest'
import {
	type ErrorCategory,
	isRecoverableError,
	isStructuredError,
	StructuredError,
} from './structured-error.js'

describe('StructuredError', () => {
	test('creates error with all properties', () => {
		const error = new StructuredError(
			'Bad unit',
			'VALUE',
			'BAD_UNIT',
			false,
			{ param: 'units', value: '"parsec"' },
		)

		expect(error).toBeInstanceOf(Error)
		expect(error).toBeInstanceOf(StructuredError)
		expect(error.message).toBe('Bad unit')
		expect(error.category).toBe('VALUE')
		expect(error.code).toBe('BAD_UNIT')
		expect(error.recoverable).toBe(false)
		expect(error.context).toEqual({ param: 'units', value: '"parsec"' })
		expect(error.name).toBe('StructuredError')
		expect(error.stack).toBeDefined()
	})

	test('defaults context to an empty object', () => {
		const error = new StructuredError('Minimal', 'INTERNAL', 'MINIMAL', false)

		expect(error.context).toEqual({})
		expect(error.cause).toBeUndefined()
	})

	test('supports error chaining via cause', () => {
		const original = new RangeError('division by zero')
		const wrapped = new StructuredError(
			'Wrapped',
			'ARITHMETIC',
			'WRAPPED',
			false,
			{},
			original,
		)

		expect(wrapped.cause).toBe(original)
		expect(wrapped.cause?.message).toBe('division by zero')
	})

	test('serializes to JSON', () => {
		const error = new StructuredError('JSON test', 'TYPE', 'JSON_ERROR', true, {
			operator: '+',
		})

		const json = error.toJSON()

		expect(json).toMatchObject({
			name: 'StructuredError',
			message: 'JSON test',
			category: 'TYPE',
			code: 'JSON_ERROR',
			recoverable: true,
			context: { operator: '+' },
		})
		expect(json.stack).toBeDefined()
		expect(json.cause).toBeUndefined()
	})

	test('serializes error with cause', () => {
		const error = new StructuredError(
			'With cause',
			'INTERNAL',
			'CAUSED',
			false,
			{},
			new Error('Original'),
		)

		expect(error.toJSON().cause).toMatchObject({
			name: 'Error',
			message: 'Original',
		})
	})

	test('supports all error categories', () => {
		const categories: ErrorCategory[] = [
			'VALUE',
			'TYPE',
			'ARITHMETIC',
			'CONFIGURATION',
			'INTERNAL',
		]

		for (const category of categories) {
			expect(new StructuredError('x', category, 'X', false).category).toBe(
				category,
			)
		}
	})

	test('works with subclasses', () => {
		class CustomError extends StructuredError {
			constructor(code: string) {
				super('Custom error', 'CONFIGURATION', code, false)
				this.name = 'CustomError'
			}
		}

		const error = new CustomError('CUSTOM_CODE')

		expect(error).toBeInstanceOf(StructuredError)
		expect(error).toBeInstanceOf(CustomError)
		expect(error.name).toBe('CustomError')
		expect(error.category).toBe('CONFIGURATION')
	})
})

describe('isStructuredError', () => {
	test('returns true for StructuredError instances', () => {
		expect(
			isStructuredError(new StructuredError('x', 'INTERNAL', 'X', false)),
		).toBe(true)
	})

	test('returns false for other values', () => {
		expect(isStructuredError(new Error('plain'))).toBe(false)
		expect(isStructuredError(null)).toBe(false)
		expect(isStructuredError(undefined)).toBe(false)
		expect(isStructuredError('string')).toBe(false)
		expect(isStructuredError({})).toBe(false)
	})
})

describe('isRecoverableError', () => {
	test('reflects the recoverable flag', () => {
		expect(
			isRecoverableError(new StructuredError('x', 'VALUE', 'X', true)),
		).toBe(true)
		expect(
			isRecoverableError(new StructuredError('x', 'VALUE', 'X', false)),
		).toBe(false)
	})

	test('returns false for non-structured values', () => {
		expect(isRecoverableError(new Error('Standard'))).toBe(false)
		expect(isRecoverableError(null)).toBe(false)
	})
})
