/**
 * Errors raised by Size construction, arithmetic, conversion and
 * configuration.
 *
 * All of them are synchronous, local and not recoverable: the caller passed
 * something the operation cannot use.
 *
 * @module errors/size-errors
 */

import { type ErrorCategory, StructuredError } from './structured-error.js'

/**
 * Render an offending argument for an error message.
 */
export function describeValue(value: unknown): string {
	if (typeof value === 'string') return JSON.stringify(value)
	if (typeof value === 'bigint') return `${value}n`
	if (Array.isArray(value)) return `[${value.map(describeValue).join(', ')}]`
	return String(value)
}

/**
 * Base class of every error thrown by the package.
 */
export class SizeError extends StructuredError {
	constructor(
		message: string,
		category: ErrorCategory,
		code: string,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message, category, code, false, context, cause)
		this.name = 'SizeError'
	}
}

/**
 * Malformed or inapplicable argument: a bad numeral, an unresolvable unit
 * specifier, a non-positive conversion factor, badly ordered bounds or an
 * invalid configuration field.
 */
export class SizeValueError extends SizeError {
	/** The rejected value. */
	public readonly value: unknown
	/** Name of the parameter that received it. */
	public readonly param: string

	constructor(value: unknown, param: string, detail?: string, cause?: Error) {
		const base = `value ${describeValue(value)} for parameter ${param} is unacceptable`
		super(
			detail ? `${base}: ${detail}` : base,
			'VALUE',
			'SIZE_VALUE',
			{ param, value: describeValue(value) },
			cause,
		)
		this.name = 'SizeValueError'
		this.value = value
		this.param = param
	}
}

/**
 * A constructed magnitude would be non-integral while strict mode is on.
 */
export class SizeFractionalResultError extends SizeError {
	constructor(magnitude?: string) {
		super(
			'value is a fractional number of bytes, forbidden in strict mode',
			'ARITHMETIC',
			'SIZE_FRACTIONAL_RESULT',
			magnitude === undefined ? {} : { magnitude },
		)
		this.name = 'SizeFractionalResultError'
	}
}

/**
 * The operand combination has no defined meaning, e.g. a size plus a bare
 * number.
 */
export class SizeNonsensicalBinOpError extends SizeError {
	public readonly operator: string
	public readonly other: unknown

	constructor(operator: string, other: unknown) {
		super(
			`nonsensical operation ${operator} with operand ${describeValue(other)} of type ${operandType(other)}`,
			'TYPE',
			'SIZE_NONSENSICAL_BINOP',
			{ operator, other: describeValue(other) },
		)
		this.name = 'SizeNonsensicalBinOpError'
		this.operator = operator
		this.other = other
	}
}

/**
 * The operand types are valid but the value is not, e.g. division by a zero
 * size.
 */
export class SizeNonsensicalBinOpValueError extends SizeError {
	public readonly operator: string
	public readonly other: unknown

	constructor(operator: string, other: unknown) {
		super(
			`nonsensical operation ${operator} with value ${describeValue(other)}`,
			'ARITHMETIC',
			'SIZE_NONSENSICAL_BINOP_VALUE',
			{ operator, other: describeValue(other) },
		)
		this.name = 'SizeNonsensicalBinOpValueError'
		this.operator = operator
		this.other = other
	}
}

/**
 * A size was exponentiated or used as the factor of another size.
 */
export class SizePowerResultError extends SizeError {
	constructor() {
		super(
			'result would be a power of bytes, which is not representable',
			'TYPE',
			'SIZE_POWER_RESULT',
		)
		this.name = 'SizePowerResultError'
	}
}

/**
 * Type guard for errors thrown by this package.
 */
export function isSizeError(error: unknown): error is SizeError {
	return error instanceof SizeError
}

function operandType(value: unknown): string {
	if (value === null) return 'null'
	if (typeof value === 'object') return value.constructor?.name ?? 'object'
	return typeof value
}
