/**
 * Error handling: structured base class and the Size error taxonomy.
 *
 * @module errors
 */

export {
	describeValue,
	isSizeError,
	SizeError,
	SizeFractionalResultError,
	SizeNonsensicalBinOpError,
	SizeNonsensicalBinOpValueError,
	SizePowerResultError,
	SizeValueError,
} from './size-errors.js'
export {
	type ErrorCategory,
	isRecoverableError,
	isStructuredError,
	StructuredError,
	type StructuredErrorJSON,
} from './structured-error.js'
