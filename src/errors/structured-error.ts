/**
 * Structured error base
 *
 * Gives every error thrown by the package:
 * - A machine-readable code and category
 * - A recoverability hint
 * - Context metadata naming the offending argument or operand
 * - Error chaining via `cause`
 * - JSON serialization for logging
 *
 * @module errors/structured-error
 */

/**
 * Error categories used across the package.
 */
export type ErrorCategory =
	| 'VALUE' // Malformed or inapplicable argument
	| 'TYPE' // Operand shape has no defined meaning
	| 'ARITHMETIC' // Operand shape is fine but the value is illegal
	| 'CONFIGURATION' // Invalid configuration field
	| 'INTERNAL' // Unexpected failure

/**
 * Serialized form returned by {@link StructuredError.toJSON}.
 */
export interface StructuredErrorJSON {
	name: string
	message: string
	category: ErrorCategory
	code: string
	recoverable: boolean
	context: Record<string, unknown>
	stack?: string
	cause?: {
		name: string
		message: string
		stack?: string
	}
}

/**
 * Structured error with categorization, recoverability, and context.
 *
 * Base class of the package's error hierarchy.
 *
 * @example
 * ```typescript
 * class ParseError extends StructuredError {
 *   constructor(text: string) {
 *     super(`cannot parse ${text}`, "VALUE", "PARSE_FAILED", false, { text });
 *     this.name = "ParseError";
 *   }
 * }
 * ```
 */
export class StructuredError extends Error {
	/**
	 * High-level error category for classification.
	 */
	public readonly category: ErrorCategory

	/**
	 * Machine-readable error code (e.g., "SIZE_VALUE").
	 */
	public readonly code: string

	/**
	 * Whether retrying the same call could succeed.
	 */
	public readonly recoverable: boolean

	/**
	 * Arbitrary context metadata for debugging.
	 */
	public readonly context: Record<string, unknown>

	/**
	 * Original error that caused this error.
	 */
	public override readonly cause?: Error

	constructor(
		message: string,
		category: ErrorCategory,
		code: string,
		recoverable: boolean,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message)
		this.name = 'StructuredError'
		this.category = category
		this.code = code
		this.recoverable = recoverable
		this.context = context
		this.cause = cause

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target)
		}
	}

	/**
	 * Serialize error to JSON for logging.
	 */
	toJSON(): StructuredErrorJSON {
		return {
			name: this.name,
			message: this.message,
			category: this.category,
			code: this.code,
			recoverable: this.recoverable,
			context: this.context,
			stack: this.stack,
			cause: this.cause
				? {
						name: this.cause.name,
						message: this.cause.message,
						stack: this.cause.stack,
					}
				: undefined,
		}
	}
}

/**
 * Type guard to check if an error is a StructuredError.
 */
export function isStructuredError(error: unknown): error is StructuredError {
	return error instanceof StructuredError
}

/**
 * Type guard to check if an error is recoverable.
 *
 * @returns True if error is a StructuredError and is marked recoverable
 */
export function isRecoverableError(error: unknown): boolean {
	return isStructuredError(error) && error.recoverable
}
