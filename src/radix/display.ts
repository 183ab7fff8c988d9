/**
 * Turn a {@link Radix} and its exactness into display text.
 *
 * @module radix/display
 */

import type { Relation } from '../rational/index.js'
import type { Radix } from './radix.js'

/** How the base of a numeral is shown. */
export interface BaseConfig {
	/** Prefix numerals with `0b`, `0` or `0x` for bases 2, 8 and 16. */
	readonly usePrefix: boolean
	/** Append the base as subscript digits when it is not 10. */
	readonly useSubscript: boolean
}

/** How individual digits are shown. */
export interface DigitsConfig {
	/** Joins decimal-rendered digits of bases above 10. */
	readonly separator: string
	/** Upper-case letter digits. */
	readonly useCaps: boolean
	/** Letters for digits above 9, up to base 36. */
	readonly useLetters: boolean
}

/** Which trailing zeros of the fractional part are dropped. */
export interface StripConfig {
	/** Always strip trailing zeros. */
	readonly strip: boolean
	/** Strip trailing zeros of exact numerals only. */
	readonly stripExact: boolean
	/** Drop a fractional part made only of zeros. */
	readonly stripWhole: boolean
}

export interface DisplayConfig {
	/** Mark approximate numerals with "< " or "> ". */
	readonly showApproxStr: boolean
	readonly baseConfig: BaseConfig
	readonly digitsConfig: DigitsConfig
	readonly stripConfig: StripConfig
}

/**
 * Renders a numeral given its relation to the exact value.
 */
export interface RadixDisplay {
	xform(radix: Radix, relation: Relation): string
}

export type RadixDisplayFactory = (config: DisplayConfig) => RadixDisplay

const LETTER_DIGITS = '0123456789abcdefghijklmnopqrstuvwxyz'
const SUBSCRIPT_DIGITS = '₀₁₂₃₄₅₆₇₈₉'
const BASE_PREFIXES: Readonly<Record<number, string>> = {
	2: '0b',
	8: '0',
	16: '0x',
}

function subscript(base: number): string {
	return [...String(base)]
		.map((digit) => SUBSCRIPT_DIGITS[Number(digit)] ?? digit)
		.join('')
}

function stripTrailingZeros(digits: readonly number[]): number[] {
	let end = digits.length
	while (end > 0 && digits[end - 1] === 0) end--
	return digits.slice(0, end)
}

/**
 * Default numeral display.
 *
 * The approximation marker describes where the exact value lies relative
 * to the shown numeral: "< 2" means the exact value is below 2.
 *
 * @example
 * ```ts
 * const display = createRadixDisplay(DEFAULT_DISPLAY_CONFIG);
 * display.xform(radix, 1); // "< 2"
 * ```
 */
export function createRadixDisplay(config: DisplayConfig): RadixDisplay {
	const { baseConfig, digitsConfig, stripConfig } = config

	function renderDigits(digits: readonly number[], base: number): string {
		if (base <= 10) return digits.join('')
		if (digitsConfig.useLetters && base <= LETTER_DIGITS.length) {
			const text = digits.map((d) => LETTER_DIGITS[d] ?? '').join('')
			return digitsConfig.useCaps ? text.toUpperCase() : text
		}
		return digits.join(digitsConfig.separator)
	}

	function fractional(radix: Radix, relation: Relation): number[] {
		let digits = [...radix.nonRepeatingPart]
		if (radix.repeatingPart.length > 0) return digits
		if (stripConfig.strip || (stripConfig.stripExact && relation === 0)) {
			digits = stripTrailingZeros(digits)
		}
		if (stripConfig.stripWhole && digits.every((d) => d === 0)) {
			digits = []
		}
		return digits
	}

	return {
		xform(radix: Radix, relation: Relation): string {
			const { base } = radix
			const nonRepeating = fractional(radix, relation)

			let number = renderDigits(radix.integerPart, base)
			if (nonRepeating.length > 0 || radix.repeatingPart.length > 0) {
				number += `.${renderDigits(nonRepeating, base)}`
				if (radix.repeatingPart.length > 0) {
					number += `(${renderDigits(radix.repeatingPart, base)})`
				}
			}

			const prefix = baseConfig.usePrefix ? (BASE_PREFIXES[base] ?? '') : ''
			const suffix =
				baseConfig.useSubscript && base !== 10 ? subscript(base) : ''
			const sign = radix.positive ? '' : '-'
			const text = `${sign}${prefix}${number}${suffix}`

			if (!config.showApproxStr || relation === 0) return text
			return `${relation === 1 ? '<' : '>'} ${text}`
		},
	}
}
