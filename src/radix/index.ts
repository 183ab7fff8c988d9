/**
 * Numeral rendering for exact rationals: digit expansion with rounding,
 * and configurable display of the result.
 *
 * @example
 * ```ts
 * import { createRadixDisplay, fromRational } from "exactbytes/radix";
 *
 * const [radix, relation] = fromRational(Rational.of(2047n, 1024n), 10, 2, ROUND_HALF_ZERO);
 * createRadixDisplay(config).xform(radix, relation); // "< 2"
 * ```
 *
 * @module radix
 */

export {
	type BaseConfig,
	createRadixDisplay,
	type DigitsConfig,
	type DisplayConfig,
	type RadixDisplay,
	type RadixDisplayFactory,
	type StripConfig,
} from './display.js'
export { fromRational, type Radix, toRational } from './radix.js'
