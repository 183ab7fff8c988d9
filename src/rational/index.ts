/**
 * Exact rational arithmetic and integer rounding.
 *
 * @example
 * ```ts
 * import { Rational, roundToInt, ROUND_HALF_UP } from "exactbytes/rational";
 *
 * const third = Rational.of(1n, 3n);
 * third.add(third).toString(); // "2/3"
 * roundToInt(Rational.from("2.5"), ROUND_HALF_UP); // [3n, 1]
 * ```
 *
 * @module rational
 */

export { type PreciseNumber, Rational, roundToInt } from './rational.js'
export {
	isRoundingMethod,
	type Relation,
	ROUND_DOWN,
	ROUND_HALF_DOWN,
	ROUND_HALF_EVEN,
	ROUND_HALF_UP,
	ROUND_HALF_ZERO,
	ROUND_TO_ZERO,
	ROUND_UP,
	ROUNDING_METHODS,
	RoundingMethod,
} from './rounding.js'
