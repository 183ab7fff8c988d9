/**
 * The Size value type.
 *
 * @example
 * ```ts
 * import { Size } from "exactbytes/size";
 * import { KiB } from "exactbytes/units";
 *
 * new Size(1536).getString(); // "1.5 KiB"
 * new Size(1500).roundTo(KiB, ROUND_UP).getString(); // "2 KiB"
 * ```
 *
 * @module size
 */

export { nextOrLast, takeUntil } from './generators.js'
export {
	type Bounds,
	type ClassifiedUnitSpec,
	classifyUnitSpec,
	type Operand,
	resolveUnitFactor,
	Size,
	type SizeInput,
	type UnitSpec,
} from './size.js'
