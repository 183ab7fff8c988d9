/**
 * Named byte units.
 *
 * @example
 * ```ts
 * import { BinaryUnits, MiB } from "exactbytes/units";
 *
 * MiB.factor.toString(); // "1048576"
 * BinaryUnits.unitForExp(3)?.symbol; // "GiB"
 * ```
 *
 * @module units
 */

export {
	B,
	BinaryUnits,
	DecimalUnits,
	EB,
	EiB,
	GB,
	GiB,
	KiB,
	kB,
	MB,
	MiB,
	PB,
	PiB,
	TB,
	TiB,
	UNITS,
	Unit,
	UnitFamily,
	unitFamily,
	YB,
	YiB,
	ZB,
	ZiB,
} from './units.js'
