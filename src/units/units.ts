/**
 * Unit tables for the binary (1024) and decimal (1000) families.
 *
 * @module units/units
 */

import { Rational } from '../rational/index.js'

/**
 * A named unit of bytes. `factor` is `base ** exponent` bytes.
 */
export class Unit {
	readonly factor: Rational

	constructor(
		readonly abbr: string,
		readonly prefix: string,
		readonly base: bigint,
		readonly exponent: number,
	) {
		this.factor = Rational.pow(base, exponent)
		Object.freeze(this)
	}

	/** Unit symbol, e.g. "KiB", "kB", "B". */
	get symbol(): string {
		return `${this.abbr}B`
	}

	toString(): string {
		return this.symbol
	}
}

/** The byte. */
export const B = new Unit('', '', 1n, 0)

/**
 * An ordered table of units sharing one base.
 */
export class UnitFamily {
	private readonly table: readonly Unit[]

	constructor(
		readonly name: 'binary' | 'decimal',
		readonly base: bigint,
		prefixes: ReadonlyArray<readonly [abbr: string, prefix: string]>,
	) {
		this.table = Object.freeze(
			prefixes.map(([abbr, prefix], i) => new Unit(abbr, prefix, base, i + 1)),
		)
	}

	/** Units in ascending exponent order, excluding the byte. */
	units(): Unit[] {
		return [...this.table]
	}

	/** Unit with the given exponent, or null when the table has none. */
	unitForExp(exponent: number): Unit | null {
		return this.table.find((unit) => unit.exponent === exponent) ?? null
	}

	maxExponent(): number {
		return this.table.length
	}

	has(unit: Unit): boolean {
		return this.table.includes(unit)
	}

	/** Look a unit up by its symbol ("MiB") within this family. */
	bySymbol(symbol: string): Unit | null {
		return this.table.find((unit) => unit.symbol === symbol) ?? null
	}
}

export const BinaryUnits = new UnitFamily('binary', 1024n, [
	['Ki', 'kibi'],
	['Mi', 'mebi'],
	['Gi', 'gibi'],
	['Ti', 'tebi'],
	['Pi', 'pebi'],
	['Ei', 'exbi'],
	['Zi', 'zebi'],
	['Yi', 'yobi'],
])

export const DecimalUnits = new UnitFamily('decimal', 1000n, [
	['k', 'kilo'],
	['M', 'mega'],
	['G', 'giga'],
	['T', 'tera'],
	['P', 'peta'],
	['E', 'exa'],
	['Z', 'zetta'],
	['Y', 'yotta'],
])

function pick(family: UnitFamily, exponent: number): Unit {
	const unit = family.unitForExp(exponent)
	if (!unit) throw new Error(`${family.name} table has no exponent ${exponent}`)
	return unit
}

export const KiB = pick(BinaryUnits, 1)
export const MiB = pick(BinaryUnits, 2)
export const GiB = pick(BinaryUnits, 3)
export const TiB = pick(BinaryUnits, 4)
export const PiB = pick(BinaryUnits, 5)
export const EiB = pick(BinaryUnits, 6)
export const ZiB = pick(BinaryUnits, 7)
export const YiB = pick(BinaryUnits, 8)

export const kB = pick(DecimalUnits, 1)
export const MB = pick(DecimalUnits, 2)
export const GB = pick(DecimalUnits, 3)
export const TB = pick(DecimalUnits, 4)
export const PB = pick(DecimalUnits, 5)
export const EB = pick(DecimalUnits, 6)
export const ZB = pick(DecimalUnits, 7)
export const YB = pick(DecimalUnits, 8)

/** Every named unit: the byte, then the binary and decimal families. */
export const UNITS: readonly Unit[] = Object.freeze([
	B,
	...BinaryUnits.units(),
	...DecimalUnits.units(),
])

/** Pick the family for a components search. */
export function unitFamily(binaryUnits: boolean): UnitFamily {
	return binaryUnits ? BinaryUnits : DecimalUnits
}
