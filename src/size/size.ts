/**
 * The Size value type: an exact, immutable number of bytes.
 *
 * Sizes never mix with floating point. Arithmetic follows a fixed operand
 * matrix (size with size, size with exact number) and anything outside it
 * throws instead of being coerced.
 *
 * @module size/size
 */

import {
	getDefaultStringConfig,
	getDefaultValueConfig,
	isStrict,
	type StringConfig,
	type ValueConfig,
} from '../config/index.js'
import {
	SizeFractionalResultError,
	SizeNonsensicalBinOpError,
	SizeNonsensicalBinOpValueError,
	SizePowerResultError,
	SizeValueError,
} from '../errors/index.js'
import { fromRational, type Radix } from '../radix/index.js'
import {
	isRoundingMethod,
	type PreciseNumber,
	Rational,
	type Relation,
	type RoundingMethod,
	roundToInt,
} from '../rational/index.js'
import { B, Unit, unitFamily } from '../units/index.js'
import { nextOrLast, takeUntil } from './generators.js'

/** Anything a size can be built from. */
export type SizeInput = PreciseNumber | string | Size

/** The other operand of a binary operation. */
export type Operand = Size | PreciseNumber

/**
 * Something that denotes a number of bytes per unit: a named unit, a size,
 * or a bare exact number.
 */
export type UnitSpec = Unit | Size | PreciseNumber

/** A unit specifier resolved to its factor. */
export type ClassifiedUnitSpec =
	| { readonly kind: 'unit'; readonly unit: Unit; readonly factor: Rational }
	| { readonly kind: 'size'; readonly size: Size; readonly factor: Rational }
	| { readonly kind: 'number'; readonly factor: Rational }

/** Lower and upper bound for {@link Size.roundTo}; null means unbounded. */
export type Bounds = readonly [lower: Size | null, upper: Size | null]

/**
 * Work out which kind of unit specifier `spec` is.
 *
 * @returns the variant and its factor, or null when `spec` denotes no unit
 */
export function classifyUnitSpec(spec: unknown): ClassifiedUnitSpec | null {
	if (spec instanceof Unit) return { kind: 'unit', unit: spec, factor: spec.factor }
	if (spec instanceof Size) return { kind: 'size', size: spec, factor: spec.magnitude }
	if (Rational.isPrecise(spec)) return { kind: 'number', factor: Rational.from(spec) }
	return null
}

/**
 * Factor in bytes of a unit specifier, or null when it denotes no unit.
 */
export function resolveUnitFactor(spec: unknown): Rational | null {
	return classifyUnitSpec(spec)?.factor ?? null
}

/**
 * Render a rational as a numeral under `config`.
 */
function asSingleNumber(value: Rational, config: ValueConfig): [Radix, Relation] {
	return fromRational(value, config.base, config.maxPlaces, config.roundingMethod)
}

/**
 * Run an exact operation, turning a zero divisor into
 * SizeNonsensicalBinOpValueError.
 */
function guarded<T>(operator: string, divisor: unknown, operation: () => T): T {
	try {
		return operation()
	} catch (error) {
		if (error instanceof RangeError) {
			throw new SizeNonsensicalBinOpValueError(operator, divisor)
		}
		throw error
	}
}

/**
 * An exact number of bytes.
 *
 * @example
 * ```ts
 * const size = new Size(3, MiB);
 * size.add(new Size(512, KiB)).getString(); // "3.5 MiB"
 * size.divide(new Size(1, KiB)).toString(); // "3072"
 * size.convertTo(kB).toString(); // "393216/125"
 * ```
 */
export class Size {
	/** The exact number of bytes. */
	readonly magnitude: Rational

	/**
	 * @param value - exact number or numeral string, or a size to copy
	 * @param units - unit specifier for `value`, default the byte; must be
	 * omitted when `value` is a size
	 * @throws SizeValueError on a malformed value or unresolvable units
	 * @throws SizeFractionalResultError in strict mode when the result is
	 * not a whole number of bytes
	 */
	constructor(value: SizeInput = 0, units?: UnitSpec | null) {
		let magnitude: Rational

		if (value instanceof Size) {
			if (units !== undefined && units !== null) {
				throw new SizeValueError(
					units,
					'units',
					'meaningless when Size value is passed',
				)
			}
			magnitude = value.magnitude
		} else if (typeof value === 'string' || Rational.isPrecise(value)) {
			const factor = resolveUnitFactor(units ?? B)
			if (factor === null) throw new SizeValueError(units, 'units')
			let exact: Rational
			try {
				exact = Rational.from(value)
			} catch (error) {
				throw new SizeValueError(
					value,
					'value',
					undefined,
					error instanceof Error ? error : undefined,
				)
			}
			magnitude = exact.mul(factor)
		} else {
			throw new SizeValueError(value, 'value')
		}

		if (isStrict() && !magnitude.isInteger()) {
			throw new SizeFractionalResultError(magnitude.toString())
		}
		this.magnitude = magnitude
		Object.freeze(this)
	}

	// Unary operations

	negate(): Size {
		return new Size(this.magnitude.neg())
	}

	abs(): Size {
		return new Size(this.magnitude.abs())
	}

	plus(): Size {
		return new Size(this.magnitude)
	}

	/** A new size with the same magnitude. */
	clone(): Size {
		return new Size(this.magnitude)
	}

	/** Whole bytes, truncated toward zero. */
	toBigInt(): bigint {
		return this.magnitude.trunc()
	}

	isZero(): boolean {
		return this.magnitude.isZero()
	}

	toBoolean(): boolean {
		return !this.isZero()
	}

	/**
	 * Key for hash-based collections; equal sizes have equal keys.
	 */
	hashKey(): string {
		return this.magnitude.toString()
	}

	// Binary operations

	/** size + size */
	add(other: Operand): Size {
		if (!(other instanceof Size)) throw new SizeNonsensicalBinOpError('+', other)
		return new Size(this.magnitude.add(other.magnitude))
	}

	/** size - size */
	subtract(other: Operand): Size {
		if (!(other instanceof Size)) throw new SizeNonsensicalBinOpError('-', other)
		return new Size(this.magnitude.sub(other.magnitude))
	}

	/** other - this, for a size `other` */
	rsubtract(other: Operand): Size {
		if (!(other instanceof Size)) throw new SizeNonsensicalBinOpError('rsub', other)
		return new Size(other.magnitude.sub(this.magnitude))
	}

	/**
	 * size * number. Multiplication is commutative, so this also covers
	 * number * size.
	 *
	 * @throws SizePowerResultError when `other` is a size
	 */
	multiply(other: Operand): Size {
		if (Rational.isPrecise(other)) return new Size(this.magnitude.mul(other))
		if (other instanceof Size) throw new SizePowerResultError()
		throw new SizeNonsensicalBinOpError('*', other)
	}

	/**
	 * True division: by a size gives a ratio, by a number gives a size.
	 */
	divide(other: Size): Rational
	divide(other: PreciseNumber): Size
	divide(other: Operand): Rational | Size
	divide(other: Operand): Rational | Size {
		if (other instanceof Size) {
			return guarded('truediv', other, () => this.magnitude.div(other.magnitude))
		}
		if (Rational.isPrecise(other)) {
			return new Size(guarded('truediv', other, () => this.magnitude.div(other)))
		}
		throw new SizeNonsensicalBinOpError('truediv', other)
	}

	/** other / this, for a size `other` */
	rdivide(other: Operand): Rational {
		if (!(other instanceof Size)) {
			throw new SizeNonsensicalBinOpError('rtruediv', other)
		}
		return guarded('rtruediv', this, () => other.magnitude.div(this.magnitude))
	}

	/**
	 * Floor division: by a size gives an integer, by a number gives a size.
	 */
	floorDivide(other: Size): bigint
	floorDivide(other: PreciseNumber): Size
	floorDivide(other: Operand): bigint | Size
	floorDivide(other: Operand): bigint | Size {
		if (other instanceof Size) {
			return guarded('floordiv', other, () =>
				this.magnitude.floorDiv(other.magnitude),
			)
		}
		if (Rational.isPrecise(other)) {
			return new Size(
				guarded('floordiv', other, () =>
					Rational.of(this.magnitude.floorDiv(other)),
				),
			)
		}
		throw new SizeNonsensicalBinOpError('floordiv', other)
	}

	/** other // this, for a size `other` */
	rfloorDivide(other: Operand): bigint {
		if (!(other instanceof Size)) {
			throw new SizeNonsensicalBinOpError('rfloordiv', other)
		}
		return guarded('rfloordiv', this, () =>
			other.magnitude.floorDiv(this.magnitude),
		)
	}

	/**
	 * Remainder of floor division; always a size.
	 */
	modulo(other: Operand): Size {
		if (other instanceof Size) {
			return new Size(guarded('%', other, () => this.magnitude.mod(other.magnitude)))
		}
		if (Rational.isPrecise(other)) {
			return new Size(guarded('%', other, () => this.magnitude.mod(other)))
		}
		throw new SizeNonsensicalBinOpError('%', other)
	}

	/** other % this, for a size `other` */
	rmodulo(other: Operand): Size {
		if (!(other instanceof Size)) throw new SizeNonsensicalBinOpError('rmod', other)
		return new Size(guarded('rmod', this, () => other.magnitude.mod(this.magnitude)))
	}

	/**
	 * Floor quotient and remainder, `this = other * quotient + remainder`.
	 * By a size the quotient is an integer; by a number it is a size.
	 */
	divmod(other: Size): [bigint, Size]
	divmod(other: PreciseNumber): [Size, Size]
	divmod(other: Operand): [bigint, Size] | [Size, Size]
	divmod(other: Operand): [bigint, Size] | [Size, Size] {
		if (other instanceof Size) {
			const [quotient, remainder] = guarded('divmod', other, () =>
				this.magnitude.divmod(other.magnitude),
			)
			return [quotient, new Size(remainder)]
		}
		if (Rational.isPrecise(other)) {
			const [quotient, remainder] = guarded('divmod', other, () =>
				this.magnitude.divmod(other),
			)
			return [new Size(quotient), new Size(remainder)]
		}
		throw new SizeNonsensicalBinOpError('divmod', other)
	}

	/** divmod(other, this), for a size `other` */
	rdivmod(other: Operand): [Rational, Size] {
		if (!(other instanceof Size)) {
			throw new SizeNonsensicalBinOpError('rdivmod', other)
		}
		const [quotient, remainder] = guarded('rdivmod', this, () =>
			other.magnitude.divmod(this.magnitude),
		)
		return [Rational.of(quotient), new Size(remainder)]
	}

	/**
	 * Sizes cannot be raised to a power.
	 *
	 * @throws SizePowerResultError for a number exponent
	 * @throws SizeNonsensicalBinOpError for anything else
	 */
	power(other: unknown): never {
		if (Rational.isPrecise(other)) throw new SizePowerResultError()
		throw new SizeNonsensicalBinOpError('**', other)
	}

	/**
	 * Sizes cannot be exponents.
	 *
	 * @throws SizeNonsensicalBinOpError always
	 */
	rpower(other: unknown): never {
		throw new SizeNonsensicalBinOpError('rpow', other)
	}

	// Comparison

	compare(other: Size): Relation {
		if (!(other instanceof Size)) throw new SizeNonsensicalBinOpError('cmp', other)
		return this.magnitude.compare(other.magnitude)
	}

	lt(other: Size): boolean {
		if (!(other instanceof Size)) throw new SizeNonsensicalBinOpError('<', other)
		return this.magnitude.lt(other.magnitude)
	}

	le(other: Size): boolean {
		if (!(other instanceof Size)) throw new SizeNonsensicalBinOpError('<=', other)
		return this.magnitude.le(other.magnitude)
	}

	gt(other: Size): boolean {
		if (!(other instanceof Size)) throw new SizeNonsensicalBinOpError('>', other)
		return this.magnitude.gt(other.magnitude)
	}

	ge(other: Size): boolean {
		if (!(other instanceof Size)) throw new SizeNonsensicalBinOpError('>=', other)
		return this.magnitude.ge(other.magnitude)
	}

	/** Same magnitude; false for anything that is not a size. */
	equals(other: unknown): boolean {
		return other instanceof Size && this.magnitude.equals(other.magnitude)
	}

	notEquals(other: unknown): boolean {
		return !this.equals(other)
	}

	// Conversion

	/**
	 * This size counted in the given unit.
	 *
	 * @throws SizeValueError if `spec` is not a unit specifier or its
	 * factor is not positive
	 */
	convertTo(spec: UnitSpec = B): Rational {
		const factor = resolveUnitFactor(spec)
		if (factor === null) throw new SizeValueError(spec, 'spec')
		if (factor.sign() <= 0) {
			throw new SizeValueError(factor, 'factor', 'can not convert to non-positive unit')
		}
		return this.magnitude.div(factor)
	}

	/**
	 * This size in the byte and in every unit of one family, finest first.
	 * Each call returns a fresh lazy sequence.
	 */
	*componentsList(binaryUnits = true): Generator<[Rational, Unit], void, undefined> {
		for (const unit of [B, ...unitFamily(binaryUnits).units()]) {
			yield [this.convertTo(unit), unit]
		}
	}

	/**
	 * Pick the unit to display this size in, and the value in that unit.
	 *
	 * With a forced unit that unit is used. Otherwise units are scanned from
	 * the finest up and the scan stops at the first unit in which the value
	 * drops below `family base * minValue`; if none does, the coarsest unit
	 * is used. With `exactValue` the scanned units are then searched from
	 * the coarsest down for one in which the value renders exactly, falling
	 * back to the finest.
	 *
	 * @example
	 * ```ts
	 * new Size(1024).components(createValueConfig()); // [1, KiB]
	 * new Size(1500).components(createValueConfig({ binaryUnits: false })); // [3/2, kB]
	 * ```
	 */
	components(config: ValueConfig = getDefaultValueConfig()): [Rational, Unit] {
		if (config.unit !== null) return [this.convertTo(config.unit), config.unit]

		const limit = config.minValue.mul(unitFamily(config.binaryUnits).base)
		const candidates = [
			...takeUntil(
				([value]) => value.abs().lt(limit),
				this.componentsList(config.binaryUnits),
			),
		]
		const finest = candidates[0]
		const chosen = candidates.at(-1)
		if (finest === undefined || chosen === undefined) {
			throw new Error('unit table yielded no candidates')
		}

		if (config.exactValue) {
			return nextOrLast(
				([value]) => asSingleNumber(value, config)[1] === 0,
				candidates.reverse(),
				finest,
			)
		}
		return chosen
	}

	/**
	 * Round to a multiple of a unit.
	 *
	 * A zero unit gives a zero size. Bounds are applied after rounding: a
	 * result below `lower` becomes `lower` and one above `upper` becomes
	 * `upper`, even when that moves the result against the rounding method
	 * (ROUND_DOWN can end up rounding up).
	 *
	 * @throws SizeValueError on an unusable unit, a negative unit, an
	 * unknown rounding method or a lower bound above the upper bound
	 *
	 * @example
	 * ```ts
	 * new Size(1500).roundTo(KiB, ROUND_UP); // Size(2048)
	 * new Size(1500).roundTo(KiB, ROUND_DOWN, [new Size(1100), null]); // Size(1100)
	 * ```
	 */
	roundTo(
		unit: UnitSpec,
		rounding: RoundingMethod,
		bounds: Bounds = [null, null],
	): Size {
		const factor = resolveUnitFactor(unit)
		if (factor === null) throw new SizeValueError(unit, 'unit')
		if (factor.sign() < 0) throw new SizeValueError(factor, 'factor')
		if (!isRoundingMethod(rounding)) throw new SizeValueError(rounding, 'rounding')

		let result: Size
		if (factor.isZero()) {
			result = new Size(0)
		} else {
			const [rounded] = roundToInt(this.magnitude.div(factor), rounding)
			result = new Size(factor.mul(rounded))
		}

		const [lower, upper] = bounds
		if (lower !== null && upper !== null && lower.gt(upper)) {
			throw new SizeValueError(bounds, 'bounds')
		}

		if (lower !== null && result.lt(lower)) return lower
		if (upper !== null && result.gt(upper)) return upper
		return result
	}

	// Text

	/**
	 * The rendered numeral, its relation to the exact value, and the unit.
	 */
	getStringInfo(config: ValueConfig = getDefaultValueConfig()): [Radix, Relation, Unit] {
		const [value, unit] = this.components(config)
		const [radix, relation] = asSingleNumber(value, config)
		return [radix, relation, unit]
	}

	/**
	 * Human-readable text, e.g. "1.5 KiB" or "< 2 KiB".
	 */
	getString(config: StringConfig = getDefaultStringConfig()): string {
		const [radix, relation, unit] = this.getStringInfo(config.valueConfig)
		const number = config.displayFactory(config.displayConfig).xform(radix, relation)
		return `${number} ${unit.symbol}`
	}

	/** Display form under the current default configuration. */
	toString(): string {
		return this.getString()
	}

	/** Debug form showing the exact magnitude, e.g. "Size(3/2)". */
	inspect(): string {
		return `Size(${this.magnitude})`
	}

	[Symbol.for('nodejs.util.inspect.custom')](): string {
		return this.inspect()
	}
}
