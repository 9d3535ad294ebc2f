/**
 * ByteSize - an immutable (magnitude, unit) pair such as "512 kilobytes".
 *
 * The magnitude is an exact decimal. Byte counts are rounded toward positive
 * infinity, so `toBytes()` is never smaller than the true size and can be
 * used as an upper bound when allocating.
 *
 * Two sizes are equal when their byte counts are equal, whatever their
 * units: `500 MB` equals `0.5 GB`. Hashing follows the same rule.
 */

import { BigDecimal, Effect, Equal, Hash, Option } from "effect"
import { ceilToBigInt, divideExact, fromFiniteNumber, parseDecimal, toPlainString } from "../lib/decimal"
import { factorDecimalOf, factorOf, longForm, shortForm, type ByteUnit } from "./ByteUnit"
import {
  byteCountOverflow,
  invalidSizeFormat,
  nonTerminatingConversion,
  orThrow,
  type ByteCountOverflow,
  type IntegerWidth,
  type InvalidSizeFormat,
  type NonTerminatingConversion
} from "./SizeError"

const INT32_BITS = 32
const INT64_BITS = 64
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER)
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER)

const fitsIn = (bytes: bigint, width: IntegerWidth): boolean => {
  switch (width) {
    case "int32":
      return BigInt.asIntN(INT32_BITS, bytes) === bytes
    case "int64":
      return BigInt.asIntN(INT64_BITS, bytes) === bytes
    case "safe-integer":
      return bytes >= MIN_SAFE && bytes <= MAX_SAFE
  }
}

const toDecimal = (value: BigDecimal.BigDecimal | bigint | number): BigDecimal.BigDecimal => {
  if (typeof value === "bigint") return BigDecimal.fromBigInt(value)
  if (typeof value === "number") {
    return Option.getOrThrowWith(fromFiniteNumber(value), () => invalidSizeFormat(String(value)))
  }
  return value
}

export class ByteSize implements Equal.Equal {
  private constructor(
    readonly value: BigDecimal.BigDecimal,
    readonly unit: ByteUnit
  ) {}

  // ===========================================================================
  // Construction
  // ===========================================================================

  /**
   * A number is read through its shortest decimal form, so `make(0.1, "gigabytes")`
   * is exactly one tenth of a gigabyte. Throws `InvalidSizeFormat` for NaN and
   * infinities.
   */
  static make(value: BigDecimal.BigDecimal | bigint | number, unit: ByteUnit = "bytes"): ByteSize {
    return new ByteSize(toDecimal(value), unit)
  }

  static ofBytes(bytes: bigint | number): ByteSize {
    if (typeof bytes === "number" && !Number.isInteger(bytes)) {
      throw invalidSizeFormat(String(bytes))
    }
    return ByteSize.make(bytes, "bytes")
  }

  static fromString(literal: string, unit: ByteUnit): Effect.Effect<ByteSize, InvalidSizeFormat> {
    return Option.match(parseDecimal(literal), {
      onNone: () => Effect.fail(invalidSizeFormat(literal)),
      onSome: (value) => Effect.succeed(new ByteSize(value, unit))
    })
  }

  static unsafeFromString(literal: string, unit: ByteUnit): ByteSize {
    return orThrow(ByteSize.fromString(literal, unit))
  }

  // ===========================================================================
  // Byte counts
  // ===========================================================================

  toBytes(): bigint {
    return ceilToBigInt(BigDecimal.multiply(this.value, factorDecimalOf(this.unit)))
  }

  toBytesInt32(): Effect.Effect<number, ByteCountOverflow> {
    return this.checkedBytes("int32").pipe(Effect.map(Number))
  }

  toBytesInt64(): Effect.Effect<bigint, ByteCountOverflow> {
    return this.checkedBytes("int64")
  }

  toBytesSafeInteger(): Effect.Effect<number, ByteCountOverflow> {
    return this.checkedBytes("safe-integer").pipe(Effect.map(Number))
  }

  private checkedBytes(width: IntegerWidth): Effect.Effect<bigint, ByteCountOverflow> {
    const bytes = this.toBytes()
    return fitsIn(bytes, width) ? Effect.succeed(bytes) : Effect.fail(byteCountOverflow(bytes, width))
  }

  // ===========================================================================
  // Conversion
  // ===========================================================================

  /**
   * Same size in another unit. Fails when the rounded byte count divided by
   * the target factor has no finite decimal expansion.
   */
  convertTo(unit: ByteUnit): Effect.Effect<ByteSize, NonTerminatingConversion> {
    const bytes = this.toBytes()
    return Option.match(divideExact(bytes, factorOf(unit)), {
      onNone: () => Effect.fail(nonTerminatingConversion(bytes, unit)),
      onSome: (value) => Effect.succeed(new ByteSize(value, unit))
    })
  }

  unsafeConvertTo(unit: ByteUnit): ByteSize {
    return orThrow(this.convertTo(unit))
  }

  // ===========================================================================
  // Display
  // ===========================================================================

  toString(): string {
    return `${toPlainString(this.value)} ${shortForm(this.unit)}`
  }

  toLongString(): string {
    return `${toPlainString(this.value)} ${longForm(this.unit)}`
  }

  // ===========================================================================
  // Equality
  // ===========================================================================

  equals(that: ByteSize): boolean {
    return Equal.equals(this, that)
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof ByteSize && this.toBytes() === that.toBytes()
  }

  [Hash.symbol](): number {
    return Hash.hash(this.toBytes())
  }
}
