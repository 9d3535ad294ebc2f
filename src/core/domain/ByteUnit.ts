/**
 * ByteUnit - the closed set of storage units and their static definitions.
 *
 * SI units scale by 1000, IEC units by 1024. `bytes` is the common base of
 * both and is a member of neither family.
 */

import { BigDecimal, Effect, Option } from "effect"
import { unknownSizeUnit, type UnknownSizeUnit } from "./SizeError"

export type ByteStandard = "SI" | "IEC"

export type ByteUnit =
  | "bytes"
  | "kilobytes"
  | "megabytes"
  | "gigabytes"
  | "terabytes"
  | "petabytes"
  | "exabytes"
  | "zettabytes"
  | "yottabytes"
  | "kibibytes"
  | "mebibytes"
  | "gibibytes"
  | "tebibytes"
  | "pebibytes"
  | "exbibytes"
  | "zebibytes"
  | "yobibytes"

export interface UnitDefinition {
  readonly unit: ByteUnit
  readonly standard: ByteStandard | undefined
  readonly exponent: number
  readonly factor: bigint
  readonly shortName: string
  readonly longName: string
  /** Lower-cased; lookups lower-case the token first. */
  readonly aliases: ReadonlyArray<string>
}

const BASE: Record<ByteStandard, bigint> = { SI: 1000n, IEC: 1024n }

// =============================================================================
// Table
// =============================================================================

const bytesDefinition: UnitDefinition = {
  unit: "bytes",
  standard: undefined,
  exponent: 0,
  factor: 1n,
  shortName: "B",
  longName: "bytes",
  aliases: ["b", "byte", "bytes"]
}

// "M" and "Mi" are mebibytes, "MB" is megabytes
const scaled = (
  standard: ByteStandard,
  exponent: number,
  prefix: string,
  unit: ByteUnit
): UnitDefinition => {
  const letter = prefix.charAt(0)
  const upper = letter.toUpperCase()
  const isIEC = standard === "IEC"

  return {
    unit,
    standard,
    exponent,
    factor: BASE[standard] ** BigInt(exponent),
    shortName: isIEC ? `${upper}iB` : `${upper}B`,
    longName: unit,
    aliases: isIEC
      ? [letter, `${letter}i`, `${letter}ib`, `${prefix}byte`, `${prefix}bytes`]
      : [`${letter}b`, `${prefix}byte`, `${prefix}bytes`]
  }
}

const definitions: ReadonlyArray<UnitDefinition> = Object.freeze([
  bytesDefinition,
  scaled("SI", 1, "kilo", "kilobytes"),
  scaled("SI", 2, "mega", "megabytes"),
  scaled("SI", 3, "giga", "gigabytes"),
  scaled("SI", 4, "tera", "terabytes"),
  scaled("SI", 5, "peta", "petabytes"),
  scaled("SI", 6, "exa", "exabytes"),
  scaled("SI", 7, "zetta", "zettabytes"),
  scaled("SI", 8, "yotta", "yottabytes"),
  scaled("IEC", 1, "kibi", "kibibytes"),
  scaled("IEC", 2, "mebi", "mebibytes"),
  scaled("IEC", 3, "gibi", "gibibytes"),
  scaled("IEC", 4, "tebi", "tebibytes"),
  scaled("IEC", 5, "pebi", "pebibytes"),
  scaled("IEC", 6, "exbi", "exbibytes"),
  scaled("IEC", 7, "zebi", "zebibytes"),
  scaled("IEC", 8, "yobi", "yobibytes")
].map((definition) => Object.freeze(definition)))

const byUnit: ReadonlyMap<ByteUnit, UnitDefinition> = new Map(
  definitions.map((d) => [d.unit, d] as const)
)

const byAlias: ReadonlyMap<string, ByteUnit> = new Map(
  definitions.flatMap((d) => d.aliases.map((alias) => [alias, d.unit] as const))
)

// =============================================================================
// Queries
// =============================================================================

export const isByteUnit = (u: unknown): u is ByteUnit =>
  typeof u === "string" && definitions.some((d) => d.unit === u)

/** Throws a `TypeError` for a string that is not a unit, from an unchecked caller. */
export const unitDefinition = (unit: ByteUnit): UnitDefinition => {
  const definition = byUnit.get(unit)
  if (definition === undefined) {
    throw new TypeError(`Not a byte unit: "${unit}"`)
  }
  return definition
}

export const factorOf = (unit: ByteUnit): bigint => unitDefinition(unit).factor

export const factorDecimalOf = (unit: ByteUnit): BigDecimal.BigDecimal =>
  BigDecimal.fromBigInt(factorOf(unit))

export const isSI = (unit: ByteUnit): boolean => unitDefinition(unit).standard === "SI"

export const isIEC = (unit: ByteUnit): boolean => unitDefinition(unit).standard === "IEC"

/** All units in declaration order: bytes, then SI, then IEC. */
export const units: ReadonlyArray<ByteUnit> = definitions.map((d) => d.unit)

export const siUnits: ReadonlyArray<ByteUnit> = units.filter(isSI)

export const iecUnits: ReadonlyArray<ByteUnit> = units.filter(isIEC)

export const shortForm = (unit: ByteUnit): string => unitDefinition(unit).shortName

export const longForm = (unit: ByteUnit): string => unitDefinition(unit).longName

export const lookupAlias = (token: string): Option.Option<ByteUnit> =>
  Option.fromNullable(byAlias.get(token.toLowerCase()))

/**
 * Like {@link lookupAlias}, but trims the token and fails with
 * `UnknownSizeUnit` instead of returning none. Canonical names such as
 * "mebibytes" are aliases too.
 */
export const resolveUnit = (token: string): Effect.Effect<ByteUnit, UnknownSizeUnit> =>
  Option.match(lookupAlias(token.trim()), {
    onNone: () => Effect.fail(unknownSizeUnit(token)),
    onSome: (unit) => Effect.succeed(unit)
  })
