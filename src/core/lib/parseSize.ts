import { Effect, Option } from "effect"
import { ByteSize } from "../domain/ByteSize"
import { lookupAlias } from "../domain/ByteUnit"
import { parseDecimal } from "./decimal"
import {
  invalidSizeFormat,
  orThrow,
  unknownSizeUnit,
  type InvalidSizeFormat,
  type UnknownSizeUnit
} from "../domain/SizeError"

const LETTER = /\p{L}/u

/**
 * Splits at the last non-letter: `"1.5 GiB"` is `["1.5", "GiB"]`,
 * `"3Gb"` is `["3", "Gb"]`.
 */
export const splitNumberAndUnit = (input: string): readonly [number: string, unit: string] => {
  const trimmed = input.trim()
  let i = trimmed.length
  while (i > 0 && LETTER.test(trimmed.charAt(i - 1))) {
    i--
  }
  return [trimmed.slice(0, i).trim(), trimmed.slice(i).trim()]
}

/**
 * Parses a human-written size such as "1 megabyte", "3Gb", "2M" or "7 KiB".
 *
 * A bare letter is binary, the letter followed by "B" is decimal: "2M" is two
 * mebibytes, "2MB" two megabytes. Unit matching ignores case. The number is
 * checked first (`InvalidSizeFormat`), then the unit (`UnknownSizeUnit`); there
 * is no default unit, so "1024" fails.
 */
export const parseSize = (
  input: string
): Effect.Effect<ByteSize, InvalidSizeFormat | UnknownSizeUnit> =>
  Effect.gen(function* () {
    const [number, unitToken] = splitNumberAndUnit(input)

    const value = yield* Option.match(parseDecimal(number), {
      onNone: () => Effect.fail(invalidSizeFormat(number)),
      onSome: (d) => Effect.succeed(d)
    })
    const unit = yield* Option.match(lookupAlias(unitToken), {
      onNone: () => Effect.fail(unknownSizeUnit(unitToken)),
      onSome: (u) => Effect.succeed(u)
    })

    return ByteSize.make(value, unit)
  })

export const unsafeParseSize = (input: string): ByteSize => orThrow(parseSize(input))
