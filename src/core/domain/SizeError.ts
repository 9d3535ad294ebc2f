import { Data, Effect, Either } from "effect"
import type { ByteUnit } from "./ByteUnit"

export class InvalidSizeFormat extends Data.TaggedError("InvalidSizeFormat")<{
  readonly input: string
  readonly message: string
}> {}

export class UnknownSizeUnit extends Data.TaggedError("UnknownSizeUnit")<{
  readonly unit: string
  readonly message: string
}> {}

export class NonTerminatingConversion extends Data.TaggedError("NonTerminatingConversion")<{
  readonly bytes: bigint
  readonly unit: ByteUnit
  readonly message: string
}> {}

export type IntegerWidth = "int32" | "int64" | "safe-integer"

export class ByteCountOverflow extends Data.TaggedError("ByteCountOverflow")<{
  readonly bytes: bigint
  readonly width: IntegerWidth
  readonly message: string
}> {}

export type SizeError =
  | InvalidSizeFormat
  | UnknownSizeUnit
  | NonTerminatingConversion
  | ByteCountOverflow

export const invalidSizeFormat = (input: string) =>
  new InvalidSizeFormat({ input, message: `Invalid size format: "${input}"` })

export const unknownSizeUnit = (unit: string) =>
  new UnknownSizeUnit({ unit, message: `Unknown size unit: "${unit}"` })

export const nonTerminatingConversion = (bytes: bigint, unit: ByteUnit) =>
  new NonTerminatingConversion({
    bytes,
    unit,
    message: `${bytes} bytes has no finite decimal expansion in ${unit}`
  })

export const byteCountOverflow = (bytes: bigint, width: IntegerWidth) =>
  new ByteCountOverflow({ bytes, width, message: `${bytes} bytes does not fit in ${width}` })

/** Runs a synchronous effect, throwing its failure as-is rather than wrapped. */
export const orThrow = <A, E>(effect: Effect.Effect<A, E>): A =>
  Either.getOrThrowWith(Effect.runSync(Effect.either(effect)), (error) => error)
