import { Config, Console, Effect, pipe } from "effect"

import type { BytesOptions, ConvertOptions } from "./options"
import { fromDomainError } from "./errors"

import { parseSize, resolveUnit, splitNumberAndUnit, unitDefinition, units } from "../core"
import { LoggerServiceTag, LoggerServiceLive, type OutputForm } from "../services/LoggerService"

export const AppLive = LoggerServiceLive

/**
 * Default output form, `BYTESIZE_FORMAT=short|long`
 */
export const outputForm: Config.Config<OutputForm> = Config.literal("short", "long")(
  "BYTESIZE_FORMAT"
).pipe(Config.withDefault<OutputForm>("short"))

/**
 * Error handling wrapper for CLI commands
 */
export const withErrorHandling = <A, R>(
  effect: Effect.Effect<A, unknown, R>
): Effect.Effect<void, never, R> =>
  pipe(
    effect,
    Effect.catchAll((error) => {
      const appError = fromDomainError(error)
      return Console.error(`\n${appError.format()}`)
    }),
    Effect.asVoid
  )

const traceSplit = (input: string) => {
  const [number, unit] = splitNumberAndUnit(input)
  return Effect.logDebug(`Size "${input}": number "${number}", unit "${unit}"`)
}

/**
 * Run the bytes command
 */
export const runBytes = (options: BytesOptions) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag

    yield* traceSplit(options.size)
    const size = yield* parseSize(options.size)
    yield* Effect.logDebug(`Parsed ${options.size} as ${size.toLongString()}`)

    yield* logger.bytes(size.toBytes())
  })

/**
 * Run the convert command
 */
export const runConvert = (options: ConvertOptions) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag

    yield* traceSplit(options.size)
    const size = yield* parseSize(options.size)
    const unit = yield* resolveUnit(options.to)
    yield* Effect.logDebug(`Converting ${size.toLongString()} (${size.toBytes()} bytes) to ${unit}`)

    const converted = yield* size.convertTo(unit)
    const form = options.long ? "long" : yield* outputForm

    yield* logger.converted(converted, form)
  })

/**
 * Run the units command
 */
export const runUnits = () =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag
    yield* logger.unitTable(units.map(unitDefinition))
  })
