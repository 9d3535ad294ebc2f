/**
 * LoggerService - formatted console output for the bytes, convert and units commands
 */

import { Context, Effect, Layer, Console } from "effect"
import type { ByteSize } from "../core/domain/ByteSize"
import type { UnitDefinition } from "../core/domain/ByteUnit"

export type OutputForm = "short" | "long"

// =============================================================================
// Formatting
// =============================================================================

export const formatSize = (size: ByteSize, form: OutputForm): string =>
  form === "long" ? size.toLongString() : size.toString()

export const formatUnitRow = (definition: UnitDefinition): string =>
  [
    definition.shortName.padEnd(4),
    definition.longName.padEnd(11),
    (definition.standard ?? "-").padEnd(4),
    definition.factor.toString().padStart(25),
    `  ${definition.aliases.join(", ")}`
  ].join(" ")

// =============================================================================
// Service interface
// =============================================================================

export interface LoggerService {
  readonly bytes: (bytes: bigint) => Effect.Effect<void>
  readonly converted: (size: ByteSize, form: OutputForm) => Effect.Effect<void>
  readonly unitTable: (definitions: ReadonlyArray<UnitDefinition>) => Effect.Effect<void>
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

// =============================================================================
// Implementation
// =============================================================================

export const LoggerServiceLive = Layer.succeed(
  LoggerServiceTag,
  {
    bytes: (bytes) => Console.log(bytes.toString()),
    converted: (size, form) => Console.log(formatSize(size, form)),
    unitTable: (definitions) =>
      Effect.gen(function* () {
        yield* Console.log(`${"Unit".padEnd(4)} ${"Name".padEnd(11)} Std  ${"Factor".padStart(25)}   Aliases`)
        for (const definition of definitions) {
          yield* Console.log(formatUnitRow(definition))
        }
      }),
  }
)
