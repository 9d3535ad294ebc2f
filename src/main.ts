/**
 * bytesize CLI
 *
 * Reads human-written storage sizes and converts them between SI (1000) and
 * IEC (1024) units without losing precision.
 *
 * Commands:
 *   bytes   - Print the byte count of a size, rounded up
 *   convert - Print a size in another unit
 *   units   - List every unit with its factor and aliases
 *
 * Example:
 *   $ bytesize bytes 1.5GiB            # 1610612736
 *   $ bytesize convert 10KB --to KiB   # 9.765625 KiB
 *   $ bytesize convert 2M --to MB --long
 */

import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Logger, LogLevel } from "effect"

import * as Opts from "./cli/options"
import { runBytes, runConvert, runUnits, withErrorHandling, AppLive } from "./cli/handler"

const withDebug =
  (debug: boolean) =>
  <A, E, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    debug ? Logger.withMinimumLogLevel(self, LogLevel.Debug) : self

// =============================================================================
// Bytes subcommand
// =============================================================================

const bytesCommand = Command.make(
  "bytes",
  {
    size: Opts.size,
    debug: Opts.debug,
  },
  (opts) =>
    withErrorHandling(runBytes({ size: opts.size })).pipe(
      withDebug(opts.debug),
      Effect.provide(AppLive)
    )
).pipe(
  Command.withDescription("Print the byte count of a size, rounded up")
)

// =============================================================================
// Convert subcommand
// =============================================================================

const convertCommand = Command.make(
  "convert",
  {
    size: Opts.size,
    to: Opts.to,
    long: Opts.long,
    debug: Opts.debug,
  },
  (opts) =>
    withErrorHandling(
      runConvert({
        size: opts.size,
        to: opts.to,
        long: opts.long,
      })
    ).pipe(
      withDebug(opts.debug),
      Effect.provide(AppLive)
    )
).pipe(
  Command.withDescription("Print a size in another unit")
)

// =============================================================================
// Units subcommand
// =============================================================================

const unitsCommand = Command.make("units", {}, () =>
  withErrorHandling(runUnits()).pipe(Effect.provide(AppLive))
).pipe(
  Command.withDescription("List every unit with its factor and aliases")
)

// =============================================================================
// Root command
// =============================================================================

const rootCommand = Command.make("bytesize", {}).pipe(
  Command.withSubcommands([bytesCommand, convertCommand, unitsCommand]),
  Command.withDescription(
    "Parse and convert storage sizes between SI and IEC units"
  )
)

// =============================================================================
// Run CLI
// =============================================================================

const cli = Command.run(rootCommand, {
  name: "bytesize",
  version: "0.1.0",
})

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain)
