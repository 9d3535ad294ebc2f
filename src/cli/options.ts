import { Args, Options } from "@effect/cli";

export const size = Args.text({ name: "size" }).pipe(
  Args.withDescription("Size to read (e.g., 512MB, 1.5 GiB, 2M, \"7 kibibytes\")")
);

export const to = Options.text("to").pipe(
  Options.withAlias("t"),
  Options.withDescription("Target unit, as a name or alias (e.g., GB, gibibytes, M)")
);

export const long = Options.boolean("long").pipe(
  Options.withDescription("Print the unit's long name (overrides BYTESIZE_FORMAT)"),
  Options.withDefault(false)
);

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Enable verbose debug logging"),
  Options.withDefault(false)
);

export interface BytesOptions {
  readonly size: string;
}

export interface ConvertOptions {
  readonly size: string;
  readonly to: string;
  readonly long: boolean;
}
