import { Match } from "effect"

import type { SizeError } from "../core/domain/SizeError"

export class AppError extends Error {
  readonly _tag = "AppError";

  constructor(
    readonly title: string,
    readonly detail: string,
    readonly suggestion: string
  ) {
    super(`${title}: ${detail}`);
  }

  format(): string {
    return [
      `ERROR: ${this.title}`,
      ``,
      `   ${this.detail}`,
      ``,
      `   Hint: ${this.suggestion}`
    ].join("\n");
  }
}

const errors = {
  invalidSizeFormat: (input: string) =>
    new AppError(
      "Invalid size",
      `"${input}" is not a decimal number.`,
      `Write the number before the unit, e.g. 512MB, 1.5 GiB or 2M.`
    ),

  unknownUnit: (unit: string) =>
    new AppError(
      "Unknown unit",
      unit.length === 0 ? `No unit was given.` : `"${unit}" is not a known unit.`,
      `Run 'bytesize units' to list the accepted units and aliases.`
    ),

  nonTerminatingConversion: (bytes: bigint, unit: string) =>
    new AppError(
      "Inexact conversion",
      `${bytes} bytes cannot be written exactly in ${unit}.`,
      `Convert to a unit whose factor divides the byte count.`
    ),

  byteCountOverflow: (bytes: bigint, width: string) =>
    new AppError(
      "Byte count too large",
      `${bytes} bytes does not fit in ${width}.`,
      `Use the arbitrary-precision byte count instead.`
    ),

  unexpected: (message: string) =>
    new AppError("Unexpected error", message, `If this persists, please report this issue.`)
};

const matchSizeError = Match.typeTags<SizeError>()({
  InvalidSizeFormat: (e) => errors.invalidSizeFormat(e.input),
  UnknownSizeUnit: (e) => errors.unknownUnit(e.unit),
  NonTerminatingConversion: (e) => errors.nonTerminatingConversion(e.bytes, e.unit),
  ByteCountOverflow: (e) => errors.byteCountOverflow(e.bytes, e.width)
});

const SIZE_ERROR_TAGS: ReadonlySet<string> = new Set<SizeError["_tag"]>([
  "InvalidSizeFormat",
  "UnknownSizeUnit",
  "NonTerminatingConversion",
  "ByteCountOverflow"
]);

const isSizeError = (e: unknown): e is SizeError =>
  typeof e === "object" &&
  e !== null &&
  "_tag" in e &&
  typeof e._tag === "string" &&
  SIZE_ERROR_TAGS.has(e._tag);

export const fromDomainError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (isSizeError(error)) {
    return matchSizeError(error);
  }

  if (error instanceof Error) {
    return errors.unexpected(error.message);
  }

  return errors.unexpected(String(error));
};

export const {
  invalidSizeFormat,
  unknownUnit,
  nonTerminatingConversion,
  byteCountOverflow,
  unexpected
} = errors;
