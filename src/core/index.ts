export { ByteSize } from "./domain/ByteSize"

export type { ByteStandard, ByteUnit, UnitDefinition } from "./domain/ByteUnit"
export {
  units,
  siUnits,
  iecUnits,
  isByteUnit,
  unitDefinition,
  factorOf,
  factorDecimalOf,
  isSI,
  isIEC,
  shortForm,
  longForm,
  lookupAlias,
  resolveUnit
} from "./domain/ByteUnit"

export type { IntegerWidth, SizeError } from "./domain/SizeError"
export {
  InvalidSizeFormat,
  UnknownSizeUnit,
  NonTerminatingConversion,
  ByteCountOverflow
} from "./domain/SizeError"

export { parseSize, unsafeParseSize, splitNumberAndUnit } from "./lib/parseSize"
