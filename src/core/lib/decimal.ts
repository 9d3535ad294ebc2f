/**
 * Exact decimal helpers on top of effect's BigDecimal.
 *
 * A BigDecimal is `value * 10^-scale`. Everything here works on those two
 * fields with bigint arithmetic, so no binary floating point is ever involved.
 */

import { BigDecimal, Option } from "effect"

const DECIMAL_LITERAL = /^([+-]?)(\d+)?(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/

/** Largest scale, either sign, a parsed literal may carry. */
export const MAX_LITERAL_SCALE = 10_000

const pow10 = (n: number): bigint => 10n ** BigInt(n)

/**
 * Parses a decimal literal such as `42`, `-0.5`, `.25`, `1.` or `1.5e3`
 * without going through a JavaScript number. The scale of the literal is kept
 * (`"1.50"` has scale 2). Literals whose scale would exceed
 * {@link MAX_LITERAL_SCALE} in magnitude are rejected.
 */
export const parseDecimal = (input: string): Option.Option<BigDecimal.BigDecimal> => {
  const match = DECIMAL_LITERAL.exec(input)
  if (!match) return Option.none()

  const [, sign = "", intPart = "", fracPart, exponent] = match
  if (intPart.length === 0 && (fracPart === undefined || fracPart.length === 0)) {
    return Option.none()
  }

  const fraction = fracPart ?? ""
  const digits = BigInt(`${intPart}${fraction}` || "0")
  const scale = fraction.length - (exponent === undefined ? 0 : Number(exponent))
  if (!(Math.abs(scale) <= MAX_LITERAL_SCALE)) return Option.none()

  return Option.some(BigDecimal.make(sign === "-" ? -digits : digits, scale))
}

/**
 * Reads a finite number through its shortest round-trip string, so `0.1`
 * becomes exactly one tenth rather than the nearest double.
 */
export const fromFiniteNumber = (n: number): Option.Option<BigDecimal.BigDecimal> =>
  Number.isFinite(n) ? parseDecimal(String(n)) : Option.none()

/** Rounds toward positive infinity. */
export const ceilToBigInt = (d: BigDecimal.BigDecimal): bigint => {
  if (d.scale <= 0) return d.value * pow10(-d.scale)

  const divisor = pow10(d.scale)
  // bigint division truncates toward zero, which is already the ceiling for negatives
  const quotient = d.value / divisor
  return d.value % divisor > 0n ? quotient + 1n : quotient
}

const gcd = (a: bigint, b: bigint): bigint => {
  let x = a < 0n ? -a : a
  let y = b < 0n ? -b : b
  while (y !== 0n) {
    ;[x, y] = [y, x % y]
  }
  return x
}

const countFactor = (n: bigint, prime: bigint): [count: number, rest: bigint] => {
  let count = 0
  let rest = n
  while (rest % prime === 0n) {
    rest /= prime
    count++
  }
  return [count, rest]
}

/**
 * Divides two integers exactly. Returns none when the quotient has no finite
 * decimal expansion, i.e. the reduced divisor has a prime factor other than 2
 * or 5. The result carries the smallest non-negative scale that holds it.
 */
export const divideExact = (
  dividend: bigint,
  divisor: bigint
): Option.Option<BigDecimal.BigDecimal> => {
  if (divisor === 0n) return Option.none()

  const g = gcd(dividend, divisor)
  let numerator = dividend / g
  let denominator = divisor / g
  if (denominator < 0n) {
    numerator = -numerator
    denominator = -denominator
  }

  const [twos, afterTwos] = countFactor(denominator, 2n)
  const [fives, rest] = countFactor(afterTwos, 5n)
  if (rest !== 1n) return Option.none()

  const scale = Math.max(twos, fives)
  return Option.some(BigDecimal.make(numerator * (pow10(scale) / denominator), scale))
}

/**
 * Positional notation with the decimal's own scale: `make(150n, 2)` is
 * `"1.50"`, `make(5n, -2)` is `"500"`. Never uses exponent notation.
 */
export const toPlainString = (d: BigDecimal.BigDecimal): string => {
  if (d.scale <= 0) return (d.value * pow10(-d.scale)).toString()

  const negative = d.value < 0n
  const digits = (negative ? -d.value : d.value).toString().padStart(d.scale + 1, "0")
  const point = digits.length - d.scale
  return `${negative ? "-" : ""}${digits.slice(0, point)}.${digits.slice(point)}`
}
