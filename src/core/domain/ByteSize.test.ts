import { describe, expect, test } from "vitest"
import { BigDecimal, Effect, Equal, Hash, HashSet } from "effect"
import { ByteSize } from "./ByteSize"
import { factorOf, iecUnits, siUnits, units, type ByteUnit } from "./ByteUnit"
import { InvalidSizeFormat } from "./SizeError"

const size = (value: number | bigint | string, unit: ByteUnit) =>
  typeof value === "string" ? ByteSize.unsafeFromString(value, unit) : ByteSize.make(value, unit)

const expectSameSize = (a: ByteSize, b: ByteSize) => {
  expect(a.toBytes()).toBe(b.toBytes())
  expect(Equal.equals(a, b)).toBe(true)
}

describe("ByteSize", () => {
  describe("toBytes", () => {
    test("one of each unit is its factor", () => {
      expect(size(1, "bytes").toBytes()).toBe(1n)
      for (const unit of units) {
        expect(size(1, unit).toBytes()).toBe(factorOf(unit))
      }
    })

    test("factors grow by 1000 for SI and 1024 for IEC", () => {
      let si = 1000n
      for (const unit of siUnits) {
        expect(size(1, unit).toBytes()).toBe(si)
        si *= 1000n
      }
      let iec = 1024n
      for (const unit of iecUnits) {
        expect(size(1, unit).toBytes()).toBe(iec)
        iec *= 1024n
      }
    })

    test("rounds up to whole bytes", () => {
      expect(size(0.1, "bytes").toBytes()).toBe(1n)
      expect(size(1.0000001, "kilobytes").toBytes()).toBe(1001n)
      expect(size(-0.5, "bytes").toBytes()).toBe(0n)
      expect(size(-3, "kilobytes").toBytes()).toBe(-3000n)
    })

    test("keeps precision beyond doubles", () => {
      expect(size("0.000000000000000000001", "zettabytes").toBytes()).toBe(1n)
      expect(size(123456789n, "yobibytes").toBytes()).toBe(123456789n * 1024n ** 8n)
    })
  })

  describe("width-checked byte counts", () => {
    test("int32", () => {
      expect(Effect.runSync(size(1, "gibibytes").toBytesInt32())).toBe(1073741824)
      const error = Effect.runSync(Effect.flip(size(2, "gibibytes").toBytesInt32()))
      expect(error._tag).toBe("ByteCountOverflow")
      expect(error.width).toBe("int32")
      expect(error.bytes).toBe(2147483648n)
    })

    test("int64", () => {
      expect(Effect.runSync(size(2, "gibibytes").toBytesInt64())).toBe(2147483648n)
      const error = Effect.runSync(Effect.flip(size(8, "exbibytes").toBytesInt64()))
      expect(error.width).toBe("int64")
      expect(error.bytes).toBe(2n ** 63n)
    })

    test("safe integer", () => {
      expect(Effect.runSync(size(1, "pebibytes").toBytesSafeInteger())).toBe(1125899906842624)
      const error = Effect.runSync(Effect.flip(size(8, "pebibytes").toBytesSafeInteger()))
      expect(error.width).toBe("safe-integer")
      expect(error.message).toBe("9007199254740992 bytes does not fit in safe-integer")
    })
  })

  describe("construction", () => {
    test("ofBytes uses the bytes unit", () => {
      const bytes = ByteSize.ofBytes(1024)
      expect(bytes.unit).toBe("bytes")
      expect(bytes.toString()).toBe("1024 B")
      expect(ByteSize.ofBytes(-7n).toBytes()).toBe(-7n)
    })

    test("make defaults to bytes", () => {
      expect(ByteSize.make(3n).unit).toBe("bytes")
    })

    test("make takes a BigDecimal as-is", () => {
      const value = BigDecimal.make(125n, 3)
      expect(ByteSize.make(value, "kilobytes").value).toBe(value)
    })

    test("rejects non-integer byte counts and non-finite numbers", () => {
      expect(() => ByteSize.ofBytes(1.5)).toThrow(InvalidSizeFormat)
      expect(() => ByteSize.make(NaN, "bytes")).toThrow(InvalidSizeFormat)
      expect(() => ByteSize.make(Infinity, "megabytes")).toThrow(InvalidSizeFormat)
    })

    test("fromString parses the literal losslessly", () => {
      const tenth = Effect.runSync(ByteSize.fromString("0.1", "gigabytes"))
      expect(tenth.toBytes()).toBe(100_000_000n)
      expect(tenth.toString()).toBe("0.1 GB")
    })

    test("fromString fails on malformed literals", () => {
      const error = Effect.runSync(Effect.flip(ByteSize.fromString("abc", "bytes")))
      expect(error._tag).toBe("InvalidSizeFormat")
      expect(error.input).toBe("abc")
      expect(() => ByteSize.unsafeFromString("1,5", "bytes")).toThrow(InvalidSizeFormat)
    })
  })

  describe("equality", () => {
    test("same size in different units", () => {
      expectSameSize(size(0.2, "gigabytes"), size(200, "megabytes"))
      expectSameSize(size(800, "kilobytes"), size(0.8, "megabytes"))
      expectSameSize(size(80, "bytes"), size(0.08, "kilobytes"))
      expectSameSize(size(80 * 1024, "kibibytes"), size(80, "mebibytes"))
      expectSameSize(size(80, "kibibytes"), size(80 / 1024, "mebibytes"))
    })

    test("mixed standards", () => {
      expectSameSize(size(500, "megabytes"), size(0.5, "gigabytes"))
      expectSameSize(size(500, "mebibytes"), size("0.48828125", "gibibytes"))
    })

    test("repeated construction is equal", () => {
      for (const value of [2, 42, 666, 0.1, 42.42, 1000.0]) {
        for (const unit of units) {
          expect(size(value, unit).equals(size(value, unit))).toBe(true)
        }
      }
    })

    test("differs when byte counts differ", () => {
      expect(size(1, "kilobytes").equals(size(1, "kibibytes"))).toBe(false)
      expect(Equal.equals(size(1, "bytes"), 1n)).toBe(false)
    })

    test("compares rounded byte counts", () => {
      expect(size(0.5, "bytes").equals(size(1, "bytes"))).toBe(true)
    })

    test("hash follows byte-count equality", () => {
      const a = size(500, "megabytes")
      const b = size(0.5, "gigabytes")
      expect(Hash.hash(a)).toBe(Hash.hash(b))
      expect(HashSet.size(HashSet.make(a, b, size(1, "gibibytes")))).toBe(2)
    })
  })

  describe("convertTo", () => {
    test("between SI units", () => {
      const converted = Effect.runSync(size(500, "megabytes").convertTo("gigabytes"))
      expectSameSize(converted, size(0.5, "gigabytes"))
      expect(converted.unit).toBe("gigabytes")
      expect(converted.toString()).toBe("0.5 GB")
    })

    test("from SI to IEC", () => {
      const converted = Effect.runSync(size(10, "kilobytes").convertTo("kibibytes"))
      expectSameSize(converted, size(9.765625, "kibibytes"))
      expect(converted.toString()).toBe("9.765625 KiB")
    })

    test("to the same unit keeps the value", () => {
      const converted = Effect.runSync(size(10, "megabytes").convertTo("megabytes"))
      expect(converted.toString()).toBe("10 MB")
    })

    test("round-trips through an extreme unit", () => {
      const zetta = size(1, "bytes").unsafeConvertTo("zettabytes")
      expect(zetta.toBytes()).toBe(1n)
      expect(zetta.toString()).toBe("0.000000000000000000001 ZB")
      expectSameSize(zetta.unsafeConvertTo("bytes"), size(1, "bytes"))
      expect(zetta.unsafeConvertTo("bytes").toString()).toBe("1 B")
    })

    test("converts the rounded byte count", () => {
      expect(size(0.5, "bytes").unsafeConvertTo("bytes").toString()).toBe("1 B")
    })

    test("leaves the original untouched", () => {
      const original = size(2, "mebibytes")
      original.unsafeConvertTo("kilobytes")
      expect(original.unit).toBe("mebibytes")
      expect(original.toString()).toBe("2 MiB")
    })
  })

  describe("display", () => {
    test("short and long forms", () => {
      expect(size(512, "kilobytes").toString()).toBe("512 KB")
      expect(size(512, "kilobytes").toLongString()).toBe("512 kilobytes")
      expect(size(7, "kibibytes").toLongString()).toBe("7 kibibytes")
    })

    test("keeps the literal's scale", () => {
      expect(size("1.50", "mebibytes").toString()).toBe("1.50 MiB")
    })

    test("uses positional notation", () => {
      expect(size(1e21, "bytes").toString()).toBe("1000000000000000000000 B")
      expect(size("1e-3", "gigabytes").toString()).toBe("0.001 GB")
    })
  })
})
