import { describe, expect, it } from "vitest";
import {
  ParamParseError,
  parseBigInteger,
  parseFloatKind,
  parseInteger,
} from "../src/binding/mod.ts";

describe("parseInteger()", () => {
  it("should parse signed values", () => {
    expect(parseInteger("int", "42")).toBe(42);
    expect(parseInteger("int", "-7")).toBe(-7);
    expect(parseInteger("int32", "+5")).toBe(5);
    expect(parseInteger("int8", "-128")).toBe(-128);
  });

  it("should reject values outside the kind's range", () => {
    expect(() => parseInteger("int8", "128")).toThrow(
      'invalid int8 value "128": value out of range',
    );
    expect(() => parseInteger("uint8", "256")).toThrow(
      'invalid uint8 value "256": value out of range',
    );
    expect(() => parseInteger("int", "9007199254740992")).toThrow(
      "value out of range",
    );
  });

  it("should reject signs on unsigned kinds", () => {
    expect(() => parseInteger("uint", "-1")).toThrow(
      'invalid uint value "-1": invalid syntax',
    );
    expect(() => parseInteger("uint16", "+1")).toThrow("invalid syntax");
  });

  it("should reject non-integer text", () => {
    expect(() => parseInteger("int", "1.5", "id")).toThrow(
      'invalid int value "1.5" for path parameter "id": invalid syntax',
    );
    expect(() => parseInteger("int", "")).toThrow("invalid syntax");
    expect(() => parseInteger("int", "0x10")).toThrow("invalid syntax");
  });

  it("should describe the failure", () => {
    try {
      parseInteger("uint32", "abc", "count");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ParamParseError);
      expect(error).toHaveProperty("kind", "uint32");
      expect(error).toHaveProperty("text", "abc");
      expect(error).toHaveProperty("reason", "invalid syntax");
    }
  });
});

describe("parseBigInteger()", () => {
  it("should parse the full 64-bit ranges", () => {
    expect(parseBigInteger("int64", "9223372036854775807")).toBe(
      9223372036854775807n,
    );
    expect(parseBigInteger("int64", "-9223372036854775808")).toBe(
      -9223372036854775808n,
    );
    expect(parseBigInteger("uint64", "18446744073709551615")).toBe(
      18446744073709551615n,
    );
  });

  it("should reject values past the range", () => {
    expect(() => parseBigInteger("int64", "9223372036854775808")).toThrow(
      'invalid int64 value "9223372036854775808": value out of range',
    );
    expect(() => parseBigInteger("uint64", "18446744073709551616")).toThrow(
      "value out of range",
    );
  });
});

describe("parseFloatKind()", () => {
  it("should parse decimal and exponent forms", () => {
    expect(parseFloatKind("float64", "3.25")).toBe(3.25);
    expect(parseFloatKind("float64", "1e3")).toBe(1000);
    expect(parseFloatKind("float64", ".5")).toBe(0.5);
    expect(parseFloatKind("float64", "-2.")).toBe(-2);
  });

  it("should parse hexadecimal floats with a binary exponent", () => {
    expect(parseFloatKind("float64", "0x1p-2")).toBe(0.25);
    expect(parseFloatKind("float64", "-0X1.8p1")).toBe(-3);
    expect(parseFloatKind("float32", "0x.8P0")).toBe(0.5);
    expect(() => parseFloatKind("float64", "0x1.8")).toThrow("invalid syntax");
    expect(() => parseFloatKind("float64", "0x.p1")).toThrow("invalid syntax");
    expect(() => parseFloatKind("float64", "0x1p2000")).toThrow(
      "value out of range",
    );
  });

  it("should parse infinities and NaN in any case", () => {
    expect(parseFloatKind("float64", "Inf")).toBe(Infinity);
    expect(parseFloatKind("float64", "-infinity")).toBe(-Infinity);
    expect(parseFloatKind("float32", "+INF")).toBe(Infinity);
    expect(parseFloatKind("float64", "NaN")).toBeNaN();
    expect(() => parseFloatKind("float64", "+nan")).toThrow("invalid syntax");
  });

  it("should round float32 values to single precision", () => {
    expect(parseFloatKind("float32", "0.1")).toBe(Math.fround(0.1));
    expect(parseFloatKind("float32", "0.1")).not.toBe(0.1);
  });

  it("should reject values that overflow", () => {
    expect(() => parseFloatKind("float64", "1e400")).toThrow(
      'invalid float64 value "1e400": value out of range',
    );
    expect(() => parseFloatKind("float32", "3.5e38")).toThrow(
      "value out of range",
    );
  });

  it("should reject other text", () => {
    expect(() => parseFloatKind("float64", "abc", "ratio")).toThrow(
      'invalid float64 value "abc" for path parameter "ratio": invalid syntax',
    );
    expect(() => parseFloatKind("float64", "1,5")).toThrow("invalid syntax");
  });
});
