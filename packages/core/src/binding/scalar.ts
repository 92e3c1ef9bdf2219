/**
 * Conversions from path segment text to scalar values.
 */

export type IntegerKind =
  | "int"
  | "int8"
  | "int16"
  | "int32"
  | "uint"
  | "uint8"
  | "uint16"
  | "uint32";

export type BigIntegerKind = "int64" | "uint64";

export type FloatKind = "float32" | "float64";

export type ScalarKind = "string" | IntegerKind | BigIntegerKind | FloatKind;

export type ParseFailure = "invalid syntax" | "value out of range";

/**
 * A path segment that does not convert to the declared kind.
 */
export class ParamParseError extends Error {
  readonly kind: ScalarKind;
  readonly text: string;
  readonly reason: ParseFailure;

  constructor(
    kind: ScalarKind,
    text: string,
    reason: ParseFailure,
    param?: string,
  ) {
    const source = param === undefined ? "" : ` for path parameter "${param}"`;
    super(`invalid ${kind} value ${JSON.stringify(text)}${source}: ${reason}`);
    this.name = "ParamParseError";
    this.kind = kind;
    this.text = text;
    this.reason = reason;
  }
}

interface IntegerRange {
  signed: boolean;
  min: bigint;
  max: bigint;
}

function bitRange(bits: number, signed: boolean): IntegerRange {
  const width = BigInt(bits);
  return signed
    ? { signed, min: -(1n << (width - 1n)), max: (1n << (width - 1n)) - 1n }
    : { signed, min: 0n, max: (1n << width) - 1n };
}

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

const INTEGER_RANGES: Record<IntegerKind | BigIntegerKind, IntegerRange> = {
  int: { signed: true, min: -MAX_SAFE, max: MAX_SAFE },
  int8: bitRange(8, true),
  int16: bitRange(16, true),
  int32: bitRange(32, true),
  int64: bitRange(64, true),
  uint: { signed: false, min: 0n, max: MAX_SAFE },
  uint8: bitRange(8, false),
  uint16: bitRange(16, false),
  uint32: bitRange(32, false),
  uint64: bitRange(64, false),
};

const SIGNED_INTEGER = /^[+-]?\d+$/;
const UNSIGNED_INTEGER = /^\d+$/;
const DECIMAL_FLOAT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const HEX_FLOAT = /^([+-]?)0[xX]([0-9a-fA-F]*)\.?([0-9a-fA-F]*)[pP]([+-]?\d+)$/;
const INFINITE_FLOAT = /^([+-]?)inf(?:inity)?$/i;
const NAN_FLOAT = /^nan$/i;

/**
 * Parse a base-10 integer of the given kind as a bigint. Signed kinds take
 * an optional leading sign, unsigned kinds none.
 *
 * @throws {ParamParseError}
 */
export function parseBigInteger(
  kind: IntegerKind | BigIntegerKind,
  text: string,
  param?: string,
): bigint {
  const range = INTEGER_RANGES[kind];
  const syntax = range.signed ? SIGNED_INTEGER : UNSIGNED_INTEGER;
  if (!syntax.test(text)) {
    throw new ParamParseError(kind, text, "invalid syntax", param);
  }
  const value = BigInt(text);
  if (value < range.min || value > range.max) {
    throw new ParamParseError(kind, text, "value out of range", param);
  }
  return value;
}

/**
 * Parse an integer kind that fits a JavaScript number.
 *
 * @throws {ParamParseError}
 */
export function parseInteger(
  kind: IntegerKind,
  text: string,
  param?: string,
): number {
  return Number(parseBigInteger(kind, text, param));
}

/**
 * Value of a hexadecimal float such as `0x1.8p1`, or `undefined` when the
 * text is not one. The binary exponent is required.
 */
function parseHexFloat(text: string): number | undefined {
  const match = HEX_FLOAT.exec(text);
  if (!match) return undefined;
  const [, sign, whole, fraction, exponent] = match;
  const digits = whole + fraction;
  if (digits.length === 0) return undefined;
  const magnitude = Number(BigInt(`0x${digits}`)) *
    2 ** (Number(exponent) - 4 * fraction.length);
  return sign === "-" ? -magnitude : magnitude;
}

/**
 * Parse a decimal or hexadecimal float, a signed `inf`/`infinity` or
 * `nan`, in any case. Digit separators are not accepted. `float32` values
 * are rounded to single precision.
 *
 * @throws {ParamParseError}
 */
export function parseFloatKind(
  kind: FloatKind,
  text: string,
  param?: string,
): number {
  if (NAN_FLOAT.test(text)) return NaN;
  const infinite = INFINITE_FLOAT.exec(text);
  if (infinite) {
    return infinite[1] === "-" ? -Infinity : Infinity;
  }
  const parsed = DECIMAL_FLOAT.test(text) ? Number(text) : parseHexFloat(text);
  if (parsed === undefined) {
    throw new ParamParseError(kind, text, "invalid syntax", param);
  }
  const value = kind === "float32" ? Math.fround(parsed) : parsed;
  if (!Number.isFinite(value)) {
    throw new ParamParseError(kind, text, "value out of range", param);
  }
  return value;
}
