import {
  f32FromBits,
  f64FromBits,
  type FloatValue,
  type Value,
  type ValueType,
} from "../script/command";

// Bit layout of an f32: 1 sign bit, 8 exponent bits, 23 mantissa bits.
// Bit layout of an f64: 1 sign bit, 11 exponent bits, 52 mantissa bits.

export const F32_SIGN_BIT = 1 << 31 >>> 0;
export const F32_EXPONENT_MASK = 0x7f80_0000;
export const F32_MANTISSA_MASK = 0x007f_ffff;
/** Most significant mantissa bit. Set on a quiet NaN. */
export const F32_QUIET_BIT = 1 << 22;
/**
 * XOR-ing a canonical NaN with this mask sets every bit except possibly the
 * sign, so the result is 0xffffffff or 0x7fffffff.
 */
export const F32_CANONICAL_MASK = 0b1_00000000_01111111111111111111111;

export const F64_SIGN_BIT = 1n << 63n;
export const F64_EXPONENT_MASK = 0x7ff0_0000_0000_0000n;
export const F64_MANTISSA_MASK = 0x000f_ffff_ffff_ffffn;
export const F64_QUIET_BIT = 1n << 51n;
export const F64_CANONICAL_MASK =
  0b1_00000000000_0111111111111111111111111111111111111111111111111111n;

export function isF32NanBits(bits: number): boolean {
  return (
    (bits & F32_EXPONENT_MASK) === F32_EXPONENT_MASK &&
    (bits & F32_MANTISSA_MASK) !== 0
  );
}

export function isF64NanBits(bits: bigint): boolean {
  return (
    (bits & F64_EXPONENT_MASK) === F64_EXPONENT_MASK &&
    (bits & F64_MANTISSA_MASK) !== 0n
  );
}

export function isF32QuietNan(bits: number): boolean {
  return isF32NanBits(bits) && (bits & F32_QUIET_BIT) === F32_QUIET_BIT;
}

export function isF64QuietNan(bits: bigint): boolean {
  return isF64NanBits(bits) && (bits & F64_QUIET_BIT) === F64_QUIET_BIT;
}

export function isF32CanonicalNan(bits: number): boolean {
  const masked = (bits ^ F32_CANONICAL_MASK) >>> 0;
  return masked === 0xffff_ffff || masked === 0x7fff_ffff;
}

export function isF64CanonicalNan(bits: bigint): boolean {
  const masked = BigInt.asUintN(64, bits ^ F64_CANONICAL_MASK);
  return masked === 0xffff_ffff_ffff_ffffn || masked === 0x7fff_ffff_ffff_ffffn;
}

/** True for an f32 or f64 NaN of any payload. */
export function isNan(v: Value): v is FloatValue {
  switch (v.type) {
    case "f32":
      return isF32NanBits(v.bits);
    case "f64":
      return isF64NanBits(v.bits);
    default:
      return false;
  }
}

export function valueType(v: Value): ValueType {
  return v.type;
}

export function hexBits32(bits: number): string {
  return `0x${(bits >>> 0).toString(16).padStart(8, "0")}`;
}

export function hexBits64(bits: bigint): string {
  return `0x${BigInt.asUintN(64, bits).toString(16).padStart(16, "0")}n`;
}

/**
 * Decimal text that parses back to the same double. `String()` is the
 * shortest round-tripping form but prints negative zero as "0".
 */
function formatFinite(n: number): string {
  return Object.is(n, -0) ? "-0" : String(n);
}

function formatFloat(n: number): string {
  if (n === Number.POSITIVE_INFINITY) return "Number.POSITIVE_INFINITY";
  if (n === Number.NEGATIVE_INFINITY) return "Number.NEGATIVE_INFINITY";
  return formatFinite(n);
}

/**
 * Unwrapped JS scalar for a value: the form an exported function takes as an
 * argument. NaNs are rebuilt from their bits.
 */
export function bareValueLiteral(v: Value): string {
  switch (v.type) {
    case "i32":
      return String(v.value);
    case "i64":
      return `${v.value}n`;
    case "f32":
      return isF32NanBits(v.bits)
        ? `numberFromF32Bits(${hexBits32(v.bits)})`
        : formatFloat(f32FromBits(v.bits));
    case "f64":
      return isF64NanBits(v.bits)
        ? `numberFromF64Bits(${hexBits64(v.bits)})`
        : formatFloat(f64FromBits(v.bits));
  }
}

/** Tagged `Value` constructor call that rebuilds `v` bit for bit. */
export function valueLiteral(v: Value): string {
  switch (v.type) {
    case "i32":
      return `i32(${v.value})`;
    case "i64":
      return `i64(${v.value}n)`;
    case "f32":
      return isF32NanBits(v.bits)
        ? `f32Bits(${hexBits32(v.bits)})`
        : `f32(${bareValueLiteral(v)})`;
    case "f64":
      return isF64NanBits(v.bits)
        ? `f64Bits(${hexBits64(v.bits)})`
        : `f64(${bareValueLiteral(v)})`;
  }
}
