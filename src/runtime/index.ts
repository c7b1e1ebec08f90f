/**
 * Runtime for generated spec tests.
 *
 * Generated files import these helpers to build modules against the shared
 * `spectest` environment, call exports, and compare results bit for bit.
 */

import {
  F32_SIGN_BIT,
  F64_SIGN_BIT,
  isF32CanonicalNan,
  isF32NanBits,
  isF32QuietNan,
  isF64CanonicalNan,
  isF64NanBits,
  isF64QuietNan,
} from "../codegen/value-codec";
import {
  f32,
  f32Bits,
  f32FromBits,
  f64,
  f64Bits,
  f64FromBits,
  i32,
  i64,
  type Value,
  type ValueType,
} from "../script/command";

export type { Value, ValueType };
export {
  f32,
  f32Bits,
  f64,
  f64Bits,
  i32,
  i64,
  isF32CanonicalNan,
  isF32QuietNan,
  isF64CanonicalNan,
  isF64QuietNan,
};

/** JS number holding the f32 with these bits. */
export const numberFromF32Bits = f32FromBits;
/** JS number holding the f64 with these bits. */
export const numberFromF64Bits = f64FromBits;

const scratch = new DataView(new ArrayBuffer(8));

function f64BitsOf(n: number): bigint {
  scratch.setFloat64(0, n);
  return scratch.getBigUint64(0);
}

export function isNanValue(v: Value): boolean {
  switch (v.type) {
    case "f32":
      return isF32NanBits(v.bits);
    case "f64":
      return isF64NanBits(v.bits);
    default:
      return false;
  }
}

/** Sign bit of a float value or JS number. Integers report a negative value. */
export function hasNegativeSign(v: Value | number): boolean {
  if (typeof v === "number") return (f64BitsOf(v) & F64_SIGN_BIT) !== 0n;
  switch (v.type) {
    case "i32":
      return v.value < 0;
    case "i64":
      return v.value < 0n;
    case "f32":
      return (v.bits & F32_SIGN_BIT) !== 0;
    case "f64":
      return (v.bits & F64_SIGN_BIT) !== 0n;
  }
}

/**
 * Quiet-NaN check on a raw export result. The JS API hands f32 results over
 * widened to doubles, which keeps the quiet bit as the top mantissa bit, so
 * the f64 check covers both widths.
 */
export function isQuietNanResult(result: unknown): boolean {
  return typeof result === "number" && isF64QuietNan(f64BitsOf(result));
}

export function isCanonicalNanResult(result: unknown): boolean {
  return typeof result === "number" && isF64CanonicalNan(f64BitsOf(result));
}

function typedResult(raw: unknown, type: ValueType, index: number): Value {
  switch (type) {
    case "i32":
      if (typeof raw === "number") return i32(raw);
      break;
    case "i64":
      if (typeof raw === "bigint") return i64(raw);
      break;
    case "f32":
      if (typeof raw === "number") return f32(raw);
      break;
    case "f64":
      if (typeof raw === "number") return f64(raw);
      break;
  }
  throw new TypeError(`Result ${index} is a ${typeof raw}, not an ${type}`);
}

/** Tag raw export results with the types the script expects. */
export function typedResults(raw: readonly unknown[], types: readonly ValueType[]): Value[] {
  if (raw.length !== types.length) {
    throw new Error(`Expected ${types.length} results, got ${raw.length}`);
  }
  return raw.map((value, i) => typedResult(value, types[i], i));
}

/**
 * The `spectest` module every test module may import from: printing
 * functions that do nothing, a table, a memory and an immutable global.
 */
export function spectestImports(): WebAssembly.Imports {
  return {
    spectest: {
      print: () => {},
      print_i32: (_value: number) => {},
      print_i32_f32: (_lhs: number, _rhs: number) => {},
      print_f64_f64: (_lhs: number, _rhs: number) => {},
      table: new WebAssembly.Table({ initial: 10, maximum: 20, element: "anyfunc" }),
      memory: new WebAssembly.Memory({ initial: 1, maximum: 2 }),
      global_i32: new WebAssembly.Global({ value: "i32", mutable: false }, 666),
    },
  };
}

export function compileModule(base64Binary: string): WebAssembly.Module {
  return new WebAssembly.Module(new Uint8Array(Buffer.from(base64Binary, "base64")));
}

export function instantiateModule(
  base64Binary: string,
  moduleText: string,
  imports: WebAssembly.Imports = spectestImports(),
): WebAssembly.Instance {
  try {
    return new WebAssembly.Instance(compileModule(base64Binary), imports);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`WASM can't be instantiated: ${message}\n${moduleText}`, {
      cause: error,
    });
  }
}

function exportOf(instance: WebAssembly.Instance, field: string): unknown {
  if (!Object.prototype.hasOwnProperty.call(instance.exports, field)) {
    throw new Error(`Missing export "${field}"`);
  }
  return instance.exports[field];
}

/** Call an exported function. Always returns the results as a list. */
export function invoke(
  instance: WebAssembly.Instance,
  field: string,
  args: ReadonlyArray<number | bigint>,
): unknown[] {
  const fn = exportOf(instance, field);
  if (typeof fn !== "function") {
    throw new Error(`Export "${field}" is not a function`);
  }
  const result: unknown = fn(...args);
  if (result === undefined) return [];
  return Array.isArray(result) ? result : [result];
}

/** Value of an exported global, as a one-element list. */
export function readGlobal(instance: WebAssembly.Instance, field: string): unknown[] {
  const global = exportOf(instance, field);
  if (!(global instanceof WebAssembly.Global)) {
    throw new Error(`Export "${field}" is not a global`);
  }
  const value: unknown = global.value;
  return [value];
}
