/**
 * Structured commands of a WebAssembly test script.
 *
 * Floats carry their raw bit pattern so NaN payloads and signed zeroes survive
 * every step between the script and the emitted literal.
 */

export type ValueType = "i32" | "i64" | "f32" | "f64";

export type Value =
  | { type: "i32"; value: number }
  | { type: "i64"; value: bigint }
  | { type: "f32"; bits: number }
  | { type: "f64"; bits: bigint };

export type FloatValue = Extract<Value, { type: "f32" | "f64" }>;

export type Action =
  /** Call an exported function. `module` absent means the latest module. */
  | { type: "invoke"; module?: string; field: string; args: Value[] }
  /** Read an exported global. */
  | { type: "get"; module?: string; field: string };

export type CommandKind =
  | { type: "module"; binary: Uint8Array; name?: string }
  | { type: "assert_return"; action: Action; expected: Value[] }
  | { type: "assert_return_canonical_nan"; action: Action }
  | { type: "assert_return_arithmetic_nan"; action: Action }
  | { type: "assert_trap"; action: Action; message?: string }
  | { type: "assert_invalid"; binary: Uint8Array; message?: string }
  | { type: "assert_malformed"; binary: Uint8Array; message?: string }
  | { type: "assert_uninstantiable"; binary: Uint8Array; message?: string }
  | { type: "assert_exhaustion"; action: Action; message?: string }
  | { type: "assert_unlinkable"; binary: Uint8Array; message?: string }
  | { type: "register"; name?: string; as: string }
  | { type: "action"; action: Action };

export interface Command {
  /** Line of the command in the originating script. */
  line: number;
  kind: CommandKind;
}

export function i32(value: number): Value {
  return { type: "i32", value: value | 0 };
}

export function i64(value: bigint): Value {
  return { type: "i64", value: BigInt.asIntN(64, value) };
}

export function f32Bits(bits: number): Value {
  return { type: "f32", bits: bits >>> 0 };
}

export function f64Bits(bits: bigint): Value {
  return { type: "f64", bits: BigInt.asUintN(64, bits) };
}

const scratch = new DataView(new ArrayBuffer(8));

/** f32 value nearest to `value`, stored by bits. */
export function f32(value: number): Value {
  scratch.setFloat32(0, value);
  return f32Bits(scratch.getUint32(0));
}

export function f64(value: number): Value {
  scratch.setFloat64(0, value);
  return f64Bits(scratch.getBigUint64(0));
}

export function f32FromBits(bits: number): number {
  scratch.setUint32(0, bits >>> 0);
  return scratch.getFloat32(0);
}

export function f64FromBits(bits: bigint): number {
  scratch.setBigUint64(0, BigInt.asUintN(64, bits));
  return scratch.getFloat64(0);
}

export function invoke(field: string, args: Value[], module?: string): Action {
  return module === undefined
    ? { type: "invoke", field, args }
    : { type: "invoke", module, field, args };
}
