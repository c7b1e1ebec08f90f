import fs from "node:fs";
import path from "node:path";
import { beforeAll, describe, expect, test } from "vitest";
import {
  compileModule,
  f64,
  i32,
  instantiateModule,
  invoke,
  isQuietNanResult,
  readGlobal,
  spectestImports,
  typedResults,
} from "../../src/runtime";
import { EMPTY_MODULE_BASE64 } from "../helpers/script";
import { SCRIPTS_DIR, WAT_DIR } from "../helpers/paths";
import { instantiateFixture, toBase64, watToWasm } from "../helpers/wasm-runner";

describe("exports of an instance", () => {
  let instance: WebAssembly.Instance;

  beforeAll(async () => {
    instance = await instantiateFixture("arith");
  });

  test("invoke returns results as a list", () => {
    expect(invoke(instance, "add", [2, 3])).toEqual([5]);
    expect(invoke(instance, "neg64", [5n])).toEqual([-5n]);
    expect(invoke(instance, "nothing", [])).toEqual([]);
  });

  test("multiple results keep their order", () => {
    expect(typedResults(invoke(instance, "pair", []), ["i32", "f64"])).toEqual([i32(7), f64(-0)]);
  });

  test("a trap surfaces as a runtime error", () => {
    expect(() => invoke(instance, "div", [1, 0])).toThrow(WebAssembly.RuntimeError);
  });

  test("0/0 is a quiet NaN", () => {
    const [result] = invoke(instance, "f32_nan", []);
    expect(isQuietNanResult(result)).toBe(true);
  });

  test("globals are read as one-element lists", () => {
    expect(readGlobal(instance, "answer")).toEqual([42]);
  });

  test("unknown or mistyped exports are reported by name", () => {
    expect(() => invoke(instance, "nope", [])).toThrow('Missing export "nope"');
    expect(() => invoke(instance, "answer", [])).toThrow('Export "answer" is not a function');
    expect(() => readGlobal(instance, "add")).toThrow('Export "add" is not a global');
  });
});

describe("spectestImports", () => {
  test("provides the shared environment", async () => {
    const instance = await instantiateFixture("spectest-imports");
    expect(invoke(instance, "global", [])).toEqual([666]);
    expect(invoke(instance, "log", [])).toEqual([]);
  });

  test("every instantiation gets a fresh memory", () => {
    const first = spectestImports().spectest;
    const second = spectestImports().spectest;
    expect(first.memory).toBeInstanceOf(WebAssembly.Memory);
    expect(first.memory).not.toBe(second.memory);
    expect(first.table).toBeInstanceOf(WebAssembly.Table);
  });
});

describe("instantiateModule", () => {
  test("reports a missing import module with the module text", async () => {
    const watPath = path.join(WAT_DIR, "needs-env.wat");
    const binary = toBase64(await watToWasm(watPath));

    let caught: unknown;
    try {
      instantiateModule(binary, "(module $needs_env)");
    } catch (error: unknown) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(Error);
    if (!(caught instanceof Error)) return;
    expect(caught.message).toMatch(/^WASM can't be instantiated: /);
    expect(caught.message.endsWith("\n(module $needs_env)")).toBe(true);
    // A whole import module missing from the import object is a TypeError.
    expect(caught.cause).toBeInstanceOf(TypeError);
  });

  test("reports an import of the wrong kind as a link failure", async () => {
    const binary = toBase64(await watToWasm(path.join(WAT_DIR, "wrong-kind.wat")));
    expect(() => instantiateModule(binary, "(module $wrong_kind)")).toThrow(
      /^WASM can't be instantiated: /,
    );

    let caught: unknown;
    try {
      instantiateModule(binary, "(module $wrong_kind)");
    } catch (error: unknown) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(Error);
    if (!(caught instanceof Error)) return;
    expect(caught.cause).toBeInstanceOf(WebAssembly.LinkError);
  });

  test("takes other imports when given", async () => {
    const watPath = path.join(WAT_DIR, "needs-env.wat");
    const binary = toBase64(await watToWasm(watPath));
    const instance = instantiateModule(binary, "", { env: { missing: () => {} } });
    expect(Object.keys(instance.exports)).toEqual([]);
  });
});

describe("compileModule", () => {
  test("compiles a valid binary", () => {
    expect(compileModule(EMPTY_MODULE_BASE64)).toBeInstanceOf(WebAssembly.Module);
  });

  test("rejects a binary with a truncated section", () => {
    const binary = fs.readFileSync(path.join(SCRIPTS_DIR, "arith.2.wasm")).toString("base64");
    expect(() => compileModule(binary)).toThrow(WebAssembly.CompileError);
  });
});
