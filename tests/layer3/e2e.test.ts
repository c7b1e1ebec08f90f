import path from "node:path";
import { beforeAll, describe, expect, test } from "vitest";
import { SpectestBundle, StringSink } from "../../src/codegen/bundle";
import { createDisassembler, loadWabt } from "../../src/codegen/disassemble";
import { readScript } from "../../src/script/reader";
import { SCRIPTS_DIR } from "../helpers/paths";

/** Generated source for the `arith` fixture script. */
let generated: string;

beforeAll(async () => {
  const wabt = await loadWabt();
  const script = await readScript(path.join(SCRIPTS_DIR, "arith.json"), wabt);
  const sink = new StringSink();
  const bundle = new SpectestBundle(sink, {
    runtimeImport: "../src/runtime/index",
    disassemble: createDisassembler(wabt),
  });
  bundle.addScript(script.name, script.commands);
  generated = sink.toString();
});

describe("generated file for a script", () => {
  test("opens one describe block named after the script", () => {
    expect(generated).toContain('\ndescribe("test_arith", () => {\n');
    expect(generated.endsWith("\n  });\n});\n")).toBe(true);
  });

  test("the factory carries the disassembled module", () => {
    expect(generated).toContain("  function create_module_1(): WebAssembly.Instance {\n    const moduleText = `(module");
    expect(generated).toContain('(export "nan_add"');
  });

  test("argument bits are kept", () => {
    expect(generated).toContain(
      [
        "  function c3_l15_action_invoke(instance: WebAssembly.Instance): unknown[] {",
        '    const result = invoke(instance, "add", [-1, 1]);',
        '    expect(typedResults(result, ["i32"])).toEqual([i32(0)]);',
        "    return result;",
        "  }",
      ].join("\n"),
    );
    expect(generated).toContain(
      '    const result = invoke(instance, "nan_add", [numberFromF32Bits(0x7fc00000)]);',
    );
  });

  test("the trap runs alone against a fresh instance", () => {
    expect(generated).toContain(
      [
        '  test("c4_l16_assert_trap", () => {',
        "    const instance = create_module_1();",
        "    expect(() => c4_l16_action_invoke(instance)).toThrow();",
        "  });",
      ].join("\n"),
    );
  });

  test("compile failures embed the module bytes", () => {
    expect(generated).toContain(
      [
        '  test("c8_l20_assert_malformed", () => {',
        '    const wasmBinary = "KG1vZHVsZSAoZnVuYyAoaTMyLmNvbnN0KSkpCg==";',
      ].join("\n"),
    );
    expect(generated).toContain(
      [
        '  test("c9_l21_assert_invalid", () => {',
        '    const wasmBinary = "AGFzbQEAAAAK";',
        '    expect(() => compileModule(wasmBinary), "WASM should not compile as it is invalid").toThrow();',
        "  });",
      ].join("\n"),
    );
  });

  test("everything but the trap is batched on the module, in script order", () => {
    expect(generated).toContain(
      [
        '  test("test_module_1", () => {',
        "    const instance = create_module_1();",
        "    start_module_1(instance);",
        "    c2_l14_action_invoke(instance);",
        "    c3_l15_action_invoke(instance);",
        "    c5_l17_assert_return_arithmetic_nan(instance);",
        "    c6_l18_action_get(instance);",
        "  });",
      ].join("\n"),
    );
    expect(generated.match(/test\("test_module_\d+"/g)).toEqual(['test("test_module_1"']);
  });
});
