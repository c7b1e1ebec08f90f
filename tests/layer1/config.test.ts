import path from "node:path";
import { describe, expect, test, vi } from "vitest";
import { ConfigError, loadSuiteList, resolveConfig, runtimeImportFrom } from "../../src/config";
import { BUILD_DIR, RUNTIME_ENTRY, SPECTESTS_DIR } from "../../src/paths";
import { PROJECT_ROOT } from "../helpers/paths";

const suites = () => ["i32", "f32"];

describe("resolveConfig", () => {
  test("defaults to the checked-in script list and the build directory", () => {
    const config = resolveConfig([], {}, suites);
    expect(config).toEqual({
      scriptsDir: SPECTESTS_DIR,
      outDir: BUILD_DIR,
      suites: ["i32", "f32"],
      fatThreshold: 200,
      runtimeImport: "../src/runtime/index",
    });
  });

  test("flags win over the environment", () => {
    const config = resolveConfig(
      ["--out-dir=/tmp/flag-out", "--scripts-dir=/tmp/flag-scripts"],
      { OUT_DIR: "/tmp/env-out", SPECTESTS_DIR: "/tmp/env-scripts" },
      suites,
    );
    expect(config.outDir).toBe("/tmp/flag-out");
    expect(config.scriptsDir).toBe("/tmp/flag-scripts");
  });

  test("the environment replaces the defaults", () => {
    const config = resolveConfig([], { OUT_DIR: "/tmp/env-out", SPECTESTS_DIR: "/tmp/env-scripts" }, suites);
    expect(config.outDir).toBe("/tmp/env-out");
    expect(config.scriptsDir).toBe("/tmp/env-scripts");
  });

  test("repeated --suite flags select suites in order without reading the list", () => {
    const list = vi.fn(suites);
    const config = resolveConfig(["--suite=nop", "--suite=block"], {}, list);
    expect(config.suites).toEqual(["nop", "block"]);
    expect(list).not.toHaveBeenCalled();
  });

  test("takes a fat threshold and an explicit runtime import", () => {
    const config = resolveConfig(
      ["--fat-threshold=0", "--runtime-import=wast-spectest-codegen/runtime"],
      {},
      suites,
    );
    expect(config.fatThreshold).toBe(0);
    expect(config.runtimeImport).toBe("wast-spectest-codegen/runtime");
  });

  test("rejects a bad threshold", () => {
    expect(() => resolveConfig(["--fat-threshold=-3"], {}, suites)).toThrow(
      new ConfigError('--fat-threshold must be a non-negative integer, got "-3"'),
    );
  });

  test("rejects unknown arguments", () => {
    expect(() => resolveConfig(["--verbose"], {}, suites)).toThrow(ConfigError);
    expect(() => resolveConfig(["--verbose"], {}, suites)).toThrow("Unknown argument: --verbose");
  });
});

describe("runtimeImportFrom", () => {
  test("is relative to the output directory, without an extension", () => {
    expect(runtimeImportFrom(path.join(PROJECT_ROOT, "build"))).toBe("../src/runtime/index");
    expect(runtimeImportFrom(path.join(PROJECT_ROOT, "src"))).toBe("./runtime/index");
    expect(runtimeImportFrom(PROJECT_ROOT, RUNTIME_ENTRY)).toBe("./src/runtime/index");
  });
});

describe("loadSuiteList", () => {
  test("reads the default list", () => {
    const list = loadSuiteList();
    expect(list).toHaveLength(60);
    expect(list[0]).toBe("address");
    expect(list).toContain("i32_");
    expect(list).toContain("f64_cmp");
  });
});
