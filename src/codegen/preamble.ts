export const BANNER = `// Test file generated by scripts/generate-spectests.ts from WebAssembly script bundles.
// Do not edit it by hand: it is rewritten on every generation.
`;

/** Everything a generated block refers to besides its own functions. */
export const RUNTIME_IMPORTS = [
  "compileModule",
  "f32",
  "f32Bits",
  "f64",
  "f64Bits",
  "hasNegativeSign",
  "i32",
  "i64",
  "instantiateModule",
  "invoke",
  "isNanValue",
  "isQuietNanResult",
  "numberFromF32Bits",
  "numberFromF64Bits",
  "readGlobal",
  "spectestImports",
  "typedResults",
] as const;

/**
 * Head of the generated file: the banner, the test API, and the runtime
 * holding NaN classification and the shared `spectest` import environment.
 * `testApiImport` must export `describe`, `expect` and `test`.
 */
export function renderPreamble(runtimeImport: string, testApiImport = "vitest"): string {
  const names = RUNTIME_IMPORTS.map((name) => `  ${name},`).join("\n");
  return [
    BANNER,
    `import { describe, expect, test } from ${JSON.stringify(testApiImport)};`,
    `import {`,
    names,
    `} from ${JSON.stringify(runtimeImport)};`,
    "",
    "/** Bindings every generated module is instantiated against. */",
    "function generateImports(): WebAssembly.Imports {",
    "  return spectestImports();",
    "}",
    "",
  ].join("\n");
}
