import type { ValueType } from "../script/command";

/** What a generated unit checks about the results of its action. */
export type Assertion =
  /** Only the call itself must not throw. */
  | { kind: "none" }
  /** Results, typed by `types`, equal the tagged `expected` literals. */
  | { kind: "equals"; types: ValueType[]; expected: string[] }
  /** First result is a NaN of `type` whose sign matches the bare `expected`. */
  | { kind: "nan-sign"; type: "f32" | "f64"; expected: string }
  /** First result is a quiet NaN of either width. */
  | { kind: "quiet-nan" };

/** The call a unit performs against its module instance. */
export type Call =
  | { kind: "invoke"; field: string; args: string[] }
  | { kind: "get"; field: string };

export type Fragment =
  | { kind: "line"; line: number }
  | { kind: "factory"; moduleIndex: number; binary: Uint8Array; text: string }
  | { kind: "start-hook"; name: string }
  | { kind: "unit"; name: string; call: Call; assertion: Assertion }
  | { kind: "trap-test"; name: string; moduleIndex: number; unit: string }
  | {
      kind: "compile-failure-test";
      name: string;
      binary: Uint8Array;
      reason: "invalid" | "malformed";
    }
  | { kind: "batch"; moduleIndex: number; calls: string[] };

export function factoryName(moduleIndex: number): string {
  return `create_module_${moduleIndex}`;
}

export function startHookName(moduleIndex: number): string {
  return `start_module_${moduleIndex}`;
}

export function batchName(moduleIndex: number): string {
  return `test_module_${moduleIndex}`;
}

const INDENT = "  ";

/** Body of a JS template literal holding `text` verbatim. */
export function templateLiteralBody(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/`/g, "\\`").replace(/\$\{/g, "\\${");
}

function base64(binary: Uint8Array): string {
  return Buffer.from(binary).toString("base64");
}

function renderCall(call: Call): string {
  switch (call.kind) {
    case "invoke":
      return `invoke(instance, ${JSON.stringify(call.field)}, [${call.args.join(", ")}])`;
    case "get":
      return `readGlobal(instance, ${JSON.stringify(call.field)})`;
  }
}

function renderAssertion(name: string, assertion: Assertion): string[] {
  switch (assertion.kind) {
    case "none":
      return [];
    case "equals":
      return [
        `expect(typedResults(result, ${JSON.stringify(assertion.types)})).toEqual([${assertion.expected.join(", ")}]);`,
      ];
    case "nan-sign":
      return [
        `const expected = ${assertion.expected};`,
        `const [actual] = typedResults(result.slice(0, 1), [${JSON.stringify(assertion.type)}]);`,
        `expect(actual.type).toBe(${JSON.stringify(assertion.type)});`,
        `expect(isNanValue(actual)).toBe(true);`,
        `expect(hasNegativeSign(actual)).toBe(hasNegativeSign(expected));`,
      ];
    case "quiet-nan":
      return [
        `expect(result.length, ${JSON.stringify(`Missing result in ${name}`)}).toBeGreaterThan(0);`,
        `expect(isQuietNanResult(result[0])).toBe(true);`,
      ];
  }
}

function block(header: string, body: string[], footer = "}"): string[] {
  return [header, ...body.map((l) => INDENT + l), footer];
}

/** Lines of one fragment, unindented. */
export function renderFragment(fragment: Fragment): string[] {
  switch (fragment.kind) {
    case "line":
      return ["", `// Line ${fragment.line}`];
    case "factory": {
      // Keep the text aligned with the function body.
      const text = templateLiteralBody(fragment.text.trimEnd()).replace(/\n/g, `\n${INDENT}`);
      return block(
        `function ${factoryName(fragment.moduleIndex)}(): WebAssembly.Instance {`,
        [
          `const moduleText = \`${text}\`;`,
          `return instantiateModule("${base64(fragment.binary)}", moduleText, generateImports());`,
        ],
      );
    }
    case "start-hook":
      return block(`function ${fragment.name}(instance: WebAssembly.Instance): void {`, [
        "// The start function already ran when the instance was created.",
        "void instance;",
      ]);
    case "unit":
      return block(`function ${fragment.name}(instance: WebAssembly.Instance): unknown[] {`, [
        `const result = ${renderCall(fragment.call)};`,
        ...renderAssertion(fragment.name, fragment.assertion),
        "return result;",
      ]);
    case "trap-test":
      return block(
        `test(${JSON.stringify(fragment.name)}, () => {`,
        [
          `const instance = ${factoryName(fragment.moduleIndex)}();`,
          `expect(() => ${fragment.unit}(instance)).toThrow();`,
        ],
        "});",
      );
    case "compile-failure-test":
      return block(
        `test(${JSON.stringify(fragment.name)}, () => {`,
        [
          `const wasmBinary = ${JSON.stringify(base64(fragment.binary))};`,
          `expect(() => compileModule(wasmBinary), "WASM should not compile as it is ${fragment.reason}").toThrow();`,
        ],
        "});",
      );
    case "batch":
      return [
        "",
        ...block(
          `test(${JSON.stringify(batchName(fragment.moduleIndex))}, () => {`,
          [
            `const instance = ${factoryName(fragment.moduleIndex)}();`,
            ...fragment.calls.map((call) => `${call}(instance);`),
          ],
          "});",
        ),
      ];
  }
}

export function renderFragments(fragments: readonly Fragment[]): string {
  return fragments.flatMap(renderFragment).join("\n") + "\n";
}
