import type { Command } from "../script/command";
import type { Disassembler } from "./disassemble";
import { FAT_TEST_THRESHOLD, WastTestGenerator } from "./generator";
import { renderPreamble } from "./preamble";

/** Where the generated file goes. Each `write` carries whole blocks only. */
export interface OutputSink {
  write(chunk: string): void;
}

/** Collects the output in memory. */
export class StringSink implements OutputSink {
  private readonly chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join("");
  }
}

export interface BundleOptions {
  /** Module specifier the generated file imports its runtime from. */
  runtimeImport: string;
  /** Module the generated file takes `describe`, `expect` and `test` from. */
  testApiImport?: string;
  disassemble: Disassembler;
  fatThreshold?: number;
}

export interface ScriptOutcome {
  script: string;
  /** Name of the emitted `describe` block. Skipped scripts have none. */
  namespace: string | undefined;
  commandCount: number;
  emitted: boolean;
}

/** Identifier-safe namespace for a script's base name. */
export function namespaceFor(scriptName: string): string {
  return `test_${scriptName.replace(/[^A-Za-z0-9_]/g, "_")}`;
}

function indent(text: string): string {
  return text
    .split("\n")
    .map((line) => (line.length > 0 ? `  ${line}` : line))
    .join("\n");
}

/**
 * The single generated test file. The preamble is written when the bundle
 * is created; every script then adds one `describe` block, unless it is fat.
 */
export class SpectestBundle {
  private readonly namespaces = new Set<string>();
  private readonly fatThreshold: number;
  readonly outcomes: ScriptOutcome[] = [];

  constructor(
    private readonly sink: OutputSink,
    private readonly options: BundleOptions,
  ) {
    this.fatThreshold = options.fatThreshold ?? FAT_TEST_THRESHOLD;
    sink.write(renderPreamble(options.runtimeImport, options.testApiImport));
  }

  private uniqueNamespace(scriptName: string): string {
    const base = namespaceFor(scriptName);
    let namespace = base;
    for (let n = 2; this.namespaces.has(namespace); n++) {
      namespace = `${base}_${n}`;
    }
    this.namespaces.add(namespace);
    return namespace;
  }

  /**
   * Generate one script. Nothing is written if generation throws, so a
   * failing script never leaves a partial block behind.
   */
  addScript(scriptName: string, commands: Iterable<Command>): ScriptOutcome {
    const generator = new WastTestGenerator(scriptName, this.options.disassemble).consume(
      commands,
    );

    if (generator.isFat(this.fatThreshold)) {
      console.warn(
        `Skipping fat script ${scriptName}: ${generator.commandCount} commands (limit ${this.fatThreshold})`,
      );
      const outcome = {
        script: scriptName,
        namespace: undefined,
        commandCount: generator.commandCount,
        emitted: false,
      };
      this.outcomes.push(outcome);
      return outcome;
    }

    const namespace = this.uniqueNamespace(scriptName);
    this.sink.write(
      `\ndescribe(${JSON.stringify(namespace)}, () => {\n${indent(generator.output)}});\n`,
    );
    const outcome = {
      script: scriptName,
      namespace,
      commandCount: generator.commandCount,
      emitted: true,
    };
    this.outcomes.push(outcome);
    return outcome;
  }

  get emittedCount(): number {
    return this.outcomes.filter((o) => o.emitted).length;
  }

  get suppressedCount(): number {
    return this.outcomes.filter((o) => !o.emitted).length;
  }
}
