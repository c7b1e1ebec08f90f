#!/usr/bin/env -S npx tsx
/**
 * Spec test generator.
 * 1. Reads the command manifest of every listed suite (wast2json output)
 * 2. Generates one `describe` block per suite, in list order
 * 3. Writes the whole bundle to <out-dir>/spectests.test.ts
 *
 * Suites with more than --fat-threshold commands are left out of the bundle.
 */

import fs from "node:fs";
import path from "node:path";
import { SpectestBundle, StringSink } from "../src/codegen/bundle";
import { createDisassembler, loadWabt } from "../src/codegen/disassemble";
import { ConfigError, USAGE, resolveConfig, type GeneratorConfig } from "../src/config";
import { OUTPUT_FILE_NAME } from "../src/paths";
import { readScript, type LoadedScript } from "../src/script/reader";

const CONCURRENCY = 8;

async function runParallel<T, R>(
  items: T[],
  fn: (item: T) => Promise<R>,
  concurrency: number,
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let index = 0;
  const workers = Array.from({ length: concurrency }, async () => {
    while (index < items.length) {
      const i = index++;
      results[i] = await fn(items[i]);
    }
  });
  await Promise.all(workers);
  return results;
}

function loadConfig(): GeneratorConfig {
  try {
    return resolveConfig(process.argv.slice(2));
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      console.error(USAGE);
      process.exit(1);
    }
    throw err;
  }
}

async function main() {
  const config = loadConfig();

  console.log("=== Spec test generator ===\n");
  const wabt = await loadWabt();

  // Phase 1: read scripts. Any unreadable script fails the whole run.
  console.log(`Reading ${config.suites.length} scripts from ${config.scriptsDir}...`);
  const scripts: LoadedScript[] = await runParallel(
    config.suites,
    (suite) => readScript(path.join(config.scriptsDir, `${suite}.json`), wabt),
    CONCURRENCY,
  );

  // Phase 2: generate, one whole block per script.
  const sink = new StringSink();
  const bundle = new SpectestBundle(sink, {
    runtimeImport: config.runtimeImport,
    disassemble: createDisassembler(wabt),
    fatThreshold: config.fatThreshold,
  });
  for (const script of scripts) {
    const outcome = bundle.addScript(script.name, script.commands);
    if (outcome.emitted) {
      console.log(`  ${script.name}: ${outcome.commandCount} commands`);
    }
  }
  console.log(
    `  Generated: ${bundle.emittedCount} scripts, ${bundle.suppressedCount} skipped as fat`,
  );

  // Phase 3: write the artifact.
  fs.mkdirSync(config.outDir, { recursive: true });
  const outFile = path.join(config.outDir, OUTPUT_FILE_NAME);
  fs.writeFileSync(outFile, sink.toString());
  console.log(`\nWrote ${outFile}`);
}

main().catch((err: unknown) => {
  console.error("Generation failed:", err);
  process.exit(1);
});
