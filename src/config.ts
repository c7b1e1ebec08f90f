import fs from "node:fs";
import path from "node:path";
import { FAT_TEST_THRESHOLD } from "./codegen/generator";
import { BUILD_DIR, RUNTIME_ENTRY, SPECTESTS_DIR, SUITES_FILE } from "./paths";

export interface GeneratorConfig {
  /** Directory holding `<suite>.json` manifests and their module files. */
  scriptsDir: string;
  outDir: string;
  /** Suites to generate, in output order. */
  suites: string[];
  fatThreshold: number;
  /** Specifier the generated file imports the runtime through. */
  runtimeImport: string;
}

export const USAGE = `Usage: tsx scripts/generate-spectests.ts [--scripts-dir=<dir>] [--out-dir=<dir>]
       [--suite=<name>]... [--fat-threshold=<n>] [--runtime-import=<specifier>]

Environment: OUT_DIR and SPECTESTS_DIR stand in for --out-dir and --scripts-dir.`;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Suite names of the default script list. */
export function loadSuiteList(file: string = SUITES_FILE): string[] {
  const list: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  if (!Array.isArray(list) || !list.every((name): name is string => typeof name === "string")) {
    throw new ConfigError(`${file} must hold an array of suite names`);
  }
  return list;
}

/**
 * Import specifier of the runtime as seen from `outDir`, without the `.ts`
 * extension: the generated file is loaded by Vitest, which resolves it.
 */
export function runtimeImportFrom(outDir: string, runtimeEntry: string = RUNTIME_ENTRY): string {
  const relative = path
    .relative(outDir, runtimeEntry)
    .split(path.sep)
    .join("/")
    .replace(/\.ts$/, "");
  return relative.startsWith(".") ? relative : `./${relative}`;
}

function parseThreshold(raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigError(`--fat-threshold must be a non-negative integer, got "${raw}"`);
  }
  return n;
}

export function resolveConfig(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  suiteList: () => string[] = loadSuiteList,
): GeneratorConfig {
  let scriptsDir = env.SPECTESTS_DIR ?? SPECTESTS_DIR;
  let outDir = env.OUT_DIR ?? BUILD_DIR;
  let fatThreshold = FAT_TEST_THRESHOLD;
  let runtimeImport: string | undefined;
  const suites: string[] = [];

  for (const arg of argv) {
    if (arg.startsWith("--scripts-dir=")) {
      scriptsDir = arg.slice("--scripts-dir=".length);
    } else if (arg.startsWith("--out-dir=")) {
      outDir = arg.slice("--out-dir=".length);
    } else if (arg.startsWith("--suite=")) {
      suites.push(arg.slice("--suite=".length));
    } else if (arg.startsWith("--fat-threshold=")) {
      fatThreshold = parseThreshold(arg.slice("--fat-threshold=".length));
    } else if (arg.startsWith("--runtime-import=")) {
      runtimeImport = arg.slice("--runtime-import=".length);
    } else {
      throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }

  outDir = path.resolve(outDir);
  return {
    scriptsDir: path.resolve(scriptsDir),
    outDir,
    suites: suites.length > 0 ? suites : suiteList(),
    fatThreshold,
    runtimeImport: runtimeImport ?? runtimeImportFrom(outDir),
  };
}
