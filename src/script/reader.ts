import fs from "node:fs";
import path from "node:path";
import Ajv, { type ErrorObject, type Schema, type ValidateFunction } from "ajv";
import type { WabtModule } from "../codegen/disassemble";
import { ScriptError } from "../errors";
import { SCRIPT_SCHEMA } from "../paths";
import {
  f32Bits,
  f64Bits,
  i32,
  i64,
  type Action,
  type Command,
  type CommandKind,
  type Value,
} from "./command";

// Shape of the JSON manifests written by wabt's `wast2json`.

export interface ManifestValue {
  type: "i32" | "i64" | "f32" | "f64";
  /** Unsigned decimal bit pattern, or a NaN class for expected results. */
  value?: string;
}

export interface ManifestAction {
  type: "invoke" | "get";
  module?: string;
  field: string;
  args?: ManifestValue[];
}

export interface ManifestCommand {
  type: CommandKind["type"];
  line: number;
  name?: string;
  as?: string;
  filename?: string;
  text?: string;
  module_type?: "binary" | "text";
  action?: ManifestAction;
  expected?: ManifestValue[];
}

export interface ScriptManifest {
  source_filename: string;
  commands: ManifestCommand[];
}

export interface LoadedScript {
  name: string;
  commands: Command[];
}

const ajv = new Ajv({ allErrors: true, strict: false });
let validateManifestFn: ValidateFunction<ScriptManifest> | undefined;

function manifestValidator(): ValidateFunction<ScriptManifest> {
  if (!validateManifestFn) {
    const schema: Schema = JSON.parse(fs.readFileSync(SCRIPT_SCHEMA, "utf8"));
    validateManifestFn = ajv.compile<ScriptManifest>(schema);
  }
  return validateManifestFn;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? [])
    .map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`)
    .join("; ");
}

/** Script name of a manifest path: the base name up to the first dot. */
export function scriptNameOf(manifestPath: string): string {
  return path.basename(manifestPath).split(".")[0];
}

export function parseManifest(script: string, json: unknown): ScriptManifest {
  const validate = manifestValidator();
  if (!validate(json)) {
    throw new ScriptError(script, `invalid command manifest: ${formatErrors(validate.errors)}`);
  }
  return json;
}

/** Bits of a manifest value, converted without passing through a float. */
export function toValue(script: string, line: number, v: ManifestValue): Value {
  if (v.value === undefined || !/^[0-9]+$/.test(v.value)) {
    throw new ScriptError(script, `${v.type} value ${v.value ?? "(missing)"} is not a bit pattern`, line);
  }
  const bits = BigInt(v.value);
  switch (v.type) {
    case "i32":
      return i32(Number(BigInt.asIntN(32, bits)));
    case "i64":
      return i64(bits);
    case "f32":
      return f32Bits(Number(BigInt.asUintN(32, bits)));
    case "f64":
      return f64Bits(bits);
  }
}

function toAction(script: string, line: number, action: ManifestAction): Action {
  switch (action.type) {
    case "invoke": {
      const args = (action.args ?? []).map((v) => toValue(script, line, v));
      return action.module === undefined
        ? { type: "invoke", field: action.field, args }
        : { type: "invoke", module: action.module, field: action.field, args };
    }
    case "get":
      return action.module === undefined
        ? { type: "get", field: action.field }
        : { type: "get", module: action.module, field: action.field };
  }
}

function nanClassOf(expected: ManifestValue[] | undefined): "canonical" | "arithmetic" | undefined {
  if (!expected || expected.length !== 1) return undefined;
  const [value] = expected;
  if (value.value === "nan:canonical") return "canonical";
  if (value.value === "nan:arithmetic") return "arithmetic";
  return undefined;
}

export type ModuleLoader = (filename: string, moduleType: "binary" | "text") => Uint8Array;

/**
 * Manifest commands to structured commands. `loadModule` supplies the bytes
 * of the module files the manifest refers to.
 */
export function toCommands(
  script: string,
  manifest: ScriptManifest,
  loadModule: ModuleLoader,
): Command[] {
  return manifest.commands.map((cmd) => {
    const { line } = cmd;

    const binary = (): Uint8Array => {
      if (cmd.filename === undefined) {
        throw new ScriptError(script, `${cmd.type} has no module file`, line);
      }
      return loadModule(cmd.filename, cmd.module_type ?? "binary");
    };
    const action = (): Action => {
      if (cmd.action === undefined) {
        throw new ScriptError(script, `${cmd.type} has no action`, line);
      }
      return toAction(script, line, cmd.action);
    };
    const message = cmd.text === undefined ? {} : { message: cmd.text };

    let kind: CommandKind;
    switch (cmd.type) {
      case "module":
        kind = cmd.name === undefined
          ? { type: "module", binary: binary() }
          : { type: "module", binary: binary(), name: cmd.name };
        break;
      case "assert_return": {
        // Newer manifests put NaN classes in `expected` instead of using
        // a command type of their own.
        const nan = nanClassOf(cmd.expected);
        if (nan === "canonical") {
          kind = { type: "assert_return_canonical_nan", action: action() };
        } else if (nan === "arithmetic") {
          kind = { type: "assert_return_arithmetic_nan", action: action() };
        } else {
          kind = {
            type: "assert_return",
            action: action(),
            expected: (cmd.expected ?? []).map((v) => toValue(script, line, v)),
          };
        }
        break;
      }
      case "assert_return_canonical_nan":
      case "assert_return_arithmetic_nan":
        kind = { type: cmd.type, action: action() };
        break;
      case "assert_trap":
      case "assert_exhaustion":
        kind = { type: cmd.type, action: action(), ...message };
        break;
      case "assert_invalid":
      case "assert_malformed":
      case "assert_uninstantiable":
      case "assert_unlinkable":
        kind = { type: cmd.type, binary: binary(), ...message };
        break;
      case "register":
        if (cmd.as === undefined) {
          throw new ScriptError(script, "register has no name to register as", line);
        }
        kind = cmd.name === undefined
          ? { type: "register", as: cmd.as }
          : { type: "register", name: cmd.name, as: cmd.as };
        break;
      case "action":
        kind = { type: "action", action: action() };
        break;
    }
    return { line, kind };
  });
}

/**
 * Module bytes for a manifest entry. Binary files are read as they are;
 * `.wat` files are assembled with wabt unless the command expects the text
 * itself to be rejected.
 */
export function createModuleLoader(baseDir: string, wabt: WabtModule): ModuleLoader {
  return (filename, moduleType) => {
    const file = path.join(baseDir, filename);
    const contents = fs.readFileSync(file);
    if (moduleType === "text" || !filename.endsWith(".wat")) {
      return new Uint8Array(contents);
    }
    const module = wabt.parseWat(filename, contents.toString("utf8"));
    try {
      return new Uint8Array(module.toBinary({}).buffer);
    } finally {
      module.destroy();
    }
  };
}

/** Read a `wast2json` manifest and every module it refers to. */
export async function readScript(manifestPath: string, wabt: WabtModule): Promise<LoadedScript> {
  const name = scriptNameOf(manifestPath);
  let json: unknown;
  try {
    json = JSON.parse(await fs.promises.readFile(manifestPath, "utf8"));
  } catch (error: unknown) {
    throw new ScriptError(name, `cannot read ${manifestPath}`, undefined, { cause: error });
  }

  const manifest = parseManifest(name, json);
  const loadModule = createModuleLoader(path.dirname(manifestPath), wabt);
  try {
    return { name, commands: toCommands(name, manifest, loadModule) };
  } catch (error: unknown) {
    if (error instanceof ScriptError) throw error;
    throw new ScriptError(name, "cannot load a module of the script", undefined, {
      cause: error,
    });
  }
}
