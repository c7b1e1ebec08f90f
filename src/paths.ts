import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const PROJECT_ROOT = path.join(__dirname, "..");
export const SCHEMA_DIR = path.join(PROJECT_ROOT, "schema");
export const SCRIPT_SCHEMA = path.join(SCHEMA_DIR, "wast-script.schema.json");
/** wast2json manifests, one `<suite>.json` per script, with their modules. */
export const SPECTESTS_DIR = path.join(PROJECT_ROOT, "spectests");
export const SUITES_FILE = path.join(SPECTESTS_DIR, "suites.json");
export const BUILD_DIR = path.join(PROJECT_ROOT, "build");
export const RUNTIME_ENTRY = path.join(PROJECT_ROOT, "src", "runtime", "index.ts");
export const OUTPUT_FILE_NAME = "spectests.test.ts";
