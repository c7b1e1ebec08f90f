export { SpectestBundle, StringSink, namespaceFor } from "./codegen/bundle";
export type { BundleOptions, OutputSink, ScriptOutcome } from "./codegen/bundle";
export { createDisassembler, loadWabt } from "./codegen/disassemble";
export type { Disassembler, WabtModule } from "./codegen/disassemble";
export { FAT_TEST_THRESHOLD, WastTestGenerator } from "./codegen/generator";
export { renderFragment, renderFragments } from "./codegen/fragments";
export type { Assertion, Call, Fragment } from "./codegen/fragments";
export { ModuleCalls } from "./codegen/module-calls";
export { renderPreamble } from "./codegen/preamble";
export { bareValueLiteral, isNan, valueLiteral, valueType } from "./codegen/value-codec";
export { ConfigError, resolveConfig } from "./config";
export type { GeneratorConfig } from "./config";
export { ScriptError } from "./errors";
export * from "./script/command";
export { parseManifest, readScript, toCommands } from "./script/reader";
export type { LoadedScript, ScriptManifest } from "./script/reader";
