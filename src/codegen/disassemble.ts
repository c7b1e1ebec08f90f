import wabtInit from "wabt";

export type WabtModule = Awaited<ReturnType<typeof wabtInit>>;

/** Turns a module binary back into its text format. */
export type Disassembler = (binary: Uint8Array) => string;

let wabtPromise: Promise<WabtModule> | undefined;

/** wabt's wasm build, initialised once per process. */
export function loadWabt(): Promise<WabtModule> {
  if (!wabtPromise) wabtPromise = wabtInit();
  return wabtPromise;
}

export function createDisassembler(wabt: WabtModule): Disassembler {
  return (binary) => {
    let module: ReturnType<WabtModule["readWasm"]>;
    try {
      module = wabt.readWasm(binary, { readDebugNames: true });
    } catch (error: unknown) {
      throw new Error("Can't convert module back to text: binary is unreadable", {
        cause: error,
      });
    }
    try {
      module.generateNames();
      module.applyNames();
      return module.toText({ foldExprs: false, inlineExport: false });
    } finally {
      module.destroy();
    }
  };
}
