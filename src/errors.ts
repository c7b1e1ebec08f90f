/** A script that cannot be turned into tests. Generation for it stops. */
export class ScriptError extends Error {
  constructor(
    readonly script: string,
    message: string,
    readonly line?: number,
    options?: { cause?: unknown },
  ) {
    super(`${script}${line === undefined ? "" : `:${line}`}: ${message}`, options);
    this.name = "ScriptError";
  }
}
