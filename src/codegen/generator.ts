import { ScriptError } from "../errors";
import type { Action, Command, CommandKind, Value } from "../script/command";
import type { Disassembler } from "./disassemble";
import {
  renderFragments,
  startHookName,
  type Assertion,
  type Call,
  type Fragment,
} from "./fragments";
import { ModuleCalls } from "./module-calls";
import { bareValueLiteral, isNan, valueLiteral, valueType } from "./value-codec";

/** Scripts with more commands than this are left out of the bundle. */
export const FAT_TEST_THRESHOLD = 200;

/**
 * Turns the commands of one script into test fragments.
 *
 * Every module gets a factory and a start hook. Units generated while a module
 * is the latest one are batched into a single test for that module, except
 * trap assertions: a trap can leave memory or globals half-written, so each one
 * runs against a fresh instance in its own test.
 */
export class WastTestGenerator {
  /** Index of the latest module. Modules are numbered from 1. */
  lastModule = 0;
  lastLine = 0;
  commandCount = 0;

  private readonly moduleCalls = new ModuleCalls();
  private readonly fragments: Fragment[] = [];
  private consumed = false;

  constructor(
    readonly script: string,
    private readonly disassemble: Disassembler,
  ) {}

  consume(commands: Iterable<Command>): this {
    if (this.consumed) {
      throw new Error(`Script ${this.script} was already consumed`);
    }
    this.consumed = true;

    for (const { line, kind } of commands) {
      this.lastLine = line;
      this.commandCount++;
      this.fragments.push({ kind: "line", line });
      this.visitCommand(kind);
    }
    for (let n = 1; n <= this.lastModule; n++) {
      this.flushModuleCalls(n);
    }
    return this;
  }

  isFat(threshold = FAT_TEST_THRESHOLD): boolean {
    return this.commandCount > threshold;
  }

  get emitted(): readonly Fragment[] {
    return this.fragments;
  }

  /** Rendered source of everything emitted so far. */
  get output(): string {
    return renderFragments(this.fragments);
  }

  /** Units registered on a module and not yet batched. */
  pendingCalls(moduleIndex: number): readonly string[] {
    return this.moduleCalls.pendingFor(moduleIndex);
  }

  private commandName(): string {
    return `c${this.commandCount}_l${this.lastLine}`;
  }

  private flushModuleCalls(moduleIndex: number): void {
    const batch = this.moduleCalls.flush(moduleIndex);
    if (batch) this.fragments.push(batch);
  }

  private visitCommand(kind: CommandKind): void {
    switch (kind.type) {
      case "module":
        this.visitModule(kind.binary);
        break;
      case "assert_return":
        this.visitAssertReturn(kind.action, kind.expected);
        break;
      case "assert_return_canonical_nan":
        this.visitAssertReturnNan(kind.action, "canonical");
        break;
      case "assert_return_arithmetic_nan":
        this.visitAssertReturnNan(kind.action, "arithmetic");
        break;
      case "assert_trap":
        this.visitAssertTrap(kind.action);
        break;
      case "assert_invalid":
        this.visitCompileFailure(kind.binary, "invalid");
        break;
      case "assert_malformed":
        this.visitCompileFailure(kind.binary, "malformed");
        break;
      case "action":
        this.visitPerformAction(kind.action);
        break;
      // Accepted and skipped: linking, instantiation failures and stack
      // exhaustion are not covered by the generated tests.
      case "assert_uninstantiable":
      case "assert_exhaustion":
      case "assert_unlinkable":
      case "register":
        break;
      default: {
        const unhandled: never = kind;
        throw new ScriptError(
          this.script,
          `unknown command ${JSON.stringify(unhandled)}`,
          this.lastLine,
        );
      }
    }
  }

  private visitModule(binary: Uint8Array): void {
    let text: string;
    try {
      text = this.disassemble(binary);
    } catch (error: unknown) {
      throw new ScriptError(this.script, "module cannot be disassembled", this.lastLine, {
        cause: error,
      });
    }

    this.flushModuleCalls(this.lastModule);
    this.lastModule++;
    this.fragments.push({ kind: "factory", moduleIndex: this.lastModule, binary, text });

    // Instantiation already runs the start function, so the hook is empty.
    const startHook = startHookName(this.lastModule);
    this.fragments.push({ kind: "start-hook", name: startHook });
    this.moduleCalls.register(this.lastModule, startHook);
  }

  private requireModule(): void {
    if (this.lastModule === 0) {
      throw new ScriptError(this.script, "action appears before any module", this.lastLine);
    }
  }

  private toCall(action: Action): Call {
    switch (action.type) {
      case "invoke":
        return { kind: "invoke", field: action.field, args: action.args.map(bareValueLiteral) };
      case "get":
        return { kind: "get", field: action.field };
    }
  }

  /**
   * Emit a unit performing `action`. With `expected`, the unit also checks
   * the results: by sign and NaN-ness when a NaN is expected, exactly
   * otherwise. Returns the unit name.
   */
  private visitAction(action: Action, expected?: Value[]): string {
    this.requireModule();

    let assertion: Assertion = { kind: "none" };
    if (expected) {
      const [first] = expected;
      if (first !== undefined && isNan(first)) {
        assertion = { kind: "nan-sign", type: first.type, expected: bareValueLiteral(first) };
      } else {
        assertion = {
          kind: "equals",
          types: expected.map(valueType),
          expected: expected.map(valueLiteral),
        };
      }
    }

    const name = `${this.commandName()}_action_${action.type}`;
    this.fragments.push({ kind: "unit", name, call: this.toCall(action), assertion });
    return name;
  }

  private visitAssertReturn(action: Action, expected: Value[]): void {
    this.moduleCalls.register(this.lastModule, this.visitAction(action, expected));
  }

  private visitPerformAction(action: Action): void {
    this.moduleCalls.register(this.lastModule, this.visitAction(action));
  }

  private visitAssertReturnNan(action: Action, nan: "canonical" | "arithmetic"): void {
    this.requireModule();
    const name = `${this.commandName()}_assert_return_${nan}_nan`;
    this.fragments.push({
      kind: "unit",
      name,
      call: this.toCall(action),
      assertion: { kind: "quiet-nan" },
    });
    this.moduleCalls.register(this.lastModule, name);
  }

  private visitAssertTrap(action: Action): void {
    const unit = this.visitAction(action);
    this.fragments.push({
      kind: "trap-test",
      name: `${this.commandName()}_assert_trap`,
      moduleIndex: this.lastModule,
      unit,
    });
  }

  private visitCompileFailure(binary: Uint8Array, reason: "invalid" | "malformed"): void {
    this.fragments.push({
      kind: "compile-failure-test",
      name: `${this.commandName()}_assert_${reason}`,
      binary,
      reason,
    });
  }
}
