import { describe, expect, test } from "vitest";
import { ModuleCalls } from "../../src/codegen/module-calls";

describe("ModuleCalls", () => {
  test("keeps units in registration order per module", () => {
    const calls = new ModuleCalls();
    calls.register(1, "start_module_1");
    calls.register(2, "start_module_2");
    calls.register(1, "c2_l3_action_invoke");

    expect(calls.pendingFor(1)).toEqual(["start_module_1", "c2_l3_action_invoke"]);
    expect(calls.pendingFor(2)).toEqual(["start_module_2"]);
    expect(calls.pendingFor(3)).toEqual([]);
    expect(calls.pendingCount).toBe(3);
  });

  test("flush hands out one batch and forgets the module", () => {
    const calls = new ModuleCalls();
    calls.register(1, "start_module_1");
    calls.register(1, "c2_l3_action_invoke");

    expect(calls.flush(1)).toEqual({
      kind: "batch",
      moduleIndex: 1,
      calls: ["start_module_1", "c2_l3_action_invoke"],
    });
    expect(calls.pendingFor(1)).toEqual([]);
    expect(calls.flush(1)).toBeUndefined();
    expect(calls.flushedCount).toBe(2);
    expect(calls.pendingCount).toBe(0);
  });

  test("flushing a module with nothing pending yields nothing", () => {
    const calls = new ModuleCalls();
    expect(calls.flush(0)).toBeUndefined();
    expect(calls.flushedCount).toBe(0);
  });
});
