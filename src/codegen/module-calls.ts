import type { Fragment } from "./fragments";

/**
 * Units waiting to run against a module, grouped per module index.
 *
 * Order inside a module is script order: a unit may depend on state an
 * earlier one left in the instance (a global write followed by a read).
 */
export class ModuleCalls {
  private readonly pending = new Map<number, string[]>();
  private flushed = 0;
  private registered = 0;

  register(moduleIndex: number, unitName: string): void {
    const calls = this.pending.get(moduleIndex);
    if (calls) {
      calls.push(unitName);
    } else {
      this.pending.set(moduleIndex, [unitName]);
    }
    this.registered++;
  }

  /** Pending names for a module, in registration order. */
  pendingFor(moduleIndex: number): readonly string[] {
    return this.pending.get(moduleIndex) ?? [];
  }

  /**
   * Take every pending unit of a module as one batch. Returns `undefined`
   * when nothing is pending.
   */
  flush(moduleIndex: number): Extract<Fragment, { kind: "batch" }> | undefined {
    const calls = this.pending.get(moduleIndex);
    this.pending.delete(moduleIndex);
    if (!calls || calls.length === 0) return undefined;
    this.flushed += calls.length;
    return { kind: "batch", moduleIndex, calls };
  }

  /** Units registered but not yet flushed, across all modules. */
  get pendingCount(): number {
    return this.registered - this.flushed;
  }

  get flushedCount(): number {
    return this.flushed;
  }
}
