import { log } from "../logger.js";
import type { EntityDelta, EntityKind } from "../types.js";
import { applyDeltas, type MergeOutcome } from "./merge.js";
import type { WorldState } from "./state.js";
import { WorldStateStore } from "./store.js";

/**
 * The world state plus the file it lives in. Every mutation goes through
 * here and ends with a full save. Assumes a single writer process.
 */
export class WorldLedger {
  private constructor(
    readonly state: WorldState,
    private readonly store: WorldStateStore,
  ) {}

  static async open(filePath: string): Promise<WorldLedger> {
    const store = new WorldStateStore(filePath);
    return new WorldLedger(await store.load(), store);
  }

  /** Merge deltas in the given (chronological) order, then persist. */
  async apply(deltas: EntityDelta[]): Promise<MergeOutcome[]> {
    if (deltas.length === 0) return [];
    const outcomes = applyDeltas(this.state, deltas);
    await this.store.save(this.state);
    const created = outcomes.filter((o) => o.created).length;
    log.debug(`merged ${outcomes.length} deltas (${created} new) into ${this.store.filePath}`);
    return outcomes;
  }

  async remove(kind: EntityKind, id: string): Promise<boolean> {
    const removed = this.state.remove(kind, id);
    if (removed) await this.store.save(this.state);
    return removed;
  }
}
