// worldcore/rpc/CapabilityTable.ts
//
// Per-connection export table. Ids are only meaningful on the connection
// that received them and are never reused within it.

import { IdSequence } from "../core/Region";
import { Logger } from "../utils/logger";
import type { CapRef, CapabilityServer } from "./Capability";

const log = Logger.scope("CAPS");

interface CapEntry {
  cap: CapabilityServer;
  refs: number;
}

export class CapabilityTable {
  private readonly byId = new Map<number, CapEntry>();
  private readonly idOf = new Map<CapabilityServer, number>();
  private readonly ids = new IdSequence();

  /** Exporting an object that is already in the table bumps its refcount. */
  export(cap: CapabilityServer): CapRef {
    const existing = this.idOf.get(cap);
    if (existing !== undefined) {
      const entry = this.byId.get(existing);
      if (entry) {
        entry.refs += 1;
        return { $cap: existing };
      }
    }

    const id = this.ids.take();
    this.byId.set(id, { cap, refs: 1 });
    this.idOf.set(cap, id);
    log.debug("Exported capability", { capId: id, kind: cap.kind });
    return { $cap: id };
  }

  get(id: number): CapabilityServer | undefined {
    return this.byId.get(id)?.cap;
  }

  refCount(id: number): number {
    return this.byId.get(id)?.refs ?? 0;
  }

  /**
   * Drop `count` references. The entry goes away at zero.
   * Returns false when the id is not in the table.
   */
  release(id: number, count = 1): boolean {
    const entry = this.byId.get(id);
    if (!entry) return false;

    entry.refs -= count;
    if (entry.refs <= 0) {
      this.byId.delete(id);
      this.idOf.delete(entry.cap);
      log.debug("Released capability", { capId: id, kind: entry.cap.kind });
    }
    return true;
  }

  get size(): number {
    return this.byId.size;
  }

  /** Drop everything; returns how many entries were held. */
  clear(): number {
    const n = this.byId.size;
    this.byId.clear();
    this.idOf.clear();
    return n;
  }
}
