// worldcore/core/Region.ts
//
// Exclusive-access region around one registry's state.
//
// Every read or write of a registry goes through run(). Calls are synchronous
// and run to completion, so a region is only ever "held" for the duration of
// one mutation. Nested entry means a handler reached back into the registry
// it is already mutating; that is a bug, not contention, so it throws.

export class RegionReentryError extends Error {
  constructor(readonly region: string) {
    super(`Region "${region}" is already held`);
    this.name = "RegionReentryError";
  }
}

export class RegionAsyncError extends Error {
  constructor(readonly region: string) {
    super(`Region "${region}" critical section returned a promise`);
    this.name = "RegionAsyncError";
  }
}

export class Region<S> {
  private held = false;

  constructor(
    readonly name: string,
    private readonly state: S,
  ) {}

  get isHeld(): boolean {
    return this.held;
  }

  run<R>(fn: (state: S) => R): R {
    if (this.held) {
      throw new RegionReentryError(this.name);
    }

    this.held = true;
    try {
      const result = fn(this.state);
      if (result instanceof Promise) {
        // The region would be released before the work finished.
        throw new RegionAsyncError(this.name);
      }
      return result;
    } finally {
      this.held = false;
    }
  }
}

/** Monotonic id source starting at 1. Lives inside the registry state it numbers. */
export class IdSequence {
  private next: number;

  constructor(start = 1) {
    this.next = start;
  }

  take(): number {
    const id = this.next;
    this.next += 1;
    return id;
  }

  peek(): number {
    return this.next;
  }
}
