export interface UnstubScope {
  /** Depth of this attempt, 1 for the outermost */
  readonly depth: number;
  release(): void;
}

/**
 * Counts unstub attempts currently in flight, across every slot sharing this guard.
 *
 * Entering hands out a scope that must be released on every exit path. An attempt that would exceed the limit
 * is refused without touching the count.
 */
export class UnstubGuard {
  private inFlight = 0;

  constructor(public readonly limit = 2) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Unstub depth limit must be a positive integer, got ${limit}`);
    }
  }

  get depth() {
    return this.inFlight;
  }

  /** `null` once `limit` attempts are already in flight */
  public tryEnter(): UnstubScope | null {
    if (this.inFlight + 1 > this.limit) return null;

    const depth = ++this.inFlight;
    let released = false;
    return {
      depth,
      release: () => {
        if (released) return;
        released = true;
        this.inFlight--;
      },
    };
  }
}
