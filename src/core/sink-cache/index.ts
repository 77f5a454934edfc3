import type { Sink } from "../types.js";

export class SinkCacheCloseError extends Error {
  public readonly errors: readonly unknown[];

  public constructor(errors: readonly unknown[]) {
    super(`${errors.length} cached sinks failed to close.`);
    this.name = "SinkCacheCloseError";
    this.errors = errors;
  }
}

/**
 * Holds at most one sink per resource key. Concurrent callers for the same
 * key share one pending open; a failed open leaves no entry behind.
 */
export class SinkCache<TSink extends Sink = Sink> {
  private readonly entries = new Map<string, Promise<TSink>>();

  public get size(): number {
    return this.entries.size;
  }

  public has(key: string): boolean {
    return this.entries.has(key);
  }

  public keys(): readonly string[] {
    return Array.from(this.entries.keys());
  }

  public acquire(key: string, open: () => Promise<TSink>): Promise<TSink> {
    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }

    const pending = Promise.resolve().then(open);
    this.entries.set(key, pending);
    void pending.then(undefined, () => {
      if (this.entries.get(key) === pending) {
        this.entries.delete(key);
      }
    });
    return pending;
  }

  /**
   * Settled sinks by key; keys whose open is still pending are awaited, and
   * keys whose open failed are left out.
   */
  public async settled(): Promise<ReadonlyMap<string, TSink>> {
    const settled = new Map<string, TSink>();
    for (const [key, entry] of Array.from(this.entries)) {
      const sink = await entry.then(
        (value) => value,
        () => undefined,
      );
      if (sink !== undefined) {
        settled.set(key, sink);
      }
    }
    return settled;
  }

  public async closeAll(): Promise<void> {
    const pending = Array.from(this.entries.values());
    this.entries.clear();

    const results = await Promise.allSettled(
      pending.map(async (entry) => {
        // Failed opens were already reported to their callers.
        const sink = await entry.then(
          (value) => value,
          () => undefined,
        );
        await sink?.close?.();
      }),
    );
    const errors: unknown[] = results.flatMap((result) =>
      result.status === "rejected" ? [result.reason] : [],
    );
    if (errors.length > 0) {
      throw new SinkCacheCloseError(errors);
    }
  }
}
