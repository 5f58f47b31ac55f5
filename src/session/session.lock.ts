function isThenable(value: unknown): boolean {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/**
 * Re-entrant guard for synchronous critical sections.
 *
 * Host lifecycle callbacks and tool calls arrive from different event sources;
 * a synchronous section cannot interleave with another on the event loop, so
 * the guard only has to keep sections synchronous and track nesting depth.
 */
export class ReentrantLock {
  private depth = 0;

  get held(): boolean {
    return this.depth > 0;
  }

  run<T>(section: () => T): T {
    this.depth += 1;
    try {
      const result = section();
      if (isThenable(result)) {
        throw new Error("LOCK_ERROR critical section must not return a promise");
      }
      return result;
    } finally {
      this.depth -= 1;
    }
  }
}
