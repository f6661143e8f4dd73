// =============================================================================
// VAULTLINE — Bounded Task Group
//
// Runs submitted tasks with at most `limit` in flight, all sharing one
// AbortSignal. The first task to fail aborts that signal, queued tasks
// are dropped, and wait() rejects with the first failure once everything
// already started has settled.
//
// Tasks own disjoint work and report through their own closures; the
// group holds no results.
// =============================================================================

export type Task = (signal: AbortSignal) => Promise<void>;

export class TaskGroup {
  readonly signal: AbortSignal;
  private readonly controller = new AbortController();
  private readonly limit: number;
  private readonly pending: Task[] = [];
  private readonly inFlight = new Set<Promise<void>>();
  private readonly idleWaiters: Array<() => void> = [];
  private failure: { cause: unknown } | null = null;
  private detachParent: (() => void) | null = null;

  /**
   * @param limit maximum simultaneous tasks; Infinity for unbounded
   * @param parent caller's signal; aborting it aborts the group
   */
  constructor(limit: number = Infinity, parent?: AbortSignal) {
    if (!(limit >= 1)) {
      throw new Error(`Task group limit must be at least 1, got ${limit}`);
    }
    this.limit = limit;
    this.signal = this.controller.signal;

    if (parent) {
      if (parent.aborted) {
        this.fail(parent.reason);
      } else {
        const onAbort = (): void => this.fail(parent.reason);
        parent.addEventListener('abort', onAbort, { once: true });
        this.detachParent = () => parent.removeEventListener('abort', onAbort);
      }
    }
  }

  go(task: Task): void {
    this.pending.push(task);
    this.pump();
  }

  /** Resolves when every task has finished; rejects with the first failure. */
  async wait(): Promise<void> {
    this.pump();
    if (this.inFlight.size > 0 || this.pending.length > 0) {
      await new Promise<void>(resolve => this.idleWaiters.push(resolve));
    }
    this.detachParent?.();
    this.detachParent = null;
    if (this.failure) {
      throw this.failure.cause;
    }
  }

  private fail(cause: unknown): void {
    if (this.failure) return;
    this.failure = { cause };
    this.controller.abort(cause);
  }

  private pump(): void {
    if (this.signal.aborted) {
      this.pending.length = 0;
    }
    while (this.inFlight.size < this.limit && this.pending.length > 0) {
      const task = this.pending.shift();
      if (task) this.start(task);
    }
    if (this.inFlight.size === 0 && this.pending.length === 0) {
      for (const resolve of this.idleWaiters.splice(0)) resolve();
    }
  }

  private start(task: Task): void {
    const run: Promise<void> = Promise.resolve()
      .then(() => task(this.signal))
      .catch((err: unknown) => this.fail(err))
      .finally(() => {
        this.inFlight.delete(run);
        this.pump();
      });
    this.inFlight.add(run);
  }
}
