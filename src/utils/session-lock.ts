/**
 * Session Lock
 *
 * Serializes entry points into the shared application instance.
 *
 * Everything in fontctl is synchronous, so the only way two entry points
 * can overlap is re-entry: a key handler or notice callback calling back
 * into the application while a command is still running. Such calls are
 * queued and run, in order, once the running task returns.
 */

export type LockedTask = () => void;

export class SessionLock {
  private held: boolean = false;
  private readonly pending: LockedTask[] = [];

  /**
   * Run a task while holding the lock.
   *
   * If the lock is already held, the task is queued and this call returns
   * immediately. Queued tasks are dropped if a task throws.
   */
  run(task: LockedTask): void {
    if (this.held) {
      this.pending.push(task);
      return;
    }

    this.held = true;
    try {
      let next: LockedTask | undefined = task;
      while (next) {
        next();
        next = this.pending.shift();
      }
    } finally {
      this.held = false;
      this.pending.length = 0;
    }
  }

  /** Whether a task is currently running */
  get locked(): boolean {
    return this.held;
  }

  /** Number of tasks waiting for the lock */
  get queued(): number {
    return this.pending.length;
  }
}
