/**
 * Execution Locking System
 *
 * Serializes venue operations per scope (one round, the MetaIDO
 * registry, ID allocation) inside a single process. Waiters are served
 * in arrival order; an optional timeout turns a long wait into a
 * LockError.
 */

import { createLogger } from "./logger";

const log = createLogger("lock");

const DEFAULT_ACQUIRE_TIMEOUT_MS = 30_000;

export interface LockInfo {
  operation: string;
  since: number;
}

export interface LockStatus {
  locked: boolean;
  lockInfo?: LockInfo;
  waiting: number;
}

export interface ExecutionLockOptions {
  /** 0 waits forever */
  acquireTimeoutMs?: number;
}

// ============================================================================
// Lock
// ============================================================================

export class ExecutionLock {
  private holder: LockInfo | null = null;
  private queue: Array<(granted: boolean) => void> = [];
  private readonly acquireTimeoutMs: number;

  constructor(readonly name: string, options: ExecutionLockOptions = {}) {
    this.acquireTimeoutMs = options.acquireTimeoutMs ?? DEFAULT_ACQUIRE_TIMEOUT_MS;
  }

  /**
   * Wait for the lock
   * @param operation - Description of the operation holding it
   */
  async acquire(operation: string): Promise<void> {
    if (!this.holder) {
      this.holder = { operation, since: Date.now() };
      return;
    }

    const granted = await new Promise<boolean>((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const waiter = (ok: boolean) => {
        if (timer) clearTimeout(timer);
        resolve(ok);
      };
      this.queue.push(waiter);
      if (this.acquireTimeoutMs > 0) {
        timer = setTimeout(() => {
          const index = this.queue.indexOf(waiter);
          if (index !== -1) {
            this.queue.splice(index, 1);
            resolve(false);
          }
        }, this.acquireTimeoutMs);
      }
    });

    if (!granted) {
      throw new LockError(
        `Cannot acquire lock "${this.name}" for "${operation}". ` +
        `Held by "${this.holder?.operation ?? "unknown"}"`
      );
    }
    this.holder = { operation, since: Date.now() };
  }

  release(): void {
    if (!this.holder) return;
    this.holder = null;
    const next = this.queue.shift();
    if (next) {
      // The waiter re-marks the holder when it resumes; keep the slot
      // taken meanwhile so no newcomer jumps the queue.
      this.holder = { operation: "handoff", since: Date.now() };
      next(true);
    }
  }

  getStatus(): LockStatus {
    return {
      locked: this.holder !== null,
      lockInfo: this.holder ?? undefined,
      waiting: this.queue.length,
    };
  }

  isLocked(): boolean {
    return this.holder !== null;
  }

  /**
   * Execute a function with automatic lock management
   */
  async withLock<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    await this.acquire(operation);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

// ============================================================================
// Error Types
// ============================================================================

export class LockError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LockError";
  }
}

// ============================================================================
// Per-Scope Lock Manager
// ============================================================================

/**
 * Manages one lock per scope key, e.g. "round:3" or "meta"
 */
export class ScopedLockManager {
  private locks: Map<string, ExecutionLock> = new Map();

  constructor(private readonly options: ExecutionLockOptions = {}) {}

  private getLock(scope: string): ExecutionLock {
    let lock = this.locks.get(scope);
    if (!lock) {
      lock = new ExecutionLock(scope, this.options);
      this.locks.set(scope, lock);
    }
    return lock;
  }

  /**
   * Run `fn` holding every scope, acquired in the order given.
   * Callers must use one global order to stay deadlock-free.
   */
  async withScopes<T>(scopes: string[], operation: string, fn: () => Promise<T>): Promise<T> {
    const held: ExecutionLock[] = [];
    try {
      for (const scope of scopes) {
        const lock = this.getLock(scope);
        await lock.acquire(operation);
        held.push(lock);
      }
      return await fn();
    } catch (error) {
      if (error instanceof LockError) {
        log.warn("Lock acquisition timed out", { operation, scopes });
      }
      throw error;
    } finally {
      for (const lock of held.reverse()) {
        lock.release();
      }
    }
  }

  isScopeLocked(scope: string): boolean {
    return this.locks.get(scope)?.isLocked() ?? false;
  }
}
