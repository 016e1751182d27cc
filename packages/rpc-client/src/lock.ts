/**
 * Async readers/writer lock.
 *
 * Shared holders run concurrently; an exclusive holder runs alone. Waiters
 * are granted in arrival order, so once an exclusive waiter is queued, later
 * shared acquirers wait behind it.
 */

interface Waiter {
  exclusive: boolean;
  grant: () => void;
}

export interface ReadWriteLock {
  /** Run `fn` while holding the lock shared. */
  withReadLock<T>(fn: () => T | Promise<T>): Promise<T>;
  /** Run `fn` while holding the lock exclusively. */
  withWriteLock<T>(fn: () => T | Promise<T>): Promise<T>;
  /** Number of current shared holders. */
  readers(): number;
  /** Whether an exclusive holder is active. */
  isWriteLocked(): boolean;
}

interface LockState {
  readers: number;
  writer: boolean;
  queue: Waiter[];
}

export function createReadWriteLock(): ReadWriteLock {
  const state: LockState = { readers: 0, writer: false, queue: [] };

  function pump(): void {
    while (state.queue.length > 0) {
      const head = state.queue[0];
      if (head.exclusive) {
        if (state.writer || state.readers > 0) return;
        state.queue.shift();
        state.writer = true;
        head.grant();
        return;
      }
      if (state.writer) return;
      state.queue.shift();
      state.readers++;
      head.grant();
    }
  }

  function acquire(exclusive: boolean): Promise<void> {
    return new Promise((resolve) => {
      state.queue.push({ exclusive, grant: resolve });
      pump();
    });
  }

  function release(exclusive: boolean): void {
    if (exclusive) {
      state.writer = false;
    } else {
      state.readers--;
    }
    pump();
  }

  async function run<T>(
    exclusive: boolean,
    fn: () => T | Promise<T>
  ): Promise<T> {
    await acquire(exclusive);
    try {
      return await fn();
    } finally {
      release(exclusive);
    }
  }

  return {
    withReadLock: (fn) => run(false, fn),
    withWriteLock: (fn) => run(true, fn),
    readers: () => state.readers,
    isWriteLocked: () => state.writer,
  };
}
