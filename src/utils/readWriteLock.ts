/**
 * In-process reader/writer lock for synchronous critical sections
 *
 * Node runs each section to completion, so two sections from different callers
 * never overlap. What can overlap is a section entered from inside another one
 * (a callback that tries to mutate state while it is being read). The lock
 * admits any number of nested readers and rejects:
 * - a writer while readers or another writer are active
 * - a reader while a writer is active
 *
 * Sections must be synchronous: the lock is released when the callback returns.
 */

export class LockContentionError extends Error {
  constructor(
    readonly lockName: string,
    readonly requested: "read" | "write",
  ) {
    super(`Lock "${lockName}" is busy, cannot acquire ${requested} access`);
    this.name = "LockContentionError";
  }
}

export class ReadWriteLock {
  private readers = 0;
  private writing = false;

  constructor(readonly name: string) {}

  /**
   * Run `section` with shared access.
   *
   * @throws {LockContentionError} If a writer holds the lock
   */
  read<T>(section: () => T): T {
    if (this.writing) {
      throw new LockContentionError(this.name, "read");
    }

    this.readers++;
    try {
      return section();
    } finally {
      this.readers--;
    }
  }

  /**
   * Run `section` with exclusive access.
   *
   * @throws {LockContentionError} If any reader or writer holds the lock
   */
  write<T>(section: () => T): T {
    if (this.writing || this.readers > 0) {
      throw new LockContentionError(this.name, "write");
    }

    this.writing = true;
    try {
      return section();
    } finally {
      this.writing = false;
    }
  }

  get activeReaders(): number {
    return this.readers;
  }

  get isWriteLocked(): boolean {
    return this.writing;
  }
}
