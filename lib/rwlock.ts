import { LockMisuseError } from './errors';

/**
 * Read/write lock for synchronous critical sections.
 *
 * JavaScript runs one section at a time, so the lock never waits. What it does
 * enforce is discipline: sections must not be async, and a write may not start
 * while any section is open (a blocking lock would deadlock there). Reads may
 * nest inside reads.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;

  withReadLock<T>(section: () => T): T {
    if (this.writing) {
      throw new LockMisuseError('Read lock requested inside a write section');
    }
    this.readers++;
    try {
      return assertSync(section());
    } finally {
      this.readers--;
    }
  }

  withWriteLock<T>(section: () => T): T {
    if (this.writing || this.readers > 0) {
      throw new LockMisuseError('Write lock requested while the lock is held');
    }
    this.writing = true;
    try {
      return assertSync(section());
    } finally {
      this.writing = false;
    }
  }

  get isHeld(): boolean {
    return this.writing || this.readers > 0;
  }
}

function assertSync<T>(value: T): T {
  if (value instanceof Promise) {
    throw new LockMisuseError('Critical sections must be synchronous');
  }
  return value;
}
