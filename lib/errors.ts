export class PlaceNotFoundError extends Error {
  readonly index: number;

  constructor(index: number) {
    super(`There is no place at index: ${index}`);
    this.name = 'PlaceNotFoundError';
    this.index = index;
  }
}

/**
 * Raised when a write section is entered while the lock is already held.
 * With a blocking lock this would deadlock.
 */
export class LockMisuseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LockMisuseError';
  }
}
