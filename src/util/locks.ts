import { ReentrancyError } from './errors.js';

/**
 * Synchronous non-reentrant section. Unlike a queueing mutex, a second entry
 * while the first is still running is a programming error and is rejected.
 */
export class ReentrancyGuard {
  private holder: string | null = null;

  runExclusive<T>(entry: string, fn: () => T): T {
    if (this.holder !== null) throw new ReentrancyError(entry);
    this.holder = entry;
    try {
      return fn();
    } finally {
      this.holder = null;
    }
  }
}
