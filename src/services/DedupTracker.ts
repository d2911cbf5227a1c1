import { resolve } from 'path';

/**
 * Process-lifetime set of paths currently owned by a stability check or a
 * worker. A path is held from the moment the watcher accepts it until the
 * pipeline reaches a terminal state for it.
 *
 * Every method runs to completion on the event loop, so the membership set
 * is the single critical section and tryAcquire is a test-and-set.
 */
export class DedupTracker {
  private inFlight: Set<string> = new Set();

  tryAcquire(path: string): boolean {
    const key = resolve(path);
    if (this.inFlight.has(key)) {
      return false;
    }
    this.inFlight.add(key);
    return true;
  }

  /** No-op when the path is not held */
  release(path: string): void {
    this.inFlight.delete(resolve(path));
  }

  isHeld(path: string): boolean {
    return this.inFlight.has(resolve(path));
  }

  get size(): number {
    return this.inFlight.size;
  }
}
