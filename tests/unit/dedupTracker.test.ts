import { describe, it, expect } from '@jest/globals';
import { DedupTracker } from '../../src/services/DedupTracker.js';

describe('DedupTracker', () => {
  it('should grant a path to exactly one of many concurrent callers', async () => {
    const tracker = new DedupTracker();

    const results = await Promise.all(
      Array.from({ length: 20 }, async () => tracker.tryAcquire('/drop/a.jpg'))
    );

    expect(results.filter(Boolean)).toHaveLength(1);
    expect(tracker.size).toBe(1);
  });

  it('should make a released path available again', () => {
    const tracker = new DedupTracker();

    expect(tracker.tryAcquire('/drop/a.jpg')).toBe(true);
    tracker.release('/drop/a.jpg');

    expect(tracker.isHeld('/drop/a.jpg')).toBe(false);
    expect(tracker.tryAcquire('/drop/a.jpg')).toBe(true);
  });

  it('should ignore releasing a path that is not held', () => {
    const tracker = new DedupTracker();
    tracker.tryAcquire('/drop/a.jpg');

    tracker.release('/drop/b.jpg');
    tracker.release('/drop/b.jpg');

    expect(tracker.size).toBe(1);
    expect(tracker.isHeld('/drop/a.jpg')).toBe(true);
  });

  it('should treat different spellings of the same path as one key', () => {
    const tracker = new DedupTracker();

    expect(tracker.tryAcquire('/drop/phone/../a.jpg')).toBe(true);
    expect(tracker.tryAcquire('/drop/./a.jpg')).toBe(false);
    expect(tracker.isHeld('/drop/a.jpg')).toBe(true);
  });

  it('should hold independent paths independently', () => {
    const tracker = new DedupTracker();

    expect(tracker.tryAcquire('/drop/a.jpg')).toBe(true);
    expect(tracker.tryAcquire('/drop/b.jpg')).toBe(true);
    expect(tracker.size).toBe(2);
  });
});
