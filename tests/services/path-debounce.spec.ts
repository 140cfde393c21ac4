import { describe, expect, it } from 'vitest';
import { PathDebouncer } from '../../src/services/path-debounce.js';

function clock(start = 0): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
  };
}

describe('PathDebouncer', () => {
  it('suppresses a repeat inside the window and accepts once it has elapsed', () => {
    const time = clock();
    const debouncer = new PathDebouncer({ windowMs: 200, now: time.now });

    expect(debouncer.accept('/in/a.txt')).toBe(true);
    time.advance(199);
    expect(debouncer.accept('/in/a.txt')).toBe(false);
    time.advance(1);
    expect(debouncer.accept('/in/a.txt')).toBe(true);
  });

  it('measures the window from the last accepted trigger', () => {
    const time = clock();
    const debouncer = new PathDebouncer({ windowMs: 100, now: time.now });

    debouncer.accept('/a');
    time.advance(60);
    expect(debouncer.accept('/a')).toBe(false);
    time.advance(50);
    expect(debouncer.accept('/a')).toBe(true);
  });

  it('tracks paths independently', () => {
    const debouncer = new PathDebouncer({ windowMs: 1_000, now: clock().now });
    expect(debouncer.accept('/a')).toBe(true);
    expect(debouncer.accept('/b')).toBe(true);
    expect(debouncer.accept('/a')).toBe(false);
    expect(debouncer.getTrackedCount()).toBe(2);
  });

  it('forgets a path so the next trigger is accepted', () => {
    const debouncer = new PathDebouncer({ windowMs: 1_000, now: clock().now });
    debouncer.accept('/a');
    debouncer.forget('/a');
    expect(debouncer.accept('/a')).toBe(true);
  });

  it('accepts everything and tracks nothing with a zero window', () => {
    const debouncer = new PathDebouncer({ windowMs: 0, now: clock().now });
    expect(debouncer.accept('/a')).toBe(true);
    expect(debouncer.accept('/a')).toBe(true);
    expect(debouncer.getTrackedCount()).toBe(0);
  });
});
