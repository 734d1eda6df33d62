import { describe, it, expect } from 'vitest';
import { BoundedLog, CAPTURE_LOG_CAPACITY } from '../bounded-log';

function fill(log: BoundedLog<string>, count: number): void {
  for (let i = 1; i <= count; i++) {
    log.prepend(`R${i}`);
  }
}

describe('BoundedLog', () => {
  it('starts empty with the fixed capacity', () => {
    const log = new BoundedLog();
    expect(log.capacity).toBe(50);
    expect(CAPTURE_LOG_CAPACITY).toBe(50);
    expect(log.size).toBe(0);
    expect(log.snapshot()).toEqual([]);
  });

  it('keeps min(N, capacity) entries', () => {
    for (const count of [0, 1, 49, 50, 51, 120]) {
      const log = new BoundedLog<string>();
      fill(log, count);
      expect(log.snapshot()).toHaveLength(Math.min(count, 50));
    }
  });

  it('puts the latest entry first', () => {
    const log = new BoundedLog<string>();
    fill(log, 3);
    log.prepend('latest');
    expect(log.snapshot()[0]).toBe('latest');
    expect(log.snapshot()).toEqual(['latest', 'R3', 'R2', 'R1']);
  });

  it('evicts the oldest entry once full', () => {
    const log = new BoundedLog<string>();
    fill(log, 51);

    const expected = Array.from({ length: 50 }, (_, i) => `R${51 - i}`);
    expect(log.snapshot()).toEqual(expected);
    expect(log.snapshot()).not.toContain('R1');
  });

  it('returns a frozen copy that later inserts do not touch', () => {
    const log = new BoundedLog<string>(2);
    log.prepend('a');
    const before = log.snapshot();
    log.prepend('b');
    log.prepend('c');

    expect(before).toEqual(['a']);
    expect(Object.isFrozen(before)).toBe(true);
    expect(log.snapshot()).toEqual(['c', 'b']);
  });
});
