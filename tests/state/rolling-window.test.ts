import { describe, it, expect } from 'vitest';
import { RollingWindow } from '../../src/state/rolling-window.js';

describe('RollingWindow', () => {
  it('rejects a capacity that is not a positive integer', () => {
    expect(() => new RollingWindow(0)).toThrow(RangeError);
    expect(() => new RollingWindow(-1)).toThrow(RangeError);
    expect(() => new RollingWindow(2.5)).toThrow(RangeError);
  });

  it('keeps items in insertion order until full', () => {
    const window = new RollingWindow<number>(3);
    expect(window.push(1)).toBeUndefined();
    expect(window.push(2)).toBeUndefined();

    expect(window.size).toBe(2);
    expect(window.toArray()).toEqual([1, 2]);
    expect(window.latest()).toBe(2);
  });

  it('evicts the oldest item once full', () => {
    const window = new RollingWindow<string>(3);
    window.push('a');
    window.push('b');
    window.push('c');

    expect(window.push('d')).toBe('a');
    expect(window.push('e')).toBe('b');
    expect(window.toArray()).toEqual(['c', 'd', 'e']);
    expect(window.size).toBe(3);
    expect(window.latest()).toBe('e');
  });

  it('holds the most recent 100 of 150 items', () => {
    const window = new RollingWindow<number>(100);
    for (let i = 1; i <= 150; i++) {
      window.push(i);
    }

    const items = window.toArray();
    expect(items).toHaveLength(100);
    expect(items[0]).toBe(51);
    expect(items[99]).toBe(150);
  });

  it('returns undefined for latest() when empty', () => {
    expect(new RollingWindow(5).latest()).toBeUndefined();
  });

  it('clear() empties the window', () => {
    const window = new RollingWindow<number>(2);
    window.push(1);
    window.push(2);
    window.push(3);
    window.clear();

    expect(window.size).toBe(0);
    expect(window.toArray()).toEqual([]);
    window.push(4);
    expect(window.toArray()).toEqual([4]);
  });
});
