import { describe, it, expect } from 'vitest';
import { RunHistory } from './RunHistory.js';

describe('RunHistory', () => {
  it('evicts the oldest entry past capacity', () => {
    const history = new RunHistory<number>(3);
    [1, 2, 3, 4, 5].forEach((run) => history.push(run));

    expect(history.list()).toEqual([3, 4, 5]);
    expect(history.size).toBe(3);
    expect(history.latest()).toBe(5);
  });

  it('returns the newest entries when limited', () => {
    const history = new RunHistory<string>();
    ['a', 'b', 'c'].forEach((run) => history.push(run));

    expect(history.list(2)).toEqual(['b', 'c']);
    expect(history.list(0)).toEqual([]);
    expect(history.list(10)).toEqual(['a', 'b', 'c']);
  });

  it('clears', () => {
    const history = new RunHistory<number>(2);
    history.push(1);
    history.clear();

    expect(history.list()).toEqual([]);
    expect(history.latest()).toBeUndefined();
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new RunHistory(0)).toThrow(RangeError);
  });
});
