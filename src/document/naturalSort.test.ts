import { describe, it, expect } from 'vitest';
import { compareNumbers } from './naturalSort.js';

describe('compareNumbers', () => {
  it('compares numeric runs as integers', () => {
    expect(compareNumbers('2', '10')).toBe(-1);
    expect(compareNumbers('10', '2')).toBe(1);
    expect(compareNumbers('7', '7')).toBe(0);
  });

  it('orders amended numbers after their base', () => {
    const numbers = ['15-2', '16', '15', '15-1', '12а', '12'];
    expect([...numbers].sort(compareNumbers)).toEqual(['12', '12а', '15', '15-1', '15-2', '16']);
  });

  it('orders dotted numbers by each component', () => {
    expect(['7.10', '7.2', '7.1'].sort(compareNumbers)).toEqual(['7.1', '7.2', '7.10']);
  });
});
