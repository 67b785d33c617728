import { describe, it, expect } from 'vitest';
import { compareToExpected, DEFAULT_BITRATE_TOLERANCE_PERCENT } from '../status-policy.js';

describe('compareToExpected', () => {
  it('defaults to a 10% tolerance', () => {
    expect(DEFAULT_BITRATE_TOLERANCE_PERCENT).toBe(10);
    expect(compareToExpected(90, 100)).toBe('Normal');
    expect(compareToExpected(110, 100)).toBe('Normal');
    expect(compareToExpected(89, 100)).toBe('Low');
    expect(compareToExpected(111, 100)).toBe('High');
  });

  it('is Normal when nothing is expected', () => {
    expect(compareToExpected(500, null)).toBe('Normal');
    expect(compareToExpected(500, 0)).toBe('Normal');
    expect(compareToExpected(0, -1)).toBe('Normal');
  });

  it('reports Low for a missing signal', () => {
    expect(compareToExpected(0, 100)).toBe('Low');
  });

  it('honours a custom tolerance', () => {
    expect(compareToExpected(75, 100, 25)).toBe('Normal');
    expect(compareToExpected(74, 100, 25)).toBe('Low');
    expect(compareToExpected(100, 100, 0)).toBe('Normal');
    expect(compareToExpected(101, 100, 0)).toBe('High');
  });
});
