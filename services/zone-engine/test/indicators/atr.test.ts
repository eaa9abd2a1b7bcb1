import { describe, it, expect } from '@jest/globals';
import { averageTrueRange, latestAtr } from '../../src/indicators/atr';
import { fromHlc } from '../helpers/candles';

describe('averageTrueRange', () => {
  const candles = fromHlc([
    [10, 8, 9],
    [11, 9, 10],
    [12, 10, 11],
    [15, 11, 14],
  ]);

  it('seeds with the mean true range, then smooths Wilder style', () => {
    // true ranges from index 1: 2, 2, 4
    expect(averageTrueRange(candles, 2)).toEqual([null, null, 2, 3]);
    expect(latestAtr(candles, 2)).toBe(3);
  });

  it('stays null when there are not enough candles', () => {
    expect(averageTrueRange(candles, 4)).toEqual([null, null, null, null]);
    expect(latestAtr(candles, 4)).toBeNull();
    expect(latestAtr([], 14)).toBeNull();
  });
});
