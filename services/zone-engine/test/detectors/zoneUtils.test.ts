import { describe, it, expect } from '@jest/globals';
import { OrderBlockZone } from '@confluence/shared-types';
import { findZoneContaining, forwardWindowExtreme, isZoneActiveAt } from '../../src/detectors/zoneUtils';

const zone: OrderBlockZone = {
  kind: 'order_block',
  direction: 'bullish',
  band: { low: 99, high: 101 },
  originIndex: 5,
  validFromIndex: 5,
  validUntilIndex: 10,
  endReason: 'invalidated',
  strength: 1,
  timestamp: 0,
  consolidationStartIndex: 2,
  consolidationEndIndex: 5,
  impulsePct: 2,
};

describe('zoneUtils', () => {
  it('treats validity as [validFromIndex, validUntilIndex)', () => {
    expect(isZoneActiveAt(zone, 4)).toBe(false);
    expect(isZoneActiveAt(zone, 5)).toBe(true);
    expect(isZoneActiveAt(zone, 9)).toBe(true);
    expect(isZoneActiveAt(zone, 10)).toBe(false);
    expect(isZoneActiveAt({ ...zone, validUntilIndex: null, endReason: null }, 1000)).toBe(true);
  });

  it('finds the zone whose band holds a price', () => {
    expect(findZoneContaining(101, [zone])).toBe(zone);
    expect(findZoneContaining(101.01, [zone])).toBeNull();
  });

  it('takes the extreme of the strictly forward window', () => {
    const values = [3, 1, 4, 1, 5];

    expect(forwardWindowExtreme(values, 2, 'max')).toEqual([4, 4, 5, 5, NaN]);
    expect(forwardWindowExtreme(values, 2, 'min')).toEqual([1, 1, 1, 5, NaN]);
    expect(forwardWindowExtreme(values, 0, 'max')).toEqual([NaN, NaN, NaN, NaN, NaN]);
  });
});
