import { clamp, delay, formatOrdinal, roundTo2 } from '../../../src/common/utils';

describe('utils', () => {
  test('should round to two decimals', () => {
    expect(roundTo2(18.9424)).toBe(18.94);
    expect(roundTo2(1.10655)).toBe(1.11);
  });

  test('should clamp into a range', () => {
    expect(clamp(250, 1, 200)).toBe(200);
    expect(clamp(-0.5, 0, 5)).toBe(0);
    expect(clamp(3, 1, 10)).toBe(3);
  });

  test('should zero-pad ordinals to three digits', () => {
    expect(formatOrdinal(7)).toBe('007');
    expect(formatOrdinal(42)).toBe('042');
    expect(formatOrdinal(1000)).toBe('1000');
  });

  test('should resolve after the delay', async () => {
    const startedAt = Date.now();
    await delay(15);
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(10);
  });
});
