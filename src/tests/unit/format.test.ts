import { describe, it, expect } from 'vitest';
import { formatMinutesAsHm, formatPercent, formatWindowLabel } from '../../utils/format.js';

describe('format', () => {
  it('formats minutes as hours and minutes', () => {
    expect(formatMinutesAsHm(450)).toBe('7h 30m');
    expect(formatMinutesAsHm(360)).toBe('6h');
    expect(formatMinutesAsHm(15)).toBe('0h 15m');
    expect(formatMinutesAsHm(-90)).toBe('-1h 30m');
    expect(formatMinutesAsHm(449.6)).toBe('7h 30m');
  });

  it('formats a window length as a clock-style label', () => {
    expect(formatWindowLabel(375)).toBe('6:15');
    expect(formatWindowLabel(300)).toBe('5:00');
  });

  it('formats a percentage', () => {
    expect(formatPercent((100 * 480) / 540)).toBe('88.9%');
    expect(formatPercent(80, 0)).toBe('80%');
  });
});
