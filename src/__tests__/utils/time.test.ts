import { describe, it, expect } from 'vitest';
import {
  secondsToUs,
  usToSeconds,
  formatTimecode,
  formatSeconds,
  clamp,
  lerp,
} from '../../utils/time';

describe('time utilities', () => {
  describe('secondsToUs / usToSeconds', () => {
    it('should convert seconds to microseconds', () => {
      expect(secondsToUs(1)).toBe(1_000_000);
      expect(secondsToUs(0.5)).toBe(500_000);
      expect(secondsToUs(2.5)).toBe(2_500_000);
    });

    it('should convert microseconds to seconds', () => {
      expect(usToSeconds(1_000_000)).toBe(1);
      expect(usToSeconds(500_000)).toBe(0.5);
    });

    it('should round trip correctly', () => {
      expect(usToSeconds(secondsToUs(1.234))).toBeCloseTo(1.234);
    });
  });

  describe('formatTimecode', () => {
    it('should format short durations', () => {
      expect(formatTimecode(0)).toBe('0:00.000');
      expect(formatTimecode(1_500_000)).toBe('0:01.500');
      expect(formatTimecode(61_000_000)).toBe('1:01.000');
    });

    it('should format long durations with hours', () => {
      expect(formatTimecode(3661_000_000)).toBe('1:01:01.000');
    });
  });

  describe('formatSeconds', () => {
    it('should format a time in seconds', () => {
      expect(formatSeconds(2)).toBe('0:02.000');
      expect(formatSeconds(75.25)).toBe('1:15.250');
    });
  });

  describe('clamp', () => {
    it('should clamp values to range', () => {
      expect(clamp(5, 0, 10)).toBe(5);
      expect(clamp(-5, 0, 10)).toBe(0);
      expect(clamp(15, 0, 10)).toBe(10);
    });
  });

  describe('lerp', () => {
    it('should interpolate between two values', () => {
      expect(lerp(0, 100, 0.25)).toBe(25);
      expect(lerp(40, 0, 0.5)).toBe(20);
    });

    it('should clamp the progress to [0, 1]', () => {
      expect(lerp(0, 100, 2)).toBe(100);
      expect(lerp(0, 100, -1)).toBe(0);
    });
  });
});
