import { describe, expect, it } from 'vitest';
import { formatDuration, formatLocalDate, parseDateArg, sleep } from './time-utils.js';

describe('Time Utils', () => {
  describe('parseDateArg', () => {
    const now = new Date(2024, 4, 15, 12, 0, 0);

    it('should parse named days', () => {
      expect(parseDateArg('today', now)).toBe('2024-05-15');
      expect(parseDateArg('t', now)).toBe('2024-05-15');
      expect(parseDateArg('yesterday', now)).toBe('2024-05-14');
      expect(parseDateArg('yy', now)).toBe('2024-05-13');
    });

    it('should parse day and week offsets', () => {
      expect(parseDateArg('3d', now)).toBe('2024-05-12');
      expect(parseDateArg('d', now)).toBe('2024-05-14');
      expect(parseDateArg('2 weeks', now)).toBe('2024-05-01');
    });

    it('should parse absolute dates with or without dashes', () => {
      expect(parseDateArg('2023-01-31', now)).toBe('2023-01-31');
      expect(parseDateArg('20230131', now)).toBe('2023-01-31');
    });

    it('should reject invalid input', () => {
      expect(() => parseDateArg('2023-02-30', now)).toThrow('Invalid date: "2023-02-30"');
      expect(() => parseDateArg('soon', now)).toThrow('Invalid date');
    });
  });

  describe('formatLocalDate', () => {
    it('should zero-pad components', () => {
      expect(formatLocalDate(new Date(2024, 0, 5))).toBe('2024-01-05');
    });
  });

  describe('formatDuration', () => {
    it('should format each magnitude', () => {
      expect(formatDuration(5000)).toBe('5s');
      expect(formatDuration(65_000)).toBe('1m 5s');
      expect(formatDuration(3_660_000)).toBe('1h 1m');
      expect(formatDuration(90_000_000)).toBe('1d 1h');
    });
  });

  describe('sleep', () => {
    it('should resolve early when aborted', async () => {
      const controller = new AbortController();
      const started = Date.now();
      const pending = sleep(60_000, controller.signal);
      controller.abort();
      await pending;
      expect(Date.now() - started).toBeLessThan(1000);
    });

    it('should resolve immediately for an already aborted signal', async () => {
      await expect(sleep(60_000, AbortSignal.abort())).resolves.toBeUndefined();
    });
  });
});
