import { describe, it, expect } from 'vitest';
import { validateDailySettings, validateDateRange, validateWeights } from './validation';
import { ConfigurationError } from './errors';

describe('validation', () => {
  describe('validateDailySettings', () => {
    it('accepts the defaults and equal limits', () => {
      expect(() => validateDailySettings({ dailyTargetHours: 4, maxEntryHours: 2 })).not.toThrow();
      expect(() => validateDailySettings({ dailyTargetHours: 2, maxEntryHours: 2 })).not.toThrow();
      expect(() => validateDailySettings({ dailyTargetHours: 7.5, maxEntryHours: 1.5 })).not.toThrow();
    });

    it('rejects a per-entry maximum above the daily target', () => {
      expect(() => validateDailySettings({ dailyTargetHours: 2, maxEntryHours: 3 })).toThrow(ConfigurationError);
      expect(() => validateDailySettings({ dailyTargetHours: 2, maxEntryHours: 3 })).toThrow(
        'Max task duration cannot exceed daily hours.',
      );
    });

    it('rejects non-positive or non-finite hours', () => {
      expect(() => validateDailySettings({ dailyTargetHours: 0, maxEntryHours: 1 })).toThrow(
        'Daily hours must be a positive number.',
      );
      expect(() => validateDailySettings({ dailyTargetHours: Number.NaN, maxEntryHours: 1 })).toThrow(
        ConfigurationError,
      );
      expect(() => validateDailySettings({ dailyTargetHours: 4, maxEntryHours: -1 })).toThrow(
        'Max duration per entry must be a positive number.',
      );
    });

    it('rejects a per-entry maximum under one hour', () => {
      expect(() => validateDailySettings({ dailyTargetHours: 4, maxEntryHours: 0.5 })).toThrow(
        'Max duration per entry must be at least 1 hour.',
      );
    });
  });

  describe('validateWeights', () => {
    it('accepts weights 0-5 with at least one positive', () => {
      expect(() =>
        validateWeights([
          { key: 'A', weight: 0 },
          { key: 'B', weight: 5 },
        ]),
      ).not.toThrow();
    });

    it('rejects an empty or all-zero weight set', () => {
      expect(() => validateWeights([])).toThrow('At least one task with a positive weight is required.');
      expect(() => validateWeights([{ key: 'A', weight: 0 }])).toThrow(ConfigurationError);
    });

    it('rejects out-of-range or fractional weights', () => {
      expect(() => validateWeights([{ key: 'A', weight: 6 }])).toThrow('Weight for A must be an integer from 0 to 5.');
      expect(() => validateWeights([{ key: 'B', weight: 2.5 }])).toThrow(ConfigurationError);
      expect(() => validateWeights([{ key: 'C', weight: -1 }])).toThrow(ConfigurationError);
    });
  });

  it('rejects a date range that ends before it starts', () => {
    expect(() => validateDateRange({ start: '2026-02-24', end: '2026-02-23' })).toThrow(
      'Start date is later than end date.',
    );
    expect(() => validateDateRange({ start: '2026-02-23', end: '2026-02-23' })).not.toThrow();
  });
});
