import { classifyLevel, computeTrend, exceedsTrendLimits, isCooldownElapsed, matchSpecificValue } from './levels';

const gammaTiers = { light: 0.0001, medium: 0.0005, heavy: 0.001 };

describe('classifyLevel', () => {
  it('returns the highest tier met', () => {
    expect(classifyLevel(0.0007, gammaTiers)).toEqual({ severity: 'medium', threshold: 0.0005 });
    expect(classifyLevel(0.0011, gammaTiers)).toEqual({ severity: 'heavy', threshold: 0.001 });
    expect(classifyLevel(0.0001, gammaTiers)).toEqual({ severity: 'light', threshold: 0.0001 });
  });

  it('returns null below the lowest tier', () => {
    expect(classifyLevel(0.00005, gammaTiers)).toBeNull();
  });

  it('never matches a tier set to Infinity', () => {
    const single = { light: 60, medium: Infinity, heavy: Infinity };
    expect(classifyLevel(95, single)).toEqual({ severity: 'light', threshold: 60 });
  });
});

describe('computeTrend', () => {
  it('computes fractional and absolute change', () => {
    const trend = computeTrend(50, 55);
    expect(trend.pctChange).toBeCloseTo(0.1, 10);
    expect(trend.absChange).toBe(5);
  });

  it('reports zero fractional change from a zero baseline', () => {
    expect(computeTrend(0, 5)).toEqual({ previous: 0, current: 5, pctChange: 0, absChange: 5 });
  });
});

describe('exceedsTrendLimits', () => {
  it('fires when either limit is strictly exceeded', () => {
    expect(exceedsTrendLimits(computeTrend(50, 55), 0.05, 5)).toBe(true);
    expect(exceedsTrendLimits(computeTrend(100, 104), 0.05, 3)).toBe(true);
    expect(exceedsTrendLimits(computeTrend(60, 58), 0.05, 5)).toBe(false);
  });

  it('looks at magnitudes', () => {
    expect(exceedsTrendLimits(computeTrend(60, 50), 0.05, 5)).toBe(true);
  });
});

describe('matchSpecificValue', () => {
  it('returns the first target within tolerance', () => {
    expect(matchSpecificValue(60.3, [50, 60, 60.5], 0.5)).toBe(60);
    expect(matchSpecificValue(55, [50, 60], 0.5)).toBeNull();
  });

  it('includes the band edges', () => {
    expect(matchSpecificValue(49.5, [50], 0.5)).toBe(50);
  });
});

describe('isCooldownElapsed', () => {
  it('allows keys that never fired', () => {
    expect(isCooldownElapsed(undefined, 1000, 300)).toBe(true);
  });

  it('holds keys inside the window', () => {
    expect(isCooldownElapsed(1000, 1299, 300)).toBe(false);
    expect(isCooldownElapsed(1000, 1300, 300)).toBe(true);
  });
});
