import { describe, expect, it } from 'vitest';
import { StaticDemandForecaster } from './staticForecaster';
import type { DemandEstimate } from './types';
import { pickEstimateForWindow } from './windowSelection';

function estimate(windowDays: number, dailyRate: number, estimatedAt = '2025-01-01T00:00:00.000Z'): DemandEstimate {
  return { itemId: 'item', branchId: 'branch', windowDays, dailyRate, estimatedAt };
}

describe('pickEstimateForWindow', () => {
  it('prefers the shortest horizon that covers the window', () => {
    const picked = pickEstimateForWindow([estimate(90, 3), estimate(7, 1), estimate(30, 2)], 14);
    expect(picked?.dailyRate).toBe(2);
  });

  it('falls back to the longest horizon when none covers the window', () => {
    const picked = pickEstimateForWindow([estimate(7, 1), estimate(14, 2)], 30);
    expect(picked?.dailyRate).toBe(2);
  });

  it('takes the newest estimate between equal horizons', () => {
    const picked = pickEstimateForWindow(
      [estimate(30, 1, '2025-01-01T00:00:00.000Z'), estimate(30, 4, '2025-01-03T00:00:00.000Z')],
      30
    );
    expect(picked?.dailyRate).toBe(4);
  });

  it('returns null without candidates', () => {
    expect(pickEstimateForWindow([], 30)).toBeNull();
  });
});

describe('StaticDemandForecaster', () => {
  it('replaces estimates for the same horizon and answers per branch', async () => {
    const forecaster = new StaticDemandForecaster(() => new Date('2025-01-01T00:00:00.000Z'));
    await forecaster.upsert({ itemId: 'item', branchId: 'north', windowDays: 30, dailyRate: 1 });
    await forecaster.upsert({ itemId: 'item', branchId: 'north', windowDays: 30, dailyRate: 2.5 });

    expect(await forecaster.demandEstimate('item', 'north', 30)).toBe(2.5);
    expect(await forecaster.demandEstimate('item', 'south', 30)).toBeNull();
    expect(await forecaster.list('item')).toEqual([
      { itemId: 'item', branchId: 'north', windowDays: 30, dailyRate: 2.5, estimatedAt: '2025-01-01T00:00:00.000Z' }
    ]);
  });
});
