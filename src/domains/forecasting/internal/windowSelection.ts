import type { DemandEstimate } from './types';

/**
 * Picks the estimate whose horizon best covers the requested window: the shortest horizon
 * at least as long as the window, otherwise the longest one available. Newer estimates win
 * between equal horizons.
 */
export function pickEstimateForWindow(candidates: DemandEstimate[], windowDays: number): DemandEstimate | null {
  if (candidates.length === 0) return null;
  const byHorizon = [...candidates].sort((a, b) => {
    if (a.windowDays !== b.windowDays) return a.windowDays - b.windowDays;
    return a.estimatedAt < b.estimatedAt ? 1 : a.estimatedAt > b.estimatedAt ? -1 : 0;
  });
  const covering = byHorizon.find((estimate) => estimate.windowDays >= windowDays);
  if (covering) return covering;
  const longest = byHorizon[byHorizon.length - 1].windowDays;
  return byHorizon.find((estimate) => estimate.windowDays === longest) ?? null;
}
