import type { AppContext } from '../appContext';
import type { TransferSuggestion } from '../domains/lots';
import { suggestTransfers } from '../services/redistribution.service';
import { registerJob } from './scheduler';

export const REDISTRIBUTION_SCAN_JOB = 'redistribution-scan';

export type RedistributionScanSummary = {
  itemsScanned: number;
  itemsWithSuggestions: number;
  suggestionCount: number;
  failedItems: string[];
};

let isRunning = false;
let lastRunTime: Date | null = null;
let lastRunDuration: number | null = null;
let lastSummary: RedistributionScanSummary | null = null;

/**
 * Runs the advisor for every catalog item. Suggestions reach consumers through the audit
 * feed; a failing item is logged and the scan moves on.
 */
export async function runRedistributionScan(ctx: AppContext): Promise<RedistributionScanSummary | null> {
  if (isRunning) {
    console.warn('⚠️  Redistribution scan already running, skipping');
    return null;
  }

  isRunning = true;
  const start = Date.now();
  const summary: RedistributionScanSummary = {
    itemsScanned: 0,
    itemsWithSuggestions: 0,
    suggestionCount: 0,
    failedItems: []
  };

  try {
    const items = await ctx.catalog.listItems();
    for (const item of items) {
      summary.itemsScanned++;
      let suggestions: TransferSuggestion[];
      try {
        suggestions = await suggestTransfers(ctx, item.id);
      } catch (error) {
        console.error(`Redistribution scan failed for item ${item.sku}:`, error);
        summary.failedItems.push(item.id);
        continue;
      }
      if (suggestions.length > 0) {
        summary.itemsWithSuggestions++;
        summary.suggestionCount += suggestions.length;
      }
    }

    lastRunTime = ctx.clock();
    lastRunDuration = Date.now() - start;
    lastSummary = summary;
    console.log(
      `Redistribution scan: ${summary.suggestionCount} suggestions across ${summary.itemsWithSuggestions}/${summary.itemsScanned} items`
    );
    return summary;
  } finally {
    isRunning = false;
  }
}

export function getRedistributionScanStatus() {
  return {
    isRunning,
    lastRunTime,
    lastRunDuration,
    lastSummary
  };
}

export function registerRedistributionScanJob(ctx: AppContext, schedule: string, enabled: boolean): void {
  registerJob(
    REDISTRIBUTION_SCAN_JOB,
    schedule,
    async () => {
      await runRedistributionScan(ctx);
    },
    enabled
  );
}
