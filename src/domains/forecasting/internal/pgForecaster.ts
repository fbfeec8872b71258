import type { Pool } from 'pg';
import { toNumber } from '../../../lib/numbers';
import type { DemandEstimate, DemandEstimateInput, DemandEstimateStore } from './types';
import { pickEstimateForWindow } from './windowSelection';

type DemandEstimateRow = {
  item_id: string;
  branch_id: string;
  window_days: number;
  daily_rate: string | number;
  estimated_at: Date;
};

function mapEstimate(row: DemandEstimateRow): DemandEstimate {
  return {
    itemId: row.item_id,
    branchId: row.branch_id,
    windowDays: toNumber(row.window_days),
    dailyRate: toNumber(row.daily_rate),
    estimatedAt: new Date(row.estimated_at).toISOString()
  };
}

export class PgDemandForecaster implements DemandEstimateStore {
  constructor(private pool: Pool) {}

  async upsert(input: DemandEstimateInput): Promise<DemandEstimate> {
    const res = await this.pool.query<DemandEstimateRow>(
      `INSERT INTO demand_estimates (item_id, branch_id, window_days, daily_rate, estimated_at)
       VALUES ($1,$2,$3,$4,$5)
       ON CONFLICT (item_id, branch_id, window_days)
       DO UPDATE SET daily_rate = EXCLUDED.daily_rate, estimated_at = EXCLUDED.estimated_at
       RETURNING *`,
      [input.itemId, input.branchId, input.windowDays, input.dailyRate, input.estimatedAt ?? new Date()]
    );
    return mapEstimate(res.rows[0]);
  }

  async list(itemId?: string): Promise<DemandEstimate[]> {
    const res = itemId
      ? await this.pool.query<DemandEstimateRow>(
          'SELECT * FROM demand_estimates WHERE item_id = $1 ORDER BY branch_id, window_days',
          [itemId]
        )
      : await this.pool.query<DemandEstimateRow>(
          'SELECT * FROM demand_estimates ORDER BY item_id, branch_id, window_days'
        );
    return res.rows.map(mapEstimate);
  }

  async demandEstimate(itemId: string, branchId: string, windowDays: number): Promise<number | null> {
    const res = await this.pool.query<DemandEstimateRow>(
      'SELECT * FROM demand_estimates WHERE item_id = $1 AND branch_id = $2',
      [itemId, branchId]
    );
    return pickEstimateForWindow(res.rows.map(mapEstimate), windowDays)?.dailyRate ?? null;
  }
}
