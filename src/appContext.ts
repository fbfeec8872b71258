import type { Pool } from 'pg';
import { createPool } from './db';
import { getRedistributionPolicy, type RedistributionPolicy } from './config/redistributionPolicy';
import { getRuntimeConfig, type RuntimeConfig } from './config/runtime';
import { MemoryCatalogStore, PgCatalogStore, type CatalogStore } from './domains/catalog';
import { PgDemandForecaster, StaticDemandForecaster, type DemandEstimateStore } from './domains/forecasting';
import {
  MemoryAuditFeed,
  MemoryLotLedger,
  PgLotLedger,
  createAuditFeed,
  type AuditFeed,
  type LotLedger
} from './domains/lots';
import { systemClock, type Clock } from './lib/dates';

export type HealthProbe = {
  name: string;
  required: boolean;
  check: () => Promise<void>;
};

export type AppContext = {
  ledger: LotLedger;
  catalog: CatalogStore;
  forecaster: DemandEstimateStore;
  auditFeed: AuditFeed;
  clock: Clock;
  redistributionPolicy: RedistributionPolicy;
  healthProbes: HealthProbe[];
  close: () => Promise<void>;
};

export type AppContextOverrides = Partial<Omit<AppContext, 'close'>>;

/**
 * In-process stores for tests and for running without a database. Overrides replace
 * individual collaborators.
 */
export function createMemoryContext(overrides: AppContextOverrides = {}): AppContext {
  const clock = overrides.clock ?? systemClock;
  return {
    ledger: overrides.ledger ?? new MemoryLotLedger(clock),
    catalog: overrides.catalog ?? new MemoryCatalogStore(clock),
    forecaster: overrides.forecaster ?? new StaticDemandForecaster(clock),
    auditFeed: overrides.auditFeed ?? new MemoryAuditFeed(),
    clock,
    redistributionPolicy: overrides.redistributionPolicy ?? getRedistributionPolicy({}),
    healthProbes: overrides.healthProbes ?? [],
    close: async () => undefined
  };
}

function createPgContext(pool: Pool, config: RuntimeConfig, env: NodeJS.ProcessEnv): AppContext {
  const clock = systemClock;
  return {
    ledger: new PgLotLedger(pool, clock),
    catalog: new PgCatalogStore(pool),
    forecaster: new PgDemandForecaster(pool),
    auditFeed: createAuditFeed(config),
    clock,
    redistributionPolicy: getRedistributionPolicy(env),
    healthProbes: [
      {
        name: 'db',
        required: true,
        check: async () => {
          await pool.query('SELECT 1');
        }
      }
    ],
    close: () => pool.end()
  };
}

export function createAppContext(env: NodeJS.ProcessEnv = process.env): AppContext {
  const config = getRuntimeConfig(env);
  if (config.databaseUrl) {
    return createPgContext(createPool(config.databaseUrl), config, env);
  }
  console.warn('DATABASE_URL is not set; using the in-process lot ledger (data is lost on restart)');
  return createMemoryContext({
    auditFeed: createAuditFeed(config),
    redistributionPolicy: getRedistributionPolicy(env)
  });
}
