import { parseNonNegativeNumber, parsePositiveInteger } from './env';

export type RedistributionPolicy = {
  /** Days of forecast demand a branch should be able to cover from its own stock. */
  lookaheadDays: number;
  /** A source lot expiring within this many days makes a transfer an expiry-risk move. */
  expiryRiskDays: number;
  minTransferQuantity: number;
  /** Used for branches the forecaster has no estimate for. */
  defaultDailyDemand: number;
};

export function getRedistributionPolicy(env: NodeJS.ProcessEnv = process.env): RedistributionPolicy {
  return {
    lookaheadDays: parsePositiveInteger(env.REDISTRIBUTION_LOOKAHEAD_DAYS, 30),
    expiryRiskDays: parseNonNegativeNumber(env.REDISTRIBUTION_EXPIRY_RISK_DAYS, 30),
    minTransferQuantity: parsePositiveInteger(env.REDISTRIBUTION_MIN_TRANSFER_QUANTITY, 1),
    defaultDailyDemand: parseNonNegativeNumber(env.DEMAND_ESTIMATE_DEFAULT, 0)
  };
}
