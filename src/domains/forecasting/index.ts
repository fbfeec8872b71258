export {
  type DemandEstimate,
  type DemandEstimateInput,
  type DemandEstimateStore,
  type DemandForecaster
} from './internal/types';

export { pickEstimateForWindow } from './internal/windowSelection';
export { StaticDemandForecaster } from './internal/staticForecaster';
export { PgDemandForecaster } from './internal/pgForecaster';
