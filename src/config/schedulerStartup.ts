import { parseBoolean, parseOptionalString } from './env';

type SchedulerStartupOptions = {
  env?: NodeJS.ProcessEnv;
  nodeEnv?: string;
};

export type SchedulerStartupMode = {
  runInProcessJobs: boolean;
  schedulerEnabled: boolean;
  redistributionScanCron: string;
};

const DEFAULT_REDISTRIBUTION_SCAN_CRON = '0 3 * * *';

/**
 * Jobs only run in-process when RUN_INPROCESS_JOBS is set. In development the cron
 * scheduler additionally needs ENABLE_SCHEDULER so local servers stay quiet by default.
 */
export function resolveSchedulerStartupMode(options: SchedulerStartupOptions = {}): SchedulerStartupMode {
  const env = options.env ?? process.env;
  const nodeEnv = options.nodeEnv ?? env.NODE_ENV ?? 'development';
  const runInProcessJobs = parseBoolean(env.RUN_INPROCESS_JOBS, false);
  const redistributionScanCron =
    parseOptionalString(env.REDISTRIBUTION_SCAN_CRON) ?? DEFAULT_REDISTRIBUTION_SCAN_CRON;

  if (!runInProcessJobs) {
    return { runInProcessJobs, schedulerEnabled: false, redistributionScanCron };
  }

  if (nodeEnv === 'development') {
    return {
      runInProcessJobs,
      schedulerEnabled: parseBoolean(env.ENABLE_SCHEDULER, false),
      redistributionScanCron
    };
  }

  return { runInProcessJobs, schedulerEnabled: true, redistributionScanCron };
}
