import 'dotenv/config';
import { createApp } from './app';
import { createAppContext } from './appContext';
import { getRuntimeConfig } from './config/runtime';
import { resolveSchedulerStartupMode } from './config/schedulerStartup';
import { registerRedistributionScanJob } from './jobs/redistributionScan.job';
import { startScheduler, stopScheduler } from './jobs/scheduler';
import { closeEventBus } from './lib/eventBus';

const config = getRuntimeConfig();
const ctx = createAppContext();
const app = createApp(ctx, { healthProbeTimeoutMs: config.healthDbTimeoutMs });
const startupMode = resolveSchedulerStartupMode();

const server = app.listen(config.port, () => {
  console.log(`Lot dispense API listening on port ${config.port}`);
});

if (startupMode.runInProcessJobs) {
  registerRedistributionScanJob(ctx, startupMode.redistributionScanCron, startupMode.schedulerEnabled);
  if (startupMode.schedulerEnabled) {
    startScheduler();
  }
} else {
  console.log('In-process jobs disabled (set RUN_INPROCESS_JOBS=true to enable)');
}

let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`${signal} received, shutting down`);
  stopScheduler();
  server.close();
  try {
    await ctx.close();
    await closeEventBus();
    process.exit(0);
  } catch (error) {
    console.error('Shutdown failed', error);
    process.exit(1);
  }
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
