import cron, { type ScheduledTask } from 'node-cron';

/**
 * In-process cron scheduler. Schedules run in UTC; a job that throws is logged and
 * retried at its next tick.
 */

export type JobDefinition = {
  name: string;
  schedule: string;
  task: () => Promise<void>;
  enabled: boolean;
};

const tasks = new Map<string, ScheduledTask>();
const definitions = new Map<string, JobDefinition>();

async function runJob(definition: JobDefinition, trigger: 'cron' | 'manual'): Promise<void> {
  console.log(`🚀 Starting job "${definition.name}" (${trigger})`);
  const startTime = Date.now();
  await definition.task();
  console.log(`✅ Job "${definition.name}" completed in ${Date.now() - startTime}ms`);
}

/**
 * Registers a job. Disabled jobs are kept so they can still be triggered by hand.
 */
export function registerJob(name: string, schedule: string, task: () => Promise<void>, enabled: boolean = true): void {
  if (definitions.has(name)) {
    console.warn(`⚠️  Job "${name}" already registered, skipping`);
    return;
  }
  if (!cron.validate(schedule)) {
    throw new Error(`Invalid cron expression for job "${name}": ${schedule}`);
  }

  const definition: JobDefinition = { name, schedule, task, enabled };
  definitions.set(name, definition);

  if (!enabled) {
    console.log(`📅 Job "${name}" registered but disabled`);
    return;
  }

  const scheduled = cron.schedule(
    schedule,
    () => {
      runJob(definition, 'cron').catch((error: unknown) => {
        console.error(`❌ Job "${name}" failed:`, error);
      });
    },
    { scheduled: false, timezone: 'UTC' }
  );
  tasks.set(name, scheduled);
  console.log(`📅 Job "${name}" scheduled: ${schedule} (UTC)`);
}

export function startScheduler(): void {
  console.log(`🕐 Starting job scheduler (${tasks.size} jobs)`);
  for (const task of tasks.values()) {
    task.start();
  }
}

export function stopScheduler(): void {
  for (const [name, task] of tasks.entries()) {
    task.stop();
    console.log(`   Stopped: ${name}`);
  }
  tasks.clear();
  definitions.clear();
}

export function getJobDefinitions(): JobDefinition[] {
  return [...definitions.values()];
}

export async function triggerJob(name: string): Promise<void> {
  const definition = definitions.get(name);
  if (!definition) {
    throw new Error(`Job "${name}" not found`);
  }
  try {
    await runJob(definition, 'manual');
  } catch (error) {
    console.error(`❌ Manual job "${name}" failed:`, error);
    throw error;
  }
}
