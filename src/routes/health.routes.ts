import { Router, type Request, type Response } from 'express';
import type { AppContext } from '../appContext';
import { getRedistributionScanStatus } from '../jobs/redistributionScan.job';
import { withTimeout } from '../lib/timeouts';

const router = Router();

router.get('/health/live', (_req: Request, res: Response) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

export default router;

export function createReadinessRouter(ctx: AppContext, probeTimeoutMs: number) {
  const readiness = Router();

  readiness.get('/health/ready', async (_req: Request, res: Response) => {
    const start = Date.now();
    const details: Record<string, unknown> = {};
    let ready = true;

    for (const probe of ctx.healthProbes) {
      try {
        await withTimeout(probe.check(), probeTimeoutMs, probe.name);
        details[probe.name] = { ok: true };
      } catch (error) {
        details[probe.name] = { ok: false, error: error instanceof Error ? error.message : String(error) };
        // Optional probes are reported but never gate readiness.
        if (probe.required) ready = false;
      }
    }

    details.redistributionScan = getRedistributionScanStatus();
    details.durationMs = Date.now() - start;

    res.status(ready ? 200 : 503).json({
      status: ready ? 'ok' : 'not_ready',
      ready,
      timestamp: ctx.clock().toISOString(),
      details
    });
  });

  return readiness;
}
