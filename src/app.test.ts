import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createApp } from './app';
import { createMemoryContext, type AppContext } from './appContext';

const clock = () => new Date('2025-01-01T09:00:00.000Z');
const idSchema = z.object({ id: z.string() });

let ctx: AppContext;
let server: Server;
let baseUrl: string;
let logLines: string[];

beforeEach(async () => {
  logLines = [];
  ctx = createMemoryContext({ clock });
  const app = createApp(ctx, { logSink: (line) => logLines.push(line) });
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('Server did not bind to a port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
});

async function send(method: 'GET' | 'POST' | 'PUT', path: string, body?: unknown, headers: Record<string, string> = {}) {
  const res = await fetch(`${baseUrl}${path}`, {
    method,
    headers: { 'content-type': 'application/json', ...headers },
    body: body === undefined ? undefined : JSON.stringify(body)
  });
  const json: unknown = await res.json();
  return { status: res.status, headers: res.headers, body: json };
}

async function create(path: string, body: unknown): Promise<string> {
  const res = await send('POST', path, body);
  expect(res.status).toBe(201);
  return idSchema.parse(res.body).id;
}

async function seedCatalog() {
  const itemId = await create('/items', { sku: 'IBU-400', name: 'Ibuprofen 400mg', category: 'analgesic' });
  const branchA = await create('/branches', { code: 'A', name: 'Branch A' });
  const branchB = await create('/branches', { code: 'B', name: 'Branch B' });
  return { itemId, branchA, branchB };
}

describe('health', () => {
  it('reports liveness and readiness from the probes', async () => {
    const live = await send('GET', '/health/live');
    expect(live.status).toBe(200);
    expect(live.body).toEqual({ status: 'ok', timestamp: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/) });
    expect((await send('GET', '/health/ready')).status).toBe(200);

    ctx.healthProbes.push({
      name: 'db',
      required: true,
      check: async () => {
        throw new Error('connection refused');
      }
    });
    const ready = await send('GET', '/health/ready');
    expect(ready.status).toBe(503);
    expect(ready.body).toMatchObject({
      status: 'not_ready',
      ready: false,
      details: { db: { ok: false, error: 'connection refused' } }
    });
  });
});

describe('catalog routes', () => {
  it('rejects duplicate skus and unknown ids', async () => {
    await seedCatalog();

    const duplicate = await send('POST', '/items', { sku: 'IBU-400', name: 'Again', category: 'analgesic' });
    expect(duplicate.status).toBe(409);
    expect(duplicate.body).toEqual({
      error: {
        code: 'CATALOG_DUPLICATE',
        message: 'An entry with sku "IBU-400" already exists.',
        details: { message: 'An entry with sku "IBU-400" already exists.', field: 'sku', value: 'IBU-400' }
      }
    });

    const missing = await send('GET', '/items/00000000-0000-4000-8000-000000000000');
    expect(missing.status).toBe(404);
    expect(missing.body).toMatchObject({ error: { code: 'ITEM_NOT_FOUND', message: 'Item not found.' } });

    const malformed = await send('GET', '/branches/not-a-uuid');
    expect(malformed.status).toBe(400);
    expect(malformed.body).toMatchObject({ error: 'Invalid id.' });
  });
});

describe('lot and dispense routes', () => {
  it('receives lots, dispenses in FEFO order and maps ledger errors', async () => {
    const { itemId, branchA } = await seedCatalog();

    const invalid = await send('POST', '/lots', { itemId, branchId: branchA, quantity: -1, expiryDate: '2025-02-01', unitCost: 1 });
    expect(invalid.status).toBe(400);
    expect(invalid.body).toMatchObject({ error: { fieldErrors: { quantity: expect.any(Array) } } });

    const oversized = await send('POST', '/lots', { itemId, branchId: branchA, quantity: 1e13, expiryDate: '2025-02-01', unitCost: 1 });
    expect(oversized.status).toBe(400);
    expect(oversized.body).toMatchObject({ error: { fieldErrors: { quantity: expect.any(Array) } } });

    const expired = await send('POST', '/lots', { itemId, branchId: branchA, quantity: 5, expiryDate: '2024-12-31', unitCost: 1 });
    expect(expired.status).toBe(400);
    expect(expired.body).toMatchObject({ error: { code: 'INVALID_INPUT', details: { field: 'expiryDate' } } });

    const lot1 = await create('/lots', { itemId, branchId: branchA, quantity: 5, expiryDate: '2025-01-10', unitCost: 2 });
    const lot2 = await create('/lots', { itemId, branchId: branchA, quantity: 10, expiryDate: '2025-02-01', unitCost: 3 });

    const available = await send('GET', `/lots/available?itemId=${itemId}&branchId=${branchA}`);
    expect(available.body).toMatchObject({ data: [{ id: lot1 }, { id: lot2 }] });

    const dispensed = await send('POST', '/dispenses', { itemId, branchId: branchA, quantity: 8, reference: 'RX-7' });
    expect(dispensed.status).toBe(201);
    expect(dispensed.body).toMatchObject({
      requestedQuantity: 8,
      unfulfilledQuantity: 0,
      totalCost: 19,
      reference: 'RX-7',
      lines: [
        { lotId: lot1, quantityDrawn: 5, expiryDate: '2025-01-10' },
        { lotId: lot2, quantityDrawn: 3, expiryDate: '2025-02-01' }
      ]
    });

    const overdraw = await send('POST', `/lots/${lot2}/deductions`, { quantity: 8 });
    expect(overdraw.status).toBe(409);
    expect(overdraw.body).toEqual({
      error: {
        code: 'INSUFFICIENT_STOCK',
        message: 'Lot does not hold enough stock for this deduction.',
        details: {
          message: 'Lot does not hold enough stock for this deduction.',
          lotId: lot2,
          requested: 8,
          available: 7
        }
      }
    });

    const retiredList = await send('GET', `/lots?itemId=${itemId}&includeRetired=true`);
    expect(retiredList.body).toMatchObject({ data: [{ id: lot1, quantityRemaining: 0 }, { id: lot2, quantityRemaining: 7 }] });

    const history = await send('GET', `/dispenses?itemId=${itemId}&limit=5`);
    expect(history.body).toMatchObject({ data: [{ reference: 'RX-7' }] });
  });

  it('returns 207 for a batch with rejected requests', async () => {
    const { itemId, branchA } = await seedCatalog();
    await create('/lots', { itemId, branchId: branchA, quantity: 3, expiryDate: '2025-03-01', unitCost: 1 });

    const res = await send('POST', '/dispenses/batch', {
      requests: [
        { itemId, branchId: branchA, quantity: 2 },
        { itemId: '00000000-0000-4000-8000-000000000000', branchId: branchA, quantity: 1 }
      ]
    });

    expect(res.status).toBe(207);
    expect(res.body).toMatchObject({ fulfilled: 1, partial: 0, rejected: 1 });
  });
});

describe('redistribution routes', () => {
  it('suggests transfers from pushed demand estimates', async () => {
    const { itemId, branchA, branchB } = await seedCatalog();
    await create('/lots', { itemId, branchId: branchA, quantity: 50, expiryDate: '2025-01-04', unitCost: 1 });

    const estimate = await send('PUT', '/demand-estimates', { itemId, branchId: branchB, windowDays: 30, dailyRate: 1 });
    expect(estimate.status).toBe(200);

    const res = await send('GET', `/redistribution/suggestions?itemId=${itemId}`);
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      data: [
        {
          sourceBranchId: branchA,
          destinationBranchId: branchB,
          suggestedQuantity: 30,
          rationale: 'expiry_risk'
        }
      ]
    });
  });
});

describe('planning routes', () => {
  it('serves reorder recommendations and the consolidated dashboard', async () => {
    const branchId = await create('/branches', { code: 'A', name: 'Branch A' });
    const itemId = await create('/items', { sku: 'MET-850', name: 'Metformin 850mg', category: 'endocrine', reorderThreshold: 10 });
    await create('/lots', { itemId, branchId, quantity: 6, expiryDate: '2025-01-08', unitCost: 0.5 });

    const reorder = await send('GET', `/branches/${branchId}/reorder-recommendations?limit=5`);
    expect(reorder.status).toBe(200);
    expect(reorder.body).toMatchObject({
      data: {
        branchId,
        recommendations: [{ itemId, recommendedQuantity: 14, purchaseCost: 7, priority: 'high' }],
        summary: { count: 1, high: 1, totalPurchaseCost: 7 }
      }
    });

    const badLimit = await send('GET', `/branches/${branchId}/reorder-recommendations?limit=0`);
    expect(badLimit.status).toBe(400);

    const dashboard = await send('GET', '/dashboard/consolidated');
    expect(dashboard.status).toBe(200);
    expect(dashboard.body).toMatchObject({
      data: { totals: { branchCount: 1, inventoryValue: 3, recommendedPurchaseCost: 7, valueAtRisk: 3 } }
    });
  });
});

describe('request handling', () => {
  it('echoes the request id and logs one line per request', async () => {
    const res = await send('GET', '/nowhere', undefined, { 'x-request-id': 'req-42' });

    expect(res.status).toBe(404);
    expect(res.headers.get('x-request-id')).toBe('req-42');
    await new Promise((resolve) => setImmediate(resolve));
    expect(logLines.map((line) => JSON.parse(line))).toEqual([
      expect.objectContaining({ event: 'http_request', requestId: 'req-42', method: 'GET', path: '/nowhere', status: 404 })
    ]);
  });
});
