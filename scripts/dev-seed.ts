import { z } from 'zod'

type LogLevel = 'debug' | 'info' | 'warn' | 'error'

type SeedConfig = {
  baseUrl: string
  prefix: string
  logLevel: LogLevel
  timeoutMs: number
}

class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly details: unknown,
  ) {
    super(message)
    this.name = 'ApiError'
  }
}

const itemSchema = z.object({ id: z.string(), sku: z.string(), name: z.string() })
const branchSchema = z.object({ id: z.string(), code: z.string(), name: z.string() })
const lotSchema = z.object({ id: z.string(), expiryDate: z.string(), quantityRemaining: z.number() })
const suggestionSchema = z.object({
  sourceBranchId: z.string(),
  destinationBranchId: z.string(),
  suggestedQuantity: z.number(),
  rationale: z.string(),
})

type Item = z.infer<typeof itemSchema>
type Branch = z.infer<typeof branchSchema>

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error'])

function loadConfig(): SeedConfig {
  const baseUrl = (process.env.API_BASE_URL || 'http://localhost:3000').replace(/\/$/, '')
  const prefix = process.env.SEED_PREFIX || 'DEVSEED'
  const logLevel = logLevelSchema.catch('info').parse(process.env.LOG_LEVEL)
  const timeoutMs = Number(process.env.TIMEOUT_MS || '15000')
  return { baseUrl, prefix, logLevel, timeoutMs }
}

function makeLogger(level: LogLevel) {
  const order: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }
  const log =
    (l: LogLevel) =>
    (msg: string, extra?: unknown) => {
      if (order[l] < order[level]) return
      const line = `[dev-seed] ${l.toUpperCase()} ${msg}`
      if (extra === undefined) {
        console.log(line)
      } else {
        console.log(line, extra)
      }
    }
  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  }
}

type Logger = ReturnType<typeof makeLogger>

async function apiRequest<T>(
  config: SeedConfig,
  schema: z.ZodType<T>,
  method: 'GET' | 'POST' | 'PUT',
  path: string,
  opts: { params?: Record<string, string | undefined>; body?: unknown } = {},
): Promise<T> {
  const url = new URL(config.baseUrl + path)
  for (const [k, v] of Object.entries(opts.params ?? {})) {
    if (v !== undefined) url.searchParams.set(k, v)
  }

  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), config.timeoutMs)

  try {
    const res = await fetch(url.toString(), {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: method === 'GET' ? undefined : JSON.stringify(opts.body ?? {}),
      signal: controller.signal,
    })
    const payload: unknown = await res.json().catch(() => null)
    if (!res.ok) {
      throw new ApiError(`${method} ${path} failed with HTTP ${res.status}`, res.status, payload)
    }
    return schema.parse(payload)
  } finally {
    clearTimeout(timeout)
  }
}

const listOf = <T>(schema: z.ZodType<T>) => z.object({ data: z.array(schema) })

async function ensureItem(config: SeedConfig, log: Logger, sku: string, name: string, reorderThreshold: number) {
  const { data } = await apiRequest(config, listOf(itemSchema), 'GET', '/items')
  const existing = data.find((item) => item.sku === sku)
  if (existing) {
    log.info(`Item exists: ${sku} (${existing.id})`)
    return existing
  }
  const created = await apiRequest(config, itemSchema, 'POST', '/items', {
    body: { sku, name, category: 'analgesic', reorderThreshold },
  })
  log.info(`Item created: ${sku} (${created.id})`)
  return created
}

async function ensureBranch(config: SeedConfig, log: Logger, code: string, name: string) {
  const { data } = await apiRequest(config, listOf(branchSchema), 'GET', '/branches')
  const existing = data.find((branch) => branch.code === code)
  if (existing) {
    log.info(`Branch exists: ${code} (${existing.id})`)
    return existing
  }
  const created = await apiRequest(config, branchSchema, 'POST', '/branches', { body: { code, name } })
  log.info(`Branch created: ${code} (${created.id})`)
  return created
}

function dateInDays(days: number): string {
  return new Date(Date.now() + days * 86_400_000).toISOString().slice(0, 10)
}

async function receiveLots(config: SeedConfig, log: Logger, item: Item, branch: Branch, lots: Array<[number, number]>) {
  const { data } = await apiRequest(config, listOf(lotSchema), 'GET', '/lots', {
    params: { itemId: item.id, branchId: branch.id },
  })
  if (data.length > 0) {
    log.info(`Lots already present for ${item.sku} at ${branch.code}, skipping`)
    return
  }
  for (const [index, [quantity, expiresInDays]] of lots.entries()) {
    const lot = await apiRequest(config, lotSchema, 'POST', '/lots', {
      body: {
        itemId: item.id,
        branchId: branch.id,
        quantity,
        expiryDate: dateInDays(expiresInDays),
        unitCost: 1.25,
        lotNumber: `${config.prefix}-${branch.code}-${index + 1}`,
      },
    })
    log.debug(`Lot received: ${lot.id} exp ${lot.expiryDate}`)
  }
}

async function main() {
  const config = loadConfig()
  const log = makeLogger(config.logLevel)
  log.info(`Seeding ${config.baseUrl} with prefix ${config.prefix}`)

  const north = await ensureBranch(config, log, `${config.prefix}-N`, 'North branch')
  const south = await ensureBranch(config, log, `${config.prefix}-S`, 'South branch')
  const item = await ensureItem(config, log, `${config.prefix}-PARA-500`, 'Paracetamol 500mg', 20)

  await receiveLots(config, log, item, north, [
    [60, 10],
    [40, 120],
  ])
  await receiveLots(config, log, item, south, [[5, 200]])

  const estimate = z.object({ dailyRate: z.number() })
  await apiRequest(config, estimate, 'PUT', '/demand-estimates', {
    body: { itemId: item.id, branchId: north.id, windowDays: 30, dailyRate: 0.5 },
  })
  await apiRequest(config, estimate, 'PUT', '/demand-estimates', {
    body: { itemId: item.id, branchId: south.id, windowDays: 30, dailyRate: 3 },
  })

  const { data: suggestions } = await apiRequest(config, listOf(suggestionSchema), 'GET', '/redistribution/suggestions', {
    params: { itemId: item.id },
  })
  for (const s of suggestions) {
    log.info(`Suggestion: ${s.suggestedQuantity} from ${s.sourceBranchId} to ${s.destinationBranchId} (${s.rationale})`)
  }
  log.info('Seed complete.')
}

main().catch((err: unknown) => {
  const details = err instanceof ApiError ? { status: err.status, details: err.details } : undefined
  console.error(`[dev-seed] ERROR ${err instanceof Error ? err.message : String(err)}`, details)
  process.exit(1)
})
