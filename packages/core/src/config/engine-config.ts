import { z } from 'zod/v4'
import { ConfigValidationError } from '../errors'
import { LOG_LEVELS } from '../utils/logger'

/**
 * Retention limits for one terminal collection
 * @property {number} maxAgeDays - Items older than this are eligible for removal
 * @property {number} maxCount - Items ranked beyond this (newest first) are eligible for removal
 * @property {number} minKeep - The newest items always kept, whatever their age
 */
export interface RetentionPolicy {
  readonly maxAgeDays: number
  readonly maxCount: number
  readonly minKeep: number
}

export type RetentionCollection = 'filledOrders' | 'canceledOrders' | 'errorOrders' | 'filledPositions'

export const DEFAULT_RETENTION_POLICIES: Readonly<Record<RetentionCollection, RetentionPolicy>> = {
  filledOrders: { maxAgeDays: 30, maxCount: 10_000, minKeep: 100 },
  canceledOrders: { maxAgeDays: 7, maxCount: 5_000, minKeep: 50 },
  errorOrders: { maxAgeDays: 30, maxCount: 5_000, minKeep: 50 },
  filledPositions: { maxAgeDays: 90, maxCount: 5_000, minKeep: 100 }
}

/** Upper bound on the batch worker pool */
export const MAX_WORKERS_LIMIT = 200

/**
 * A policy given in part keeps the defaults for the fields it leaves out
 */
function retentionPolicySchema(defaults: RetentionPolicy) {
  return z
    .object({
      maxAgeDays: z.number().positive().default(defaults.maxAgeDays),
      maxCount: z.number().int().min(0).default(defaults.maxCount),
      minKeep: z.number().int().min(0).default(defaults.minKeep)
    })
    .default({ ...defaults })
}

const cleanupSchema = z
  .object({
    enabled: z.boolean().default(true),
    intervalIterations: z.number().int().positive().default(100),
    retentionPolicies: z
      .object({
        filledOrders: retentionPolicySchema(DEFAULT_RETENTION_POLICIES.filledOrders),
        canceledOrders: retentionPolicySchema(DEFAULT_RETENTION_POLICIES.canceledOrders),
        errorOrders: retentionPolicySchema(DEFAULT_RETENTION_POLICIES.errorOrders),
        filledPositions: retentionPolicySchema(DEFAULT_RETENTION_POLICIES.filledPositions)
      })
      .default({
        filledOrders: { ...DEFAULT_RETENTION_POLICIES.filledOrders },
        canceledOrders: { ...DEFAULT_RETENTION_POLICIES.canceledOrders },
        errorOrders: { ...DEFAULT_RETENTION_POLICIES.errorOrders },
        filledPositions: { ...DEFAULT_RETENTION_POLICIES.filledPositions }
      })
  })
  .default({
    enabled: true,
    intervalIterations: 100,
    retentionPolicies: {
      filledOrders: { ...DEFAULT_RETENTION_POLICIES.filledOrders },
      canceledOrders: { ...DEFAULT_RETENTION_POLICIES.canceledOrders },
      errorOrders: { ...DEFAULT_RETENTION_POLICIES.errorOrders },
      filledPositions: { ...DEFAULT_RETENTION_POLICIES.filledPositions }
    }
  })

/**
 * Engine configuration schema
 *
 * @example
 * // Poll a brokerage every 2 seconds, keep fewer canceled orders
 * {
 *   name: 'paper',
 *   mode: 'poll',
 *   pollIntervalMs: 2000,
 *   quoteAssets: ['USD'],
 *   cleanup: { retentionPolicies: { canceledOrders: { maxCount: 500 } } }
 * }
 */
const engineConfigSchema = z.object({
  name: z.string().min(1),
  mode: z.enum(['push', 'poll', 'auto']).default('auto'),
  backtesting: z.boolean().default(false),
  maxWorkers: z
    .number()
    .int()
    .positive()
    .default(20)
    .transform((n) => Math.min(n, MAX_WORKERS_LIMIT)),
  pollIntervalMs: z.number().int().positive().default(5000),
  cancelMissingOrders: z.boolean().default(true),
  quoteAssets: z.array(z.string().min(1)).default([]),
  logLevel: z.enum(LOG_LEVELS).optional(),
  logFile: z.string().min(1).optional(),
  cleanup: cleanupSchema
})

export type EngineConfigInput = z.input<typeof engineConfigSchema>
export type EngineConfig = Readonly<z.output<typeof engineConfigSchema>>
export type ReconciliationMode = EngineConfig['mode']

/**
 * Validates raw configuration and resolves every default.
 * The result is deeply frozen.
 *
 * @throws ConfigValidationError listing one line per issue
 *
 * @example
 * ```typescript
 * const config = parseEngineConfig({ name: 'paper', mode: 'poll' })
 * config.pollIntervalMs // 5000
 * config.cleanup.retentionPolicies.canceledOrders.maxAgeDays // 7
 * ```
 */
export function parseEngineConfig(input: unknown): EngineConfig {
  const result = engineConfigSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.map(String).join('.')
      return path ? `${path}: ${issue.message}` : issue.message
    })
    throw new ConfigValidationError(`Invalid engine configuration:\n${issues.join('\n')}`, issues)
  }
  return deepFreeze(result.data)
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child)
    }
  }
  return Object.freeze(value)
}
