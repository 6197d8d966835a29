/**
 * Broker-agnostic order and position engine
 */

// Engine facade and adapter contract
export * from './broker'

// Configuration
export * from './config'

// Errors
export * from './errors'

// Subscriber bus and clocks
export * from './events'

// Submission and trade events
export * from './orders'

// Reconciliation
export * from './reconciliation'

// Registry
export * from './registry'

// Retention
export * from './retention'

// Trade log
export * from './trade-log'

// Logging
export { createRootLogger, LOG_LEVELS, NoopLogger, resolveLogLevel, WinstonLogger } from './utils/logger'
export type { LogLevel, Logger, LoggerOptions } from './utils/logger'
export { runWithConcurrency } from './utils/concurrency'

// Re-export shared types for convenience
export type {
  Asset,
  EpochDate,
  Order,
  OrderParams,
  OrderSide,
  OrderType,
  Position,
  Quantity
} from '@brokerkit/shared'
export { OrderStatus, TradeEventKind } from '@brokerkit/shared'
export type { TradeEvent, TradeEventSubscriber } from '@brokerkit/types'

export const version = '0.1.0'
