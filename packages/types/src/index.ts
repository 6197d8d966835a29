// Event types
export type {
  ErrorEventPayload,
  FillEventPayload,
  OrderEventPayload,
  TradeEvent,
  TradeEventSubscriber
} from './events'

// Logging
export type { Logger } from './events'
