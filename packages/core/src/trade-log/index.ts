export { TRADE_LOG_COLUMNS, TradeEventLog } from './trade-event-log'
export type { TradeLogRow } from './trade-event-log'
