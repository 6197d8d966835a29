export * from './types/dates'
export * from './types/quantity'
export * from './types/assets'
export * from './types/orders'
export * from './types/positions'
export * from './types/status-aliases'
