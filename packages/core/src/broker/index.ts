export { BrokerEngine, createBrokerEngine } from './broker-engine'
export type { BrokerEngineOptions, SellAllOptions } from './broker-engine'
export type { Balances, BrokerAdapter, OrderModification, PushHandlers, PushStream } from './broker-adapter'
