export { SubscriberBus } from './subscriber-bus'
export { RealTimeSource, SimulatedTimeSource } from './time-source'
export type { TimeSource } from './time-source'
