export {
  ACTIVE_COLLECTIONS,
  collectionForStatus,
  OrderRegistry,
  positionKey,
  TERMINAL_COLLECTIONS
} from './order-registry'
export type { OrderCollection, OrderFilter } from './order-registry'
export { RegistryLock } from './registry-lock'
export { TrackingList } from './tracking-list'
