export { orderTimestamp, RetentionManager, selectForRemoval } from './retention-manager'
export type { CleanupReport } from './retention-manager'
