export { PollingReconciler } from './polling-reconciler'
export type { PollingReconcilerOptions, PollResult, PositionSyncResult } from './polling-reconciler'
export { PushReconciler, resolveEventKind } from './push-reconciler'
export type { PushReconcilerOptions } from './push-reconciler'
