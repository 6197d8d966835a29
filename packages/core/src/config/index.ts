export {
  DEFAULT_RETENTION_POLICIES,
  MAX_WORKERS_LIMIT,
  parseEngineConfig
} from './engine-config'
export type {
  EngineConfig,
  EngineConfigInput,
  ReconciliationMode,
  RetentionCollection,
  RetentionPolicy
} from './engine-config'
