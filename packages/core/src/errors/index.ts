export {
  asError,
  BrokerError,
  CleanupError,
  ConfigValidationError,
  ContractViolationError,
  EngineStateError,
  ReconciliationError,
  SubmissionError,
  toBrokerError
} from './broker-error'
