/**
 * Engine-level error. Every adapter failure that reaches strategy code is
 * normalized into one of these, so callers catch a single error kind
 * regardless of the brokerage underneath.
 */
export class BrokerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public override readonly cause?: Error
  ) {
    super(message)
    this.name = 'BrokerError'
  }
}

/**
 * The adapter rejected or threw while placing an order
 */
export class SubmissionError extends BrokerError {
  constructor(message: string, cause?: Error) {
    super(message, 'SUBMISSION_FAILED', cause)
    this.name = 'SubmissionError'
  }
}

/**
 * A poll cycle or push delivery could not be reconciled
 */
export class ReconciliationError extends BrokerError {
  constructor(message: string, cause?: Error) {
    super(message, 'RECONCILIATION_FAILED', cause)
    this.name = 'ReconciliationError'
  }
}

/**
 * An adapter delivered an event missing data the engine requires.
 * Indicates an adapter bug; always raised synchronously.
 */
export class ContractViolationError extends BrokerError {
  constructor(message: string) {
    super(message, 'CONTRACT_VIOLATION')
    this.name = 'ContractViolationError'
  }
}

/**
 * Retention pass failed. Logged, never thrown to callers.
 */
export class CleanupError extends BrokerError {
  constructor(message: string, cause?: Error) {
    super(message, 'CLEANUP_FAILED', cause)
    this.name = 'CleanupError'
  }
}

export class ConfigValidationError extends BrokerError {
  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(message, 'INVALID_CONFIG')
    this.name = 'ConfigValidationError'
  }
}

/**
 * Operation called in the wrong lifecycle state (e.g. submit after stop)
 */
export class EngineStateError extends BrokerError {
  constructor(message: string) {
    super(message, 'ENGINE_STATE')
    this.name = 'EngineStateError'
  }
}

/**
 * Converts any thrown value into an Error instance.
 */
export function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Normalizes a thrown adapter value into an engine error.
 * Engine errors pass through unchanged.
 *
 * @example
 * ```typescript
 * catch (error) {
 *   throw toBrokerError(error, (message, cause) => new SubmissionError(message, cause))
 * }
 * ```
 */
export function toBrokerError(
  error: unknown,
  factory: (message: string, cause: Error) => BrokerError
): BrokerError {
  if (error instanceof BrokerError) return error
  const cause = asError(error)
  return factory(cause.message, cause)
}
