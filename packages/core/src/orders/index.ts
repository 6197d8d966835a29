export { SubmissionPipeline } from './submission-pipeline'
export type { SubmissionPipelineOptions } from './submission-pipeline'
export { TradeEventStateMachine } from './trade-event-state-machine'
export type { TradeEventDetails, TradeEventStateMachineOptions } from './trade-event-state-machine'
