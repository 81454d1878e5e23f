export {
  pollOperation,
  type StatusFetcher,
  type FetchStatusOutcome,
  type FetchStatusSuccess,
  type FetchStatusFailure,
  type LoopDeps,
  type PollOptions,
} from './loop';
export {
  classifyStatus,
  extractFailureCause,
  isStatusPayload,
  isTerminal,
  defaultSuccessPredicate,
  defaultFailurePredicate,
  TERMINAL_STATUSES,
  type Classifier,
} from './classify';
export {
  computeDelay,
  planNextWait,
  resolvePollConfig,
  DEFAULT_POLL_CONFIG,
  type PollConfigInput,
  type WaitPlan,
} from './wait-plan';
