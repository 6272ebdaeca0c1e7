export {
  RetryExecutor,
  type RetryDeps,
  type RetryOutcome,
  type RetryPolicy,
  type RetryState,
} from './retry-executor.js'
