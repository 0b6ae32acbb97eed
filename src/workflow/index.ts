export { WorkflowRunner, countWords } from './workflow-runner.js';
export type {
  ExecuteOptions,
  OptionalStepFailurePolicy,
  WorkflowRunnerOptions,
} from './workflow-runner.js';
export { WorkflowRun } from './workflow-run.js';
export { MAX_TIMER_DELAY_MS, RetryPolicy, abortableSleep, backoffDelay } from './retry-policy.js';
export type { AttemptOutcome, RetryPolicyOptions, RetryResult, Sleep } from './retry-policy.js';
export {
  createStandardSteps,
  draftInstruction,
  outlineInstruction,
  DEFAULT_TITLE,
} from './standard-steps.js';
export type { StandardStepDeps } from './standard-steps.js';
export {
  RequiredStepFailure,
  StepExecutionError,
  StepTimeoutError,
  WorkflowCancelledError,
  WorkflowIncompleteError,
  WorkflowTimeBudgetExceeded,
} from './errors.js';
export type { StepFailure } from './errors.js';
