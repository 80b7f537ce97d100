// Errors
export {
  RelayError,
  CallFailure,
  ClientError,
  ServerError,
  TransportError,
  CanceledError,
  AdapterClosedError,
  NotFoundError,
  InvalidStateError,
  isRelayError,
  toErrorPayload,
} from './errors.js';
export type { RelayErrorCode, TransportFailureReason } from './errors.js';

// Backend call capability
export { BODY_PREVIEW_LIMIT, decodeBody, previewBody } from './backend.js';
export type { BackendCall, BackendClient, BackendReply, CallAttempt, AttemptOutcome } from './backend.js';

// Classification and retries
export { ErrorClass, classify, isSuccessStatus } from './classifier.js';
export { RetryPolicy, normalizeMaxRetries, sleep } from './retry.js';
export type { RetryOptions } from './retry.js';

// Dispatch
export { ScopedClient } from './scoped-client.js';
export type { Closeable, ScopeState } from './scoped-client.js';
export { DispatchEngine, DEFAULT_CORRELATION_HEADER, mergeHeaders } from './dispatch.js';
export type { DispatchOptions, DispatchRequest, DispatchResult } from './dispatch.js';

// Task lifecycle
export {
  VALID_TRANSITIONS,
  TaskStateMachine,
  getValidTransitions,
  isCancelable,
  isValidTransition,
} from './task-state-machine.js';
export type { TaskStateEvent, TaskTransitionListener } from './task-state-machine.js';
export { TaskManager, DEFAULT_TASK_RETENTION_MS } from './task-manager.js';
export type { TaskExecutor, TaskExecutionContext, TaskManagerOptions } from './task-manager.js';

// Logging
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
