export type {
  BackendClient,
  BackendConfig,
  BackendType,
  HttpBackendConfig,
  Runnable,
  RunnableBackendConfig,
  SubprocessBackendConfig,
} from './types.js';

export { HttpBackendClient } from './http.js';
export {
  SubprocessBackendClient,
  DEFAULT_CLIENT_EXIT_CODES,
  DEFAULT_KILL_GRACE_MS,
  REQUEST_ID_ENV,
  substituteArgs,
} from './subprocess.js';
export { RunnableBackendClient, statusOf } from './in-process.js';
export { createBackendClient } from './factory.js';
