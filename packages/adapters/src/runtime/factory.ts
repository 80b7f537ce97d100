import { HttpBackendClient } from './http.js';
import { RunnableBackendClient } from './in-process.js';
import { SubprocessBackendClient } from './subprocess.js';
import type { BackendClient, BackendConfig } from './types.js';

/**
 * Create a BackendClient from a BackendConfig.
 */
export function createBackendClient(config: BackendConfig): BackendClient {
  switch (config.type) {
    case 'http':
      return new HttpBackendClient(config);

    case 'subprocess':
      return new SubprocessBackendClient(config);

    case 'runnable':
      return new RunnableBackendClient(config);

    default: {
      const unknown: never = config;
      throw new Error(`Unknown backend type: ${JSON.stringify(unknown)}`);
    }
  }
}
