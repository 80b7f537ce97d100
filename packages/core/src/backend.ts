/**
 * The "backend call" capability the dispatch engine depends on.
 *
 * Implementations (HTTP, subprocess, in-process runnable) live with the adapters;
 * the engine only ever sees this interface.
 */
export interface BackendClient {
  /** Discriminator for the backend type */
  readonly kind: string;

  /**
   * Perform one attempt. Resolve with whatever status the backend produced;
   * reject with a TransportError when no response was produced at all.
   */
  send(call: BackendCall): Promise<BackendReply>;

  /** Release pooled resources and abort anything in flight */
  close(): Promise<void>;
}

export interface BackendCall {
  correlationId: string;
  /** 0-based attempt index within the logical call */
  attempt: number;
  /** Plain-text rendering of the triggering message */
  text: string;
  /** Backend-native request body */
  payload: Record<string, unknown>;
  headers: Record<string, string>;
  /** Fires on per-attempt timeout or caller cancellation */
  signal: AbortSignal;
}

export interface BackendReply {
  /** HTTP status, or an HTTP-equivalent status for non-HTTP backends */
  status: number;
  body: unknown;
}

export type AttemptOutcome = 'success' | 'transient' | 'client_error';

/**
 * One attempt of a logical call, kept for diagnostics and backoff.
 */
export interface CallAttempt {
  attempt: number;
  elapsedMs: number;
  outcome: AttemptOutcome;
  status?: number;
  /** Delay scheduled before the next attempt */
  backoffMs?: number;
}

export const BODY_PREVIEW_LIMIT = 512;

/**
 * Decode a raw response body: JSON when it parses, the raw text otherwise.
 */
export function decodeBody(raw: string): unknown {
  const trimmed = raw.trim();
  if (!trimmed) {
    return {};
  }
  try {
    return JSON.parse(trimmed) as unknown;
  } catch {
    return raw;
  }
}

export function previewBody(body: unknown, limit = BODY_PREVIEW_LIMIT): string {
  const text = typeof body === 'string' ? body : JSON.stringify(body) ?? String(body);
  return text.slice(0, limit);
}
