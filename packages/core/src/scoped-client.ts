import { AdapterClosedError, InvalidStateError } from './errors.js';

export type ScopeState = 'idle' | 'open' | 'closed';

export interface Closeable {
  close(): Promise<void>;
}

/**
 * Holds one lazily created client for the lifetime of its owner.
 *
 * The client is created on the first `acquire()` (concurrent callers share the
 * same creation), closed exactly once by `release()`, and never recreated
 * until `reopen()` is called.
 */
export class ScopedClient<T extends Closeable> {
  private current?: Promise<T>;
  private _state: ScopeState = 'idle';

  constructor(
    private readonly factory: () => T | Promise<T>,
    private readonly label = 'Backend client',
  ) {}

  get state(): ScopeState {
    return this._state;
  }

  get isClosed(): boolean {
    return this._state === 'closed';
  }

  acquire(): Promise<T> {
    if (this._state === 'closed') {
      return Promise.reject(new AdapterClosedError(this.label));
    }
    if (!this.current) {
      this._state = 'open';
      const creating = Promise.resolve().then(() => this.factory());
      creating.catch(() => {
        // Creation failed: allow the next acquire to try again
        if (this.current === creating) {
          this.current = undefined;
          this._state = 'idle';
        }
      });
      this.current = creating;
    }
    return this.current;
  }

  async release(): Promise<void> {
    if (this._state === 'closed') {
      return;
    }
    this._state = 'closed';
    const pending = this.current;
    this.current = undefined;
    if (!pending) {
      return;
    }

    let client: T;
    try {
      client = await pending;
    } catch {
      // Never created, nothing to close
      return;
    }
    await client.close();
  }

  reopen(): void {
    if (this._state !== 'closed') {
      throw new InvalidStateError(`${this.label} is not closed`);
    }
    this._state = 'idle';
  }
}
