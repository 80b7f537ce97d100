import { spawn, type ChildProcess } from 'child_process';

import {
  AdapterClosedError,
  type BackendCall,
  type BackendClient,
  type BackendReply,
  TransportError,
  createLogger,
  decodeBody,
} from '@a2a-relay/core';

import type { SubprocessBackendConfig } from './types.js';

const logger = createLogger('subprocess-backend');

export const DEFAULT_CLIENT_EXIT_CODES: readonly number[] = [2];
export const DEFAULT_KILL_GRACE_MS = 5_000;
export const REQUEST_ID_ENV = 'RELAY_REQUEST_ID';

/**
 * SubprocessBackendClient spawns a child process for each attempt.
 *
 * Two protocols:
 *   - stdio: write the JSON payload to stdin, read the reply from stdout
 *   - argv:  pass the message through `{message}`-style placeholders in args
 *
 * The exit status is mapped onto an HTTP-equivalent status so the dispatch
 * engine can classify it: 0 → 200, a client exit code → 400, a missing
 * command → 404, a non-executable command → 403, anything else → 500.
 */
export class SubprocessBackendClient implements BackendClient {
  readonly kind = 'subprocess';
  private readonly command: string;
  private readonly args: string[];
  private readonly cwd?: string;
  private readonly env: Record<string, string>;
  private readonly protocol: 'stdio' | 'argv';
  private readonly clientExitCodes: ReadonlySet<number>;
  private readonly killGraceMs: number;
  private readonly children = new Set<ChildProcess>();
  private closed = false;

  constructor(config: SubprocessBackendConfig) {
    this.command = config.command;
    this.args = config.args ?? [];
    this.cwd = config.cwd;
    this.env = config.env ?? {};
    this.protocol = config.protocol ?? 'stdio';
    this.clientExitCodes = new Set(config.clientExitCodes ?? DEFAULT_CLIENT_EXIT_CODES);
    this.killGraceMs = config.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  }

  send(call: BackendCall): Promise<BackendReply> {
    if (this.closed) {
      return Promise.reject(new AdapterClosedError('Subprocess backend client'));
    }
    if (call.signal.aborted) {
      return Promise.reject(abortError(call.signal));
    }

    const args = this.protocol === 'argv'
      ? substituteArgs(this.args, {
          message: call.text,
          session_id: typeof call.payload.session_id === 'string' ? call.payload.session_id : '',
          request_id: call.correlationId,
        })
      : this.args;

    return new Promise((resolve, reject) => {
      const child = spawn(this.command, args, {
        cwd: this.cwd,
        env: { ...process.env, ...this.env, [REQUEST_ID_ENV]: call.correlationId },
        stdio: [this.protocol === 'stdio' ? 'pipe' : 'ignore', 'pipe', 'pipe'],
      });
      this.children.add(child);

      // Decoded once on close; a chunk may end inside a multi-byte character
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let settled = false;

      const finish = (settle: () => void) => {
        if (settled) return;
        settled = true;
        this.children.delete(child);
        call.signal.removeEventListener('abort', onAbort);
        settle();
      };

      const onAbort = () => {
        this.terminate(child);
        finish(() => reject(abortError(call.signal)));
      };
      call.signal.addEventListener('abort', onAbort, { once: true });

      child.stdout?.on('data', (data: Buffer) => {
        stdoutChunks.push(data);
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderrChunks.push(data);
        logger.debug({ correlationId: call.correlationId, stderr: data.toString().trim() }, 'Subprocess stderr');
      });

      child.on('close', (code) => {
        finish(() => {
          if (this.closed) {
            reject(new AdapterClosedError('Subprocess backend client'));
            return;
          }
          const status = this.statusFor(code);
          const stdout = Buffer.concat(stdoutChunks).toString('utf8');
          const stderr = Buffer.concat(stderrChunks).toString('utf8');
          const output = status === 200 ? stdout : stderr.trim() || stdout;
          logger.debug({ correlationId: call.correlationId, code, status }, 'Subprocess exited');
          resolve({ status, body: decodeBody(output) });
        });
      });

      child.on('error', (err) => {
        const code = 'code' in err ? err.code : undefined;
        finish(() => {
          if (code === 'ENOENT') {
            resolve({ status: 404, body: { error: `Command not found: ${this.command}` } });
          } else if (code === 'EACCES') {
            resolve({ status: 403, body: { error: `Command is not executable: ${this.command}` } });
          } else {
            reject(new TransportError(`Failed to run ${this.command}: ${err.message}`, {
              reason: 'network',
              cause: err,
            }));
          }
        });
      });

      if (child.stdin) {
        // The child may exit before reading its input
        child.stdin.on('error', (err) => {
          logger.debug({ correlationId: call.correlationId, err }, 'Subprocess stdin closed early');
        });
        child.stdin.end(JSON.stringify(call.payload));
      }
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const child of this.children) {
      this.terminate(child);
    }
    this.children.clear();
  }

  private statusFor(code: number | null): number {
    if (code === 0) return 200;
    if (code !== null && this.clientExitCodes.has(code)) return 400;
    return 500;
  }

  private terminate(child: ChildProcess): void {
    child.kill('SIGTERM');
    const timer = setTimeout(() => {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill('SIGKILL');
      }
    }, this.killGraceMs);
    timer.unref();
  }
}

/**
 * Replace `{name}` placeholders in each argument. Unknown placeholders stay as-is.
 */
export function substituteArgs(args: readonly string[], values: Record<string, string>): string[] {
  return args.map((arg) =>
    arg.replace(/\{(\w+)\}/g, (match, key: string) => (key in values ? values[key] ?? match : match)),
  );
}

function abortError(signal: AbortSignal): Error {
  return new Error('Subprocess call aborted', { cause: signal.reason });
}
