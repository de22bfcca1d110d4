import { describeError, throwIfAborted } from '../errors.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { FileSet } from '../candidate/types.js';
import { withInfraRetry, type RetryHooks } from './retry.js';
import { DEFAULT_RETRY_POLICY, type BackendHandle, type ExecResult, type RetryPolicy, type SandboxBackend } from './types.js';

export interface SandboxCreateOptions {
  baseEnvironment: string;
  initialFiles: FileSet;
  workdir?: string;
  retry?: RetryPolicy;
  retryHooks?: RetryHooks;
  logger?: Logger;
  signal?: AbortSignal;
}

export interface SandboxExecOptions {
  cwd?: string;
  timeoutMs?: number;
  env?: Record<string, string>;
  signal?: AbortSignal;
}

export const DEFAULT_EXEC_TIMEOUT_MS = 600_000;

/**
 * One disposable execution environment.
 *
 * Writes are staged on the instance and only reach the backend on `sync()`;
 * `exec` refuses to run while staged writes are pending. The instance runs one
 * backend operation at a time.
 */
export class Sandbox {
  private staged = new Map<string, string>();
  private busy = false;
  private destroyed = false;

  private constructor(
    private readonly backend: SandboxBackend,
    readonly handle: BackendHandle,
    private readonly retry: RetryPolicy,
    private readonly retryHooks: RetryHooks,
    private readonly log: Logger
  ) {}

  static async create(backend: SandboxBackend, opts: SandboxCreateOptions): Promise<Sandbox> {
    const retry = opts.retry ?? DEFAULT_RETRY_POLICY;
    const log = opts.logger ?? silentLogger;
    const hooks = withRetryLogging(opts.retryHooks ?? {}, log);
    const handle = await withInfraRetry(
      'create',
      retry,
      () =>
        backend.create(
          { baseEnvironment: opts.baseEnvironment, workdir: opts.workdir ?? '/workspace', files: opts.initialFiles },
          opts.signal
        ),
      opts.signal,
      hooks
    );
    log.debug('sandbox created', { backend: backend.name, id: handle.id, files: Object.keys(opts.initialFiles).length });
    return new Sandbox(backend, handle, retry, hooks, log);
  }

  get pendingWrites(): string[] {
    return Array.from(this.staged.keys()).sort();
  }

  writeFile(path: string, content: string): void {
    this.assertUsable('writeFile');
    this.staged.set(path, content);
  }

  async readFile(path: string, signal?: AbortSignal): Promise<string | null> {
    this.assertUsable('readFile');
    const staged = this.staged.get(path);
    if (staged !== undefined) return staged;
    return await this.exclusive('readFile', signal, () => this.backend.readFile(this.handle, path, signal));
  }

  /** Materializes staged writes; must precede any exec that depends on them. */
  async sync(signal?: AbortSignal): Promise<void> {
    this.assertUsable('sync');
    if (this.staged.size === 0) return;
    const files = Object.fromEntries(this.staged);
    await this.exclusive('sync', signal, () => this.backend.writeFiles(this.handle, files, signal));
    // Keep anything staged while the write was in flight.
    for (const [path, content] of Object.entries(files)) {
      if (this.staged.get(path) === content) this.staged.delete(path);
    }
  }

  /** Never retries a non-zero exit; only backend faults are retried. */
  async exec(command: string[], opts: SandboxExecOptions = {}): Promise<ExecResult> {
    this.assertUsable('exec');
    if (this.staged.size > 0) {
      throw new Error(`sandbox ${this.handle.id}: ${this.staged.size} staged write(s) not synced before exec`);
    }
    const request = {
      command,
      cwd: opts.cwd ?? '.',
      timeoutMs: opts.timeoutMs ?? DEFAULT_EXEC_TIMEOUT_MS,
      env: opts.env
    };
    const result = await this.exclusive('exec', opts.signal, () => this.backend.exec(this.handle, request, opts.signal));
    this.log.debug('exec finished', { id: this.handle.id, command: command.join(' '), exitCode: result.exitCode, timedOut: result.timedOut });
    return result;
  }

  /** Idempotent; teardown problems are logged, never thrown. */
  async destroy(): Promise<void> {
    if (this.destroyed) return;
    this.destroyed = true;
    this.staged.clear();
    try {
      await withInfraRetry('destroy', this.retry, () => this.backend.destroy(this.handle), undefined, this.retryHooks);
    } catch (err) {
      this.log.warn('sandbox teardown failed', { id: this.handle.id, error: describeError(err) });
    }
  }

  private async exclusive<T>(operation: string, signal: AbortSignal | undefined, fn: () => Promise<T>): Promise<T> {
    if (this.busy) throw new Error(`sandbox ${this.handle.id} is busy; concurrent ${operation} rejected`);
    throwIfAborted(signal);
    this.busy = true;
    try {
      return await withInfraRetry(operation, this.retry, fn, signal, this.retryHooks);
    } finally {
      this.busy = false;
    }
  }

  private assertUsable(operation: string): void {
    if (this.destroyed) throw new Error(`sandbox ${this.handle.id} destroyed; ${operation} rejected`);
  }
}

function withRetryLogging(hooks: RetryHooks, log: Logger): RetryHooks {
  return {
    ...hooks,
    onRetry: (args) => {
      log.warn('sandbox backend call failed, retrying', {
        operation: args.operation,
        attempt: args.attempt,
        delayMs: args.delayMs,
        error: describeError(args.error)
      });
      hooks.onRetry?.(args);
    }
  };
}
