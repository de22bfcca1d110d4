import { execa } from 'execa';

import { toCancelled } from '../../errors.js';
import type { ExecResult } from '../types.js';

/** Thrown by backends when the execution layer itself misbehaved. */
export class BackendFaultError extends Error {
  readonly code = 'BACKEND_FAULT';
  readonly backend: string;

  constructor(backend: string, message: string, options?: { cause?: unknown }) {
    super(`${backend}: ${message}`, options);
    this.name = 'BackendFaultError';
    this.backend = backend;
  }
}

/** Conventional exit code for a command killed by its timeout. */
export const TIMEOUT_EXIT_CODE = 124;

export interface RunProcessOptions {
  cwd?: string;
  env?: Record<string, string>;
  input?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Runs one process without rejecting on non-zero exit.
 * A process that could not be started at all is a BackendFaultError.
 */
export async function runProcess(backend: string, file: string, args: string[], opts: RunProcessOptions = {}): Promise<ExecResult> {
  const started = Date.now();
  const common = {
    cwd: opts.cwd,
    env: opts.env,
    stdout: 'pipe',
    stderr: 'pipe',
    timeout: opts.timeoutMs,
    cancelSignal: opts.signal,
    killSignal: 'SIGTERM',
    forceKillAfterDelay: 5_000,
    reject: false
  } as const;
  const res =
    opts.input === undefined
      ? await execa(file, args, { ...common, stdin: 'ignore' })
      : await execa(file, args, { ...common, input: opts.input });
  const durationMs = Date.now() - started;

  if (opts.signal?.aborted) throw toCancelled(opts.signal);

  if (res.timedOut) {
    return { exitCode: TIMEOUT_EXIT_CODE, stdout: res.stdout, stderr: res.stderr, durationMs, timedOut: true };
  }
  if (typeof res.exitCode === 'number') {
    return { exitCode: res.exitCode, stdout: res.stdout, stderr: res.stderr, durationMs, timedOut: false };
  }
  if (res.signal) {
    // Killed from outside (OOM killer, pids limit): the command failed, the backend did not.
    const stderr = `${res.stderr}\n[terminated by ${res.signal}]`.trim();
    return { exitCode: 128, stdout: res.stdout, stderr, durationMs, timedOut: false };
  }
  throw new BackendFaultError(backend, `could not start '${file}': ${res.stderr || 'spawn failed'}`);
}
