import type { FileSet } from '../candidate/types.js';

export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  /** Command killed after its timeout; still a command failure, not an infrastructure one. */
  timedOut: boolean;
}

export interface ExecRequest {
  command: string[];
  /** Relative to the sandbox workdir. */
  cwd: string;
  timeoutMs: number;
  env?: Record<string, string>;
}

export interface BackendHandle {
  id: string;
  baseEnvironment: string;
  workdir: string;
}

export interface CreateEnvironmentSpec {
  baseEnvironment: string;
  workdir: string;
  files: FileSet;
}

/**
 * Execution backend (container engine, local scratch directory, test fake).
 *
 * Contract: a command that ran and exited non-zero is a returned ExecResult.
 * Anything thrown means the backend could not do what was asked (unreachable
 * daemon, reset connection, missing environment) and may be retried.
 */
export interface SandboxBackend {
  readonly name: string;
  create(spec: CreateEnvironmentSpec, signal?: AbortSignal): Promise<BackendHandle>;
  /** Materializes files into the environment's filesystem. */
  writeFiles(handle: BackendHandle, files: FileSet, signal?: AbortSignal): Promise<void>;
  /** Resolves to null when the file does not exist. */
  readFile(handle: BackendHandle, path: string, signal?: AbortSignal): Promise<string | null>;
  exec(handle: BackendHandle, request: ExecRequest, signal?: AbortSignal): Promise<ExecResult>;
  destroy(handle: BackendHandle): Promise<void>;
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0 = no jitter, 1 = delay drawn from [0, exp]. */
  jitter: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
  jitter: 0.5
};
