import { posix } from 'node:path';

import type { FileSet } from '../../candidate/types.js';
import type { BackendHandle, CreateEnvironmentSpec, ExecRequest, ExecResult, SandboxBackend } from '../types.js';
import { BackendFaultError, runProcess } from './process.js';

/** Label applied to every sandbox container (used for cleanup queries). */
const LABEL_APP = 'dev.beamforge.sandbox';

/** `docker` exits 125 when the daemon rejected the request itself. */
const DOCKER_CLI_ERROR_EXIT = 125;

/**
 * Messages the docker CLI itself prints when the daemon or the container is
 * gone. Matched at the start of a stderr line only: anything else on stderr
 * belongs to the command.
 */
const TRANSPORT_FAULT_PATTERNS = [/^Error response from daemon:/m, /^Cannot connect to the Docker daemon/m, /^error during connect:/m];

export interface DockerBackendOptions {
  dockerPath?: string;
  cpus?: number;
  memoryMb?: number;
  pidsLimit?: number;
  /** Timeout for docker management calls (create/start/cp/rm). */
  controlTimeoutMs?: number;
}

/**
 * Container backend over the docker CLI.
 *
 * docker's own errors (exit 125, daemon messages in TRANSPORT_FAULT_PATTERNS)
 * are thrown as BackendFaultError; every other exit is the command's own
 * result.
 */
export class DockerBackend implements SandboxBackend {
  readonly name = 'docker';
  private readonly docker: string;

  constructor(private readonly opts: DockerBackendOptions = {}) {
    this.docker = opts.dockerPath ?? 'docker';
  }

  async create(spec: CreateEnvironmentSpec, signal?: AbortSignal): Promise<BackendHandle> {
    const args = ['create', '--init', '--label', `${LABEL_APP}=true`, '-w', spec.workdir];
    if (this.opts.cpus) args.push('--cpus', String(this.opts.cpus));
    if (this.opts.memoryMb) args.push('--memory', `${this.opts.memoryMb}m`);
    if (this.opts.pidsLimit) args.push('--pids-limit', String(this.opts.pidsLimit));
    args.push(spec.baseEnvironment, 'sleep', 'infinity');

    const created = await this.control(args, signal);
    const id = created.stdout.trim();
    const handle: BackendHandle = { id, baseEnvironment: spec.baseEnvironment, workdir: spec.workdir };
    try {
      await this.control(['start', id], signal);
      await this.writeFiles(handle, spec.files, signal);
    } catch (err) {
      await this.destroy(handle).catch(() => undefined);
      throw err;
    }
    return handle;
  }

  async writeFiles(handle: BackendHandle, files: FileSet, signal?: AbortSignal): Promise<void> {
    for (const [path, content] of Object.entries(files)) {
      const target = posix.join(handle.workdir, path);
      const res = await runProcess(
        this.name,
        this.docker,
        ['exec', '-i', handle.id, 'sh', '-c', 'mkdir -p "$(dirname "$1")" && cat > "$1"', 'sh', target],
        { input: content, timeoutMs: this.controlTimeout(), signal }
      );
      this.assertOk(`write ${path}`, res);
    }
  }

  async readFile(handle: BackendHandle, path: string, signal?: AbortSignal): Promise<string | null> {
    const target = posix.join(handle.workdir, path);
    const res = await runProcess(this.name, this.docker, ['exec', handle.id, 'sh', '-c', 'test -f "$1" && cat "$1"', 'sh', target], {
      timeoutMs: this.controlTimeout(),
      signal
    });
    this.throwIfTransportFault(`read ${path}`, res);
    return res.exitCode === 0 ? res.stdout : null;
  }

  async exec(handle: BackendHandle, request: ExecRequest, signal?: AbortSignal): Promise<ExecResult> {
    const args = ['exec', '-w', posix.join(handle.workdir, request.cwd)];
    for (const [key, value] of Object.entries(request.env ?? {})) {
      args.push('-e', `${key}=${value}`);
    }
    args.push(handle.id, ...request.command);

    const res = await runProcess(this.name, this.docker, args, { timeoutMs: request.timeoutMs, signal });
    if (!res.timedOut) this.throwIfTransportFault(`exec ${request.command.join(' ')}`, res);
    return res;
  }

  async destroy(handle: BackendHandle): Promise<void> {
    const res = await runProcess(this.name, this.docker, ['rm', '-f', handle.id], { timeoutMs: this.controlTimeout() });
    if (res.exitCode !== 0 && !/No such container/i.test(res.stderr)) {
      throw new BackendFaultError(this.name, `rm ${handle.id.slice(0, 12)} failed: ${res.stderr.trim()}`);
    }
  }

  private async control(args: string[], signal?: AbortSignal): Promise<ExecResult> {
    const res = await runProcess(this.name, this.docker, args, { timeoutMs: this.controlTimeout(), signal });
    this.assertOk(args[0] ?? 'docker', res);
    return res;
  }

  private assertOk(operation: string, res: ExecResult): void {
    if (res.exitCode === 0) return;
    throw new BackendFaultError(this.name, `${operation} exited ${res.exitCode}: ${res.stderr.trim()}`);
  }

  private throwIfTransportFault(operation: string, res: ExecResult): void {
    if (res.exitCode === 0) return;
    if (res.exitCode === DOCKER_CLI_ERROR_EXIT || TRANSPORT_FAULT_PATTERNS.some((p) => p.test(res.stderr))) {
      throw new BackendFaultError(this.name, `${operation}: ${res.stderr.trim()}`);
    }
  }

  private controlTimeout(): number {
    return this.opts.controlTimeoutMs ?? 60_000;
  }
}
