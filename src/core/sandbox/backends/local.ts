import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join, relative, resolve } from 'node:path';

import type { FileSet } from '../../candidate/types.js';
import { isErrnoException, writeText } from '../../../utils/fs.js';
import type { BackendHandle, CreateEnvironmentSpec, ExecRequest, ExecResult, SandboxBackend } from '../types.js';
import { BackendFaultError, runProcess } from './process.js';

export interface LocalBackendOptions {
  /** Parent directory for scratch workspaces. Defaults to the OS temp dir. */
  rootDir?: string;
}

/**
 * Runs commands directly on the host inside a scratch directory.
 * No isolation beyond the directory; the base environment is recorded but not provisioned.
 */
export class LocalBackend implements SandboxBackend {
  readonly name = 'local';

  constructor(private readonly opts: LocalBackendOptions = {}) {}

  async create(spec: CreateEnvironmentSpec): Promise<BackendHandle> {
    const dir = await mkdtemp(join(this.opts.rootDir ?? tmpdir(), 'beamforge-sbx-'));
    const handle: BackendHandle = { id: basename(dir), baseEnvironment: spec.baseEnvironment, workdir: dir };
    await this.writeFiles(handle, spec.files);
    return handle;
  }

  async writeFiles(handle: BackendHandle, files: FileSet): Promise<void> {
    for (const [path, content] of Object.entries(files)) {
      await writeText(this.resolveInside(handle, path), content);
    }
  }

  async readFile(handle: BackendHandle, path: string): Promise<string | null> {
    try {
      return await readFile(this.resolveInside(handle, path), 'utf8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null;
      throw err;
    }
  }

  async exec(handle: BackendHandle, request: ExecRequest, signal?: AbortSignal): Promise<ExecResult> {
    const [file, ...args] = request.command;
    if (!file) throw new BackendFaultError(this.name, 'empty command');
    return await runProcess(this.name, file, args, {
      cwd: this.resolveInside(handle, request.cwd),
      env: request.env,
      timeoutMs: request.timeoutMs,
      signal
    });
  }

  async destroy(handle: BackendHandle): Promise<void> {
    await rm(handle.workdir, { recursive: true, force: true });
  }

  private resolveInside(handle: BackendHandle, path: string): string {
    const abs = resolve(handle.workdir, path);
    const rel = relative(handle.workdir, abs);
    if (rel.startsWith('..') || resolve(handle.workdir, rel) !== abs) {
      throw new BackendFaultError(this.name, `path escapes sandbox: ${path}`);
    }
    return abs;
  }
}
