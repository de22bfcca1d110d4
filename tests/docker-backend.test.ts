import { describe, expect, it } from 'vitest';
import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { DockerBackend } from '../src/core/sandbox/backends/docker.js';
import { BackendFaultError } from '../src/core/sandbox/backends/process.js';

/** Stand-in `docker` executable: logs its argv and answers by subcommand. */
async function fakeDocker(execBody: string): Promise<{ dockerPath: string; log: () => Promise<string[]> }> {
  const dir = await mkdtemp(join(tmpdir(), 'beamforge-docker-'));
  const dockerPath = join(dir, 'docker');
  const script = [
    '#!/bin/sh',
    'echo "$*" >> "$(dirname "$0")/calls.log"',
    'case "$1" in',
    '  create) echo "cid123" ;;',
    '  exec)',
    '    if [ "$2" = "-i" ]; then cat > /dev/null; exit 0; fi',
    `    ${execBody}`,
    '    ;;',
    'esac'
  ].join('\n');
  await writeFile(dockerPath, `${script}\n`, { mode: 0o755 });
  return {
    dockerPath,
    log: async () => (await readFile(join(dir, 'calls.log'), 'utf8')).trim().split('\n')
  };
}

describe('DockerBackend', () => {
  it('drives the container lifecycle through the docker CLI', async () => {
    const docker = await fakeDocker('echo "2 tests failed" >&2; exit 1');
    const backend = new DockerBackend({ dockerPath: docker.dockerPath, pidsLimit: 256 });

    const handle = await backend.create({ baseEnvironment: 'node:20', workdir: '/workspace', files: { 'a.txt': 'x' } });
    const res = await backend.exec(handle, { command: ['npm', 'test'], cwd: '.', timeoutMs: 5_000, env: { CI: '1' } });
    await backend.destroy(handle);

    expect(handle.id).toBe('cid123');
    expect(res).toMatchObject({ exitCode: 1, stderr: '2 tests failed', timedOut: false });
    expect(await docker.log()).toEqual([
      'create --init --label dev.beamforge.sandbox=true -w /workspace --pids-limit 256 node:20 sleep infinity',
      'start cid123',
      'exec -i cid123 sh -c mkdir -p "$(dirname "$1")" && cat > "$1" sh /workspace/a.txt',
      'exec -w /workspace -e CI=1 cid123 npm test',
      'rm -f cid123'
    ]);
  });

  it('throws a backend fault when the daemon is unreachable', async () => {
    const docker = await fakeDocker('echo "Cannot connect to the Docker daemon at unix:///var/run/docker.sock" >&2; exit 1');
    const backend = new DockerBackend({ dockerPath: docker.dockerPath });
    const handle = { id: 'cid123', baseEnvironment: 'node:20', workdir: '/workspace' };

    await expect(backend.exec(handle, { command: ['npm', 'test'], cwd: '.', timeoutMs: 5_000 })).rejects.toBeInstanceOf(BackendFaultError);
  });

  it('returns command output that mentions a stopped service as the command result', async () => {
    const docker = await fakeDocker('echo "FAIL: expected server, but postgres is not running" >&2; exit 1');
    const backend = new DockerBackend({ dockerPath: docker.dockerPath });
    const handle = { id: 'cid123', baseEnvironment: 'node:20', workdir: '/workspace' };

    const res = await backend.exec(handle, { command: ['npm', 'test'], cwd: '.', timeoutMs: 5_000 });

    expect(res).toMatchObject({ exitCode: 1, stderr: 'FAIL: expected server, but postgres is not running', timedOut: false });
  });

  it('throws a backend fault when the daemon reports the container is gone', async () => {
    const docker = await fakeDocker('echo "Error response from daemon: container cid123 is not running" >&2; exit 1');
    const backend = new DockerBackend({ dockerPath: docker.dockerPath });
    const handle = { id: 'cid123', baseEnvironment: 'node:20', workdir: '/workspace' };

    await expect(backend.exec(handle, { command: ['npm', 'test'], cwd: '.', timeoutMs: 5_000 })).rejects.toThrow(
      'docker: exec npm test: Error response from daemon: container cid123 is not running'
    );
  });

  it('treats exit 125 as a docker error rather than a command result', async () => {
    const docker = await fakeDocker('echo "OCI runtime exec failed" >&2; exit 125');
    const backend = new DockerBackend({ dockerPath: docker.dockerPath });
    const handle = { id: 'cid123', baseEnvironment: 'node:20', workdir: '/workspace' };

    await expect(backend.exec(handle, { command: ['ls'], cwd: '.', timeoutMs: 5_000 })).rejects.toThrow(
      'docker: exec ls: OCI runtime exec failed'
    );
  });

  it('reads a missing file as null', async () => {
    const docker = await fakeDocker('exit 1');
    const backend = new DockerBackend({ dockerPath: docker.dockerPath });
    const handle = { id: 'cid123', baseEnvironment: 'node:20', workdir: '/workspace' };

    await expect(backend.readFile(handle, 'missing.txt')).resolves.toBeNull();
  });
});
