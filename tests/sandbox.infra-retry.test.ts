import { describe, expect, it } from 'vitest';

import { CancelledError, InfrastructureError } from '../src/core/errors.js';
import { backoffDelay, withInfraRetry } from '../src/core/sandbox/retry.js';
import { Sandbox } from '../src/core/sandbox/sandbox.js';
import { runValidationPipeline } from '../src/core/sandbox/pipeline.js';
import { DEFAULT_RETRY_POLICY } from '../src/core/sandbox/types.js';
import { FakeBackend, instantRetry } from './fake-backend.js';

describe('sandbox infrastructure retry', () => {
  it('retries an install step through two transport faults and validates normally', async () => {
    const backend = new FakeBackend(() => ({ exitCode: 0, stdout: 'ok' }));
    const sandbox = await Sandbox.create(backend, {
      baseEnvironment: 'node:20',
      initialFiles: { 'package.json': '{}' },
      retryHooks: instantRetry
    });
    backend.failNext('exec', new Error('connection reset by peer'), new Error('connection reset by peer'));

    const report = await runValidationPipeline(sandbox, [
      { name: 'install', command: ['npm', 'install'] },
      { name: 'test', command: ['npm', 'test'] }
    ]);
    await sandbox.destroy();

    expect(report.passed).toBe(true);
    expect(report.rejection).toBeUndefined();
    expect(report.score).toBe(2);
    expect(backend.calls.filter((c) => c.op === 'exec')).toHaveLength(4);
    expect(backend.executed.map((e) => e.command.join(' '))).toEqual(['npm install', 'npm test']);
  });

  it('surfaces InfrastructureError with the attempt count once retries run out', async () => {
    const backend = new FakeBackend();
    const sandbox = await Sandbox.create(backend, {
      baseEnvironment: 'node:20',
      initialFiles: {},
      retry: { ...DEFAULT_RETRY_POLICY, maxAttempts: 3 },
      retryHooks: instantRetry
    });
    const fault = new Error('Cannot connect to the Docker daemon');
    backend.failNext('exec', fault, fault, fault);

    const err = await sandbox.exec(['true']).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InfrastructureError);
    expect(err).toMatchObject({ operation: 'exec', attempts: 3, cause: fault });
    await sandbox.destroy();
  });

  it('never retries a non-zero exit', async () => {
    const backend = new FakeBackend(() => ({ exitCode: 2, stderr: 'boom' }));
    const sandbox = await Sandbox.create(backend, { baseEnvironment: 'node:20', initialFiles: {}, retryHooks: instantRetry });

    const res = await sandbox.exec(['make']);

    expect(res).toEqual({ exitCode: 2, stdout: '', stderr: 'boom', durationMs: 1, timedOut: false });
    expect(backend.calls.filter((c) => c.op === 'exec')).toHaveLength(1);
    await sandbox.destroy();
  });

  it('does not retry after an abort', async () => {
    const controller = new AbortController();
    let calls = 0;
    const run = withInfraRetry(
      'exec',
      DEFAULT_RETRY_POLICY,
      async () => {
        calls++;
        controller.abort();
        throw new Error('socket hang up');
      },
      controller.signal,
      instantRetry
    );

    await expect(run).rejects.toBeInstanceOf(CancelledError);
    expect(calls).toBe(1);
  });

  it('reports each retry with an exponential, capped delay', async () => {
    const delays: number[] = [];
    const policy = { maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 300, jitter: 0 };
    let calls = 0;

    const value = await withInfraRetry(
      'create',
      policy,
      async () => {
        if (++calls < 5) throw new Error('flaky');
        return 'ready';
      },
      undefined,
      { ...instantRetry, onRetry: ({ delayMs }) => delays.push(delayMs) }
    );

    expect(value).toBe('ready');
    expect(delays).toEqual([100, 200, 300, 300]);
  });

  it('applies jitter as a fraction of the exponential delay', () => {
    const policy = { maxAttempts: 4, baseDelayMs: 1000, maxDelayMs: 8000, jitter: 0.5 };
    expect(backoffDelay(policy, 1, () => 0)).toBe(500);
    expect(backoffDelay(policy, 2, () => 1)).toBe(2000);
    expect(backoffDelay(policy, 3, () => 0.5)).toBe(3000);
  });
});
