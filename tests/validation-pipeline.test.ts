import { describe, expect, it } from 'vitest';

import { CommandFailedError } from '../src/core/errors.js';
import { runValidationPipeline, type StageResult } from '../src/core/sandbox/pipeline.js';
import { Sandbox } from '../src/core/sandbox/sandbox.js';
import { TIMEOUT_EXIT_CODE } from '../src/core/sandbox/backends/process.js';
import { FakeBackend, instantRetry } from './fake-backend.js';

function scripted(exits: Record<string, number>) {
  return new FakeBackend(({ request }) => {
    const name = request.command[0] ?? '';
    if (name === 'slow') return { exitCode: TIMEOUT_EXIT_CODE, timedOut: true, stderr: 'partial' };
    return { exitCode: exits[name] ?? 0, stderr: exits[name] ? `${name} failed` : '' };
  });
}

async function sandboxOn(backend: FakeBackend) {
  return await Sandbox.create(backend, { baseEnvironment: 'node:20', initialFiles: {}, retryHooks: instantRetry });
}

describe('validation pipeline', () => {
  it('short-circuits at the first failing required stage', async () => {
    const backend = scripted({ build: 1 });
    const sandbox = await sandboxOn(backend);

    const report = await runValidationPipeline(sandbox, [
      { name: 'install', command: ['install'] },
      { name: 'build', command: ['build'] },
      { name: 'test', command: ['test'] }
    ]);

    expect(report.passed).toBe(false);
    expect(report.failedStage).toBe('build');
    expect(report.score).toBe(1);
    expect(report.stages.map((s) => s.name)).toEqual(['install', 'build']);
    expect(report.rejection).toBeInstanceOf(CommandFailedError);
    expect(report.rejection).toMatchObject({ stage: 'build', exitCode: 1, stderr: 'build failed' });
    await sandbox.destroy();
  });

  it('keeps going past optional failures and sums weights of passed stages', async () => {
    const backend = scripted({ lint: 1 });
    const sandbox = await sandboxOn(backend);
    const seen: StageResult[] = [];

    const report = await runValidationPipeline(
      sandbox,
      [
        { name: 'build', command: ['build'], weight: 2 },
        { name: 'lint', command: ['lint'], required: false, weight: 5 },
        { name: 'test', command: ['test'], weight: 3 }
      ],
      { onStage: (r) => void seen.push(r) }
    );

    expect(report).toMatchObject({ passed: true, score: 5 });
    expect(report.failedStage).toBeUndefined();
    expect(seen.map((s) => [s.name, s.passed])).toEqual([
      ['build', true],
      ['lint', false],
      ['test', true]
    ]);
    await sandbox.destroy();
  });

  it('rejects on a timed-out required stage and notes the timeout', async () => {
    const backend = scripted({});
    const sandbox = await sandboxOn(backend);

    const report = await runValidationPipeline(sandbox, [{ name: 'smoke', command: ['slow'], timeoutMs: 50 }]);

    expect(report.failedStage).toBe('smoke');
    expect(report.stages[0]).toMatchObject({ timedOut: true, exitCode: TIMEOUT_EXIT_CODE, passed: false });
    expect(report.rejection?.stderr).toBe('partial\n[timed out after 50ms]');
    await sandbox.destroy();
  });

  it('passes an empty pipeline with a zero score', async () => {
    const sandbox = await sandboxOn(new FakeBackend());
    await expect(runValidationPipeline(sandbox, [])).resolves.toEqual({ passed: true, score: 0, stages: [] });
    await sandbox.destroy();
  });
});
