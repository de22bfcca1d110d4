import { CommandFailedError } from '../errors.js';
import type { Sandbox } from './sandbox.js';

export interface ValidationStage {
  name: string;
  command: string[];
  cwd?: string;
  timeoutMs?: number;
  env?: Record<string, string>;
  /** A failing required stage rejects the candidate and stops the pipeline. Default true. */
  required?: boolean;
  /** Contribution to the score when the stage passes. Default 1. */
  weight?: number;
}

export interface StageResult {
  name: string;
  required: boolean;
  passed: boolean;
  exitCode: number;
  timedOut: boolean;
  durationMs: number;
  stdout: string;
  stderr: string;
}

export interface ValidationReport {
  passed: boolean;
  score: number;
  stages: StageResult[];
  failedStage?: string;
  rejection?: CommandFailedError;
}

/**
 * Runs the stages in order (install → build → typecheck → test → smoke, or
 * whatever the phase declares). Stops at the first failing required stage.
 * InfrastructureError from the sandbox propagates untouched.
 */
export async function runValidationPipeline(
  sandbox: Sandbox,
  stages: readonly ValidationStage[],
  opts: { signal?: AbortSignal; onStage?: (result: StageResult) => void | Promise<void> } = {}
): Promise<ValidationReport> {
  const results: StageResult[] = [];
  let score = 0;

  for (const stage of stages) {
    const required = stage.required ?? true;
    const res = await sandbox.exec(stage.command, {
      cwd: stage.cwd,
      timeoutMs: stage.timeoutMs,
      env: stage.env,
      signal: opts.signal
    });
    const passed = res.exitCode === 0 && !res.timedOut;
    const result: StageResult = {
      name: stage.name,
      required,
      passed,
      exitCode: res.exitCode,
      timedOut: res.timedOut,
      durationMs: res.durationMs,
      stdout: res.stdout,
      stderr: res.stderr
    };
    results.push(result);
    await opts.onStage?.(result);

    if (passed) {
      score += stage.weight ?? 1;
      continue;
    }
    if (required) {
      const stderr = res.timedOut ? `${res.stderr}\n[timed out after ${stage.timeoutMs ?? 'default'}ms]`.trim() : res.stderr;
      return {
        passed: false,
        score,
        stages: results,
        failedStage: stage.name,
        rejection: new CommandFailedError(stage.name, res.exitCode, stderr)
      };
    }
  }

  return { passed: true, score, stages: results };
}
