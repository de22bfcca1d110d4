import type { CandidateNode, FileSet } from '../candidate/types.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { runValidationPipeline, type StageResult, type ValidationReport, type ValidationStage } from './pipeline.js';
import type { RetryHooks } from './retry.js';
import { Sandbox } from './sandbox.js';
import type { RetryPolicy, SandboxBackend } from './types.js';

export interface ValidateArgs {
  node: CandidateNode;
  /** Full file set mounted into the sandbox. */
  files: FileSet;
  signal?: AbortSignal;
}

export interface CandidateValidator {
  validate(args: ValidateArgs): Promise<ValidationReport>;
}

export interface SandboxValidatorOptions {
  backend: SandboxBackend;
  baseEnvironment: string;
  stages: readonly ValidationStage[];
  workdir?: string;
  retry?: RetryPolicy;
  retryHooks?: RetryHooks;
  logger?: Logger;
  onStage?: (args: { node: CandidateNode; result: StageResult }) => void | Promise<void>;
}

/** Fresh sandbox per validation attempt, torn down whatever the outcome. */
export class SandboxValidator implements CandidateValidator {
  constructor(private readonly opts: SandboxValidatorOptions) {}

  async validate({ node, files, signal }: ValidateArgs): Promise<ValidationReport> {
    const log = this.opts.logger ?? silentLogger;
    const sandbox = await Sandbox.create(this.opts.backend, {
      baseEnvironment: this.opts.baseEnvironment,
      initialFiles: files,
      workdir: this.opts.workdir,
      retry: this.opts.retry,
      retryHooks: this.opts.retryHooks,
      logger: log,
      signal
    });
    try {
      const report = await runValidationPipeline(sandbox, this.opts.stages, {
        signal,
        onStage: this.opts.onStage ? (result) => this.opts.onStage?.({ node, result }) : undefined
      });
      log.debug('candidate validated', { candidate: node.id, passed: report.passed, score: report.score, failedStage: report.failedStage });
      return report;
    } finally {
      await sandbox.destroy();
    }
  }
}
