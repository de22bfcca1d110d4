import type { Settings } from '../../config/settings.js';
import type { Logger } from '../../utils/logger.js';
import { BeamSearchActor } from '../beam/search.js';
import type { BeamObserver } from '../beam/types.js';
import { describeError } from '../errors.js';
import type { EvidenceCollector } from '../evidence/collector.js';
import { Generator } from '../generator/generator.js';
import { defaultPromptBuilder } from '../generator/prompt.js';
import type { CompletionClient, PromptBuilder } from '../generator/types.js';
import type { LedgerWriter } from '../ledger/writer.js';
import type { ActorFactory, SearchScope } from '../phase/types.js';
import type { RetryHooks } from '../sandbox/retry.js';
import type { SandboxBackend } from '../sandbox/types.js';
import { SandboxValidator } from '../sandbox/validator.js';

export interface ActorFactoryDeps {
  goal: string;
  client: CompletionClient;
  backend: SandboxBackend;
  settings: Settings;
  promptBuilders?: Readonly<Record<string, PromptBuilder>>;
  ledger?: LedgerWriter;
  evidence?: EvidenceCollector;
  retryHooks?: RetryHooks;
  logger: Logger;
}

/**
 * Assembles generator, sandbox validator and audit hooks for each search.
 * Every generator attempt, stage run, infra retry and ranking lands in the
 * ledger; stage output goes to evidence files.
 */
export function createActorFactory(deps: ActorFactoryDeps): ActorFactory {
  const { settings, ledger, evidence } = deps;

  return (scope, tree) => {
    const scopeName = scope.sibling ? `${scope.phase}/${scope.sibling}` : scope.phase;
    const log = deps.logger.child(scopeName);
    const where = { phase: scope.phase, sibling: scope.sibling };

    const generator = new Generator(deps.client, {
      buildPrompt: withMaxTokens(resolvePromptBuilder(deps.promptBuilders, scope), settings.generation.maxTokens),
      maxAttempts: settings.generation.maxAttempts,
      logger: log,
      onAttempt: async ({ ctx, attempt, ok, error, files }) => {
        await ledger?.append({
          type: 'generation_attempt',
          data: { ...where, depth: ctx.depth, attempt, ok, error, files, feedback: ctx.feedback !== undefined }
        });
      }
    });

    const retryHooks: RetryHooks = {
      ...deps.retryHooks,
      onRetry: (args) => {
        deps.retryHooks?.onRetry?.(args);
        ledger
          ?.append({ type: 'infra_retry', data: { ...where, operation: args.operation, attempt: args.attempt, delayMs: args.delayMs, error: describeError(args.error) } })
          .catch((err: unknown) => log.warn('ledger append failed', { error: describeError(err) }));
      }
    };

    const validator = new SandboxValidator({
      backend: deps.backend,
      baseEnvironment: scope.baseEnvironment ?? settings.sandbox.baseEnvironment,
      workdir: settings.sandbox.workdir,
      stages: scope.stages.map((stage) => ({ ...stage, timeoutMs: stage.timeoutMs ?? settings.sandbox.execTimeoutMs })),
      retry: settings.sandbox.retry,
      retryHooks,
      logger: log,
      onStage: async ({ node, result }) => {
        const recorded = await evidence?.recordStage(`${scopeName}-c${node.id}`, result);
        await ledger?.append({
          type: 'stage_executed',
          data: {
            ...where,
            candidate: node.id,
            stage: result.name,
            passed: result.passed,
            exitCode: result.exitCode,
            timedOut: result.timedOut,
            durationMs: result.durationMs,
            evidence: recorded?.metaPath
          }
        });
      }
    });

    return new BeamSearchActor({
      tree,
      generator,
      validator,
      config: scope.beam,
      context: { goal: deps.goal, phase: scope.phase, sibling: scope.sibling, allowedPaths: scope.allowedPaths },
      observer: ledger ? ledgerObserver(ledger, scope) : undefined,
      logger: log
    });
  };
}

function ledgerObserver(ledger: LedgerWriter, scope: SearchScope): BeamObserver {
  const where = { phase: scope.phase, sibling: scope.sibling };
  return {
    onChild: async (outcome) => {
      if (outcome.kind === 'rejected' && !outcome.node) {
        await ledger.append({ type: 'generation_failed', data: { ...where, parent: outcome.parent.id, reason: outcome.reason } });
        return;
      }
      const node = outcome.kind === 'survivor' ? outcome.entry.node : outcome.node;
      if (!node) return;
      await ledger.append({
        type: 'candidate_validated',
        data: {
          ...where,
          candidate: node.id,
          depth: node.depth,
          passed: outcome.kind === 'survivor',
          score: outcome.report?.score ?? 0,
          failedStage: outcome.report?.failedStage
        }
      });
    },
    onRanked: async ({ depth, frontier, rejected }) => {
      await ledger.append({
        type: 'frontier_ranked',
        data: { ...where, depth, rejected, frontier: frontier.map((e) => ({ candidate: e.node.id, score: e.score })) }
      });
    }
  };
}

function resolvePromptBuilder(builders: Readonly<Record<string, PromptBuilder>> | undefined, scope: SearchScope): PromptBuilder {
  const specific = scope.sibling ? builders?.[`${scope.phase}/${scope.sibling}`] : undefined;
  return specific ?? builders?.[scope.phase] ?? defaultPromptBuilder();
}

function withMaxTokens(build: PromptBuilder, maxTokens: number | undefined): PromptBuilder {
  if (maxTokens === undefined) return build;
  return (ctx) => {
    const request = build(ctx);
    return request.maxTokens === undefined ? { ...request, maxTokens } : request;
  };
}
