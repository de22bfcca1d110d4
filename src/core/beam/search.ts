import { CancelledError, GenerationError, NoViableCandidateError, describeError, throwIfAborted, toCancelled } from '../errors.js';
import { linkedController } from '../../utils/abort.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { CandidateTree } from '../candidate/tree.js';
import type { CandidateNode } from '../candidate/types.js';
import type { Generator } from '../generator/generator.js';
import type { GenerationResult } from '../generator/types.js';
import type { CandidateValidator } from '../sandbox/validator.js';
import { bestEntry, rankEntries } from './rank.js';
import type { BeamConfig, BeamEntry, BeamObserver, ChildOutcome, SearchResult } from './types.js';

export interface BeamSearchContext {
  goal: string;
  phase: string;
  sibling?: string;
  allowedPaths: readonly string[];
}

export interface BeamSearchActorOptions {
  tree: CandidateTree;
  generator: Generator;
  validator: CandidateValidator;
  config: BeamConfig;
  context: BeamSearchContext;
  observer?: BeamObserver;
  logger?: Logger;
}

/**
 * Depth-bounded beam search over one candidate tree.
 *
 * `expand` turns a frontier into the next one: every node gets W generator
 * calls (1 with feedback), every child is validated in its own sandbox, and
 * the survivors are ranked. An infrastructure failure in any child aborts the
 * rest of the expansion and propagates; a generation failure only costs that
 * child.
 */
export class BeamSearchActor {
  private spawned = 0;
  private readonly log: Logger;

  constructor(private readonly opts: BeamSearchActorOptions) {
    if (opts.config.width < 1) throw new RangeError(`beam width must be >= 1 (got ${opts.config.width})`);
    if (opts.config.maxDepth < 0) throw new RangeError(`maxDepth must be >= 0 (got ${opts.config.maxDepth})`);
    this.log = opts.logger ?? silentLogger;
  }

  get config(): BeamConfig {
    return this.opts.config;
  }

  /** Wraps start nodes as a frontier. */
  startFrontier(nodes: readonly CandidateNode[]): readonly BeamEntry[] {
    return Object.freeze(nodes.map((node) => Object.freeze({ node, score: 0, seq: node.id })));
  }

  async expand(frontier: readonly BeamEntry[], feedback?: string, signal?: AbortSignal): Promise<readonly BeamEntry[]> {
    throwIfAborted(signal);
    if (frontier.length === 0) throw new RangeError('cannot expand an empty frontier');

    const callsPerNode = feedback === undefined ? this.opts.config.width : 1;
    const depth = Math.max(...frontier.map((e) => e.node.depth)) + 1;
    const { controller, dispose } = linkedController(signal);
    let firstFailure: unknown = null;

    const tasks: Promise<ChildOutcome>[] = [];
    for (const entry of frontier) {
      for (let i = 0; i < callsPerNode; i++) {
        const seq = this.spawned++;
        tasks.push(
          this.spawnChild(entry.node, seq, feedback, controller.signal).catch((err: unknown) => {
            if (firstFailure === null && !(err instanceof CancelledError && controller.signal.aborted)) {
              firstFailure = err;
              controller.abort(new CancelledError(`expansion aborted: ${describeError(err)}`));
            }
            throw err;
          })
        );
      }
    }

    const settled = await Promise.allSettled(tasks);
    dispose();
    if (firstFailure !== null) throw firstFailure;
    if (signal?.aborted) throw toCancelled(signal);

    const survivors: BeamEntry[] = [];
    let rejected = 0;
    for (const s of settled) {
      if (s.status === 'rejected') throw s.reason;
      if (s.value.kind === 'survivor') survivors.push(s.value.entry);
      else rejected++;
    }

    if (survivors.length === 0) {
      this.log.warn('no viable candidate', { phase: this.opts.context.phase, sibling: this.opts.context.sibling, depth, rejected });
      throw new NoViableCandidateError(depth, rejected);
    }

    const next = rankEntries(survivors, this.opts.config.width);
    this.log.info('frontier ranked', {
      phase: this.opts.context.phase,
      sibling: this.opts.context.sibling,
      depth,
      survivors: survivors.length,
      rejected,
      kept: next.map((e) => ({ id: e.node.id, score: e.score }))
    });
    await this.opts.observer?.onRanked?.({ depth, frontier: next, rejected });
    return next;
  }

  /**
   * Expands from `start` for up to `maxDepth` steps and returns the best
   * survivor seen at any depth. With `maxDepth` 0 the best start node is
   * returned untouched.
   */
  async search(start: readonly CandidateNode[], opts: { feedback?: string; signal?: AbortSignal } = {}): Promise<SearchResult> {
    let frontier = this.startFrontier(start);
    const initial = bestEntry(frontier);
    if (!initial) throw new RangeError('search needs at least one start node');
    if (this.opts.config.maxDepth === 0) return { accepted: initial, steps: 0, frontier };

    const seen: BeamEntry[] = [];
    let steps = 0;
    while (steps < this.opts.config.maxDepth) {
      frontier = await this.expand(frontier, opts.feedback, opts.signal);
      steps++;
      seen.push(...frontier);
      if (this.opts.config.acceptFirst) break;
    }

    const accepted = bestEntry(seen) ?? initial;
    return { accepted, steps, frontier };
  }

  private async spawnChild(parent: CandidateNode, seq: number, feedback: string | undefined, signal: AbortSignal): Promise<ChildOutcome> {
    const { tree, generator, validator, context, observer } = this.opts;
    const parentFiles = tree.mergedFiles(parent.id);

    let generated: GenerationResult;
    try {
      generated = await generator.complete(
        {
          goal: context.goal,
          phase: context.phase,
          sibling: context.sibling,
          files: parentFiles,
          feedback,
          depth: parent.depth + 1,
          allowedPaths: context.allowedPaths
        },
        undefined,
        signal
      );
    } catch (err) {
      if (!(err instanceof GenerationError)) throw err;
      const outcome: ChildOutcome = { kind: 'rejected', parent, seq, reason: err.message };
      await observer?.onChild?.(outcome);
      return outcome;
    }

    const node = tree.addChild(parent.id, generated.files, {
      phase: context.phase,
      sibling: context.sibling,
      prompt: generated.prompt,
      rawResponse: generated.rawText,
      feedback,
      attempt: generated.attempts
    });

    const report = await validator.validate({ node, files: tree.mergedFiles(node.id), signal });
    const outcome: ChildOutcome = report.passed
      ? { kind: 'survivor', entry: Object.freeze({ node, score: report.score, seq }), report }
      : { kind: 'rejected', parent, seq, node, reason: report.rejection?.message ?? 'validation failed', report };
    await observer?.onChild?.(outcome);
    return outcome;
  }
}
