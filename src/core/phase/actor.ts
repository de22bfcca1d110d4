import { silentLogger, type Logger } from '../../utils/logger.js';
import type { SearchResult } from '../beam/types.js';
import { CandidateTree } from '../candidate/tree.js';
import type { FileSet } from '../candidate/types.js';
import { runFanOut } from './fan-out.js';
import { phaseScope, searchWithRetries } from './search.js';
import type { ActorFactory, PhaseDefinition, PhaseOutput } from './types.js';

export interface PhaseRunnerOptions {
  createActor: ActorFactory;
  logger?: Logger;
}

/** Runs one phase to an accepted output: a single search, or a fan-out join. */
export class PhaseRunner {
  private readonly log: Logger;

  constructor(private readonly opts: PhaseRunnerOptions) {
    this.log = opts.logger ?? silentLogger;
  }

  async run(def: PhaseDefinition, upstream: FileSet, signal?: AbortSignal): Promise<PhaseOutput> {
    if (def.siblings?.length) {
      return await runFanOut(def, upstream, { createActor: this.opts.createActor, logger: this.log, signal });
    }

    const tree = new CandidateTree();
    const root = tree.addRoot(upstream, { phase: def.name, prompt: '', rawResponse: '' });
    const actor = this.opts.createActor(phaseScope(def), tree);
    const result = await searchWithRetries(actor, [root], {
      retries: def.expansionRetries,
      signal,
      logger: this.log.child(def.name)
    });
    return toOutput(def.name, tree, result);
  }

  /**
   * One generator call per frontier node, feedback attached, starting from the
   * accepted node. A fan-out phase refines every sibling and joins them again.
   */
  async refine(def: PhaseDefinition, previous: PhaseOutput, feedback: string, upstream: FileSet, signal?: AbortSignal): Promise<PhaseOutput> {
    if (def.siblings?.length) {
      return await runFanOut(def, upstream, {
        createActor: this.opts.createActor,
        logger: this.log,
        signal,
        refine: { previous: previous.siblings ?? [], feedback }
      });
    }

    const actor = this.opts.createActor(phaseScope(def), previous.tree);
    const result = await searchWithRetries(actor, [previous.node], {
      feedback,
      retries: def.expansionRetries,
      signal,
      logger: this.log.child(def.name)
    });
    return toOutput(def.name, previous.tree, result);
  }
}

function toOutput(phase: string, tree: CandidateTree, result: SearchResult): PhaseOutput {
  const { node, score } = result.accepted;
  return { phase, tree, node, score, files: tree.mergedFiles(node.id) };
}
