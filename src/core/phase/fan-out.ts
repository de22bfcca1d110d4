import { CancelledError, describeError, toCancelled } from '../errors.js';
import { linkedController } from '../../utils/abort.js';
import type { Logger } from '../../utils/logger.js';
import type { SiblingSpec } from '../../config/settings.js';
import { CandidateTree } from '../candidate/tree.js';
import type { CandidateNode, FileSet } from '../candidate/types.js';
import { searchWithRetries, siblingScope } from './search.js';
import type { ActorFactory, PhaseDefinition, PhaseOutput, SiblingOutput } from './types.js';

export interface FanOutOptions {
  createActor: ActorFactory;
  logger: Logger;
  signal?: AbortSignal;
  /** Refine each sibling's accepted output with `feedback` instead of searching from upstream. */
  refine?: { previous: readonly SiblingOutput[]; feedback: string };
}

/**
 * Runs every sibling's search against the same upstream files at once. The
 * first sibling failure aborts the others and is rethrown once all of them
 * have settled. With `refine`, every sibling continues from its own accepted
 * node with the feedback attached and is validated against its own stages.
 * On success the output is a join node below a fresh root whose files overlay
 * the sibling deltas in declaration order.
 */
export async function runFanOut(def: PhaseDefinition, upstream: FileSet, opts: FanOutOptions): Promise<PhaseOutput> {
  const siblings = def.siblings ?? [];
  const { controller, dispose } = linkedController(opts.signal);
  let firstFailure: unknown = null;

  const settled = await Promise.allSettled(
    siblings.map(async (sibling) => {
      const log = opts.logger.child(`${def.name}/${sibling.name}`);
      try {
        return await runSibling(def, sibling, upstream, opts, controller.signal, log);
      } catch (err) {
        if (firstFailure === null && !(err instanceof CancelledError && controller.signal.aborted)) {
          firstFailure = err;
          log.error('sibling failed; aborting the others', { error: describeError(err) });
          controller.abort(new CancelledError(`sibling '${sibling.name}' failed: ${describeError(err)}`));
        }
        throw err;
      }
    })
  );
  dispose();

  if (firstFailure !== null) throw firstFailure;
  if (opts.signal?.aborted) throw toCancelled(opts.signal);

  const outputs: SiblingOutput[] = [];
  for (const s of settled) {
    if (s.status === 'rejected') throw s.reason;
    outputs.push(s.value);
  }
  return join(def.name, upstream, outputs);
}

async function runSibling(
  def: PhaseDefinition,
  sibling: SiblingSpec,
  upstream: FileSet,
  opts: FanOutOptions,
  signal: AbortSignal,
  log: Logger
): Promise<SiblingOutput> {
  const scope = siblingScope(def, sibling);
  let tree: CandidateTree;
  let start: CandidateNode;
  if (opts.refine) {
    const previous = opts.refine.previous.find((p) => p.sibling === sibling.name);
    if (!previous) throw new Error(`sibling '${def.name}/${sibling.name}' has no accepted output to refine`);
    tree = previous.tree;
    start = previous.node;
  } else {
    tree = new CandidateTree();
    start = tree.addRoot(upstream, { phase: def.name, sibling: sibling.name, prompt: '', rawResponse: '' });
  }

  const actor = opts.createActor(scope, tree);
  const result = await searchWithRetries(actor, [start], {
    retries: def.expansionRetries,
    feedback: opts.refine?.feedback,
    signal,
    logger: log
  });
  log.info('sibling accepted', { candidate: result.accepted.node.id, score: result.accepted.score });
  return { sibling: sibling.name, tree, node: result.accepted.node, score: result.accepted.score };
}

/** Files each sibling changed relative to upstream, overlaid in sibling order. */
export function join(phase: string, upstream: FileSet, outputs: readonly SiblingOutput[]): PhaseOutput {
  const merged: Record<string, string> = {};
  for (const out of outputs) {
    for (const [path, content] of Object.entries(out.tree.mergedFiles(out.node.id))) {
      if (upstream[path] !== content) merged[path] = content;
    }
  }

  const tree = new CandidateTree();
  const root = tree.addRoot(upstream, { phase, prompt: '', rawResponse: '' });
  const node = tree.addChild(root.id, merged, {
    phase,
    prompt: '',
    rawResponse: '',
    mergedFrom: outputs.map((o) => ({ sibling: o.sibling, candidate: o.node.id }))
  });
  const score = outputs.reduce((acc, o) => acc + o.score, 0);
  return { phase, tree, node, score, files: tree.mergedFiles(node.id), siblings: [...outputs] };
}
