import { NoViableCandidateError, describeError } from '../errors.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { SiblingSpec } from '../../config/settings.js';
import type { BeamSearchActor } from '../beam/search.js';
import type { SearchResult } from '../beam/types.js';
import type { CandidateNode } from '../candidate/types.js';
import type { PhaseDefinition, SearchScope } from './types.js';

export function phaseScope(def: PhaseDefinition): SearchScope {
  return {
    phase: def.name,
    beam: { width: def.beamWidth, maxDepth: def.maxDepth, acceptFirst: def.acceptFirst },
    allowedPaths: def.allowedPaths,
    stages: def.stages,
    baseEnvironment: def.baseEnvironment
  };
}

/** Re-runs the search from the same start after a NoViableCandidateError, `retries` more times. */
export async function searchWithRetries(
  actor: BeamSearchActor,
  start: readonly CandidateNode[],
  opts: { retries: number; feedback?: string; signal?: AbortSignal; logger?: Logger }
): Promise<SearchResult> {
  const log = opts.logger ?? silentLogger;
  for (let attempt = 0; ; attempt++) {
    try {
      return await actor.search(start, { feedback: opts.feedback, signal: opts.signal });
    } catch (err) {
      if (!(err instanceof NoViableCandidateError) || attempt >= opts.retries) throw err;
      log.warn('retrying search after no viable candidate', { attempt: attempt + 1, of: opts.retries, error: describeError(err) });
    }
  }
}

export function siblingScope(def: PhaseDefinition, sibling: SiblingSpec): SearchScope {
  const base = phaseScope(def);
  return {
    ...base,
    sibling: sibling.name,
    allowedPaths: sibling.allowedPaths.length > 0 ? sibling.allowedPaths : base.allowedPaths,
    stages: sibling.stages ?? base.stages,
    baseEnvironment: sibling.baseEnvironment ?? base.baseEnvironment
  };
}
