import type { PhaseSpec } from '../../config/settings.js';
import type { BeamSearchActor } from '../beam/search.js';
import type { BeamConfig } from '../beam/types.js';
import type { CandidateTree } from '../candidate/tree.js';
import type { CandidateNode, FileSet } from '../candidate/types.js';
import type { ValidationStage } from '../sandbox/pipeline.js';

export type PhaseDefinition = PhaseSpec;

/** Everything one beam search needs to know about where it runs. */
export interface SearchScope {
  phase: string;
  sibling?: string;
  beam: BeamConfig;
  allowedPaths: readonly string[];
  stages: readonly ValidationStage[];
  baseEnvironment?: string;
}

/** Builds the actor for one search; the session wires generator, validator and audit hooks here. */
export type ActorFactory = (scope: SearchScope, tree: CandidateTree) => BeamSearchActor;

export interface SiblingOutput {
  sibling: string;
  tree: CandidateTree;
  node: CandidateNode;
  score: number;
}

export interface PhaseOutput {
  phase: string;
  /** Tree holding `node`; feedback refinements grow it further. */
  tree: CandidateTree;
  node: CandidateNode;
  score: number;
  /** Full file set of `node`. */
  files: FileSet;
  siblings?: SiblingOutput[];
}

export type PhaseStatus = 'pending' | 'running' | 'awaiting_confirmation';

export type MachineState = { kind: PhaseStatus; phase: string } | { kind: 'completed' } | { kind: 'failed'; phase: string | null };

export function stateLabel(state: MachineState): string {
  switch (state.kind) {
    case 'completed':
      return 'completed';
    case 'failed':
      return 'failed';
    default:
      return `${state.phase}.${state.kind}`;
  }
}
