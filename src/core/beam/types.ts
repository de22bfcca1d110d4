import type { CandidateNode } from '../candidate/types.js';
import type { ValidationReport } from '../sandbox/pipeline.js';

export interface BeamConfig {
  /** Frontier size and exploring fan-out per node. */
  width: number;
  /** Expansion steps taken from the start frontier. */
  maxDepth: number;
  /** Stop at the first depth that produced a survivor. */
  acceptFirst: boolean;
}

/** A frontier member: a node plus the score that earned its place. */
export interface BeamEntry {
  readonly node: CandidateNode;
  readonly score: number;
  /** Spawn order within the search; start nodes use their arena id. */
  readonly seq: number;
}

export type ChildOutcome =
  | { kind: 'survivor'; entry: BeamEntry; report: ValidationReport }
  | { kind: 'rejected'; parent: CandidateNode; seq: number; node?: CandidateNode; reason: string; report?: ValidationReport };

export interface BeamObserver {
  onChild?(outcome: ChildOutcome): void | Promise<void>;
  onRanked?(args: { depth: number; frontier: readonly BeamEntry[]; rejected: number }): void | Promise<void>;
}

export interface SearchResult {
  accepted: BeamEntry;
  /** Expansion steps actually taken. */
  steps: number;
  /** Frontier after the last step. */
  frontier: readonly BeamEntry[];
}
