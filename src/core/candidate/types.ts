export type FileSet = Readonly<Record<string, string>>;

export type CandidateId = number;

export interface Provenance {
  phase: string;
  sibling?: string;
  /** Rendered prompt sent to the completion client (empty for roots and join nodes). */
  prompt: string;
  rawResponse: string;
  feedback?: string;
  attempt?: number;
  /** Sibling outputs a join node was merged from, in merge order. */
  mergedFrom?: Array<{ sibling: string; candidate: CandidateId }>;
}

export interface CandidateNode {
  readonly id: CandidateId;
  readonly parentId: CandidateId | null;
  readonly depth: number;
  /** Files produced by this node's generation step; `CandidateTree.mergedFiles` gives the full set. */
  readonly files: FileSet;
  readonly provenance: Readonly<Provenance>;
}
