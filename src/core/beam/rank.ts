import type { BeamEntry } from './types.js';

/** Score descending, then shallower first, then earlier spawn. */
export function compareEntries(a: BeamEntry, b: BeamEntry): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.node.depth !== b.node.depth) return a.node.depth - b.node.depth;
  return a.seq - b.seq;
}

export function rankEntries(entries: readonly BeamEntry[], width: number): readonly BeamEntry[] {
  return Object.freeze([...entries].sort(compareEntries).slice(0, Math.max(1, width)));
}

export function bestEntry(entries: readonly BeamEntry[]): BeamEntry | null {
  return rankEntries(entries, 1)[0] ?? null;
}
