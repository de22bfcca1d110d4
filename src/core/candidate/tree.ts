import type { CandidateId, CandidateNode, FileSet, Provenance } from './types.js';

/**
 * Append-only arena of candidate nodes.
 *
 * Nodes are frozen on insertion and refer to their parent by index, so a node
 * can be shared across concurrent tasks without locking. The only way to add a
 * node below depth 0 is `addChild`, which derives depth from the parent; cycles
 * cannot be expressed.
 */
export class CandidateTree {
  private readonly nodes: CandidateNode[] = [];

  get size(): number {
    return this.nodes.length;
  }

  addRoot(files: FileSet, provenance: Provenance): CandidateNode {
    return this.insert(null, 0, files, provenance);
  }

  addChild(parentId: CandidateId, files: FileSet, provenance: Provenance): CandidateNode {
    const parent = this.get(parentId);
    return this.insert(parent.id, parent.depth + 1, files, provenance);
  }

  get(id: CandidateId): CandidateNode {
    const node = this.nodes[id];
    if (!node) throw new Error(`Unknown candidate ${id}`);
    return node;
  }

  has(node: CandidateNode): boolean {
    return this.nodes[node.id] === node;
  }

  parent(id: CandidateId): CandidateNode | null {
    const node = this.get(id);
    return node.parentId === null ? null : this.get(node.parentId);
  }

  children(id: CandidateId): CandidateNode[] {
    return this.nodes.filter((n) => n.parentId === id);
  }

  /** Root first, `id` last. */
  trajectory(id: CandidateId): CandidateNode[] {
    const path: CandidateNode[] = [];
    let cur: CandidateNode | null = this.get(id);
    while (cur) {
      path.push(cur);
      cur = cur.parentId === null ? null : this.get(cur.parentId);
    }
    return path.reverse();
  }

  /** File set seen by `id`: every delta along the trajectory, later nodes win. */
  mergedFiles(id: CandidateId): FileSet {
    const merged: Record<string, string> = {};
    for (const node of this.trajectory(id)) {
      Object.assign(merged, node.files);
    }
    return Object.freeze(merged);
  }

  private insert(parentId: CandidateId | null, depth: number, files: FileSet, provenance: Provenance): CandidateNode {
    const node: CandidateNode = Object.freeze({
      id: this.nodes.length,
      parentId,
      depth,
      files: Object.freeze({ ...files }),
      provenance: Object.freeze({ ...provenance })
    });
    this.nodes.push(node);
    return node;
  }
}
