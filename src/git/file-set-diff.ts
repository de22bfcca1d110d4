import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { InvalidPathError } from '../core/errors.js';
import { writeText } from '../utils/fs.js';
import { normalizeRelativePath } from '../utils/paths.js';
import type { DiffResult } from './diff-parser.js';
import { commit, diffStaged, git, initRepo, stageAll } from './operations.js';

/**
 * Unified diff of two in-memory file sets, computed by git in a scratch
 * repository: baseline committed, working tree replaced by `current`,
 * everything staged and diffed against HEAD. Paths that are absolute, escape
 * the root or name `.git` are rejected with InvalidPathError.
 */
export async function diffFileSets(
  baseline: Readonly<Record<string, string>>,
  current: Readonly<Record<string, string>>,
  opts: { tmpRoot?: string } = {}
): Promise<DiffResult> {
  const baselineFiles = checkedEntries(baseline);
  const currentFiles = checkedEntries(current);
  const dir = await mkdtemp(join(opts.tmpRoot ?? tmpdir(), 'beamforge-diff-'));
  try {
    const repo = git(dir);
    await initRepo(repo);
    await writeFileSet(dir, baselineFiles);
    await commit(repo, 'baseline');

    await clearWorkingTree(dir);
    await writeFileSet(dir, currentFiles);
    await stageAll(repo);
    return await diffStaged(repo);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/** Paths normalized and checked before anything touches the disk; `.git` belongs to the scratch repo. */
function checkedEntries(files: Readonly<Record<string, string>>): Array<[string, string]> {
  return Object.entries(files).map(([raw, content]) => {
    const path = normalizeRelativePath(raw);
    if (path === '.git' || path.startsWith('.git/')) throw new InvalidPathError(raw, 'reserved path');
    return [path, content];
  });
}

async function writeFileSet(dir: string, files: Array<[string, string]>): Promise<void> {
  for (const [path, content] of files) {
    await writeText(join(dir, path), content);
  }
}

async function clearWorkingTree(dir: string): Promise<void> {
  for (const entry of await readdir(dir)) {
    if (entry === '.git') continue;
    await rm(join(dir, entry), { recursive: true, force: true });
  }
}
