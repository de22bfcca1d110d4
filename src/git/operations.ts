import { execa } from 'execa';

import { parseDiff, type DiffResult } from './diff-parser.js';

export interface GitRepo {
  repoRoot: string;
}

export function git(repoRoot: string): GitRepo {
  return { repoRoot };
}

// Scratch repositories must not depend on the host's identity or signing setup.
const IDENTITY = ['-c', 'user.name=beamforge', '-c', 'user.email=beamforge@localhost', '-c', 'commit.gpgsign=false'];

async function run(repo: GitRepo, args: string[]): Promise<string> {
  const res = await execa('git', args, {
    cwd: repo.repoRoot,
    stdout: 'pipe',
    stderr: 'pipe',
    stripFinalNewline: false
  });
  return res.stdout;
}

export async function initRepo(repo: GitRepo): Promise<void> {
  await run(repo, ['init', '--quiet']);
}

export async function stageAll(repo: GitRepo): Promise<void> {
  await run(repo, ['add', '-A']);
}

/** Stages everything and commits, even when nothing changed. */
export async function commit(repo: GitRepo, message: string): Promise<void> {
  await stageAll(repo);
  await run(repo, [...IDENTITY, 'commit', '--quiet', '--allow-empty', '-m', message]);
}

/**
 * Index against HEAD. Rename detection is off so that the three outputs agree
 * on one path per line.
 */
export async function diffStaged(repo: GitRepo): Promise<DiffResult> {
  const base = ['diff', '--cached', '--no-renames', '--no-color'];
  const [rawDiff, nameStatus, numStat] = await Promise.all([
    run(repo, base),
    run(repo, [...base, '--name-status']),
    run(repo, [...base, '--numstat'])
  ]);
  return parseDiff({ rawDiff, nameStatus, numStat });
}
