export interface DiffResult {
  files: DiffFile[];
  summary: { additions: number; deletions: number; filesChanged: number };
  raw: string;
}

export interface DiffFile {
  path: string;
  changeType: 'added' | 'modified' | 'deleted';
  additions: number;
  deletions: number;
}

/** Outputs of `git diff --cached --no-renames`: plain, `--name-status` and `--numstat`. */
export interface DiffParseInput {
  rawDiff: string;
  nameStatus: string;
  numStat: string;
}

const CHANGE_TYPES: Readonly<Record<string, DiffFile['changeType']>> = { A: 'added', D: 'deleted' };

/** One entry per path, sorted; counts and change type joined by path. */
export function parseDiff({ rawDiff, nameStatus, numStat }: DiffParseInput): DiffResult {
  const counts = parseNumStat(numStat);
  const changeTypes = parseNameStatus(nameStatus);

  const paths = [...new Set([...counts.keys(), ...changeTypes.keys()])].sort();
  const files = paths.map((path): DiffFile => {
    const { additions, deletions } = counts.get(path) ?? { additions: 0, deletions: 0 };
    return { path, changeType: changeTypes.get(path) ?? 'modified', additions, deletions };
  });

  const summary = { additions: 0, deletions: 0, filesChanged: files.length };
  for (const f of files) {
    summary.additions += f.additions;
    summary.deletions += f.deletions;
  }

  return { files, summary, raw: rawDiff };
}

function parseNumStat(numStat: string): Map<string, { additions: number; deletions: number }> {
  const out = new Map<string, { additions: number; deletions: number }>();
  for (const line of numStat.split('\n')) {
    const [adds, dels, rawPath] = line.split('\t');
    const path = rawPath?.trim();
    if (adds === undefined || dels === undefined || !path) continue;
    // Binary files report '-'.
    out.set(path, { additions: toCount(adds), deletions: toCount(dels) });
  }
  return out;
}

function parseNameStatus(nameStatus: string): Map<string, DiffFile['changeType']> {
  const out = new Map<string, DiffFile['changeType']>();
  for (const line of nameStatus.split('\n')) {
    const [status, rawPath] = line.split('\t');
    const path = rawPath?.trim();
    if (!status || !path) continue;
    out.set(path, CHANGE_TYPES[status.trim()] ?? 'modified');
  }
  return out;
}

function toCount(s: string): number {
  const n = Number.parseInt(s, 10);
  return Number.isFinite(n) ? n : 0;
}
