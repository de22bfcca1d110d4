import { basename, join } from 'node:path';

import type { DiffResult } from '../../git/diff-parser.js';
import { writeJson, writeText } from '../../utils/fs.js';
import type { StageResult } from '../sandbox/pipeline.js';
import type { StageEvidenceMeta } from './types.js';

export interface SessionEvidencePaths {
  evidenceDir: string;
  stagesDir: string;
  diffsDir: string;
}

export function evidencePaths(sessionDir: string): SessionEvidencePaths {
  const evidenceDir = join(sessionDir, 'evidence');
  return {
    evidenceDir,
    stagesDir: join(evidenceDir, 'stages'),
    diffsDir: join(evidenceDir, 'diffs')
  };
}

/**
 * Raw artifacts that are too large for the ledger: stage output per candidate
 * and computed diffs. Each subject (e.g. `draft-c4`) gets its own sequence.
 */
export class EvidenceCollector {
  private seqBySubject = new Map<string, number>();

  constructor(private paths: SessionEvidencePaths) {}

  nextSeq(subject: string): number {
    const next = (this.seqBySubject.get(subject) ?? 0) + 1;
    this.seqBySubject.set(subject, next);
    return next;
  }

  async recordStage(
    subject: string,
    result: StageResult
  ): Promise<{ stdoutPath: string; stderrPath: string; metaPath: string }> {
    const seq = this.nextSeq(subject);
    const base = join(this.paths.stagesDir, `${sanitize(subject)}-${seq}-${sanitize(result.name)}`);
    const stdoutPath = `${base}.stdout`;
    const stderrPath = `${base}.stderr`;
    const metaPath = `${base}.meta.json`;

    await writeText(stdoutPath, result.stdout);
    await writeText(stderrPath, result.stderr);
    const meta: StageEvidenceMeta = {
      subject,
      seq,
      timestamp: new Date().toISOString(),
      stage: result.name,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
      durationMs: Math.max(0, Math.round(result.durationMs)),
      stdoutFile: basename(stdoutPath),
      stderrFile: basename(stderrPath)
    };
    await writeJson(metaPath, meta);

    return { stdoutPath, stderrPath, metaPath };
  }

  async recordDiff(subject: string, diff: DiffResult): Promise<{ diffPath: string; metaPath: string }> {
    const seq = this.nextSeq(subject);
    const diffPath = join(this.paths.diffsDir, `${sanitize(subject)}-${seq}.diff`);
    const metaPath = `${diffPath}.meta.json`;

    await writeText(diffPath, diff.raw);
    await writeJson(metaPath, {
      subject,
      seq,
      timestamp: new Date().toISOString(),
      summary: diff.summary,
      files: diff.files
    });

    return { diffPath, metaPath };
  }

  async captureFinalFiles(files: Readonly<Record<string, string>>): Promise<string> {
    const path = join(this.paths.evidenceDir, 'final-tree.txt');
    await writeText(path, `${Object.keys(files).sort().join('\n')}\n`);
    return path;
  }
}

function sanitize(s: string): string {
  return s.replaceAll(/[^a-zA-Z0-9._-]/g, '_');
}
