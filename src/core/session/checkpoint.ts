import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { PhaseList, type PhaseSpec } from '../../config/settings.js';
import { isErrnoException } from '../../utils/fs.js';
import type { FileSet } from '../candidate/types.js';
import { CheckpointError, SessionNotFoundError } from '../errors.js';
import { MachineCheckpointV1Schema } from '../phase/checkpoint.js';
import type { PhaseStateMachine } from '../phase/state-machine.js';

export const CHECKPOINT_FILE = 'checkpoint.json';

export const SessionCheckpointV1Schema = z.object({
  version: z.literal(1),
  session_id: z.string().min(1),
  goal: z.string(),
  started_at: z.string().min(1),
  phases: PhaseList,
  initial_files: z.record(z.string(), z.string()),
  machine: MachineCheckpointV1Schema,
  updated_at: z.string().min(1)
});

export type SessionCheckpointV1 = z.infer<typeof SessionCheckpointV1Schema>;

export function buildSessionCheckpointV1(args: {
  sessionId: string;
  goal: string;
  startedAtIso: string;
  phases: readonly PhaseSpec[];
  initialFiles: FileSet;
  machine: PhaseStateMachine;
}): SessionCheckpointV1 {
  return SessionCheckpointV1Schema.parse({
    version: 1,
    session_id: args.sessionId,
    goal: args.goal,
    started_at: args.startedAtIso,
    phases: args.phases,
    initial_files: { ...args.initialFiles },
    machine: args.machine.checkpoint(),
    updated_at: new Date().toISOString()
  });
}

/** A missing file means the session was never persisted; anything unreadable is a CheckpointError. */
export async function readSessionCheckpoint(path: string, sessionId: string): Promise<SessionCheckpointV1> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') throw new SessionNotFoundError(sessionId);
    throw err;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new CheckpointError(`checkpoint of session '${sessionId}' is not valid JSON`, { cause: err });
  }

  const parsed = SessionCheckpointV1Schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : '';
    throw new CheckpointError(`invalid checkpoint of session '${sessionId}': ${where ? `${where}: ` : ''}${issue?.message ?? 'unknown issue'}`, {
      cause: parsed.error
    });
  }
  if (parsed.data.session_id !== sessionId) {
    throw new CheckpointError(`checkpoint belongs to session '${parsed.data.session_id}', not '${sessionId}'`);
  }
  return parsed.data;
}
