import { z } from 'zod';

import { RecordedError, isEngineError } from '../errors.js';
import type { FileSet } from '../candidate/types.js';
import type { PhaseStateMachine } from '../phase/state-machine.js';
import type { MachineState } from '../phase/types.js';
import type { ErrorSummary, SessionAction, SessionOutput, SessionStatus } from './types.js';

export const TRUNCATED_PLACEHOLDER = 'large file truncated';

export function summarizeError(err: Error): ErrorSummary {
  if (err instanceof RecordedError) return { code: err.code, message: err.message };
  return { code: isEngineError(err) ? err.code : 'INTERNAL', message: err.message };
}

export function availableActions(state: MachineState): SessionAction[] {
  switch (state.kind) {
    case 'awaiting_confirmation':
      return ['confirm', 'apply_feedback', 'diff'];
    case 'completed':
      return ['diff'];
    case 'failed':
      return ['get_error'];
    default:
      return ['wait'];
  }
}

/** Review copies: any content longer than `maxChars` is replaced by a placeholder. */
export function truncateForReview(files: FileSet, maxChars: number): Record<string, string> {
  const out: Record<string, string> = {};
  for (const path of Object.keys(files).sort()) {
    const content = files[path] ?? '';
    out[path] = content.length > maxChars ? TRUNCATED_PLACEHOLDER : content;
  }
  return out;
}

export function buildOutput(machine: PhaseStateMachine, reviewMaxChars: number): SessionOutput {
  const state = machine.state;
  switch (state.kind) {
    case 'awaiting_confirmation':
      return { kind: 'review', phase: state.phase, files: truncateForReview(machine.accumulatedFiles(), reviewMaxChars) };
    case 'completed':
      return { kind: 'application', files: { ...machine.accumulatedFiles() } };
    case 'failed': {
      const error = machine.error;
      return { kind: 'error', error: error ? summarizeError(error) : { code: 'INTERNAL', message: 'session failed' } };
    }
    default:
      return { kind: 'processing', phase: state.phase };
  }
}

export function buildStatus(sessionId: string, machine: PhaseStateMachine, reviewMaxChars: number): SessionStatus {
  const error = machine.error;
  return {
    sessionId,
    state: machine.label,
    output: buildOutput(machine, reviewMaxChars),
    availableActions: availableActions(machine.state),
    isCompleted: machine.state.kind === 'completed',
    error: error ? summarizeError(error) : null
  };
}

export const PhaseProgress = z.enum(['pending', 'running', 'awaiting_confirmation', 'accepted', 'failed']);

export const SessionStatusSnapshotV1Schema = z.object({
  version: z.literal(1),
  session_id: z.string().min(1),
  goal: z.string(),
  state: z.string().min(1),
  current_phase: z.string().nullable(),
  is_completed: z.boolean(),
  available_actions: z.array(z.enum(['confirm', 'apply_feedback', 'diff', 'get_error', 'wait'])),
  phases: z.array(
    z.object({
      name: z.string().min(1),
      status: PhaseProgress,
      accepted_candidate: z.number().int().nonnegative().nullable(),
      score: z.number().nullable()
    })
  ),
  files: z.array(z.string()),
  error: z.object({ code: z.string(), message: z.string() }).nullable(),
  started_at: z.string().min(1),
  updated_at: z.string().min(1)
});

export type SessionStatusSnapshotV1 = z.infer<typeof SessionStatusSnapshotV1Schema>;

export function buildSessionStatusSnapshotV1(args: {
  sessionId: string;
  goal: string;
  startedAtIso: string;
  machine: PhaseStateMachine;
}): SessionStatusSnapshotV1 {
  const { machine } = args;
  const state = machine.state;
  const currentPhase = state.kind === 'completed' ? null : state.phase;
  const error = machine.error;

  const snapshot: SessionStatusSnapshotV1 = {
    version: 1,
    session_id: args.sessionId,
    goal: args.goal,
    state: machine.label,
    current_phase: currentPhase,
    is_completed: state.kind === 'completed',
    available_actions: availableActions(state),
    phases: machine.phaseNames.map((name) => {
      const out = machine.output(name);
      return {
        name,
        status: phaseProgress(name, state, out !== undefined),
        accepted_candidate: out ? out.node.id : null,
        score: out ? out.score : null
      };
    }),
    files: Object.keys(machine.accumulatedFiles()).sort(),
    error: error ? summarizeError(error) : null,
    started_at: args.startedAtIso,
    updated_at: new Date().toISOString()
  };

  return SessionStatusSnapshotV1Schema.parse(snapshot);
}

function phaseProgress(name: string, state: MachineState, accepted: boolean): z.infer<typeof PhaseProgress> {
  if (state.kind !== 'completed' && state.phase === name) {
    return state.kind === 'failed' ? 'failed' : state.kind;
  }
  return accepted ? 'accepted' : 'pending';
}
