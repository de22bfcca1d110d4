import { z } from 'zod';

import { CheckpointError, RecordedError } from '../errors.js';
import { CandidateTree } from '../candidate/tree.js';
import type { FileSet } from '../candidate/types.js';
import type { MachineState, PhaseDefinition, PhaseOutput, SiblingOutput } from './types.js';

const FileSetSchema = z.record(z.string(), z.string());

export const MachineCheckpointV1Schema = z.object({
  version: z.literal(1),
  state: z.union([
    z.object({ kind: z.enum(['pending', 'running', 'awaiting_confirmation']), phase: z.string().min(1) }),
    z.object({ kind: z.literal('completed') }),
    z.object({ kind: z.literal('failed'), phase: z.string().min(1).nullable() })
  ]),
  /** Position of the current phase in the declared list. */
  index: z.number().int().nonnegative(),
  outputs: z.array(
    z.object({
      phase: z.string().min(1),
      score: z.number(),
      files: FileSetSchema,
      siblings: z.array(z.object({ sibling: z.string().min(1), score: z.number(), files: FileSetSchema })).optional()
    })
  ),
  error: z.object({ code: z.string().min(1), message: z.string() }).nullable()
});

export type MachineCheckpointV1 = z.infer<typeof MachineCheckpointV1Schema>;

export interface RestoredMachine {
  state: MachineState;
  index: number;
  outputs: PhaseOutput[];
  error: Error | null;
}

export function buildMachineCheckpointV1(args: {
  state: MachineState;
  index: number;
  outputs: readonly PhaseOutput[];
  error: { code: string; message: string } | null;
}): MachineCheckpointV1 {
  return MachineCheckpointV1Schema.parse({
    version: 1,
    state: args.state,
    index: args.index,
    outputs: args.outputs.map((out) => ({
      phase: out.phase,
      score: out.score,
      files: { ...out.files },
      siblings: out.siblings?.map((s) => ({ sibling: s.sibling, score: s.score, files: { ...s.tree.mergedFiles(s.node.id) } }))
    })),
    error: args.error
  });
}

/**
 * Rebuilds machine state from a checkpoint taken against `phases`.
 *
 * Search trees are not persisted: every accepted output (and every sibling
 * output) comes back as the root of a fresh tree holding its full file set,
 * so feedback refines from it as before. A phase that was running is rerun
 * from scratch, or returns to review when it already had an accepted output.
 */
export function restoreMachine(data: unknown, phases: readonly PhaseDefinition[]): RestoredMachine {
  const parsed = MachineCheckpointV1Schema.safeParse(data);
  if (!parsed.success) {
    throw new CheckpointError(`invalid machine checkpoint: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`, { cause: parsed.error });
  }
  const cp = parsed.data;

  const current = phases[cp.index];
  if (!current) throw new CheckpointError(`checkpoint points at phase #${cp.index}, but only ${phases.length} are declared`);

  const outputs: PhaseOutput[] = [];
  for (const record of cp.outputs) {
    const position = phases.findIndex((p) => p.name === record.phase);
    const def = phases[position];
    if (!def) throw new CheckpointError(`checkpoint has output for unknown phase '${record.phase}'`);
    if (position > cp.index) throw new CheckpointError(`checkpoint has output for phase '${record.phase}', which has not run yet`);
    if (outputs.some((o) => o.phase === record.phase)) throw new CheckpointError(`checkpoint has two outputs for phase '${record.phase}'`);
    outputs.push(restoreOutput(def, record));
  }

  for (const def of phases.slice(0, cp.index)) {
    if (!outputs.some((o) => o.phase === def.name)) {
      throw new CheckpointError(`phase '${def.name}' was passed without an accepted output`);
    }
  }

  const state = cp.state;
  if (state.kind === 'completed') {
    if (cp.index !== phases.length - 1 || outputs.length !== phases.length) {
      throw new CheckpointError('completed checkpoint is missing phase outputs');
    }
  } else if (state.phase !== null && state.phase !== current.name) {
    throw new CheckpointError(`checkpoint state names phase '${state.phase}', expected '${current.name}'`);
  }

  const hasCurrent = outputs.some((o) => o.phase === current.name);
  if (state.kind === 'awaiting_confirmation' && !hasCurrent) {
    throw new CheckpointError(`phase '${current.name}' awaits confirmation without an accepted output`);
  }

  let restored: MachineState = state;
  if (state.kind === 'running') {
    restored = { kind: hasCurrent ? 'awaiting_confirmation' : 'pending', phase: state.phase };
  }

  return {
    state: restored,
    index: cp.index,
    outputs,
    error: cp.error ? new RecordedError(cp.error.code, cp.error.message) : null
  };
}

function restoreOutput(def: PhaseDefinition, record: MachineCheckpointV1['outputs'][number]): PhaseOutput {
  const declared = (def.siblings ?? []).map((s) => s.name);
  const recorded = (record.siblings ?? []).map((s) => s.sibling);
  if (declared.join('\n') !== recorded.join('\n')) {
    throw new CheckpointError(`checkpoint siblings of phase '${def.name}' do not match its declaration`);
  }

  const { tree, node } = rootOf(record.files, def.name);
  const siblings = record.siblings?.map((s): SiblingOutput => ({ sibling: s.sibling, score: s.score, ...rootOf(s.files, def.name, s.sibling) }));
  return { phase: def.name, tree, node, score: record.score, files: tree.mergedFiles(node.id), siblings };
}

function rootOf(files: FileSet, phase: string, sibling?: string) {
  const tree = new CandidateTree();
  const node = tree.addRoot(files, { phase, sibling, prompt: '', rawResponse: '' });
  return { tree, node };
}
