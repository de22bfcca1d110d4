import { CancelledError, InvalidTransitionError, RecordedError, describeError, isEngineError, toCancelled } from '../errors.js';
import { diffFileSets } from '../../git/file-set-diff.js';
import type { DiffResult } from '../../git/diff-parser.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { FileSet } from '../candidate/types.js';
import type { PhaseRunner } from './actor.js';
import { buildMachineCheckpointV1, restoreMachine, type MachineCheckpointV1 } from './checkpoint.js';
import { stateLabel, type MachineState, type PhaseDefinition, type PhaseOutput } from './types.js';

export type MachineAction = 'start' | 'confirm' | 'apply_feedback' | 'diff' | 'cancel';

export interface TransitionEvent {
  from: string;
  to: string;
  action: MachineAction;
  error?: Error;
}

export interface PhaseStateMachineOptions {
  phases: readonly PhaseDefinition[];
  runner: PhaseRunner;
  /** Files the first phase starts from. */
  initialFiles?: FileSet;
  logger?: Logger;
  onTransition?: (event: TransitionEvent) => void | Promise<void>;
}

/**
 * Sequences the phases of one session.
 *
 * Every public action checks the current state synchronously and throws
 * InvalidTransitionError without touching anything when it does not apply.
 * Actions that run a phase return a promise that settles with the resulting
 * state label; phase failures land in `error` and the `failed` state rather
 * than rejecting.
 */
export class PhaseStateMachine {
  private current: MachineState;
  private index = 0;
  private readonly outputs = new Map<string, PhaseOutput>();
  private lastError: Error | null = null;
  private controller: AbortController | null = null;
  private inflight: Promise<string> | null = null;
  private readonly log: Logger;

  constructor(private readonly opts: PhaseStateMachineOptions) {
    const first = opts.phases[0];
    if (!first) throw new RangeError('at least one phase is required');
    this.current = { kind: 'pending', phase: first.name };
    this.log = opts.logger ?? silentLogger;
  }

  /**
   * Rebuilds a machine from `checkpoint()` output. Throws CheckpointError when
   * the data is malformed or does not fit `opts.phases`. A restored `pending`
   * state is resumed with `start()`.
   */
  static fromCheckpoint(data: unknown, opts: PhaseStateMachineOptions): PhaseStateMachine {
    const restored = restoreMachine(data, opts.phases);
    const machine = new PhaseStateMachine(opts);
    machine.current = restored.state;
    machine.index = restored.index;
    machine.lastError = restored.error;
    for (const out of restored.outputs) machine.outputs.set(out.phase, out);
    return machine;
  }

  get state(): MachineState {
    return this.current;
  }

  get label(): string {
    return stateLabel(this.current);
  }

  get error(): Error | null {
    return this.lastError;
  }

  get phaseNames(): string[] {
    return this.opts.phases.map((p) => p.name);
  }

  get isTerminal(): boolean {
    return this.current.kind === 'completed' || this.current.kind === 'failed';
  }

  output(phase: string): PhaseOutput | undefined {
    return this.outputs.get(phase);
  }

  /** Accepted outputs overlaid in declaration order. */
  accumulatedFiles(): FileSet {
    const merged: Record<string, string> = { ...(this.opts.initialFiles ?? {}) };
    for (const phase of this.opts.phases) {
      const out = this.outputs.get(phase.name);
      if (out) Object.assign(merged, out.files);
    }
    return Object.freeze(merged);
  }

  checkpoint(): MachineCheckpointV1 {
    const error = this.lastError;
    return buildMachineCheckpointV1({
      state: this.current,
      index: this.index,
      outputs: this.opts.phases.flatMap((p) => this.outputs.get(p.name) ?? []),
      error: error ? { code: errorCode(error), message: error.message } : null
    });
  }

  /** Resolves when no phase run is in flight. */
  async settled(): Promise<string> {
    if (this.inflight) await this.inflight;
    return this.label;
  }

  /** Runs the pending phase: the first one, or the one a restored checkpoint stopped at. */
  start(): Promise<string> {
    if (this.current.kind !== 'pending' || this.inflight) {
      throw new InvalidTransitionError('start', this.label);
    }
    return this.track(this.runPhase('start'));
  }

  confirm(): Promise<string> {
    const state = this.current;
    if (state.kind !== 'awaiting_confirmation') throw new InvalidTransitionError('confirm', this.label);
    return this.track(this.advance());
  }

  applyFeedback(feedback: string): Promise<string> {
    const state = this.current;
    if (state.kind !== 'awaiting_confirmation') throw new InvalidTransitionError('apply_feedback', this.label);
    if (!feedback.trim()) throw new RangeError('feedback must not be empty');
    return this.track(this.runPhase('apply_feedback', feedback));
  }

  diff(baseline: FileSet = {}): Promise<DiffResult> {
    if (this.current.kind === 'pending') throw new InvalidTransitionError('diff', this.label);
    return diffFileSets(baseline, this.accumulatedFiles());
  }

  /** Aborts the running phase (its searches, generator and sandbox calls) or fails a waiting session. */
  cancel(reason = 'cancelled'): Promise<string> {
    if (this.isTerminal) throw new InvalidTransitionError('cancel', this.label);
    const error = new CancelledError(reason);
    if (this.controller) {
      this.controller.abort(error);
      return this.settled();
    }
    return this.track(this.fail('cancel', error));
  }

  private async advance(): Promise<string> {
    const next = this.opts.phases[this.index + 1];
    if (!next) {
      await this.transition({ kind: 'completed' }, 'confirm');
      return this.label;
    }
    this.index += 1;
    await this.transition({ kind: 'pending', phase: next.name }, 'confirm');
    // Cancelled while the transition hook ran.
    if (this.isTerminal) return this.label;
    return await this.runPhase('confirm');
  }

  private async runPhase(action: MachineAction, feedback?: string): Promise<string> {
    const def = this.phaseAt(this.index);
    const controller = new AbortController();
    this.controller = controller;
    await this.transition({ kind: 'running', phase: def.name }, action);

    try {
      const previous = this.outputs.get(def.name);
      const output =
        feedback !== undefined && previous
          ? await this.opts.runner.refine(def, previous, feedback, this.upstreamFor(def), controller.signal)
          : await this.opts.runner.run(def, this.upstreamFor(def), controller.signal);
      this.controller = null;
      if (controller.signal.aborted) return await this.fail(action, toCancelled(controller.signal));
      this.outputs.set(def.name, output);
      this.log.info('phase output accepted', { phase: def.name, candidate: output.node.id, score: output.score });
      await this.transition({ kind: 'awaiting_confirmation', phase: def.name }, action);
      return this.label;
    } catch (err) {
      this.controller = null;
      const error = controller.signal.aborted ? toCancelled(controller.signal) : toError(err);
      return await this.fail(action, error);
    }
  }

  private async fail(action: MachineAction, error: Error): Promise<string> {
    this.lastError = error;
    const phase = this.current.kind === 'completed' || this.current.kind === 'failed' ? null : this.current.phase;
    this.log.error('session failed', { phase, action, error: describeError(error) });
    await this.transition({ kind: 'failed', phase }, action, error);
    return this.label;
  }

  private async transition(to: MachineState, action: MachineAction, error?: Error): Promise<void> {
    const from = this.label;
    this.current = to;
    this.log.debug('transition', { from, to: this.label, action });
    await this.opts.onTransition?.({ from, to: this.label, action, error });
  }

  /** Dependencies' accepted files, in declaration order; default is the previous phase. */
  private upstreamFor(def: PhaseDefinition): FileSet {
    const deps = def.dependsOn ?? (this.index > 0 ? [this.phaseAt(this.index - 1).name] : []);
    const merged: Record<string, string> = { ...(this.opts.initialFiles ?? {}) };
    for (const dep of deps) {
      const out = this.outputs.get(dep);
      if (!out) throw new Error(`phase '${def.name}' depends on '${dep}', which has no accepted output`);
      Object.assign(merged, out.files);
    }
    return merged;
  }

  private phaseAt(index: number): PhaseDefinition {
    const def = this.opts.phases[index];
    if (!def) throw new RangeError(`no phase at index ${index}`);
    return def;
  }

  private track(run: Promise<string>): Promise<string> {
    const tracked = run.finally(() => {
      if (this.inflight === tracked) this.inflight = null;
    });
    this.inflight = tracked;
    return tracked;
  }
}

function errorCode(err: Error): string {
  return isEngineError(err) || err instanceof RecordedError ? err.code : 'INTERNAL';
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(describeError(err));
}
