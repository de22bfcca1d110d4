import { join } from 'node:path';

import { PhaseList, parseSettings, type PhaseSpec, type Settings } from '../../config/settings.js';
import type { DiffResult } from '../../git/diff-parser.js';
import { writeJson } from '../../utils/fs.js';
import { SessionIdGenerator, parseSessionId } from '../../utils/id.js';
import { Logger } from '../../utils/logger.js';
import type { FileSet } from '../candidate/types.js';
import { SessionNotFoundError, describeError } from '../errors.js';
import { EvidenceCollector, evidencePaths } from '../evidence/collector.js';
import type { CompletionClient } from '../generator/types.js';
import { LedgerWriter } from '../ledger/writer.js';
import { PhaseRunner } from '../phase/actor.js';
import { PhaseStateMachine, type PhaseStateMachineOptions, type TransitionEvent } from '../phase/state-machine.js';
import { createBackend } from '../sandbox/backends/index.js';
import type { RetryHooks } from '../sandbox/retry.js';
import type { SandboxBackend } from '../sandbox/types.js';
import { createActorFactory } from './actor-factory.js';
import { CHECKPOINT_FILE, buildSessionCheckpointV1, readSessionCheckpoint } from './checkpoint.js';
import { buildSessionStatusSnapshotV1, buildStatus, summarizeError } from './status.js';
import type { SessionHandle, SessionOptions, SessionStatus } from './types.js';

export interface SessionManagerOptions {
  client: CompletionClient;
  settings?: Settings;
  /** Defaults to the backend named in settings. */
  backend?: SandboxBackend;
  logger?: Logger;
  retryHooks?: RetryHooks;
  ids?: Pick<SessionIdGenerator, 'next'>;
}

interface Session {
  handle: SessionHandle;
  goal: string;
  dir: string;
  phases: readonly PhaseSpec[];
  initialFiles: FileSet;
  machine: PhaseStateMachine;
  ledger: LedgerWriter;
  evidence: EvidenceCollector;
  /** Serializes status.json and checkpoint.json writes. */
  persist: Promise<void>;
}

/**
 * Externally visible surface: one state machine per session, plus its ledger,
 * evidence directory, status snapshot and checkpoint under
 * `<stateDir>/sessions/<id>/`.
 *
 * Actions that run a phase resolve once the phase settles; callers that only
 * want to kick work off can poll `getStatus` instead.
 */
export class SessionManager {
  private readonly sessions = new Map<string, Session>();
  private readonly settings: Settings;
  private readonly backend: SandboxBackend;
  private readonly log: Logger;
  private readonly ids: Pick<SessionIdGenerator, 'next'>;

  constructor(private readonly opts: SessionManagerOptions) {
    this.settings = opts.settings ?? parseSettings({});
    this.backend = opts.backend ?? createBackend(this.settings);
    this.log = opts.logger ?? new Logger({ level: this.settings.logLevel, json: this.settings.logJson });
    this.ids = opts.ids ?? new SessionIdGenerator();
  }

  /** Creates the session and starts its first phase; resolves once the session is persisted and running. */
  async createApplication(goal: string, options: SessionOptions = {}): Promise<SessionHandle> {
    const phases = options.phases ? PhaseList.parse(options.phases) : this.settings.phases;
    const handle: SessionHandle = { id: this.nextId(), startedAtIso: new Date().toISOString() };
    const session = await this.openSession({
      handle,
      goal,
      phases,
      initialFiles: options.initialFiles ?? {},
      promptBuilders: options.promptBuilders,
      createMachine: (machineOpts) => new PhaseStateMachine(machineOpts)
    });

    await session.ledger.append({ type: 'session_created', data: { sessionId: handle.id, goal, phases: phases.map((p) => p.name) } });
    this.log.child(handle.id).info('session created', { goal, phases: phases.map((p) => p.name), backend: this.backend.name });
    // Runs in the background; its outcome is observed through getStatus / settle.
    this.watch(session, session.machine.start());
    return handle;
  }

  /**
   * Reloads a session from `<stateDir>/sessions/<id>/checkpoint.json`. A phase
   * that was running when the checkpoint was written starts again in the
   * background. Prompt builders are not persisted and are passed again here.
   */
  async resume(sessionId: string, options: Pick<SessionOptions, 'promptBuilders'> = {}): Promise<SessionHandle> {
    const loaded = this.sessions.get(sessionId);
    if (loaded) return loaded.handle;
    if (parseSessionId(sessionId) === null) throw new SessionNotFoundError(sessionId);

    const checkpoint = await readSessionCheckpoint(join(this.sessionDir(sessionId), CHECKPOINT_FILE), sessionId);
    const handle: SessionHandle = { id: sessionId, startedAtIso: checkpoint.started_at };
    const session = await this.openSession({
      handle,
      goal: checkpoint.goal,
      phases: checkpoint.phases,
      initialFiles: checkpoint.initial_files,
      promptBuilders: options.promptBuilders,
      createMachine: (machineOpts) => PhaseStateMachine.fromCheckpoint(checkpoint.machine, machineOpts)
    });

    const { machine } = session;
    await session.ledger.append({ type: 'session_resumed', data: { sessionId, state: machine.label } });
    this.log.child(sessionId).info('session resumed', { state: machine.label });
    if (machine.state.kind === 'pending') {
      this.watch(session, machine.start());
    } else {
      this.persistStatus(session);
    }
    return handle;
  }

  getStatus(handle: SessionHandle): SessionStatus {
    const { machine } = this.get(handle);
    return buildStatus(handle.id, machine, this.settings.reviewMaxChars);
  }

  /** Waits for any in-flight phase run, then reports status. */
  async settle(handle: SessionHandle): Promise<SessionStatus> {
    const session = this.get(handle);
    await session.machine.settled();
    await session.persist;
    return this.getStatus(handle);
  }

  async confirm(handle: SessionHandle): Promise<SessionStatus> {
    const session = this.get(handle);
    await session.machine.confirm();
    return await this.settle(handle);
  }

  async applyFeedback(handle: SessionHandle, feedback: string): Promise<SessionStatus> {
    const session = this.get(handle);
    const run = session.machine.applyFeedback(feedback);
    await session.ledger.append({ type: 'feedback_applied', data: { phase: phaseOf(session), feedback } });
    await run;
    return await this.settle(handle);
  }

  async diff(handle: SessionHandle, baseline: FileSet = {}): Promise<DiffResult> {
    const session = this.get(handle);
    const result = await session.machine.diff(baseline);
    const recorded = await session.evidence.recordDiff('session', result);
    await session.ledger.append({ type: 'diff_computed', data: { summary: result.summary, evidence: recorded.diffPath } });
    return result;
  }

  /** Confirms every remaining phase until the session completes or fails. */
  async complete(handle: SessionHandle): Promise<SessionStatus> {
    const session = this.get(handle);
    await session.machine.settled();
    while (session.machine.state.kind === 'awaiting_confirmation') {
      await session.machine.confirm();
    }
    return await this.settle(handle);
  }

  async cancel(handle: SessionHandle, reason = 'cancelled by caller'): Promise<SessionStatus> {
    const session = this.get(handle);
    await session.machine.cancel(reason);
    return await this.settle(handle);
  }

  private async onTransition(session: Session, event: TransitionEvent): Promise<void> {
    const error = event.error ? summarizeError(event.error) : undefined;
    await session.ledger.append({ type: 'phase_transition', data: { from: event.from, to: event.to, action: event.action, error } });

    if (event.to === 'completed') {
      await session.ledger.append({ type: 'session_completed', data: { files: Object.keys(session.machine.accumulatedFiles()).length } });
      await session.evidence.captureFinalFiles(session.machine.accumulatedFiles());
    } else if (event.to === 'failed') {
      const type = error?.code === 'CANCELLED' ? 'session_cancelled' : 'session_failed';
      await session.ledger.append({ type, data: { error } });
    }

    this.persistStatus(session);
  }

  private persistStatus(session: Session): void {
    const snapshot = buildSessionStatusSnapshotV1({
      sessionId: session.handle.id,
      goal: session.goal,
      startedAtIso: session.handle.startedAtIso,
      machine: session.machine
    });
    const checkpoint = buildSessionCheckpointV1({
      sessionId: session.handle.id,
      goal: session.goal,
      startedAtIso: session.handle.startedAtIso,
      phases: session.phases,
      initialFiles: session.initialFiles,
      machine: session.machine
    });
    session.persist = session.persist
      .then(async () => {
        await writeJson(join(session.dir, 'status.json'), snapshot);
        await writeJson(join(session.dir, CHECKPOINT_FILE), checkpoint);
      })
      .catch((err: unknown) => this.log.warn('status snapshot write failed', { session: session.handle.id, error: describeError(err) }));
  }

  private async openSession(args: {
    handle: SessionHandle;
    goal: string;
    phases: readonly PhaseSpec[];
    initialFiles: FileSet;
    promptBuilders: SessionOptions['promptBuilders'];
    createMachine: (opts: PhaseStateMachineOptions) => PhaseStateMachine;
  }): Promise<Session> {
    const { handle, goal, phases, initialFiles } = args;
    const dir = this.sessionDir(handle.id);
    const ledger = await LedgerWriter.open(join(dir, 'ledger.jsonl'));
    const evidence = new EvidenceCollector(evidencePaths(dir));
    const log = this.log.child(handle.id);

    const runner = new PhaseRunner({
      createActor: createActorFactory({
        goal,
        client: this.opts.client,
        backend: this.backend,
        settings: this.settings,
        promptBuilders: args.promptBuilders,
        ledger,
        evidence,
        retryHooks: this.opts.retryHooks,
        logger: log
      }),
      logger: log
    });

    const machine = args.createMachine({
      phases,
      runner,
      initialFiles,
      logger: log,
      onTransition: (event) => this.onTransition(session, event)
    });
    const session: Session = { handle, goal, dir, phases, initialFiles, ledger, evidence, machine, persist: Promise.resolve() };
    this.sessions.set(handle.id, session);
    return session;
  }

  private sessionDir(sessionId: string): string {
    return join(this.settings.stateDir, 'sessions', sessionId);
  }

  private watch(session: Session, run: Promise<string>): void {
    run.catch((err: unknown) => this.log.error('phase run crashed', { session: session.handle.id, error: describeError(err) }));
  }

  private get(handle: SessionHandle): Session {
    const session = this.sessions.get(handle.id);
    if (!session) throw new SessionNotFoundError(handle.id);
    return session;
  }

  private nextId(): string {
    let id = this.ids.next();
    while (this.sessions.has(id)) id = this.ids.next();
    return id;
  }
}

function phaseOf(session: Session): string | null {
  const state = session.machine.state;
  return state.kind === 'completed' ? null : state.phase;
}
