import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { parseSettings, type PhaseSpecInput } from '../src/config/settings.js';
import { CheckpointError, SessionNotFoundError } from '../src/core/errors.js';
import { LedgerReader } from '../src/core/ledger/reader.js';
import { SessionManager } from '../src/core/session/manager.js';
import { SessionStatusSnapshotV1Schema } from '../src/core/session/status.js';
import { SessionIdGenerator } from '../src/utils/id.js';
import { silentLogger } from '../src/utils/logger.js';
import { FakeBackend, instantRetry, type CommandHandler } from './fake-backend.js';
import { MockCompletionClient, delay, fileBlocks, phaseOf, type Responder } from './mock-completion.js';

const TWO_PHASES: PhaseSpecInput[] = [
  { name: 'draft', beamWidth: 1, maxDepth: 1 },
  { name: 'logic', beamWidth: 1, maxDepth: 1 }
];

describe('SessionManager', () => {
  let stateDir: string;

  beforeEach(async () => {
    stateDir = await mkdtemp(join(tmpdir(), 'beamforge-session-'));
  });

  afterEach(async () => {
    await rm(stateDir, { recursive: true, force: true });
  });

  function createManager(respond: Responder, opts: { phases?: PhaseSpecInput[]; handler?: CommandHandler } = {}) {
    const settings = parseSettings({ stateDir, reviewMaxChars: 10, phases: opts.phases ?? TWO_PHASES });
    const ids = new SessionIdGenerator();
    const fixed = new Date('2026-03-01T12:00:00Z');
    return new SessionManager({
      client: new MockCompletionClient(respond),
      backend: new FakeBackend(opts.handler),
      settings,
      logger: silentLogger,
      retryHooks: instantRetry,
      ids: { next: () => ids.next(fixed) }
    });
  }

  const byPhase: Responder = ({ prompt }) =>
    phaseOf(prompt) === 'draft'
      ? fileBlocks({ 'model.ts': 'x'.repeat(11), 'README.md': 'todo' })
      : fileBlocks({ 'logic.ts': 'run()' });

  it('reports a phase for review with large files truncated', async () => {
    const manager = createManager(byPhase);
    const handle = await manager.createApplication('todo app');

    expect(handle.id).toBe('s-20260301-001');
    const status = await manager.settle(handle);

    expect(status).toEqual({
      sessionId: 's-20260301-001',
      state: 'draft.awaiting_confirmation',
      output: { kind: 'review', phase: 'draft', files: { 'README.md': 'todo', 'model.ts': 'large file truncated' } },
      availableActions: ['confirm', 'apply_feedback', 'diff'],
      isCompleted: false,
      error: null
    });
  });

  it('completes every phase and persists the status snapshot and ledger', async () => {
    const manager = createManager(byPhase);
    const handle = await manager.createApplication('todo app');

    const status = await manager.complete(handle);

    expect(status.state).toBe('completed');
    expect(status.isCompleted).toBe(true);
    expect(status.availableActions).toEqual(['diff']);
    expect(status.output).toEqual({
      kind: 'application',
      files: { 'README.md': 'todo', 'model.ts': 'x'.repeat(11), 'logic.ts': 'run()' }
    });

    const dir = join(stateDir, 'sessions', handle.id);
    const snapshot = SessionStatusSnapshotV1Schema.parse(JSON.parse(await readFile(join(dir, 'status.json'), 'utf8')));
    expect(snapshot.state).toBe('completed');
    expect(snapshot.current_phase).toBeNull();
    expect(snapshot.phases.map((p) => [p.name, p.status, p.accepted_candidate])).toEqual([
      ['draft', 'accepted', 1],
      ['logic', 'accepted', 1]
    ]);
    expect(snapshot.files).toEqual(['README.md', 'logic.ts', 'model.ts']);

    const reader = new LedgerReader(join(dir, 'ledger.jsonl'));
    expect(await reader.verifyIntegrity()).toEqual({ ok: true });
    const types = (await reader.readAll()).map((e) => e.type);
    expect(types[0]).toBe('session_created');
    expect(types.slice(-2)).toEqual(['phase_transition', 'session_completed']);
    expect(types.filter((t) => t === 'candidate_validated')).toHaveLength(2);
    expect(await readFile(join(dir, 'evidence', 'final-tree.txt'), 'utf8')).toBe('README.md\nlogic.ts\nmodel.ts\n');
  });

  it('records feedback and keeps the session in the same phase', async () => {
    const manager = createManager(({ prompt }) =>
      prompt.includes('Apply this feedback') ? fileBlocks({ 'README.md': 'todo v2' }) : fileBlocks({ 'README.md': 'todo' })
    );
    const handle = await manager.createApplication('todo app');
    await manager.settle(handle);

    const status = await manager.applyFeedback(handle, 'mention due dates');

    expect(status.state).toBe('draft.awaiting_confirmation');
    expect(status.output).toEqual({ kind: 'review', phase: 'draft', files: { 'README.md': 'todo v2' } });
    const reader = new LedgerReader(join(stateDir, 'sessions', handle.id, 'ledger.jsonl'));
    const feedback = await reader.findByType('feedback_applied');
    expect(feedback.map((e) => e.data)).toEqual([{ phase: 'draft', feedback: 'mention due dates' }]);
  });

  it('surfaces a failed phase as an error output', async () => {
    const manager = createManager(() => fileBlocks({ 'model.ts': 'broken' }), {
      phases: [{ name: 'draft', beamWidth: 1, maxDepth: 1, expansionRetries: 0, stages: [{ name: 'check', command: ['check'] }] }],
      handler: () => ({ exitCode: 1, stderr: 'type error' })
    });
    const handle = await manager.createApplication('todo app');

    const status = await manager.settle(handle);

    expect(status.state).toBe('failed');
    expect(status.availableActions).toEqual(['get_error']);
    expect(status.error?.code).toBe('NO_VIABLE_CANDIDATE');
    expect(status.output).toEqual({ kind: 'error', error: status.error });
    const reader = new LedgerReader(join(stateDir, 'sessions', handle.id, 'ledger.jsonl'));
    expect(await reader.findByType('session_failed')).toHaveLength(1);
    expect(await reader.findByType('stage_executed')).toHaveLength(1);
  });

  it('cancels a running session', async () => {
    const manager = createManager(async () => {
      await delay(Number.POSITIVE_INFINITY);
      return '';
    });
    const handle = await manager.createApplication('todo app');
    expect(manager.getStatus(handle).output).toEqual({ kind: 'processing', phase: 'draft' });
    expect(manager.getStatus(handle).availableActions).toEqual(['wait']);

    const status = await manager.cancel(handle, 'user stop');

    expect(status.state).toBe('failed');
    expect(status.error).toEqual({ code: 'CANCELLED', message: 'user stop' });
    const reader = new LedgerReader(join(stateDir, 'sessions', handle.id, 'ledger.jsonl'));
    expect(await reader.findByType('session_cancelled')).toHaveLength(1);
  });

  it('computes a diff of the accumulated files and stores it as evidence', async () => {
    const manager = createManager(byPhase);
    const handle = await manager.createApplication('todo app');
    await manager.settle(handle);

    const diff = await manager.diff(handle, { 'README.md': 'old' });

    expect(diff.files).toEqual([
      { path: 'README.md', changeType: 'modified', additions: 1, deletions: 1 },
      { path: 'model.ts', changeType: 'added', additions: 1, deletions: 0 }
    ]);
    const diffs = await readdir(join(stateDir, 'sessions', handle.id, 'evidence', 'diffs'));
    expect(diffs.sort()).toEqual(['session-1.diff', 'session-1.diff.meta.json']);
  });

  it('rejects unknown sessions', () => {
    const manager = createManager(byPhase);
    const unknown = { id: 's-20260301-999', startedAtIso: '2026-03-01T12:00:00.000Z' };

    expect(() => manager.getStatus(unknown)).toThrow(SessionNotFoundError);
    expect(() => manager.getStatus(unknown)).toThrow("unknown session 's-20260301-999'");
  });

  describe('resume', () => {
    it('reloads a session in review from its checkpoint and completes it', async () => {
      const first = createManager(byPhase);
      const handle = await first.createApplication('todo app');
      const before = await first.settle(handle);

      const second = createManager(byPhase);
      const resumed = await second.resume(handle.id);

      expect(resumed).toEqual(handle);
      expect(second.getStatus(resumed)).toEqual(before);
      const status = await second.complete(resumed);
      expect(status.output).toEqual({
        kind: 'application',
        files: { 'README.md': 'todo', 'model.ts': 'x'.repeat(11), 'logic.ts': 'run()' }
      });

      const reader = new LedgerReader(join(stateDir, 'sessions', handle.id, 'ledger.jsonl'));
      expect(await reader.verifyIntegrity()).toEqual({ ok: true });
      const events = await reader.findByType('session_resumed');
      expect(events.map((e) => e.data)).toEqual([{ sessionId: handle.id, state: 'draft.awaiting_confirmation' }]);
    });

    it('returns the loaded handle when the session is already open', async () => {
      const manager = createManager(byPhase);
      const handle = await manager.createApplication('todo app');
      await manager.settle(handle);

      expect(await manager.resume(handle.id)).toBe(handle);
    });

    it('rejects ids that are malformed or were never persisted', async () => {
      const manager = createManager(byPhase);

      await expect(manager.resume('../outside')).rejects.toBeInstanceOf(SessionNotFoundError);
      await expect(manager.resume('s-20260301-042')).rejects.toBeInstanceOf(SessionNotFoundError);
    });

    it('rejects a checkpoint that does not parse', async () => {
      const dir = join(stateDir, 'sessions', 's-20260301-001');
      await mkdir(dir, { recursive: true });
      await writeFile(join(dir, 'checkpoint.json'), '{"version": 1', 'utf8');

      await expect(createManager(byPhase).resume('s-20260301-001')).rejects.toBeInstanceOf(CheckpointError);
    });
  });
});

