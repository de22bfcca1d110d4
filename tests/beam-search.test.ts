import { describe, expect, it } from 'vitest';

import { BeamSearchActor } from '../src/core/beam/search.js';
import { compareEntries } from '../src/core/beam/rank.js';
import type { BeamConfig, ChildOutcome } from '../src/core/beam/types.js';
import { CandidateTree } from '../src/core/candidate/tree.js';
import { InfrastructureError, NoViableCandidateError } from '../src/core/errors.js';
import { Generator } from '../src/core/generator/generator.js';
import { defaultPromptBuilder } from '../src/core/generator/prompt.js';
import type { ValidationStage } from '../src/core/sandbox/pipeline.js';
import { SandboxValidator } from '../src/core/sandbox/validator.js';
import { FakeBackend, instantRetry, type CommandHandler } from './fake-backend.js';
import { MockCompletionClient, fileBlocks, type Responder } from './mock-completion.js';

const CHECK: ValidationStage[] = [{ name: 'check', command: ['check'] }];

function setup(args: {
  config: Partial<BeamConfig>;
  respond: Responder;
  handler?: CommandHandler;
  stages?: ValidationStage[];
  backend?: FakeBackend;
}) {
  const tree = new CandidateTree();
  const root = tree.addRoot({ 'README.md': 'app' }, { phase: 'draft', prompt: '', rawResponse: '' });
  const client = new MockCompletionClient(args.respond);
  const backend = args.backend ?? new FakeBackend(args.handler);
  const outcomes: ChildOutcome[] = [];
  const actor = new BeamSearchActor({
    tree,
    generator: new Generator(client, { buildPrompt: defaultPromptBuilder(), maxAttempts: 1 }),
    validator: new SandboxValidator({ backend, baseEnvironment: 'node:20', stages: args.stages ?? CHECK, retryHooks: instantRetry }),
    config: { width: 1, maxDepth: 1, acceptFirst: true, ...args.config },
    context: { goal: 'todo app', phase: 'draft', allowedPaths: [] },
    observer: { onChild: (o) => void outcomes.push(o) }
  });
  return { tree, root, client, backend, actor, outcomes };
}

/** Child `n` (spawn order) writes `a.txt = c<n>`. */
const numbered: Responder = ({ call }) => fileBlocks({ 'a.txt': `c${call}` });

const passWhen =
  (ok: (content: string) => boolean): CommandHandler =>
  ({ files }) =>
    ok(files['a.txt'] ?? '') ? { exitCode: 0 } : { exitCode: 1, stderr: 'check failed' };

describe('BeamSearchActor.expand', () => {
  it('keeps the only passing child when the others fail validation', async () => {
    const { actor, root, outcomes, backend } = setup({ config: { width: 3 }, respond: numbered, handler: passWhen((c) => c === 'c2') });

    const frontier = await actor.expand(actor.startFrontier([root]));

    expect(frontier).toHaveLength(1);
    expect(frontier[0]?.node.files).toEqual({ 'a.txt': 'c2' });
    expect(frontier[0]?.node.depth).toBe(1);
    expect(outcomes.filter((o) => o.kind === 'rejected')).toHaveLength(2);
    expect(backend.created).toBe(3);
    expect(backend.live).toBe(0);
  });

  it('ranks by score, then spawn order, regardless of completion order', async () => {
    const { actor, root } = setup({
      config: { width: 3 },
      respond: async ({ call }) => {
        // The first child finishes last.
        if (call === 0) await new Promise((resolve) => setTimeout(resolve, 30));
        return fileBlocks({ 'a.txt': call === 2 ? 'best' : `plain${call}` });
      },
      stages: [
        { name: 'build', command: ['build'] },
        { name: 'bonus', command: ['bonus'], required: false, weight: 2 }
      ],
      handler: ({ files, request }) => ({ exitCode: request.command[0] === 'bonus' && files['a.txt'] !== 'best' ? 1 : 0 })
    });

    const frontier = await actor.expand(actor.startFrontier([root]));

    expect(frontier.map((e) => [e.node.files['a.txt'], e.score, e.seq])).toEqual([
      ['best', 3, 2],
      ['plain0', 1, 0],
      ['plain1', 1, 1]
    ]);
  });

  it('throws NoViableCandidateError when every child fails', async () => {
    const { actor, root, tree } = setup({ config: { width: 2 }, respond: numbered, handler: passWhen(() => false) });

    const err = await actor.expand(actor.startFrontier([root])).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NoViableCandidateError);
    expect(err).toMatchObject({ depth: 1, rejected: 2 });
    // Rejected children stay in the arena for the audit trail.
    expect(tree.size).toBe(3);
  });

  it('counts a generation failure as a failed child', async () => {
    const { actor, root, outcomes } = setup({
      config: { width: 2 },
      respond: ({ call }) => (call === 0 ? 'sorry, no files' : fileBlocks({ 'a.txt': 'ok' })),
      handler: passWhen(() => true)
    });

    const frontier = await actor.expand(actor.startFrontier([root]));

    expect(frontier.map((e) => e.node.files['a.txt'])).toEqual(['ok']);
    expect(outcomes.find((o) => o.kind === 'rejected')).toMatchObject({
      kind: 'rejected',
      seq: 0,
      reason: 'generation failed after 1 attempt(s): response contains no file blocks'
    });
  });

  it('aborts sibling work and propagates an infrastructure failure', async () => {
    const abortedSeen: boolean[] = [];
    const backend = new FakeBackend(async ({ files, signal }) => {
      if (files['a.txt'] === 'c0') throw new Error('connection reset by peer');
      await new Promise((resolve) => setTimeout(resolve, 20));
      abortedSeen.push(signal?.aborted ?? false);
      return { exitCode: 0 };
    });
    const { actor, root } = setup({ config: { width: 3 }, respond: numbered, backend });

    const err = await actor.expand(actor.startFrontier([root])).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InfrastructureError);
    expect(err).toMatchObject({ operation: 'exec', attempts: 4 });
    expect(abortedSeen).toEqual([true, true]);
    expect(backend.live).toBe(0);
  });

  it('issues exactly one call per frontier node when refining with feedback', async () => {
    const { actor, root, client } = setup({ config: { width: 3 }, respond: numbered, handler: passWhen(() => true) });

    const frontier = await actor.expand(actor.startFrontier([root]), 'rename a.txt content');

    expect(client.calls).toBe(1);
    expect(frontier).toHaveLength(1);
    expect(frontier[0]?.node.provenance.feedback).toBe('rename a.txt content');
    expect(client.requests[0]?.messages[0]?.content).toContain('Apply this feedback:\nrename a.txt content');
  });
});

describe('BeamSearchActor.search', () => {
  it('returns the start node without generating when maxDepth is 0', async () => {
    const { actor, root, client } = setup({ config: { maxDepth: 0 }, respond: numbered });

    const result = await actor.search([root]);

    expect(result.accepted.node).toBe(root);
    expect(result.steps).toBe(0);
    expect(client.calls).toBe(0);
  });

  it('stops at the first depth with survivors when acceptFirst is set', async () => {
    const { actor, root, client } = setup({ config: { width: 2, maxDepth: 3, acceptFirst: true }, respond: numbered, handler: passWhen(() => true) });

    const result = await actor.search([root]);

    expect(result.steps).toBe(1);
    expect(client.calls).toBe(2);
    expect(result.accepted.node.files).toEqual({ 'a.txt': 'c0' });
  });

  it('accepts the best survivor across all depths', async () => {
    // Depth 1 yields "great" (score 2); depth 2 only "ok" (score 1).
    const { actor, root } = setup({
      config: { width: 1, maxDepth: 2, acceptFirst: false },
      respond: ({ call }) => fileBlocks({ 'a.txt': call === 0 ? 'great' : 'ok' }),
      stages: [
        { name: 'build', command: ['build'] },
        { name: 'polish', command: ['polish'], required: false }
      ],
      handler: ({ files, request }) => ({ exitCode: request.command[0] === 'polish' && files['a.txt'] !== 'great' ? 1 : 0 })
    });

    const result = await actor.search([root]);

    expect(result.steps).toBe(2);
    expect(result.accepted.node.files).toEqual({ 'a.txt': 'great' });
    expect(result.accepted.node.depth).toBe(1);
    expect(result.frontier[0]?.node.depth).toBe(2);
  });
});

describe('compareEntries', () => {
  it('prefers the shallower node on equal scores', () => {
    const tree = new CandidateTree();
    const root = tree.addRoot({}, { phase: 'p', prompt: '', rawResponse: '' });
    const deep = tree.addChild(root.id, {}, { phase: 'p', prompt: '', rawResponse: '' });

    expect(compareEntries({ node: deep, score: 1, seq: 0 }, { node: root, score: 1, seq: 5 })).toBeGreaterThan(0);
    expect(compareEntries({ node: deep, score: 2, seq: 9 }, { node: root, score: 1, seq: 0 })).toBeLessThan(0);
  });
});
