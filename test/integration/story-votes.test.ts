import { describe, it, expect, beforeEach } from 'vitest';
import { SchemaEngine } from '../../src/core/engine.js';
import { PreconditionViolation } from '../../src/core/errors.js';
import { intValue } from '../../src/model/values.js';
import { storyVotesSchema } from '../../src/schemas/story-votes.js';
import { snapshotsEqual } from '../../src/store/state.js';
import type { StateStore } from '../../src/store/state.js';
import { story, vote } from '../helpers/story-votes.js';

const args = (viewer: number, minScore: number, voter: number, kind: number) =>
  [intValue(viewer), intValue(minScore), intValue(voter), intValue(kind)];

function engineFor(orphanVotes: 'allowed' | 'forbidden' = 'allowed'): SchemaEngine {
  const engine = new SchemaEngine({ env: {}, config: { logging: { level: 'silent' } } });
  engine.loadSchema(storyVotesSchema({ orphanVotes }));
  return engine;
}

describe('stories & votes', () => {
  let engine: SchemaEngine;
  let store: StateStore;

  beforeEach(() => {
    engine = engineFor();
    store = engine.initState();
  });

  it('should accept a vote once and reject the duplicate', async () => {
    const inserted = await engine.applyOperation(store, 'insertStory', [story(1)]);
    const first = await engine.applyOperation(store, 'insertVote', [vote(1)]);
    const second = await engine.applyOperation(store, 'insertVote', [vote(1)]);

    expect(inserted.ok).toBe(true);
    expect(first.ok).toBe(true);
    expect(second.ok).toBe(false);
    if (second.ok) return;
    expect(second.error).toBeInstanceOf(PreconditionViolation);
    expect(store.toObject().votes).toEqual([vote(1)]);
  });

  it('should exclude a story hidden from the viewer', async () => {
    await engine.applyOperation(store, 'insertStory', [story(1, { score: 4, hiddenBy: [7] })]);
    await engine.applyOperation(store, 'insertStory', [story(2, { score: 2 })]);

    const hidden = await engine.runQuery(store, 'selectStoryVotes', args(7, 0, 1, 1));
    const visible = await engine.runQuery(store, 'selectStoryVotes', args(8, 0, 1, 1));

    expect(hidden.ok && hidden.value.map((r) => r.title)).toEqual(['story 2']);
    expect(visible.ok && visible.value.map((r) => r.title)).toEqual(['story 1', 'story 2']);
  });

  it('should return an inserted story exactly once', async () => {
    await engine.applyOperation(store, 'insertStory', [story(1, { score: 3 })]);
    await engine.applyOperation(store, 'insertStory', [story(2, { score: 3 })]);

    const rows = await engine.runQuery(store, 'selectStoryVotes', args(0, 0, 1, 1));

    expect(rows.ok).toBe(true);
    if (!rows.ok) return;
    expect(rows.value.filter((r) => r.title === 'story 1')).toEqual([
      { story: story(1, { score: 3 }), title: 'story 1', votes: [] },
    ]);
  });

  it('should only embed votes that are already global', async () => {
    const up = vote(1, 10, 1, 1);
    const orphaned = await engine.applyOperation(store, 'insertStory', [story(1, { votes: [up] })]);
    expect(orphaned.ok).toBe(false);

    await engine.applyOperation(store, 'insertVote', [up]);
    const embedded = await engine.applyOperation(store, 'insertStory', [story(1, { votes: [up] })]);
    expect(embedded.ok).toBe(true);

    const rows = await engine.runQuery(store, 'selectStoryVotes', args(0, 0, 10, 1));
    expect(rows.ok && rows.value.map((r) => r.votes)).toEqual([[up]]);
  });

  it('should keep embedded votes until their story is deleted', async () => {
    const up = vote(1);
    const s = story(1, { votes: [up] });
    await engine.applyOperation(store, 'insertVote', [up]);
    await engine.applyOperation(store, 'insertStory', [s]);

    const early = await engine.applyOperation(store, 'deleteVote', [up]);
    expect(early.ok).toBe(false);

    expect((await engine.applyOperation(store, 'deleteStory', [s])).ok).toBe(true);
    expect((await engine.applyOperation(store, 'deleteVote', [up])).ok).toBe(true);
    expect(store.toObject()).toEqual({ votes: [], stories: [] });
    expect(engine.auditState(store).every((c) => c.passed)).toBe(true);
  });

  it('should leave the state untouched when a precondition fails', async () => {
    await engine.applyOperation(store, 'insertVote', [vote(1)]);
    const before = store.current();

    const result = await engine.applyOperation(store, 'deleteStory', [story(9)]);

    expect(result.ok).toBe(false);
    expect(store.current()).toBe(before);
    expect(snapshotsEqual(store.current(), before)).toBe(true);
    expect(store.version).toBe(1);
  });

  it('should serialize concurrent writers', async () => {
    await engine.applyOperation(store, 'insertStory', [story(1)]);

    const results = await Promise.all([
      engine.applyOperation(store, 'insertVote', [vote(1)]),
      engine.applyOperation(store, 'insertVote', [vote(1)]),
      engine.applyOperation(store, 'insertVote', [vote(2)]),
    ]);

    expect(results.map((r) => r.ok)).toEqual([true, false, true]);
    expect(store.toObject().votes).toEqual([vote(1), vote(2)]);
    expect(store.version).toBe(3);
  });

  it('should not change the state when querying', async () => {
    await engine.applyOperation(store, 'insertStory', [story(1)]);
    const before = store.current();

    await engine.runQuery(store, 'selectStoryVotes', args(0, 0, 1, 1));

    expect(store.current()).toBe(before);
    expect(store.version).toBe(1);
  });

  describe('with orphan votes forbidden', () => {
    it('should report insertVote as disproven with an orphaned vote', () => {
      const strict = engineFor('forbidden');
      const pair = strict.report?.pairs.find((p) => p.operation === 'insertVote' && p.invariant === 'everyVoteIsEmbedded');

      expect(pair?.verdict.status).toBe('disproven');
      if (pair?.verdict.status !== 'disproven') return;
      expect(pair.verdict.witness.after.votes).toHaveLength(1);
      expect(pair.verdict.witness.after.stories).toEqual([]);
    });

    it('should refuse to delete a story that still holds votes', async () => {
      const strict = engineFor('forbidden');
      const up = vote(1);
      const s = story(1, { votes: [up] });
      const state = strict.initState({ votes: [up], stories: [s] });

      const result = await strict.applyOperation(state, 'deleteStory', [s]);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(PreconditionViolation);
    });
  });
});
