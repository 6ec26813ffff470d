import { describe, it, expect, vi } from 'vitest';
import {
  DisprovenOperationError,
  InvariantViolatedAtRuntime,
  ParameterError,
  PreconditionViolation,
} from '../../../src/core/errors.js';
import { EventBus } from '../../../src/core/events.js';
import { OperationExecutor } from '../../../src/store/executor.js';
import { StateStore } from '../../../src/store/state.js';
import { storyVotesSchema } from '../../../src/schemas/story-votes.js';
import { story, vote } from '../../helpers/story-votes.js';
import type { OperationSummary, VerificationReport } from '../../../src/verification/types.js';
import type { Schema } from '../../../src/model/schema.js';

function reportFor(schema: Schema, overrides: Record<string, Partial<OperationSummary>> = {}): VerificationReport {
  const operations: Record<string, OperationSummary> = {};
  for (const op of schema.operations) {
    operations[op.name] = {
      proven: schema.invariants.map((i) => i.name),
      disproven: [],
      inconclusive: [],
      ...overrides[op.name],
    };
  }
  return { schema: schema.name, pairs: [], operations, duration: 0 };
}

describe('OperationExecutor', () => {
  const schema = storyVotesSchema();

  describe('admissible operations', () => {
    it('should insert a story and then a vote', async () => {
      const executor = new OperationExecutor(schema, reportFor(schema));
      const store = StateStore.create(schema);

      const first = await executor.apply(store, 'insertStory', [story(1)]);
      const second = await executor.apply(store, 'insertVote', [vote(1)]);

      expect(first).toEqual({ ok: true, value: { operation: 'insertStory', version: 1, checkedAtRuntime: false } });
      expect(second.ok).toBe(true);
      expect(store.toObject()).toEqual({ votes: [vote(1)], stories: [story(1)] });
    });

    it('should emit operation:committed', async () => {
      const events = new EventBus();
      const listener = vi.fn();
      events.on('operation:committed', listener);
      const executor = new OperationExecutor(schema, reportFor(schema), { events });

      await executor.apply(StateStore.create(schema), 'insertVote', { v: vote(1) });

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][0]).toMatchObject({ operation: 'insertVote', version: 1 });
    });
  });

  describe('preconditions', () => {
    it('should reject a duplicate vote id and leave the state unchanged', async () => {
      const executor = new OperationExecutor(schema, reportFor(schema));
      const store = StateStore.create(schema);
      await executor.apply(store, 'insertVote', [vote(1)]);
      const before = store.current();

      const result = await executor.apply(store, 'insertVote', [vote(1)]);

      expect(result.ok).toBe(false);
      expect(!result.ok && result.error).toBeInstanceOf(PreconditionViolation);
      expect(store.current()).toBe(before);
      expect(store.version).toBe(1);
    });

    it('should reject a different handle that reuses an existing id', async () => {
      const executor = new OperationExecutor(schema, reportFor(schema));
      const store = StateStore.create(schema, { votes: [vote(1)] });
      const impostor = { ...vote(1), id: 'vote_other' };

      const result = await executor.apply(store, 'insertVote', [impostor]);

      expect(!result.ok && result.error.code).toBe('PRECONDITION_VIOLATION');
    });

    it('should emit operation:rejected', async () => {
      const events = new EventBus();
      const listener = vi.fn();
      events.on('operation:rejected', listener);
      const executor = new OperationExecutor(schema, reportFor(schema), { events });

      await executor.apply(StateStore.create(schema), 'deleteVote', [vote(1)]);

      expect(listener).toHaveBeenCalledWith({
        operation: 'deleteVote',
        code: 'PRECONDITION_VIOLATION',
        message: 'Precondition of operation "deleteVote" does not hold',
      });
    });
  });

  describe('parameters', () => {
    it('should return a ParameterError for unknown operations', async () => {
      const executor = new OperationExecutor(schema, reportFor(schema));
      const result = await executor.apply(StateStore.create(schema), 'dropEverything', []);
      expect(!result.ok && result.error).toBeInstanceOf(ParameterError);
    });

    it('should return a ParameterError for a mistyped argument', async () => {
      const executor = new OperationExecutor(schema, reportFor(schema));
      const result = await executor.apply(StateStore.create(schema), 'insertVote', [story(1)]);
      expect(!result.ok && result.error.message).toBe('insertVote(v): expected Vote, got Story');
    });
  });

  describe('disproven operations', () => {
    const strict = storyVotesSchema({ orphanVotes: 'forbidden' });
    const report = reportFor(strict, { insertVote: { proven: [], disproven: ['everyVoteIsEmbedded'] } });

    it('should block an operation with a disproven pair', async () => {
      const executor = new OperationExecutor(strict, report);
      const store = StateStore.create(strict);

      const result = await executor.apply(store, 'insertVote', [vote(1)]);

      expect(!result.ok && result.error).toBeInstanceOf(DisprovenOperationError);
      expect(!result.ok && result.error.message).toBe(
        'Operation "insertVote" is disproven against everyVoteIsEmbedded and is blocked',
      );
      expect(store.version).toBe(0);
    });

    it('should roll back at runtime when blocking is off', async () => {
      const events = new EventBus();
      const rolledBack = vi.fn();
      events.on('operation:rolled-back', rolledBack);
      const executor = new OperationExecutor(strict, report, { blockDisproven: false, events });
      const store = StateStore.create(strict);
      const before = store.current();

      const result = await executor.apply(store, 'insertVote', [vote(1)]);

      expect(!result.ok && result.error).toBeInstanceOf(InvariantViolatedAtRuntime);
      expect(!result.ok && result.error instanceof InvariantViolatedAtRuntime && result.error.invariants).toEqual([
        'everyVoteIsEmbedded',
      ]);
      expect(store.current()).toBe(before);
      expect(rolledBack).toHaveBeenCalledWith({ operation: 'insertVote', invariants: ['everyVoteIsEmbedded'] });
    });
  });

  describe('runtime checks', () => {
    it('should check operations with inconclusive pairs', async () => {
      const report = reportFor(schema, { insertVote: { inconclusive: ['uniqueVoteIds'] } });
      const executor = new OperationExecutor(schema, report);

      expect(executor.needsRuntimeCheck('insertVote')).toBe(true);
      expect(executor.needsRuntimeCheck('insertStory')).toBe(false);

      const result = await executor.apply(StateStore.create(schema), 'insertVote', [vote(1)]);
      expect(result.ok && result.value.checkedAtRuntime).toBe(true);
    });

    it('should check every operation in always mode', () => {
      const executor = new OperationExecutor(schema, reportFor(schema), { runtimeCheck: 'always' });
      expect(executor.needsRuntimeCheck('insertStory')).toBe(true);
    });

    it('should trust the verifier in never mode', async () => {
      const strict = storyVotesSchema({ orphanVotes: 'forbidden' });
      const report = reportFor(strict, { insertVote: { inconclusive: ['everyVoteIsEmbedded'] } });
      const executor = new OperationExecutor(strict, report, { runtimeCheck: 'never' });
      const store = StateStore.create(strict);

      const result = await executor.apply(store, 'insertVote', [vote(1)]);

      expect(result.ok).toBe(true);
      expect(store.get('votes')?.size).toBe(1);
    });
  });

  describe('concurrency', () => {
    it('should serialize concurrent writers', async () => {
      const executor = new OperationExecutor(schema, reportFor(schema));
      const store = StateStore.create(schema);

      const results = await Promise.all([
        executor.apply(store, 'insertVote', [vote(1)]),
        executor.apply(store, 'insertVote', [vote(1)]),
        executor.apply(store, 'insertVote', [vote(2)]),
      ]);

      expect(results.map((r) => r.ok)).toEqual([true, false, true]);
      expect(store.get('votes')?.toArray()).toEqual([vote(1), vote(2)]);
      expect(store.version).toBe(2);
    });
  });
});
