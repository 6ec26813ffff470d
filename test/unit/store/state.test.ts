import { describe, it, expect } from 'vitest';
import { HandleConflictError, TypeMismatchError } from '../../../src/core/errors.js';
import { Bag } from '../../../src/model/bag.js';
import { intValue } from '../../../src/model/values.js';
import { StateStore, snapshotsEqual } from '../../../src/store/state.js';
import { storyVotesSchema } from '../../../src/schemas/story-votes.js';
import { story, vote } from '../../helpers/story-votes.js';

const schema = storyVotesSchema();

describe('StateStore', () => {
  it('should create one empty bag per declared state variable', () => {
    const store = StateStore.create(schema);
    expect(store.toObject()).toEqual({ votes: [], stories: [] });
    expect(store.version).toBe(0);
    expect(store.schemaName).toBe('story-votes');
  });

  it('should seed bags from the given values', () => {
    const store = StateStore.create(schema, { votes: [vote(1)] });
    expect(store.get('votes')?.size).toBe(1);
    expect(store.get('stories')?.size).toBe(0);
  });

  it('should reject seeds for undeclared state', () => {
    expect(() => StateStore.create(schema, { comments: [] })).toThrow('seed names unknown state "comments"');
  });

  it('should reject seeds that do not match the bag type', () => {
    expect(() => StateStore.create(schema, { votes: [intValue(1)] })).toThrow(TypeMismatchError);
  });

  it('should reject seeds where one handle id names two records', () => {
    const up = vote(1, 1, 1, 1);
    const down = vote(1, 1, 1, -1);
    expect(() => StateStore.create(schema, { votes: [up], stories: [story(1, { votes: [down] })] })).toThrow(
      HandleConflictError,
    );
  });

  it('should index the handles of the current snapshot', () => {
    const store = StateStore.create(schema, { votes: [vote(1)] });
    expect(store.handles().lookup('vote_1')).toEqual(vote(1));

    const next = new Map(store.current());
    next.set('votes', Bag.of(vote(2)));
    store.commit(next);

    expect(store.handles().lookup('vote_1')).toBeUndefined();
    expect(store.handles().lookup('vote_2')).toEqual(vote(2));
  });

  it('should leave captured snapshots untouched by later commits', () => {
    const store = StateStore.create(schema);
    const before = store.current();
    const next = new Map(before);
    next.set('votes', Bag.of(vote(1)));
    store.commit(next);

    expect(before.get('votes')?.size).toBe(0);
    expect(store.get('votes')?.size).toBe(1);
    expect(store.version).toBe(1);
  });
});

describe('snapshotsEqual', () => {
  it('should compare bags as multisets', () => {
    const a = StateStore.create(schema, { votes: [vote(1), vote(2)], stories: [story(1)] });
    const b = StateStore.create(schema, { votes: [vote(2), vote(1)], stories: [story(1)] });
    const c = StateStore.create(schema, { votes: [vote(1)], stories: [story(1)] });
    expect(snapshotsEqual(a.current(), b.current())).toBe(true);
    expect(snapshotsEqual(a.current(), c.current())).toBe(false);
  });
});
