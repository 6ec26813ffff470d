import { describe, it, expect } from 'vitest';
import { UnsupportedFragmentError } from '../../../src/core/errors.js';
import { TRUE_EXPR, insert, ref, remove } from '../../../src/lang/builders.js';
import { bagOf, handleRef } from '../../../src/model/types.js';
import { storyVotesSchema } from '../../../src/schemas/story-votes.js';
import { CounterexampleSearch, seededRandom } from '../../../src/verification/counterexample.js';
import { DEFAULT_VERIFIER_OPTIONS } from '../../../src/verification/invariant-verifier.js';
import type { InvariantDecl, OperationDecl, Schema } from '../../../src/model/schema.js';

const options = DEFAULT_VERIFIER_OPTIONS.counterexample;

function pick<T extends { name: string }>(items: T[], name: string): T {
  const found = items.find((item) => item.name === name);
  if (!found) throw new Error(`no ${name}`);
  return found;
}

describe('seededRandom', () => {
  it('should repeat its sequence for the same seed', () => {
    const first = seededRandom(42);
    const second = seededRandom(42);
    const a = [first(), first(), first()];
    const b = [second(), second(), second()];

    expect(a).toEqual(b);
    for (const n of a) {
      expect(n).toBeGreaterThanOrEqual(0);
      expect(n).toBeLessThan(1);
    }
  });
});

describe('CounterexampleSearch', () => {
  const strict = storyVotesSchema({ orphanVotes: 'forbidden' });
  const insertVote = pick(strict.operations, 'insertVote');
  const everyVoteIsEmbedded = pick(strict.invariants, 'everyVoteIsEmbedded');

  it('should find an orphaned vote from the empty state', () => {
    const witness = new CounterexampleSearch(strict, options).search(insertVote, everyVoteIsEmbedded);

    expect(witness).not.toBeNull();
    if (!witness) return;
    expect(witness.before).toEqual({ votes: [], stories: [] });
    expect(witness.after.votes).toEqual([witness.params.v]);
    expect(witness.after.stories).toEqual([]);
    expect(witness.description).toMatch(/^insertVote\(v = Vote#vote_w\d+\{id: /);
    expect(witness.description).toContain('from {votes = {{}}, stories = {{}}} reaches {votes = {{Vote#vote_w');
  });

  it('should be deterministic for a seed', () => {
    const first = new CounterexampleSearch(strict, options).search(insertVote, everyVoteIsEmbedded);
    const second = new CounterexampleSearch(strict, options).search(insertVote, everyVoteIsEmbedded);
    expect(first).toEqual(second);
  });

  it('should find nothing when the precondition protects the invariant', () => {
    const schema = storyVotesSchema();
    const search = new CounterexampleSearch(schema, options);

    expect(search.search(pick(schema.operations, 'insertStory'), pick(schema.invariants, 'uniqueStoryIds'))).toBeNull();
    expect(
      search.search(pick(schema.operations, 'deleteVote'), pick(schema.invariants, 'embeddedVotesAreGlobal')),
    ).toBeNull();
  });

  it('should find a removal that strands an embedded vote whatever the seed', () => {
    const schema = storyVotesSchema();
    const deleteAny: OperationDecl = {
      name: 'deleteAny',
      params: [{ name: 'v', type: handleRef('Vote') }],
      assume: TRUE_EXPR,
      effects: [remove('votes', ref('v'))],
    };
    const embedded = pick(schema.invariants, 'embeddedVotesAreGlobal');
    const withDelete: Schema = { ...schema, operations: [deleteAny] };

    for (const seed of [1, 2, 3, 7, 11, 42]) {
      const witness = new CounterexampleSearch(withDelete, { ...options, seed }).search(deleteAny, embedded);

      expect(witness).not.toBeNull();
      if (!witness) return;
      expect(witness.before.stories.length).toBeGreaterThan(0);
      expect(witness.after.votes).toHaveLength(witness.before.votes.length - 1);
    }
  });

  it('should not search when disabled', () => {
    const search = new CounterexampleSearch(strict, { ...options, enabled: false });
    expect(search.search(insertVote, everyVoteIsEmbedded)).toBeNull();
  });

  it('should refuse types it cannot sample', () => {
    const node = handleRef('Node');
    const addNode: OperationDecl = {
      name: 'addNode',
      params: [{ name: 'n', type: node }],
      assume: TRUE_EXPR,
      effects: [insert('nodes', ref('n'))],
    };
    const anything: InvariantDecl = { name: 'anything', formula: TRUE_EXPR };
    const schema: Schema = {
      name: 'linked',
      types: { Node: { name: 'Node', flavor: 'handle', fields: { next: node } } },
      state: { nodes: bagOf(node) },
      invariants: [anything],
      queries: [],
      operations: [addNode],
    };

    expect(() => new CounterexampleSearch(schema, options).search(addNode, anything)).toThrow(UnsupportedFragmentError);
  });
});
