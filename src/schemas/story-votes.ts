/**
 * Stories & votes: a sample schema of news stories and the votes cast on them.
 *
 * Votes live in the global `votes` bag and are also embedded in the story
 * they belong to (`Story.votes`). Keeping both copies consistent is the job
 * of the operations' preconditions, checked by the verifier through the
 * `embeddedVotesAreGlobal` invariant.
 *
 * Whether a vote may exist in `votes` without any story embedding it is a
 * modelling choice: `orphanVotes: 'forbidden'` adds `everyVoteIsEmbedded`,
 * which a bare `insertVote` cannot preserve.
 */

import {
  all,
  and,
  comp,
  exists,
  ge,
  eq,
  gen,
  insert,
  isEmpty,
  member,
  not,
  path,
  record,
  ref,
  remove,
  state,
  unique,
  where,
} from '../lang/builders.js';
import { INT, STRING, bagOf, handleRef } from '../model/types.js';
import type { InvariantDecl, OperationDecl, Schema } from '../model/schema.js';

export type OrphanVotePolicy = 'allowed' | 'forbidden';

export interface StoryVotesOptions {
  orphanVotes?: OrphanVotePolicy;
}

const VOTE = handleRef('Vote');
const STORY = handleRef('Story');

const v = ref('v');
const s = ref('s');

function invariants(orphanVotes: OrphanVotePolicy): InvariantDecl[] {
  const decls: InvariantDecl[] = [
    {
      name: 'uniqueVoteIds',
      description: 'no two votes share an id',
      formula: unique(path(ref('v'), 'val', 'id'), gen('v', state('votes'))),
    },
    {
      name: 'uniqueStoryIds',
      description: 'no two stories share an id',
      formula: unique(path(ref('s'), 'val', 'id'), gen('s', state('stories'))),
    },
    {
      name: 'embeddedVotesAreGlobal',
      description: 'every vote embedded in a story is in the global votes bag',
      formula: all(member(v, state('votes')), gen('s', state('stories')), gen('v', path(s, 'val', 'votes'))),
    },
  ];
  if (orphanVotes === 'forbidden') {
    decls.push({
      name: 'everyVoteIsEmbedded',
      description: 'every global vote is embedded in some story',
      formula: all(
        exists(s, gen('s', state('stories')), where(member(v, path(s, 'val', 'votes')))),
        gen('v', state('votes')),
      ),
    });
  }
  return decls;
}

function operations(orphanVotes: OrphanVotePolicy): OperationDecl[] {
  return [
    {
      name: 'insertVote',
      params: [{ name: 'v', type: VOTE }],
      assume: not(
        exists(ref('v0'), gen('v0', state('votes')), where(eq(path(ref('v0'), 'val', 'id'), path(v, 'val', 'id')))),
      ),
      effects: [insert('votes', v)],
    },
    {
      name: 'insertStory',
      params: [{ name: 's', type: STORY }],
      assume: and(
        not(
          exists(ref('s0'), gen('s0', state('stories')), where(eq(path(ref('s0'), 'val', 'id'), path(s, 'val', 'id')))),
        ),
        all(member(ref('v'), state('votes')), gen('v', path(s, 'val', 'votes'))),
      ),
      effects: [insert('stories', s)],
    },
    {
      name: 'deleteVote',
      params: [{ name: 'v', type: VOTE }],
      assume: and(
        member(v, state('votes')),
        not(exists(ref('s'), gen('s', state('stories')), where(member(v, path(ref('s'), 'val', 'votes'))))),
      ),
      effects: [remove('votes', v)],
    },
    {
      name: 'deleteStory',
      params: [{ name: 's', type: STORY }],
      // Embedded votes would be orphaned by the removal.
      assume:
        orphanVotes === 'forbidden'
          ? and(member(s, state('stories')), isEmpty(path(s, 'val', 'votes')))
          : member(s, state('stories')),
      effects: [remove('stories', s)],
    },
  ];
}

/** Build the stories & votes schema. */
export function storyVotesSchema(options: StoryVotesOptions = {}): Schema {
  const orphanVotes = options.orphanVotes ?? 'allowed';
  return {
    name: orphanVotes === 'forbidden' ? 'story-votes-strict' : 'story-votes',
    types: {
      Vote: {
        name: 'Vote',
        flavor: 'handle',
        fields: { id: INT, userId: INT, storyId: INT, vote: INT },
      },
      Story: {
        name: 'Story',
        flavor: 'handle',
        fields: {
          id: INT,
          userId: INT,
          score: INT,
          title: STRING,
          hiddenBy: bagOf(INT),
          votes: bagOf(VOTE),
        },
      },
      StoryVotes: {
        name: 'StoryVotes',
        flavor: 'record',
        fields: { story: STORY, title: STRING, votes: bagOf(VOTE) },
      },
    },
    state: {
      votes: bagOf(VOTE),
      stories: bagOf(STORY),
    },
    invariants: invariants(orphanVotes),
    queries: [
      {
        // Stories the viewer has not hidden, scoring at least minScore, with
        // the votes `voter` cast on them of the given kind.
        name: 'selectStoryVotes',
        params: [
          { name: 'viewer', type: INT },
          { name: 'minScore', type: INT },
          { name: 'voter', type: INT },
          { name: 'kind', type: INT },
        ],
        body: comp(
          record('StoryVotes', {
            story: s,
            title: path(s, 'val', 'title'),
            votes: comp(
              v,
              gen('v', path(s, 'val', 'votes')),
              where(eq(path(v, 'val', 'userId'), ref('voter'))),
              where(eq(path(v, 'val', 'vote'), ref('kind'))),
            ),
          }),
          gen('s', state('stories')),
          where(not(member(ref('viewer'), path(s, 'val', 'hiddenBy')))),
          where(ge(path(s, 'val', 'score'), ref('minScore'))),
        ),
        orderBy: { key: path(s, 'val', 'score'), direction: 'desc' },
      },
    ],
    operations: operations(orphanVotes),
  };
}
