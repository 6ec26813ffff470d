/**
 * Fixture builders for the stories & votes schema.
 */

import { bagValue, handleValue, intValue, stringValue } from '../../src/model/values.js';
import type { HandleValue } from '../../src/model/types.js';

export function vote(id: number, userId = 1, storyId = 1, kind = 1): HandleValue {
  return handleValue(
    'Vote',
    {
      id: intValue(id),
      userId: intValue(userId),
      storyId: intValue(storyId),
      vote: intValue(kind),
    },
    `vote_${id}`,
  );
}

export interface StoryFixture {
  userId?: number;
  score?: number;
  title?: string;
  hiddenBy?: number[];
  votes?: HandleValue[];
}

export function story(id: number, fixture: StoryFixture = {}): HandleValue {
  return handleValue(
    'Story',
    {
      id: intValue(id),
      userId: intValue(fixture.userId ?? 1),
      score: intValue(fixture.score ?? 0),
      title: stringValue(fixture.title ?? `story ${id}`),
      hiddenBy: bagValue((fixture.hiddenBy ?? []).map((u) => intValue(u))),
      votes: bagValue(fixture.votes ?? []),
    },
    `story_${id}`,
  );
}
