import type { StoryId, StorySource, StorySummary } from "../models/types.js";
import { cancelledError } from "./errors.js";
import { toStorySummary } from "./schema.js";

export interface FetchStoriesOptions {
  signal?: AbortSignal;
}

const byScoreDescending = (a: StorySummary, b: StorySummary): number =>
  (b.score ?? 0) - (a.score ?? 0);

/**
 * Fetches every story concurrently and resolves once all of them have
 * settled. Items that fail to load are left out of the result, which is
 * sorted by score (highest first, unscored as 0). Equal scores keep the
 * order of `ids`.
 *
 * Rejects with a "cancelled" HackerNewsError if `signal` aborts.
 */
export async function fetchStories(
  source: StorySource,
  ids: readonly StoryId[],
  { signal }: FetchStoriesOptions = {}
): Promise<StorySummary[]> {
  const results = await Promise.allSettled(
    ids.map((id) => source.getItem(id, signal))
  );

  if (signal?.aborted) {
    throw cancelledError();
  }

  const stories: StorySummary[] = [];
  results.forEach((result, index) => {
    if (result.status === "fulfilled") {
      stories.push(toStorySummary(result.value));
      return;
    }
    const reason =
      result.reason instanceof Error
        ? result.reason.message
        : String(result.reason);
    console.error(`Dropping story ${ids[index]}: ${reason}`);
  });

  if (stories.length < ids.length) {
    console.log(`Loaded ${stories.length} of ${ids.length} stories`);
  }

  return stories.sort(byScoreDescending);
}
