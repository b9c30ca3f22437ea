import type {
  StoryId,
  TopStoriesState,
  TopStorySource,
} from "../models/types.js";
import { fetchStories } from "./aggregator.js";
import { isCancelled } from "./errors.js";

export const TOP_STORIES_LIMIT = 30;

export type SettledTopStoriesState = Exclude<
  TopStoriesState,
  { status: "loading" }
>;

export interface LoadTopStoriesOptions {
  limit?: number;
  signal?: AbortSignal;
}

// One explicit load: the ID list, then the fan-out over its first `limit` ids
export async function loadTopStories(
  source: TopStorySource,
  { limit = TOP_STORIES_LIMIT, signal }: LoadTopStoriesOptions = {}
): Promise<SettledTopStoriesState> {
  let ids: StoryId[];
  try {
    ids = await source.getTopStoryIds(signal);
  } catch (error) {
    if (isCancelled(error)) throw error;
    const message =
      error instanceof Error ? error.message : "Failed to load top stories";
    console.error("Error loading top stories:", message);
    return { status: "error", message };
  }

  const stories = await fetchStories(source, ids.slice(0, limit), { signal });
  return { status: "loaded", stories };
}
