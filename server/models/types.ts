export type StoryId = number;

export interface StorySummary {
  id: StoryId;
  title: string;
  url?: string;
  score?: number;
  author?: string;
  submittedAtEpochSeconds?: number;
  commentCount?: number;
}

export interface StoryDetail extends StorySummary {
  // Raw HTML body as returned by the API (self posts, Ask HN, polls)
  text?: string;
  paragraphs: string[];
}

export type TopStoriesState =
  | { status: "loading" }
  | { status: "error"; message: string }
  | { status: "loaded"; stories: StorySummary[] };

// Anything that can resolve a single story; the HTTP client is one
export interface StorySource {
  getItem(id: StoryId, signal?: AbortSignal): Promise<StoryDetail>;
}

export interface TopStorySource extends StorySource {
  getTopStoryIds(signal?: AbortSignal): Promise<StoryId[]>;
}
