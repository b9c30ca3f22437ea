export interface StorySummary {
  id: number;
  title: string;
  url?: string;
  score?: number;
  author?: string;
  submittedAtEpochSeconds?: number;
  commentCount?: number;
}

export interface StoryDetail extends StorySummary {
  text?: string;
  paragraphs: string[];
}

export type TopStoriesState =
  | { status: "loading" }
  | { status: "error"; message: string }
  | { status: "loaded"; stories: StorySummary[] };
