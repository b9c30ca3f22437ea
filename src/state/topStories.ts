import type { StorySummary, TopStoriesState } from "../types";

export type TopStoriesAction =
  | { type: "load" }
  | { type: "loaded"; stories: StorySummary[] }
  | { type: "failed"; message: string };

export const initialTopStoriesState: TopStoriesState = { status: "loading" };

/**
 * Only an explicit load leaves a settled state; a result is accepted only
 * while a load is in flight, so late completions cannot overwrite a
 * newer state.
 */
export const topStoriesReducer = (
  state: TopStoriesState,
  action: TopStoriesAction
): TopStoriesState => {
  switch (action.type) {
    case "load":
      return state.status === "loading" ? state : { status: "loading" };
    case "loaded":
      if (state.status !== "loading") return state;
      return { status: "loaded", stories: action.stories };
    case "failed":
      if (state.status !== "loading") return state;
      return { status: "error", message: action.message };
  }
};
