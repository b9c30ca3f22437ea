import axios from "axios";
import { useEffect, useReducer, useState } from "react";
import { describeRequestError, fetchTopStories } from "../services/api";
import {
  initialTopStoriesState,
  topStoriesReducer,
} from "../state/topStories";
import { StoryItem } from "./StoryItem";

export const StoryList = () => {
  const [state, dispatch] = useReducer(
    topStoriesReducer,
    initialTopStoriesState
  );
  // Bumped by Retry; each value is one explicit load
  const [attempt, setAttempt] = useState(0);

  useEffect(() => {
    const controller = new AbortController();
    dispatch({ type: "load" });

    fetchTopStories(controller.signal)
      .then((result) => {
        if (controller.signal.aborted) return;
        if (result.status === "loaded") {
          console.log(`StoryList received ${result.stories.length} stories`);
          dispatch({ type: "loaded", stories: result.stories });
        } else {
          dispatch({ type: "failed", message: result.message });
        }
      })
      .catch((err: unknown) => {
        if (axios.isCancel(err) || controller.signal.aborted) return;
        console.error("Error in loadStories:", err);
        dispatch({ type: "failed", message: describeRequestError(err) });
      });

    return () => controller.abort();
  }, [attempt]);

  if (state.status === "loading") {
    return <div className="loading">Loading stories...</div>;
  }

  if (state.status === "error") {
    return (
      <div className="error-message">
        <h4>Error</h4>
        <p>{state.message}</p>
        <button
          className="retry"
          onClick={() => setAttempt((count) => count + 1)}
        >
          Retry
        </button>
      </div>
    );
  }

  if (state.stories.length === 0) {
    return (
      <div className="no-stories">
        <p>No stories loaded</p>
        <button
          className="retry"
          onClick={() => setAttempt((count) => count + 1)}
        >
          Load Stories
        </button>
      </div>
    );
  }

  return (
    <ul className="entries unstyled">
      {state.stories.map((story) => (
        <StoryItem key={story.id} story={story} />
      ))}
    </ul>
  );
};
