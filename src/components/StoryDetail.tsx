import axios from "axios";
import { useEffect, useState } from "react";
import { Link, useParams } from "react-router-dom";
import { describeRequestError, fetchStory } from "../services/api";
import type { StoryDetail as Story } from "../types";
import { getDomainFromUrl, parseStoryId } from "../utils/format";

export const StoryDetail = () => {
  const { id } = useParams();
  const [story, setStory] = useState<Story | null>(null);
  const [loading, setLoading] = useState<boolean>(true);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    const itemId = parseStoryId(id);
    if (itemId === null) {
      setError("Invalid story id");
      setLoading(false);
      return;
    }

    const controller = new AbortController();
    setLoading(true);
    setError(null);

    fetchStory(itemId, controller.signal)
      .then((data) => {
        if (controller.signal.aborted) return;
        setStory(data);
        setLoading(false);
      })
      .catch((err: unknown) => {
        if (axios.isCancel(err) || controller.signal.aborted) return;
        console.error(`Error loading story ${itemId}:`, err);
        setError(describeRequestError(err));
        setLoading(false);
      });

    return () => controller.abort();
  }, [id]);

  if (loading) {
    return <div className="loading">Loading...</div>;
  }

  if (error || !story) {
    return (
      <div className="error-message">
        <p>Error: {error ?? "Story not available"}</p>
        <Link to="/">Back to top stories</Link>
      </div>
    );
  }

  const host = story.url ? getDomainFromUrl(story.url) || story.url : "";

  return (
    <article className="story-detail">
      <h2>{story.title}</h2>
      <div className="byline">
        {story.score !== undefined && <span>{story.score} points </span>}
        {story.author && <span>by {story.author} </span>}
        {story.commentCount !== undefined && (
          <span>{story.commentCount} comments</span>
        )}
      </div>
      <hr />
      {story.url && (
        <p>
          <a href={story.url}>{host}</a>
        </p>
      )}
      {story.paragraphs.map((paragraph, index) => (
        <p key={index}>{paragraph}</p>
      ))}
      <Link to="/">Back to top stories</Link>
    </article>
  );
};
