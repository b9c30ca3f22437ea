import { Link } from "react-router-dom";
import type { StorySummary } from "../types";
import { formatRelativeTime, getDomainFromUrl } from "../utils/format";

interface StoryItemProps {
  story: StorySummary;
}

export const StoryItem = ({ story }: StoryItemProps) => {
  const domain = story.url ? getDomainFromUrl(story.url) : "";
  const submitted =
    story.submittedAtEpochSeconds !== undefined
      ? formatRelativeTime(story.submittedAtEpochSeconds)
      : "";

  return (
    <li className="entry row" id={`${story.id}`}>
      <Link to={`/item/${story.id}`} className="comments span2">
        {story.commentCount ?? 0}
      </Link>
      <span className="points span1">{story.score ?? 0}</span>
      <div className="span15">
        {story.url ? (
          <a className="link story" href={story.url}>
            {story.title}
            {domain && <span className="source"> ({domain})</span>}
          </a>
        ) : (
          <Link className="link story" to={`/item/${story.id}`}>
            {story.title}
          </Link>
        )}
        <div className="byline">
          {story.author && <span>by {story.author} </span>}
          {submitted && <span>{submitted}</span>}
        </div>
      </div>
    </li>
  );
};
