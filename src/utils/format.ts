const HOUR_MS = 60 * 60 * 1000;

export const formatRelativeTime = (
  epochSeconds: number,
  nowMs: number = Date.now()
): string => {
  const diffHours = Math.floor((nowMs - epochSeconds * 1000) / HOUR_MS);

  if (diffHours < 1) {
    return "less than an hour ago";
  } else if (diffHours === 1) {
    return "1 hour ago";
  } else if (diffHours < 24) {
    return `${diffHours} hours ago`;
  }

  const diffDays = Math.floor(diffHours / 24);
  return diffDays === 1 ? "1 day ago" : `${diffDays} days ago`;
};

// Empty for links back to the aggregator itself and for unparseable urls
export const getDomainFromUrl = (url: string): string => {
  try {
    const hostname = new URL(url).hostname;
    return hostname !== "news.ycombinator.com"
      ? hostname.replace(/^www\./, "")
      : "";
  } catch {
    return "";
  }
};

// Route params arrive as free text; only plain positive decimals are ids
export const parseStoryId = (raw: string | undefined): number | null => {
  if (raw === undefined || !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
};
