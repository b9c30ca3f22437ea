import axios from "axios";
import type { StoryDetail, TopStoriesState } from "../types";

const API_URL = import.meta.env.VITE_API_URL || "http://localhost:3001/api";

export type TopStoriesResponse = Exclude<TopStoriesState, { status: "loading" }>;

// The server answers 502 with an error state when the upstream API fails
export const fetchTopStories = async (
  signal?: AbortSignal
): Promise<TopStoriesResponse> => {
  console.log(`Fetching top stories from: ${API_URL}/top-stories`);
  const response = await axios.get<TopStoriesResponse>(
    `${API_URL}/top-stories`,
    {
      signal,
      validateStatus: (status) => status === 200 || status === 502,
    }
  );
  return response.data;
};

export const fetchStory = async (
  id: number,
  signal?: AbortSignal
): Promise<StoryDetail> => {
  const response = await axios.get<StoryDetail>(`${API_URL}/stories/${id}`, {
    signal,
  });
  return response.data;
};

export const describeRequestError = (error: unknown): string => {
  if (axios.isAxiosError<{ error?: string }>(error)) {
    const serverMessage = error.response?.data?.error;
    if (serverMessage) return serverMessage;
    return `Network error: ${error.message}`;
  }
  return error instanceof Error ? error.message : "Something went wrong";
};
