import { z } from "zod";
import { DEFAULT_API_URL, DEFAULT_TIMEOUT_MS } from "./hackernews/client.js";
import { TOP_STORIES_LIMIT } from "./hackernews/loader.js";
import { describeIssue } from "./hackernews/schema.js";

const hostList = (value: string): string[] =>
  value
    .split(",")
    .map((host) => host.trim())
    .filter((host) => host.length > 0);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  HN_API_URL: z.string().url().default(DEFAULT_API_URL),
  HN_TOP_STORIES_LIMIT: z.coerce
    .number()
    .int()
    .min(1)
    .max(TOP_STORIES_LIMIT)
    .default(TOP_STORIES_LIMIT),
  HN_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_TIMEOUT_MS),
  HN_FIRST_PARTY_HOSTS: z
    .string()
    .default("hacker-news.firebaseio.com")
    .transform(hostList),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

export interface Config {
  port: number;
  apiUrl: string;
  topStoriesLimit: number;
  requestTimeoutMs: number;
  firstPartyHosts: string[];
  nodeEnv: "development" | "production" | "test";
}

export const loadConfig = (
  env: Record<string, string | undefined> = process.env
): Config => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${describeIssue(parsed.error)}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    apiUrl: values.HN_API_URL,
    topStoriesLimit: values.HN_TOP_STORIES_LIMIT,
    requestTimeoutMs: values.HN_REQUEST_TIMEOUT_MS,
    firstPartyHosts: values.HN_FIRST_PARTY_HOSTS,
    nodeEnv: values.NODE_ENV,
  };
};
