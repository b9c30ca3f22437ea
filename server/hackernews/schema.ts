import { z } from "zod";
import type { StoryDetail, StorySummary } from "../models/types.js";
import { htmlToParagraphs } from "./text.js";

// The API sends null for fields it has nothing for, and omits others
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  schema.nullish().transform((value) => value ?? undefined);

export const TopStoryIdsSchema = z.array(z.number().int());

export const ItemSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  url: optional(z.string()),
  score: optional(z.number()),
  by: optional(z.string()),
  time: optional(z.number().int()),
  text: optional(z.string()),
  descendants: optional(z.number().int()),
});

export type Item = z.infer<typeof ItemSchema>;

// Copies only the fields that are set, so absent values stay absent
export const toStorySummary = (story: StorySummary): StorySummary => {
  const summary: StorySummary = { id: story.id, title: story.title };

  if (story.url !== undefined) summary.url = story.url;
  if (story.score !== undefined) summary.score = story.score;
  if (story.author !== undefined) summary.author = story.author;
  if (story.submittedAtEpochSeconds !== undefined) {
    summary.submittedAtEpochSeconds = story.submittedAtEpochSeconds;
  }
  if (story.commentCount !== undefined) {
    summary.commentCount = story.commentCount;
  }

  return summary;
};

export const toStoryDetail = (item: Item): StoryDetail => {
  const detail: StoryDetail = {
    ...toStorySummary({
      id: item.id,
      title: item.title,
      url: item.url,
      score: item.score,
      author: item.by,
      submittedAtEpochSeconds: item.time,
      commentCount: item.descendants,
    }),
    paragraphs: item.text ? htmlToParagraphs(item.text) : [],
  };

  if (item.text !== undefined) detail.text = item.text;

  return detail;
};

export const describeIssue = (error: z.ZodError): string => {
  const issue = error.issues[0];
  if (!issue) return "invalid payload";
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
};
