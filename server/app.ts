import express, { type Response } from "express";
import cors from "cors";
import path from "path";
import type { StoryId, TopStorySource } from "./models/types.js";
import { HackerNewsError, isCancelled } from "./hackernews/errors.js";
import { loadTopStories } from "./hackernews/loader.js";

export interface AppOptions {
  client: TopStorySource;
  topStoriesLimit: number;
  // Built front end to serve, production only
  staticDir?: string;
}

export const statusForError = (error: HackerNewsError): number =>
  error.kind === "missing" ? 404 : 502;

// Plain decimal digits only; Number() alone would take "1e0" or "0x10"
export const parseStoryId = (raw: string): StoryId | null => {
  if (!/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
};

// Aborts upstream work when the caller goes away before we answer
const abortOnDisconnect = (res: Response): AbortController => {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller;
};

export const createApp = ({
  client,
  topStoriesLimit,
  staticDir,
}: AppOptions) => {
  const app = express();

  app.use(cors());

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // Top stories, fetched fresh on every call
  app.get("/api/top-stories", async (_req, res) => {
    const controller = abortOnDisconnect(res);
    try {
      const state = await loadTopStories(client, {
        limit: topStoriesLimit,
        signal: controller.signal,
      });

      if (state.status === "error") {
        res.status(502).json(state);
        return;
      }

      console.log(`Serving ${state.stories.length} top stories`);
      res.json(state);
    } catch (error) {
      if (isCancelled(error)) {
        console.log("Top stories request abandoned by client");
        return;
      }
      console.error("Error loading top stories:", error);
      res.status(500).json({ status: "error", message: "Server error" });
    }
  });

  app.get("/api/stories/:id", async (req, res) => {
    const id = parseStoryId(req.params.id);
    if (id === null) {
      res.status(400).json({ error: "Story id must be a positive integer" });
      return;
    }

    const controller = abortOnDisconnect(res);
    try {
      const story = await client.getItem(id, controller.signal);
      res.json(story);
    } catch (error) {
      if (isCancelled(error)) {
        return;
      }
      if (error instanceof HackerNewsError) {
        console.error(`Error fetching story ${id}:`, error.message);
        res.status(statusForError(error)).json({ error: error.message });
        return;
      }
      console.error(`Error fetching story ${id}:`, error);
      res.status(500).json({ error: "Server error" });
    }
  });

  if (staticDir) {
    app.use(express.static(staticDir));

    app.get("*", (_req, res) => {
      res.sendFile(path.join(staticDir, "index.html"));
    });
  }

  return app;
};
