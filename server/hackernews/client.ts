import axios, {
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosResponse,
} from "axios";
import type {
  StoryDetail,
  StoryId,
  TopStorySource,
} from "../models/types.js";
import { HackerNewsError, cancelledError } from "./errors.js";
import { instrument } from "./instrumentation.js";
import {
  ItemSchema,
  TopStoryIdsSchema,
  describeIssue,
  toStoryDetail,
} from "./schema.js";

export const DEFAULT_API_URL = "https://hacker-news.firebaseio.com/v0";
export const DEFAULT_TIMEOUT_MS = 10_000;

export interface HackerNewsClientOptions {
  baseURL?: string;
  timeoutMs?: number;
  // Hosts that receive a traceparent header
  firstPartyHosts?: string[];
  // Replaces the HTTP transport, e.g. with an in-process stand-in
  adapter?: AxiosAdapter;
}

export class HackerNewsClient implements TopStorySource {
  private readonly http: AxiosInstance;

  constructor(options: HackerNewsClientOptions = {}) {
    this.http = axios.create({
      baseURL: options.baseURL ?? DEFAULT_API_URL,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      // Status codes are checked in get() so they map to a "status" error
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
    instrument(this.http, options.firstPartyHosts ?? []);
  }

  async getTopStoryIds(signal?: AbortSignal): Promise<StoryId[]> {
    const data = await this.get("/topstories.json", signal);
    const parsed = TopStoryIdsSchema.safeParse(data);
    if (!parsed.success) {
      throw new HackerNewsError(
        "decode",
        `Decode error: ${describeIssue(parsed.error)}`,
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }

  async getItem(id: StoryId, signal?: AbortSignal): Promise<StoryDetail> {
    const data = await this.get(`/item/${id}.json`, signal);
    if (data === null) {
      throw new HackerNewsError("missing", `Item ${id} not found`);
    }

    const parsed = ItemSchema.safeParse(data);
    if (!parsed.success) {
      throw new HackerNewsError(
        "decode",
        `Decode error: ${describeIssue(parsed.error)}`,
        { cause: parsed.error }
      );
    }
    return toStoryDetail(parsed.data);
  }

  private async get(path: string, signal?: AbortSignal): Promise<unknown> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(path, { signal });
    } catch (error) {
      if (axios.isCancel(error) || signal?.aborted) {
        throw cancelledError();
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new HackerNewsError("transport", `Network error: ${reason}`, {
        cause: error,
      });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new HackerNewsError(
        "status",
        `Unexpected status ${response.status} from ${path}`,
        { status: response.status }
      );
    }
    return response.data;
  }
}
