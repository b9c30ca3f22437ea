import { describe, it } from "node:test";
import * as assert from "node:assert";
import { loadConfig } from "../server/config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    assert.deepStrictEqual(loadConfig({}), {
      port: 3001,
      apiUrl: "https://hacker-news.firebaseio.com/v0",
      topStoriesLimit: 30,
      requestTimeoutMs: 10000,
      firstPartyHosts: ["hacker-news.firebaseio.com"],
      nodeEnv: "development",
    });
  });

  it("reads and coerces environment values", () => {
    const config = loadConfig({
      PORT: "8080",
      HN_API_URL: "http://localhost:3000/v0",
      HN_TOP_STORIES_LIMIT: "10",
      HN_REQUEST_TIMEOUT_MS: "2500",
      HN_FIRST_PARTY_HOSTS: "localhost:3000, hacker-news.firebaseio.com,",
      NODE_ENV: "production",
    });

    assert.deepStrictEqual(config, {
      port: 8080,
      apiUrl: "http://localhost:3000/v0",
      topStoriesLimit: 10,
      requestTimeoutMs: 2500,
      firstPartyHosts: ["localhost:3000", "hacker-news.firebaseio.com"],
      nodeEnv: "production",
    });
  });

  it("refuses a top stories limit above 30", () => {
    assert.throws(
      () => loadConfig({ HN_TOP_STORIES_LIMIT: "45" }),
      /^Error: Invalid configuration: HN_TOP_STORIES_LIMIT: /
    );
  });

  it("refuses a malformed API url", () => {
    assert.throws(
      () => loadConfig({ HN_API_URL: "not a url" }),
      /Invalid configuration: HN_API_URL: Invalid url/
    );
  });
});
