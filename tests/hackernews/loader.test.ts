import { describe, it } from "node:test";
import * as assert from "node:assert";
import { HackerNewsError, isCancelled } from "../../server/hackernews/errors.js";
import { loadTopStories } from "../../server/hackernews/loader.js";
import type { StoryDetail, StoryId } from "../../server/models/types.js";
import { FakeStorySource, story, storiesById } from "./fakes.js";

const range = (count: number): StoryId[] =>
  Array.from({ length: count }, (_, index) => 1000 + index);

describe("loadTopStories", () => {
  it("loads the first 30 ids only", async () => {
    const all = range(45);
    const source = new FakeStorySource(
      all,
      storiesById(all.map((id) => story(id, { score: id % 17 })))
    );

    const state = await loadTopStories(source);

    assert.strictEqual(state.status, "loaded");
    assert.deepStrictEqual(source.itemCalls, all.slice(0, 30));
    if (state.status === "loaded") {
      assert.strictEqual(state.stories.length, 30);
    }
  });

  it("honours a smaller limit", async () => {
    const all = range(10);
    const source = new FakeStorySource(all, storiesById(all.map((id) => story(id))));

    await loadTopStories(source, { limit: 3 });

    assert.deepStrictEqual(source.itemCalls, [1000, 1001, 1002]);
  });

  it("returns an error state and skips the fan-out when the id list fails", async () => {
    const source = new FakeStorySource(
      new HackerNewsError("transport", "Network error: getaddrinfo ENOTFOUND")
    );

    const state = await loadTopStories(source);

    assert.deepStrictEqual(state, {
      status: "error",
      message: "Network error: getaddrinfo ENOTFOUND",
    });
    assert.strictEqual(source.itemCalls.length, 0);
  });

  it("uses the message of any other failure", async () => {
    const source = new FakeStorySource(new Error("boom"));

    assert.deepStrictEqual(await loadTopStories(source), {
      status: "error",
      message: "boom",
    });
  });

  it("still loads when one fetch in a full batch times out", async () => {
    const all = range(30);
    const items = new Map<StoryId, StoryDetail | Error>(
      all.map((id) => [id, story(id, { score: (id * 31) % 97 })])
    );
    const timedOut = all[16] ?? 0;
    items.set(
      timedOut,
      new HackerNewsError("transport", "Network error: timeout of 10000ms exceeded")
    );
    const source = new FakeStorySource(all, items);

    const state = await loadTopStories(source);

    assert.strictEqual(state.status, "loaded");
    if (state.status !== "loaded") return;
    assert.strictEqual(state.stories.length, 29);
    assert.ok(state.stories.every((entry) => entry.id !== timedOut));
    for (let i = 1; i < state.stories.length; i++) {
      assert.ok(
        (state.stories[i - 1]?.score ?? 0) >= (state.stories[i]?.score ?? 0)
      );
    }
  });

  it("gives the same result for the same upstream data", async () => {
    const all = range(12);
    const source = new FakeStorySource(
      all,
      storiesById(all.map((id) => story(id, { score: id % 3 })))
    );

    const first = await loadTopStories(source);
    const second = await loadTopStories(source);

    assert.deepStrictEqual(second, first);
    assert.strictEqual(source.topStoryCalls, 2);
  });

  it("rejects instead of publishing when cancelled", async () => {
    const source = new FakeStorySource(range(3));
    const controller = new AbortController();
    controller.abort();

    await assert.rejects(
      loadTopStories(source, { signal: controller.signal }),
      (error: unknown) => isCancelled(error)
    );
    assert.strictEqual(source.itemCalls.length, 0);
  });
});
