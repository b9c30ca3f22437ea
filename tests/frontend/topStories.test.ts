import { describe, it } from "node:test";
import * as assert from "node:assert";
import {
  initialTopStoriesState,
  topStoriesReducer,
} from "../../src/state/topStories";
import type { TopStoriesState } from "../../src/types";

const stories = [{ id: 1, title: "First", score: 12 }];

describe("topStoriesReducer", () => {
  it("starts out loading", () => {
    assert.deepStrictEqual(initialTopStoriesState, { status: "loading" });
  });

  it("settles a load with its result", () => {
    assert.deepStrictEqual(
      topStoriesReducer({ status: "loading" }, { type: "loaded", stories }),
      { status: "loaded", stories }
    );
    assert.deepStrictEqual(
      topStoriesReducer(
        { status: "loading" },
        { type: "failed", message: "Network error: timeout" }
      ),
      { status: "error", message: "Network error: timeout" }
    );
  });

  it("returns to loading on retry", () => {
    const failed: TopStoriesState = { status: "error", message: "nope" };

    assert.deepStrictEqual(topStoriesReducer(failed, { type: "load" }), {
      status: "loading",
    });
  });

  it("ignores results that arrive when no load is in flight", () => {
    const loaded: TopStoriesState = { status: "loaded", stories };

    assert.strictEqual(
      topStoriesReducer(loaded, { type: "failed", message: "late" }),
      loaded
    );
    assert.strictEqual(
      topStoriesReducer(loaded, { type: "loaded", stories: [] }),
      loaded
    );
  });
});
