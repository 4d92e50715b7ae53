/**
 * Integration Test — Source cursor persistence
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import { getSourceCursor, setSourceCursor, sqliteCursorStore } from "@/db";

describe("Source cursor", () => {
  let harness: TestDbHarness;

  beforeEach(() => {
    harness = createTestDb();
  });

  afterEach(() => {
    harness.cleanup();
  });

  it("should return null before anything was stored", () => {
    expect(getSourceCursor("telegram:getUpdates")).toBeNull();
  });

  it("should overwrite the cursor per source", () => {
    setSourceCursor("telegram:getUpdates", "10");
    sqliteCursorStore.setCursor("telegram:getUpdates", "13");
    setSourceCursor("other", "1");

    expect(sqliteCursorStore.getCursor("telegram:getUpdates")).toBe("13");
    expect(getSourceCursor("other")).toBe("1");
  });
});
