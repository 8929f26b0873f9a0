import { describe, expect, it } from "vitest";
import type { RevisionInfo } from "../../src/model/revision.js";
import { verifyRevisionHistory } from "../../src/model/revision-history.js";

function entry(revisionId: string, parentRevisionId: string | undefined, time: number): RevisionInfo {
  const info: RevisionInfo = { packageId: "pkg-a", revisionId, createdAt: new Date(time) };
  if (parentRevisionId !== undefined) info.parentRevisionId = parentRevisionId;
  return info;
}

describe("verifyRevisionHistory", () => {
  it("accepts an empty history", () => {
    expect(verifyRevisionHistory([])).toBeUndefined();
  });

  it("accepts a linear newest-first history", () => {
    const history = [entry("r3", "r2", 3000), entry("r2", "r1", 2000), entry("r1", undefined, 1000)];
    expect(verifyRevisionHistory(history)).toBeUndefined();
  });

  it("accepts revisions created in the same millisecond", () => {
    const history = [entry("r2", "r1", 1000), entry("r1", undefined, 1000)];
    expect(verifyRevisionHistory(history)).toBeUndefined();
  });

  it("reports a broken parent link", () => {
    const history = [entry("r3", "r1", 3000), entry("r2", "r1", 2000), entry("r1", undefined, 1000)];
    expect(verifyRevisionHistory(history)).toEqual({
      index: 0,
      revisionId: "r3",
      reason: "parent is r1, expected r2",
    });
  });

  it("reports a missing parent", () => {
    const history = [entry("r2", undefined, 2000), entry("r1", undefined, 1000)];
    expect(verifyRevisionHistory(history)).toEqual({
      index: 0,
      revisionId: "r2",
      reason: "parent is (none), expected r1",
    });
  });

  it("reports a parent on the oldest revision", () => {
    expect(verifyRevisionHistory([entry("r1", "r0", 1000)])).toEqual({
      index: 0,
      revisionId: "r1",
      reason: "oldest revision has parent r0",
    });
  });

  it("reports duplicate ids", () => {
    const history = [entry("r1", "r1", 2000), entry("r1", undefined, 1000)];
    expect(verifyRevisionHistory(history)).toEqual({
      index: 1,
      revisionId: "r1",
      reason: "duplicate revision id",
    });
  });

  it("reports time running backwards", () => {
    const history = [entry("r2", "r1", 1000), entry("r1", undefined, 2000)];
    expect(verifyRevisionHistory(history)).toEqual({
      index: 0,
      revisionId: "r2",
      reason: "created before its parent",
    });
  });
});
