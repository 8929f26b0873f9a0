import { describe, expect, it } from "vitest";
import {
  type Revision,
  type Tag,
  toPackageRevisionInfo,
  toRevisionInfo,
  toTagInfo,
} from "../../src/model/revision.js";

function sampleRevision(): Revision {
  return {
    packageId: "pkg-a",
    revisionId: "r2",
    content: { name: "mypackage", keywords: ["x"] },
    createdAt: new Date("2024-03-01T10:00:00.000Z"),
    message: "Datapackage updated",
    author: { name: "Test User", email: "test@example.com" },
    parentRevisionId: "r1",
  };
}

describe("revision projections", () => {
  it("copies the revision with content", () => {
    const revision = sampleRevision();
    const info = toPackageRevisionInfo(revision);

    expect(info).toEqual(revision);
    expect(info.content).not.toBe(revision.content);
    expect(info.createdAt).not.toBe(revision.createdAt);
    expect(info.author).not.toBe(revision.author);
  });

  it("detaches content from the stored revision", () => {
    const revision = sampleRevision();
    const info = toPackageRevisionInfo(revision);
    info.content.name = "changed";
    expect(revision.content.name).toBe("mypackage");
  });

  it("drops content from listing entries", () => {
    const info = toRevisionInfo(sampleRevision());
    expect(info).toEqual({
      packageId: "pkg-a",
      revisionId: "r2",
      createdAt: new Date("2024-03-01T10:00:00.000Z"),
      message: "Datapackage updated",
      author: { name: "Test User", email: "test@example.com" },
      parentRevisionId: "r1",
    });
    expect("content" in info).toBe(false);
  });

  it("omits absent optional fields", () => {
    const info = toRevisionInfo({
      packageId: "pkg-a",
      revisionId: "r1",
      content: {},
      createdAt: new Date(0),
    });
    expect(Object.keys(info).sort()).toEqual(["createdAt", "packageId", "revisionId"]);
  });

  it("copies tags", () => {
    const tag: Tag = {
      packageId: "pkg-a",
      name: "ver-1.0.1",
      revisionId: "r2",
      createdAt: new Date(1000),
      description: "First release",
    };
    const info = toTagInfo(tag);
    expect(info).toEqual(tag);
    expect(info.createdAt).not.toBe(tag.createdAt);
    expect(Object.keys(info)).not.toContain("author");
  });
});
