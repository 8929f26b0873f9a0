import { expectFailure } from "@metastore/testing";
import { describe, expect, it } from "vitest";
import { MemoryRepositoryHost } from "../../src/index.js";

const REPO = { owner: "acme", name: "pkg-a" };

async function createRepository() {
  const host = new MemoryRepositoryHost();
  await host.createRepository(REPO, { branch: "master" });
  const root = await host.getBranchHead(REPO, "master");
  if (root === undefined) {
    throw new Error("Repository has no root commit");
  }
  return { host, root };
}

describe("MemoryRepositoryHost", () => {
  it("starts repositories with a single root commit", async () => {
    const { host, root } = await createRepository();

    const commits = await host.listCommits(REPO, "master");

    expect(commits.map((commit) => commit.sha)).toEqual([root]);
    expect(commits[0].parents).toEqual([]);
    await expectFailure(host.createRepository(REPO, { branch: "master" }), "already-exists");
  });

  it("carries files over from the parent commit", async () => {
    const { host, root } = await createRepository();

    const first = await host.createCommit(REPO, {
      parentSha: root,
      files: [{ path: "datapackage.json", content: "{}" }],
      message: "first",
    });
    const second = await host.createCommit(REPO, {
      parentSha: first.sha,
      files: [{ path: "notes.txt", content: "hello" }],
      message: "second",
    });

    expect(await host.readFile(REPO, "datapackage.json", second.sha)).toBe("{}");
    expect(await host.readFile(REPO, "datapackage.json", root)).toBeUndefined();
  });

  it("only fast-forwards a branch unless forced", async () => {
    const { host, root } = await createRepository();
    const left = await host.createCommit(REPO, { parentSha: root, files: [], message: "left" });
    const right = await host.createCommit(REPO, { parentSha: root, files: [], message: "right" });

    expect(await host.updateBranch(REPO, "master", left.sha, { force: false })).toBe(true);
    expect(await host.updateBranch(REPO, "master", right.sha, { force: false })).toBe(false);
    expect(await host.getBranchHead(REPO, "master")).toBe(left.sha);
    expect(await host.updateBranch(REPO, "master", right.sha, { force: true })).toBe(true);
    expect(await host.getBranchHead(REPO, "master")).toBe(right.sha);
  });

  it("keeps tag names unique unless forced", async () => {
    const { host, root } = await createRepository();
    const commit = await host.createCommit(REPO, { parentSha: root, files: [], message: "c" });

    await host.createTag(REPO, { name: "v1", commitSha: root, message: "first" });
    await expectFailure(host.createTag(REPO, { name: "v1", commitSha: commit.sha, message: "again" }), "already-exists");
    await host.createTag(REPO, { name: "v1", commitSha: commit.sha, message: "moved", force: true });

    expect(await host.getTag(REPO, "v1")).toMatchObject({ commitSha: commit.sha, message: "moved" });
    expect(await host.deleteTag(REPO, "v1")).toBe(true);
    expect(await host.deleteTag(REPO, "v1")).toBe(false);
  });

  it("fails to delete a missing repository", async () => {
    await expectFailure(new MemoryRepositoryHost().deleteRepository(REPO), "not-found");
  });
});
