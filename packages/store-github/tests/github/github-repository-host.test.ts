import { expectFailure } from "@metastore/testing";
import { describe, expect, it, vi } from "vitest";
import { GitHubRepositoryHost } from "../../src/index.js";
import {
  brokenBodyResponse,
  createFetchStub,
  emptyResponse,
  jsonResponse,
  type RouteHandler,
} from "../mocks/fetch-stub.js";

const REPO = { owner: "acme", name: "pkg-a" };
const SIGNATURE = { name: "Test User", email: "test@example.com", date: "2024-01-02T03:04:05Z" };

function createHost(routes: Record<string, RouteHandler>) {
  const { fetch, requests } = createFetchStub(routes);
  const host = new GitHubRepositoryHost({ token: "test-token", fetch });
  return { host, fetch, requests };
}

function gitCommit(sha: string, parents: string[], tree = "tree-1") {
  return {
    sha,
    message: "Datapackage updated\n",
    author: SIGNATURE,
    committer: SIGNATURE,
    parents: parents.map((parent) => ({ sha: parent })),
    tree: { sha: tree },
  };
}

function listedCommit(sha: string, parents: string[]) {
  return {
    sha,
    commit: { message: "Datapackage updated", author: SIGNATURE },
    parents: parents.map((parent) => ({ sha: parent })),
  };
}

describe("GitHubRepositoryHost", () => {
  describe("requests", () => {
    it("sends the token and API version", async () => {
      const { host, requests } = createHost({
        "GET /repos/acme/pkg-a/git/ref/heads/master": () =>
          jsonResponse(200, { ref: "refs/heads/master", object: { sha: "c1", type: "commit" } }),
      });

      expect(await host.getBranchHead(REPO, "master")).toBe("c1");

      const [request] = requests;
      expect(request.headers.get("Authorization")).toBe("Bearer test-token");
      expect(request.headers.get("Accept")).toBe("application/vnd.github+json");
      expect(request.headers.get("X-GitHub-Api-Version")).toBe("2022-11-28");
    });

    it("uses a custom API root", async () => {
      const { fetch } = createFetchStub(
        {
          "GET /repos/acme/pkg-a/git/ref/heads/master": () => jsonResponse(404, { message: "Not Found" }),
        },
        "https://github.example.com/api/v3",
      );
      const host = new GitHubRepositoryHost({
        token: "test-token",
        baseUrl: "https://github.example.com/api/v3/",
        fetch,
      });

      expect(await host.getBranchHead(REPO, "master")).toBeUndefined();
      expect(fetch).toHaveBeenCalledWith(
        "https://github.example.com/api/v3/repos/acme/pkg-a/git/ref/heads/master",
        expect.objectContaining({ method: "GET" }),
      );
    });

    it("logs each request at debug level", async () => {
      const { fetch } = createFetchStub({
        "DELETE /repos/acme/pkg-a": () => emptyResponse(),
      });
      const debug = vi.fn();
      const host = new GitHubRepositoryHost({ token: "test-token", fetch, logger: { debug } });

      await host.deleteRepository(REPO);

      expect(debug).toHaveBeenCalledWith("GitHub DELETE /repos/acme/pkg-a");
    });
  });

  describe("repositories", () => {
    it("creates a repository for the authenticated user", async () => {
      const { host, requests } = createHost({
        "GET /user": () => jsonResponse(200, { login: "acme" }),
        "POST /user/repos": () => jsonResponse(201, { name: "pkg-a" }),
        "GET /repos/acme/pkg-a/git/ref/heads/master": () =>
          jsonResponse(200, { ref: "refs/heads/master", object: { sha: "root", type: "commit" } }),
      });

      await host.createRepository(REPO, { branch: "master", description: "Data package repository" });

      expect(requests[1].body).toEqual({ name: "pkg-a", description: "Data package repository", auto_init: true });
    });

    it("creates organization repositories and the requested branch", async () => {
      const { host, requests } = createHost({
        "GET /user": () => jsonResponse(200, { login: "someone" }),
        "POST /orgs/acme/repos": () => jsonResponse(201, { name: "pkg-a" }),
        "GET /repos/acme/pkg-a/git/ref/heads/data": () => jsonResponse(404, { message: "Not Found" }),
        "GET /repos/acme/pkg-a": () => jsonResponse(200, { default_branch: "main" }),
        "GET /repos/acme/pkg-a/git/ref/heads/main": () =>
          jsonResponse(200, { ref: "refs/heads/main", object: { sha: "root", type: "commit" } }),
        "POST /repos/acme/pkg-a/git/refs": () =>
          jsonResponse(201, { ref: "refs/heads/data", object: { sha: "root", type: "commit" } }),
      });

      await host.createRepository(REPO, { branch: "data" });

      expect(requests.map((request) => `${request.method} ${request.path}`)).toEqual([
        "GET /user",
        "POST /orgs/acme/repos",
        "GET /repos/acme/pkg-a/git/ref/heads/data",
        "GET /repos/acme/pkg-a",
        "GET /repos/acme/pkg-a/git/ref/heads/main",
        "POST /repos/acme/pkg-a/git/refs",
      ]);
      expect(requests[5].body).toEqual({ ref: "refs/heads/data", sha: "root" });
    });

    it("maps a taken repository name to already-exists", async () => {
      const { host } = createHost({
        "GET /user": () => jsonResponse(200, { login: "acme" }),
        "POST /user/repos": () =>
          jsonResponse(422, {
            message: "Repository creation failed.",
            errors: [{ resource: "Repository", code: "custom", message: "name already exists on this account" }],
          }),
      });

      const error = await expectFailure(host.createRepository(REPO, { branch: "master" }), "already-exists");
      expect(error.message).toBe(
        "Failed to create repository acme/pkg-a: 422 Repository creation failed.: name already exists on this account",
      );
    });

    it("maps a missing repository to not-found", async () => {
      const { host } = createHost({
        "DELETE /repos/acme/pkg-a": () => jsonResponse(404, { message: "Not Found" }),
      });

      await expectFailure(host.deleteRepository(REPO), "not-found");
    });
  });

  describe("commits", () => {
    it("reads a commit", async () => {
      const { host } = createHost({
        "GET /repos/acme/pkg-a/git/commits/c2": () => jsonResponse(200, gitCommit("c2", ["c1"])),
      });

      expect(await host.getCommit(REPO, "c2")).toEqual({
        sha: "c2",
        message: "Datapackage updated",
        author: { name: "Test User", email: "test@example.com" },
        date: new Date("2024-01-02T03:04:05Z"),
        parents: ["c1"],
      });
    });

    it("returns undefined for unknown commits", async () => {
      const { host } = createHost({
        "GET /repos/acme/pkg-a/git/commits/0000": () => jsonResponse(422, { message: "No commit found for SHA" }),
      });

      expect(await host.getCommit(REPO, "0000")).toBeUndefined();
    });

    it("pages through the branch history", async () => {
      const firstPage = Array.from({ length: 100 }, (_, index) => listedCommit(`c${200 - index}`, [`c${199 - index}`]));
      const { host } = createHost({
        "GET /repos/acme/pkg-a/commits?sha=master&per_page=100&page=1": () => jsonResponse(200, firstPage),
        "GET /repos/acme/pkg-a/commits?sha=master&per_page=100&page=2": () =>
          jsonResponse(200, [listedCommit("c100", [])]),
      });

      const commits = await host.listCommits(REPO, "master");

      expect(commits).toHaveLength(101);
      expect(commits[0].sha).toBe("c200");
      expect(commits[100]).toMatchObject({ sha: "c100", parents: [] });
    });

    it("reads raw file content", async () => {
      const { host, requests } = createHost({
        "GET /repos/acme/pkg-a/contents/datapackage.json?ref=c2": () => new Response('{"name":"mypackage"}'),
      });

      expect(await host.readFile(REPO, "datapackage.json", "c2")).toBe('{"name":"mypackage"}');
      expect(requests[0].headers.get("Accept")).toBe("application/vnd.github.raw+json");
    });

    it("creates a commit on top of the parent tree", async () => {
      const { host, requests } = createHost({
        "GET /repos/acme/pkg-a/git/commits/c1": () => jsonResponse(200, gitCommit("c1", ["root"], "tree-1")),
        "POST /repos/acme/pkg-a/git/trees": () => jsonResponse(201, { sha: "tree-2" }),
        "POST /repos/acme/pkg-a/git/commits": () => jsonResponse(201, gitCommit("c2", ["c1"], "tree-2")),
      });

      const commit = await host.createCommit(REPO, {
        parentSha: "c1",
        files: [{ path: "datapackage.json", content: "{}" }],
        message: "Datapackage updated",
        author: { name: "Test User", email: "test@example.com" },
      });

      expect(commit.sha).toBe("c2");
      expect(requests[1].body).toEqual({
        base_tree: "tree-1",
        tree: [{ path: "datapackage.json", mode: "100644", type: "blob", content: "{}" }],
      });
      expect(requests[2].body).toEqual({
        message: "Datapackage updated",
        tree: "tree-2",
        parents: ["c1"],
        author: { name: "Test User", email: "test@example.com" },
      });
    });

    it("leaves the author to the token's user when the email is missing", async () => {
      const { host, requests } = createHost({
        "GET /repos/acme/pkg-a/git/commits/c1": () => jsonResponse(200, gitCommit("c1", ["root"])),
        "POST /repos/acme/pkg-a/git/trees": () => jsonResponse(201, { sha: "tree-2" }),
        "POST /repos/acme/pkg-a/git/commits": () => jsonResponse(201, gitCommit("c2", ["c1"], "tree-2")),
      });

      await host.createCommit(REPO, { parentSha: "c1", files: [], message: "m", author: { name: "Test User" } });

      expect(requests[2].body).toEqual({ message: "m", tree: "tree-2", parents: ["c1"] });
    });
  });

  describe("branches", () => {
    it("moves the branch without force", async () => {
      const { host, requests } = createHost({
        "PATCH /repos/acme/pkg-a/git/refs/heads/master": () =>
          jsonResponse(200, { ref: "refs/heads/master", object: { sha: "c2", type: "commit" } }),
      });

      expect(await host.updateBranch(REPO, "master", "c2", { force: false })).toBe(true);
      expect(requests[0].body).toEqual({ sha: "c2", force: false });
    });

    it("reports a rejected fast-forward", async () => {
      const { host } = createHost({
        "PATCH /repos/acme/pkg-a/git/refs/heads/master": () =>
          jsonResponse(422, { message: "Update is not a fast forward" }),
      });

      expect(await host.updateBranch(REPO, "master", "c2", { force: false })).toBe(false);
    });
  });

  describe("tags", () => {
    const tagPayload = {
      sha: "tag-1",
      tag: "v1",
      message: "Tagging revision\n",
      object: { sha: "c1", type: "commit" },
      tagger: SIGNATURE,
    };

    it("creates an annotated tag and its ref", async () => {
      const { host, requests } = createHost({
        "POST /repos/acme/pkg-a/git/tags": () => jsonResponse(201, tagPayload),
        "POST /repos/acme/pkg-a/git/refs": () =>
          jsonResponse(201, { ref: "refs/tags/v1", object: { sha: "tag-1", type: "tag" } }),
      });

      const tag = await host.createTag(REPO, { name: "v1", commitSha: "c1", message: "Tagging revision" });

      expect(tag).toEqual({
        name: "v1",
        commitSha: "c1",
        message: "Tagging revision",
        tagger: { name: "Test User", email: "test@example.com" },
        date: new Date("2024-01-02T03:04:05Z"),
      });
      expect(requests[0].body).toEqual({ tag: "v1", message: "Tagging revision", object: "c1", type: "commit" });
      expect(requests[1].body).toEqual({ ref: "refs/tags/v1", sha: "tag-1" });
    });

    it("fails on a taken tag name", async () => {
      const { host } = createHost({
        "POST /repos/acme/pkg-a/git/tags": () => jsonResponse(201, tagPayload),
        "POST /repos/acme/pkg-a/git/refs": () => jsonResponse(422, { message: "Reference already exists" }),
      });

      await expectFailure(host.createTag(REPO, { name: "v1", commitSha: "c1", message: "m" }), "already-exists");
    });

    it("re-points a taken tag name when forced", async () => {
      const { host, requests } = createHost({
        "POST /repos/acme/pkg-a/git/tags": () => jsonResponse(201, tagPayload),
        "POST /repos/acme/pkg-a/git/refs": () => jsonResponse(422, { message: "Reference already exists" }),
        "PATCH /repos/acme/pkg-a/git/refs/tags/v1": () =>
          jsonResponse(200, { ref: "refs/tags/v1", object: { sha: "tag-1", type: "tag" } }),
      });

      await host.createTag(REPO, { name: "v1", commitSha: "c1", message: "m", force: true });

      expect(requests[2].body).toEqual({ sha: "tag-1", force: true });
    });

    it("resolves annotated and lightweight tags", async () => {
      const { host } = createHost({
        "GET /repos/acme/pkg-a/git/matching-refs/tags/": () =>
          jsonResponse(200, [
            { ref: "refs/tags/v1", object: { sha: "tag-1", type: "tag" } },
            { ref: "refs/tags/light", object: { sha: "c2", type: "commit" } },
          ]),
        "GET /repos/acme/pkg-a/git/tags/tag-1": () => jsonResponse(200, tagPayload),
        "GET /repos/acme/pkg-a/git/commits/c2": () => jsonResponse(200, gitCommit("c2", ["c1"])),
      });

      const tags = await host.listTags(REPO);

      expect(tags.map((tag) => [tag.name, tag.commitSha, tag.message])).toEqual([
        ["v1", "c1", "Tagging revision"],
        ["light", "c2", ""],
      ]);
    });

    it("returns undefined for a missing tag", async () => {
      const { host } = createHost({
        "GET /repos/acme/pkg-a/git/ref/tags/v9": () => jsonResponse(404, { message: "Not Found" }),
      });

      expect(await host.getTag(REPO, "v9")).toBeUndefined();
    });

    it("reports whether a tag was deleted", async () => {
      const { host } = createHost({
        "DELETE /repos/acme/pkg-a/git/refs/tags/v1": () => emptyResponse(),
        "DELETE /repos/acme/pkg-a/git/refs/tags/v2": () =>
          jsonResponse(422, { message: "Reference does not exist" }),
      });

      expect(await host.deleteTag(REPO, "v1")).toBe(true);
      expect(await host.deleteTag(REPO, "v2")).toBe(false);
    });
  });

  describe("failures", () => {
    it("maps authentication failures to backend-unavailable with the status", async () => {
      const { host } = createHost({
        "GET /repos/acme/pkg-a/git/ref/heads/master": () => jsonResponse(401, { message: "Bad credentials" }),
      });

      const error = await expectFailure(host.getBranchHead(REPO, "master"), "backend-unavailable");
      expect(error).toMatchObject({ status: 401, message: "Failed to read branch master: 401 Bad credentials" });
    });

    it("maps server errors to backend-unavailable", async () => {
      const { host } = createHost({
        "GET /repos/acme/pkg-a/commits?sha=master&per_page=100&page=1": () =>
          new Response("upstream timeout", { status: 504 }),
      });

      const error = await expectFailure(host.listCommits(REPO, "master"), "backend-unavailable");
      expect(error).toMatchObject({ status: 504, message: "Failed to list commits: 504 upstream timeout" });
    });

    it("maps network failures to backend-unavailable", async () => {
      const fetch = vi.fn().mockRejectedValue(new TypeError("fetch failed"));
      const host = new GitHubRepositoryHost({ token: "test-token", fetch });

      const error = await expectFailure(host.getBranchHead(REPO, "master"), "backend-unavailable");
      expect(error.message).toBe("GitHub request GET /repos/acme/pkg-a/git/ref/heads/master failed: fetch failed");
      expect(error.cause).toBeInstanceOf(TypeError);
    });

    it("maps a body that fails after the headers to backend-unavailable", async () => {
      const timeout = new DOMException("The operation was aborted due to timeout", "TimeoutError");
      const { host } = createHost({
        "GET /repos/acme/pkg-a/git/ref/heads/master": () => brokenBodyResponse(200, timeout),
      });

      const error = await expectFailure(host.getBranchHead(REPO, "master"), "backend-unavailable");
      expect(error.message).toMatch(/^GitHub response 200 could not be read: /);
      expect(error.cause).toBeDefined();
    });

    it("maps a file read cut off mid-body to backend-unavailable", async () => {
      const { host } = createHost({
        "GET /repos/acme/pkg-a/contents/datapackage.json?ref=c2": () =>
          brokenBodyResponse(200, new TypeError("terminated")),
      });

      const error = await expectFailure(host.readFile(REPO, "datapackage.json", "c2"), "backend-unavailable");
      expect(error.message).toMatch(/^GitHub response 200 could not be read: /);
    });

    it("maps other statuses to unexpected", async () => {
      const { host } = createHost({
        "GET /repos/acme/pkg-a/git/ref/tags/v1": () => jsonResponse(418, { message: "I'm a teapot" }),
      });

      await expectFailure(host.getTag(REPO, "v1"), "unexpected");
    });

    it("rejects malformed payloads", async () => {
      const { host } = createHost({
        "GET /repos/acme/pkg-a/git/ref/heads/master": () => jsonResponse(200, { ref: "refs/heads/master" }),
      });

      const error = await expectFailure(host.getBranchHead(REPO, "master"), "unexpected");
      expect(error.message).toBe("Malformed GitHub response: ref object is not an object");
    });
  });
});
