/**
 * RepositoryHost over the GitHub REST API
 *
 * Uses the low-level Git data endpoints (trees, commits, refs, tags) so
 * that every commit is created against an explicit parent and branch
 * moves are conditional.
 *
 * Status mapping:
 * - network failures, timeouts, 5xx, 401, 403, 429: BackendUnavailableError
 * - 404: NotFoundError (or an absent result for lookups)
 * - 422 "already exists": AlreadyExistsError, other 422: InvalidArgumentError
 */

import {
  AlreadyExistsError,
  type Author,
  BackendUnavailableError,
  InvalidArgumentError,
  type MetastoreError,
  type MetastoreLogger,
  NotFoundError,
  UnexpectedBackendError,
} from "@metastore/core";
import type {
  CommitInfo,
  CreateCommitOptions,
  CreateTagOptions,
  RepositoryHost,
  RepositoryRef,
  TagObject,
} from "../repository-host.js";
import {
  readArray,
  readErrorMessage,
  readGitCommit,
  readGitRef,
  readGitTag,
  readListedCommit,
  readObject,
  readString,
} from "./github-json.js";

export const GITHUB_API_URL = "https://api.github.com";
const API_VERSION = "2022-11-28";
const PAGE_SIZE = 100;

export type FetchFunction = (input: string, init: RequestInit) => Promise<Response>;

export interface GitHubRepositoryHostOptions {
  /** Personal access token or app installation token */
  token: string;
  /** API root; defaults to https://api.github.com */
  baseUrl?: string;
  /** Abort requests taking longer than this; defaults to 30 seconds */
  timeoutMs?: number;
  /** Transport; defaults to the global fetch */
  fetch?: FetchFunction;
  logger?: MetastoreLogger;
}

interface RequestOptions {
  body?: unknown;
  accept?: string;
}

export class GitHubRepositoryHost implements RepositoryHost {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFunction;
  private readonly logger: MetastoreLogger | undefined;
  private login: Promise<string> | undefined;

  constructor(options: GitHubRepositoryHostOptions) {
    this.token = options.token;
    this.baseUrl = (options.baseUrl ?? GITHUB_API_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger;
  }

  async createRepository(repo: RepositoryRef, options: { branch: string; description?: string }): Promise<void> {
    const owner = await this.authenticatedLogin();
    const path = repo.owner === owner ? "/user/repos" : `/orgs/${encodeURIComponent(repo.owner)}/repos`;
    const response = await this.request("POST", path, {
      body: { name: repo.name, description: options.description, auto_init: true },
    });
    await this.expectOk(response, `create repository ${repo.owner}/${repo.name}`);

    // auto_init commits to the account's default branch
    const head = await this.getBranchHead(repo, options.branch);
    if (head === undefined) {
      const created = await this.json(
        await this.request("GET", this.repoPath(repo, "")),
        `read repository ${repo.owner}/${repo.name}`,
      );
      const defaultBranch = readString(readObject(created, "repository"), "default_branch");
      const root = await this.getBranchHead(repo, defaultBranch);
      if (root === undefined) {
        throw new UnexpectedBackendError(`Repository ${repo.owner}/${repo.name} was created without a commit`);
      }
      await this.expectOk(
        await this.request("POST", this.repoPath(repo, "/git/refs"), {
          body: { ref: `refs/heads/${options.branch}`, sha: root },
        }),
        `create branch ${options.branch}`,
      );
    }
  }

  async deleteRepository(repo: RepositoryRef): Promise<void> {
    await this.expectOk(await this.request("DELETE", this.repoPath(repo, "")), `delete ${repo.owner}/${repo.name}`);
  }

  async getBranchHead(repo: RepositoryRef, branch: string): Promise<string | undefined> {
    const response = await this.request("GET", this.repoPath(repo, `/git/ref/heads/${encodeRef(branch)}`));
    // 409: the repository has no commits yet
    if (response.status === 404 || response.status === 409) {
      return undefined;
    }
    return readGitRef(await this.json(response, `read branch ${branch}`)).sha;
  }

  async getCommit(repo: RepositoryRef, sha: string): Promise<CommitInfo | undefined> {
    const response = await this.request("GET", this.repoPath(repo, `/git/commits/${sha}`));
    if (response.status === 404 || response.status === 422) {
      return undefined;
    }
    const { treeSha: _tree, ...commit } = readGitCommit(await this.json(response, `read commit ${sha}`));
    return commit;
  }

  async listCommits(repo: RepositoryRef, branch: string): Promise<CommitInfo[]> {
    const commits: CommitInfo[] = [];
    for (let page = 1; ; page++) {
      const query = `?sha=${encodeURIComponent(branch)}&per_page=${PAGE_SIZE}&page=${page}`;
      const entries = readArray(
        await this.json(await this.request("GET", this.repoPath(repo, `/commits${query}`)), "list commits"),
        "commits",
      );
      commits.push(...entries.map(readListedCommit));
      if (entries.length < PAGE_SIZE) {
        return commits;
      }
    }
  }

  async readFile(repo: RepositoryRef, path: string, sha: string): Promise<string | undefined> {
    const response = await this.request(
      "GET",
      this.repoPath(repo, `/contents/${path.split("/").map(encodeURIComponent).join("/")}?ref=${sha}`),
      { accept: "application/vnd.github.raw+json" },
    );
    if (response.status === 404) {
      return undefined;
    }
    await this.expectOk(response, `read ${path}@${sha}`, false);
    return readText(response);
  }

  async createCommit(repo: RepositoryRef, options: CreateCommitOptions): Promise<CommitInfo> {
    const parent = readGitCommit(
      await this.json(
        await this.request("GET", this.repoPath(repo, `/git/commits/${options.parentSha}`)),
        `read commit ${options.parentSha}`,
      ),
    );
    const tree = readObject(
      await this.json(
        await this.request("POST", this.repoPath(repo, "/git/trees"), {
          body: {
            base_tree: parent.treeSha,
            tree: options.files.map((file) => ({ path: file.path, mode: "100644", type: "blob", content: file.content })),
          },
        }),
        "create tree",
      ),
      "tree",
    );
    const { treeSha: _tree, ...commit } = readGitCommit(
      await this.json(
        await this.request("POST", this.repoPath(repo, "/git/commits"), {
          body: {
            message: options.message,
            tree: readString(tree, "sha"),
            parents: [options.parentSha],
            author: toSignature(options.author),
          },
        }),
        "create commit",
      ),
    );
    return commit;
  }

  async updateBranch(repo: RepositoryRef, branch: string, sha: string, options: { force: boolean }): Promise<boolean> {
    const response = await this.request("PATCH", this.repoPath(repo, `/git/refs/heads/${encodeRef(branch)}`), {
      body: { sha, force: options.force },
    });
    if (response.status === 422 && !options.force) {
      const message = readErrorMessage(await readBody(response));
      if (/fast.forward/i.test(message)) {
        return false;
      }
      throw this.failure(422, message, `update branch ${branch}`);
    }
    await this.expectOk(response, `update branch ${branch}`);
    return true;
  }

  async createTag(repo: RepositoryRef, options: CreateTagOptions): Promise<TagObject> {
    const payload = await this.json(
      await this.request("POST", this.repoPath(repo, "/git/tags"), {
        body: {
          tag: options.name,
          message: options.message,
          object: options.commitSha,
          type: "commit",
          tagger: toSignature(options.tagger),
        },
      }),
      `create tag ${options.name}`,
    );
    const tag = readGitTag(payload);
    const tagSha = readString(readObject(payload, "tag"), "sha");
    const created = await this.request("POST", this.repoPath(repo, "/git/refs"), {
      body: { ref: `refs/tags/${options.name}`, sha: tagSha },
    });
    if (created.status === 422 && options.force) {
      const message = readErrorMessage(await readBody(created));
      if (!/already exists/i.test(message)) {
        throw this.failure(422, message, `create tag ref ${options.name}`);
      }
      await this.expectOk(
        await this.request("PATCH", this.repoPath(repo, `/git/refs/tags/${encodeRef(options.name)}`), {
          body: { sha: tagSha, force: true },
        }),
        `move tag ${options.name}`,
      );
      return tag;
    }
    await this.expectOk(created, `create tag ref ${options.name}`);
    return tag;
  }

  async getTag(repo: RepositoryRef, name: string): Promise<TagObject | undefined> {
    const response = await this.request("GET", this.repoPath(repo, `/git/ref/tags/${encodeRef(name)}`));
    if (response.status === 404) {
      return undefined;
    }
    return this.resolveTagRef(repo, readGitRef(await this.json(response, `read tag ${name}`)));
  }

  async listTags(repo: RepositoryRef): Promise<TagObject[]> {
    const refs = readArray(
      await this.json(await this.request("GET", this.repoPath(repo, "/git/matching-refs/tags/")), "list tags"),
      "refs",
    );
    const tags: TagObject[] = [];
    for (const ref of refs) {
      tags.push(await this.resolveTagRef(repo, readGitRef(ref)));
    }
    return tags;
  }

  async deleteTag(repo: RepositoryRef, name: string): Promise<boolean> {
    const response = await this.request("DELETE", this.repoPath(repo, `/git/refs/tags/${encodeRef(name)}`));
    // 422: "Reference does not exist"
    if (response.status === 404 || response.status === 422) {
      return false;
    }
    await this.expectOk(response, `delete tag ${name}`);
    return true;
  }

  private async resolveTagRef(repo: RepositoryRef, ref: { ref: string; sha: string; type: string }): Promise<TagObject> {
    const name = ref.ref.replace(/^refs\/tags\//, "");
    if (ref.type === "tag") {
      return readGitTag(
        await this.json(await this.request("GET", this.repoPath(repo, `/git/tags/${ref.sha}`)), `read tag ${name}`),
      );
    }
    // Lightweight tag: the ref points at the commit itself
    const commit = await this.getCommit(repo, ref.sha);
    if (!commit) {
      throw new NotFoundError(`Tag ${name} points at a missing commit ${ref.sha}`);
    }
    const tag: TagObject = { name, commitSha: commit.sha, message: "", date: commit.date };
    if (commit.author) tag.tagger = commit.author;
    return tag;
  }

  private authenticatedLogin(): Promise<string> {
    this.login ??= this.request("GET", "/user")
      .then((response) => this.json(response, "read authenticated user"))
      .then((user) => readString(readObject(user, "user"), "login"))
      .catch((error: unknown) => {
        this.login = undefined;
        throw error;
      });
    return this.login;
  }

  private repoPath(repo: RepositoryRef, suffix: string): string {
    return `/repos/${encodeURIComponent(repo.owner)}/${encodeURIComponent(repo.name)}${suffix}`;
  }

  private async request(method: string, path: string, options: RequestOptions = {}): Promise<Response> {
    const headers: Record<string, string> = {
      Accept: options.accept ?? "application/vnd.github+json",
      Authorization: `Bearer ${this.token}`,
      "X-GitHub-Api-Version": API_VERSION,
      "User-Agent": "metastore",
    };
    const init: RequestInit = { method, headers, signal: AbortSignal.timeout(this.timeoutMs) };
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(options.body);
    }
    this.logger?.debug?.(`GitHub ${method} ${path}`);
    try {
      return await this.fetchFn(`${this.baseUrl}${path}`, init);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new BackendUnavailableError(`GitHub request ${method} ${path} failed: ${reason}`, { cause: error });
    }
  }

  private async json(response: Response, action: string): Promise<unknown> {
    await this.expectOk(response, action, false);
    return readBody(response);
  }

  private async expectOk(response: Response, action: string, consume = true): Promise<void> {
    if (response.ok) {
      if (consume) {
        await response.body?.cancel();
      }
      return;
    }
    throw this.failure(response.status, readErrorMessage(await readBody(response)), action);
  }

  private failure(status: number, message: string, action: string): MetastoreError {
    const text = `Failed to ${action}: ${status}${message ? ` ${message}` : ""}`;
    if (status === 401 || status === 403 || status === 429 || status >= 500) {
      return new BackendUnavailableError(text, { status });
    }
    if (status === 404) {
      return new NotFoundError(text);
    }
    if (status === 422 && /already exists/i.test(message)) {
      return new AlreadyExistsError(text);
    }
    if (status === 422) {
      return new InvalidArgumentError("request", action, text);
    }
    return new UnexpectedBackendError(text);
  }
}

/**
 * Read the whole response body. The body streams after the headers
 * arrive, so a timeout or a reset can still fail here.
 */
async function readText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new BackendUnavailableError(`GitHub response ${response.status} could not be read: ${reason}`, { cause: error });
  }
}

async function readBody(response: Response): Promise<unknown> {
  const text = await readText(response);
  if (text.length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    if (response.ok) {
      throw new UnexpectedBackendError(`GitHub returned invalid JSON (${response.status})`, { cause: error });
    }
    return { message: text };
  }
}

function encodeRef(name: string): string {
  return name.split("/").map(encodeURIComponent).join("/");
}

/**
 * Git signature for an author; GitHub needs both name and email, so a
 * partial author falls back to the token's user.
 */
function toSignature(author: Author | undefined): { name: string; email: string } | undefined {
  if (author?.name === undefined || author.email === undefined) {
    return undefined;
  }
  return { name: author.name, email: author.email };
}
