import { Octokit } from "octokit";
import type { GetObjectOptions, ObjectStore, RemoteObject } from "./types.js";
import { ContentTooLargeError, NetworkError, SyncError } from "../core/errors.js";
import { normalizeFolder } from "../core/registry.js";

export interface ParsedGitHubRemote {
  owner: string;
  repo: string;
  pathPrefix: string;
  branch: string;
}

/**
 * Parse a GitHub remote string into components.
 * Format: github:owner/repo[/path][#branch]
 * Examples:
 *   github:user/repo → { owner: "user", repo: "repo", pathPrefix: "", branch: "main" }
 *   github:user/repo/data → { owner: "user", repo: "repo", pathPrefix: "data", branch: "main" }
 *   github:user/repo/a/b#live → { owner: "user", repo: "repo", pathPrefix: "a/b", branch: "live" }
 */
export function parseGitHubRemote(remote: string): ParsedGitHubRemote | null {
  if (!remote.startsWith("github:")) return null;

  const [key, branch] = remote.slice("github:".length).split("#", 2);
  const parts = key.split("/");

  if (parts.length < 2) return null;

  const [owner, repo, ...pathParts] = parts;
  if (!owner || !repo) return null;
  if (branch !== undefined && !branch) return null;

  return {
    owner,
    repo,
    pathPrefix: normalizeFolder(pathParts.join("/")),
    branch: branch ?? "main",
  };
}

/**
 * Serves objects out of a GitHub repository through the contents API.
 * Tags are git blob SHAs, which change exactly when file content does.
 */
export class GitHubObjectStore implements ObjectStore {
  private octokit: Octokit;
  private owner: string;
  private repo: string;
  private pathPrefix: string;
  private branch: string;

  constructor(token: string, owner: string, repo: string, pathPrefix = "", branch = "main") {
    this.octokit = new Octokit({ auth: token });
    this.owner = owner;
    this.repo = repo;
    this.pathPrefix = normalizeFolder(pathPrefix);
    this.branch = branch;
  }

  private prefixPath(path: string): string {
    if (!this.pathPrefix) return path;
    if (!path) return this.pathPrefix;
    return `${this.pathPrefix}/${path}`;
  }

  private unprefixPath(path: string): string {
    if (!this.pathPrefix) return path;
    return path.startsWith(`${this.pathPrefix}/`)
      ? path.slice(this.pathPrefix.length + 1)
      : path;
  }

  async listObjects(folder: string): Promise<RemoteObject[]> {
    try {
      const { data } = await this.octokit.rest.repos.getContent({
        owner: this.owner,
        repo: this.repo,
        path: this.prefixPath(normalizeFolder(folder)),
        ref: this.branch,
      });

      if (!Array.isArray(data)) return [];

      return data
        .filter((item) => item.type === "file")
        .map((item) => ({ key: this.unprefixPath(item.path), tag: item.sha }));
    } catch (err) {
      const error = err as Error & { status?: number };
      if (error.status === 404) return [];
      throw toNetworkError(`list ${folder}`, error);
    }
  }

  async headObject(key: string): Promise<string | null> {
    try {
      const { data } = await this.octokit.rest.repos.getContent({
        owner: this.owner,
        repo: this.repo,
        path: this.prefixPath(key),
        ref: this.branch,
      });

      if (Array.isArray(data) || data.type !== "file") return null;
      return data.sha;
    } catch (err) {
      const error = err as Error & { status?: number };
      if (error.status === 404) return null;
      throw toNetworkError(`head ${key}`, error);
    }
  }

  async getObject(
    key: string,
    options: GetObjectOptions = {},
  ): Promise<AsyncIterable<Uint8Array>> {
    const content = await this.getFileContent(key, options.maxBytes);
    return single(content);
  }

  describe(): string {
    const path = this.pathPrefix ? `/${this.pathPrefix}` : "";
    return `github:${this.owner}/${this.repo}${path}#${this.branch}`;
  }

  private async getFileContent(key: string, maxBytes?: number): Promise<Uint8Array> {
    try {
      const { data } = await this.octokit.rest.repos.getContent({
        owner: this.owner,
        repo: this.repo,
        path: this.prefixPath(key),
        ref: this.branch,
      });

      if (Array.isArray(data) || data.type !== "file") {
        throw new NetworkError(`Not a file: ${key}`, undefined, false);
      }

      if (maxBytes !== undefined && data.size > maxBytes) {
        throw new ContentTooLargeError(key, maxBytes);
      }

      // Files over 1 MB come back without inline content
      if (data.encoding === "base64" && (data.content || data.size === 0)) {
        return Uint8Array.from(Buffer.from(data.content, "base64"));
      }
      return await this.getBlob(data.sha);
    } catch (err) {
      if (err instanceof SyncError) throw err;
      throw toNetworkError(`get ${key}`, err as Error & { status?: number });
    }
  }

  private async getBlob(sha: string): Promise<Uint8Array> {
    const { data: blob } = await this.octokit.rest.git.getBlob({
      owner: this.owner,
      repo: this.repo,
      file_sha: sha,
    });
    const encoding = blob.encoding === "base64" ? "base64" : "utf-8";
    return Uint8Array.from(Buffer.from(blob.content, encoding));
  }
}

function toNetworkError(
  what: string,
  error: Error & { status?: number },
): NetworkError {
  if (error.status === 401 || error.status === 403) {
    return new NetworkError(
      `Authentication failed: ${error.message}`,
      error,
      false,
    );
  }
  if (error.status === 404) {
    return new NetworkError(`Failed to ${what}: not found`, error, false);
  }
  return new NetworkError(`Failed to ${what}: ${error.message}`, error);
}

async function* single(data: Uint8Array): AsyncGenerator<Uint8Array> {
  yield data;
}
