import { Octokit } from "@octokit/rest";
import type { PostRepository } from "../../domain/repositories/PostRepository.js";
import { PostNotFoundError } from "../../domain/errors/PostErrors.js";
import { isPostFile } from "../../domain/value-objects/PostFileName.js";
import { isIgnoredEntry, normalizePostPath } from "../../shared/utils/paths.js";
import { logger } from "../../shared/utils/logger.js";

export interface GitHubPostRepositoryOptions {
  owner: string;
  repo: string;
  root: string;
  ref?: string;
  token?: string;
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    error.status === 404
  );
}

/**
 * Posts kept in a GitHub repository, read and written through the
 * contents API.
 */
export class GitHubPostRepository implements PostRepository {
  private readonly octokit: Octokit;
  private readonly root: string;

  constructor(private readonly options: GitHubPostRepositoryOptions) {
    this.octokit = new Octokit({
      auth: options.token,
    });
    this.root = options.root.replace(/^\/+|\/+$/g, "");
  }

  async list(): Promise<string[]> {
    const files: string[] = [];

    const walk = async (directory: string): Promise<void> => {
      const { data } = await this.octokit.repos.getContent({
        owner: this.options.owner,
        repo: this.options.repo,
        path: directory,
        ...this.refParam(),
      });

      if (!Array.isArray(data)) {
        throw new Error(`Path ${directory} is a file, not a directory`);
      }

      for (const item of data) {
        if (isIgnoredEntry(item.name)) continue;
        if (item.type === "dir") {
          await walk(item.path);
        } else if (item.type === "file" && isPostFile(item.name)) {
          files.push(this.relative(item.path));
        }
      }
    };

    try {
      await walk(this.root);
    } catch (error) {
      if (isNotFound(error)) {
        logger.warn(
          { owner: this.options.owner, repo: this.options.repo, root: this.root },
          "Posts directory does not exist in repository"
        );
        return [];
      }
      logger.error({ error }, "Error listing posts");
      throw error;
    }

    logger.debug({ count: files.length }, "Listed posts from GitHub");
    return files.sort();
  }

  async read(postPath: string): Promise<string> {
    const relativePath = normalizePostPath(postPath);
    const file = await this.getFile(relativePath);
    if (!file) {
      throw new PostNotFoundError(relativePath);
    }
    return Buffer.from(file.content, "base64").toString("utf-8");
  }

  async write(postPath: string, content: string): Promise<void> {
    const relativePath = normalizePostPath(postPath);
    const existing = await this.getFile(relativePath);

    await this.octokit.repos.createOrUpdateFileContents({
      owner: this.options.owner,
      repo: this.options.repo,
      path: this.absolute(relativePath),
      message: existing
        ? `Update post ${relativePath}`
        : `Add post ${relativePath}`,
      content: Buffer.from(content).toString("base64"),
      ...(existing ? { sha: existing.sha } : {}),
      ...(this.options.ref ? { branch: this.options.ref } : {}),
    });
    logger.debug({ path: relativePath }, "Committed post");
  }

  async exists(postPath: string): Promise<boolean> {
    return (await this.getFile(normalizePostPath(postPath))) !== null;
  }

  private async getFile(
    relativePath: string
  ): Promise<{ content: string; sha: string } | null> {
    try {
      const { data } = await this.octokit.repos.getContent({
        owner: this.options.owner,
        repo: this.options.repo,
        path: this.absolute(relativePath),
        ...this.refParam(),
      });

      if (Array.isArray(data)) {
        throw new Error(`Path ${relativePath} is a directory, not a file`);
      }
      if ("content" in data && typeof data.content === "string") {
        return { content: data.content, sha: data.sha };
      }
      throw new Error(`Path ${relativePath} is not a regular file`);
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  private refParam(): { ref?: string } {
    return this.options.ref ? { ref: this.options.ref } : {};
  }

  private absolute(relativePath: string): string {
    return this.root ? `${this.root}/${relativePath}` : relativePath;
  }

  private relative(repoPath: string): string {
    return this.root && repoPath.startsWith(`${this.root}/`)
      ? repoPath.slice(this.root.length + 1)
      : repoPath;
  }
}
