import { mkdir, readFile, readdir, stat, writeFile } from "fs/promises";
import path from "path";
import type { PostRepository } from "../../domain/repositories/PostRepository.js";
import { PostNotFoundError } from "../../domain/errors/PostErrors.js";
import { isPostFile } from "../../domain/value-objects/PostFileName.js";
import { isIgnoredEntry, normalizePostPath } from "../../shared/utils/paths.js";
import { logger } from "../../shared/utils/logger.js";

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

export class FileSystemPostRepository implements PostRepository {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async list(): Promise<string[]> {
    const files: string[] = [];

    const walk = async (relativeDir: string): Promise<void> => {
      const entries = await readdir(path.join(this.root, relativeDir), {
        withFileTypes: true,
      });
      for (const entry of entries) {
        if (isIgnoredEntry(entry.name)) continue;
        const relativePath = relativeDir
          ? `${relativeDir}/${entry.name}`
          : entry.name;
        if (entry.isDirectory()) {
          await walk(relativePath);
        } else if (entry.isFile() && isPostFile(entry.name)) {
          files.push(relativePath);
        }
      }
    };

    try {
      await walk("");
    } catch (error) {
      if (isNotFound(error)) {
        logger.warn({ root: this.root }, "Posts directory does not exist");
        return [];
      }
      throw error;
    }

    logger.debug({ root: this.root, count: files.length }, "Listed posts");
    return files.sort();
  }

  async read(postPath: string): Promise<string> {
    const relativePath = normalizePostPath(postPath);
    try {
      return await readFile(this.resolve(relativePath), "utf-8");
    } catch (error) {
      if (isNotFound(error)) throw new PostNotFoundError(relativePath);
      throw error;
    }
  }

  async write(postPath: string, content: string): Promise<void> {
    const filePath = this.resolve(normalizePostPath(postPath));
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content, "utf-8");
    logger.debug({ path: filePath }, "Wrote post");
  }

  async exists(postPath: string): Promise<boolean> {
    try {
      await stat(this.resolve(normalizePostPath(postPath)));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  private resolve(relativePath: string): string {
    return path.join(this.root, ...relativePath.split("/"));
  }
}
