import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { FileSystemPostRepository } from "./FileSystemPostRepository.js";
import { PostNotFoundError } from "../../domain/errors/PostErrors.js";

vi.mock("../../shared/utils/logger.js", () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe("FileSystemPostRepository", () => {
  let root: string;
  let repository: FileSystemPostRepository;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "posts-"));
    repository = new FileSystemPostRepository(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe("list", () => {
    it("should list post files recursively and skip the rest", async () => {
      await mkdir(path.join(root, "2016"));
      await mkdir(path.join(root, "_drafts"));
      await writeFile(path.join(root, "2015-03-01-a.md"), "a");
      await writeFile(path.join(root, "2016", "2016-01-01-b.markdown"), "b");
      await writeFile(path.join(root, "_drafts", "2017-01-01-c.md"), "c");
      await writeFile(path.join(root, ".hidden.md"), "d");
      await writeFile(path.join(root, "notes.txt"), "e");

      expect(await repository.list()).toEqual([
        "2015-03-01-a.md",
        "2016/2016-01-01-b.markdown",
      ]);
    });

    it("should return nothing when the directory is missing", async () => {
      const missing = new FileSystemPostRepository(path.join(root, "nope"));
      expect(await missing.list()).toEqual([]);
    });
  });

  describe("read", () => {
    it("should read a post by relative path", async () => {
      await mkdir(path.join(root, "2016"));
      await writeFile(path.join(root, "2016", "2016-01-01-b.md"), "hello");

      expect(await repository.read("2016/2016-01-01-b.md")).toBe("hello");
    });

    it("should throw PostNotFoundError for missing posts", async () => {
      await expect(repository.read("2015-03-01-a.md")).rejects.toBeInstanceOf(
        PostNotFoundError
      );
    });

    it("should refuse paths outside the root", async () => {
      await expect(repository.read("../outside.md")).rejects.toThrow(
        "Post path leaves the posts directory: ../outside.md"
      );
    });
  });

  describe("write", () => {
    it("should create parent directories", async () => {
      await repository.write("2016/2016-01-01-b.md", "content");

      expect(
        await readFile(path.join(root, "2016", "2016-01-01-b.md"), "utf-8")
      ).toBe("content");
      expect(await repository.exists("2016/2016-01-01-b.md")).toBe(true);
    });
  });

  describe("exists", () => {
    it("should be false for missing posts", async () => {
      expect(await repository.exists("2015-03-01-a.md")).toBe(false);
    });
  });
});
