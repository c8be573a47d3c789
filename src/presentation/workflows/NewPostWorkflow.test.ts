import { describe, it, expect, vi, beforeEach } from "vitest";
import { NewPostWorkflow } from "./NewPostWorkflow.js";
import type { PostRepository } from "../../domain/repositories/PostRepository.js";

// Mock dependencies
vi.mock("../../infrastructure/di/container.js", () => ({
  container: {
    getPostRepository: vi.fn(),
    getConfig: vi.fn(),
  },
}));

vi.mock("../../shared/utils/logger.js", () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { container } from "../../infrastructure/di/container.js";
import { loadEnv } from "../../shared/config/index.js";

describe("NewPostWorkflow", () => {
  let repository: PostRepository;

  beforeEach(() => {
    vi.clearAllMocks();

    repository = {
      list: vi.fn(),
      read: vi.fn(),
      write: vi.fn().mockResolvedValue(undefined),
      exists: vi.fn().mockResolvedValue(false),
    };
    vi.mocked(container.getPostRepository).mockReturnValue(repository);
    vi.mocked(container.getConfig).mockReturnValue(
      loadEnv({ DEFAULT_LAYOUT: "article" })
    );
  });

  it("should create the post with the configured layout", async () => {
    const path = await new NewPostWorkflow().execute({
      title: "SFINAE in practice",
      categories: ["cpp"],
      date: new Date(2016, 4, 10, 8),
    });

    expect(path).toBe("2016-05-10-sfinae-in-practice.md");
    expect(repository.write).toHaveBeenCalledWith(
      path,
      expect.stringMatching(/^---\nlayout: article\ntitle: SFINAE in practice\n/)
    );
  });
});
