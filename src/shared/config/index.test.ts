import { describe, it, expect } from "vitest";
import { getRepoInfo, getRequiredFields, loadEnv } from "./index.js";

describe("config", () => {
  it("should apply defaults", () => {
    const config = loadEnv({});
    expect(config).toMatchObject({
      POSTS_DIR: "_posts",
      POST_SOURCE: "filesystem",
      EXCERPT_SEPARATOR: "<!--more-->",
      DEFAULT_LAYOUT: "post",
      REQUIRED_FIELDS: [],
      LINT_DISABLED_RULES: [],
      LINT_FORMAT: "text",
    });
    expect(config.LINT_MAX_WARNINGS).toBeUndefined();
    expect(getRequiredFields(config)).toEqual([
      "layout",
      "title",
      "date",
      "categories",
    ]);
  });

  it("should treat empty values as unset and split lists", () => {
    const config = loadEnv({
      POSTS_DIR: "",
      REQUIRED_FIELDS: "title, date",
      LINT_DISABLED_RULES: "slug-format,,date-mismatch",
      LINT_MAX_WARNINGS: "3",
    });
    expect(config.POSTS_DIR).toBe("_posts");
    expect(getRequiredFields(config)).toEqual(["title", "date"]);
    expect(config.LINT_DISABLED_RULES).toEqual(["slug-format", "date-mismatch"]);
    expect(config.LINT_MAX_WARNINGS).toBe(3);
  });

  it("should reject unknown sources", () => {
    expect(() => loadEnv({ POST_SOURCE: "ftp" })).toThrow();
  });

  describe("getRepoInfo", () => {
    it("should prefer explicit owner and name", () => {
      expect(
        getRepoInfo(
          loadEnv({
            GITHUB_REPO_OWNER: "octo",
            GITHUB_REPO_NAME: "blog",
            GITHUB_REPOSITORY: "other/repo",
          })
        )
      ).toEqual({ owner: "octo", repo: "blog" });
    });

    it("should fall back to GITHUB_REPOSITORY", () => {
      expect(getRepoInfo(loadEnv({ GITHUB_REPOSITORY: "octo/blog" }))).toEqual({
        owner: "octo",
        repo: "blog",
      });
    });

    it("should throw when nothing is configured", () => {
      expect(() => getRepoInfo(loadEnv({}))).toThrow(
        /GitHub repository is not configured/
      );
    });
  });
});
