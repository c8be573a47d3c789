import "dotenv/config";
import { z } from "zod";

const commaList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? "")
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const envSchema = z.object({
  POSTS_DIR: z.string().min(1).default("_posts"),
  POST_SOURCE: z.enum(["filesystem", "github"]).default("filesystem"),
  GITHUB_TOKEN: z.string().optional(),
  GITHUB_REPO_OWNER: z.string().optional(),
  GITHUB_REPO_NAME: z.string().optional(),
  GITHUB_REPOSITORY: z.string().optional(),
  GITHUB_REF: z.string().optional(),
  EXCERPT_SEPARATOR: z.string().min(1).default("<!--more-->"),
  DEFAULT_LAYOUT: z.string().min(1).default("post"),
  REQUIRED_FIELDS: commaList,
  LINT_DISABLED_RULES: commaList,
  LINT_MAX_WARNINGS: z.coerce.number().int().nonnegative().optional(),
  LINT_FORMAT: z.enum(["text", "markdown"]).default("text"),
  INDEX_OUTPUT: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

// Empty strings from .env files count as unset
function readEnv(source: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const values: Record<string, string | undefined> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = source[key];
    values[key] = value === "" ? undefined : value;
  }
  return values;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(readEnv(source));
}

export const env = loadEnv();

export const DEFAULT_REQUIRED_FIELDS = [
  "layout",
  "title",
  "date",
  "categories",
] as const;

export function getRequiredFields(config: Env = env): string[] {
  return config.REQUIRED_FIELDS.length > 0
    ? config.REQUIRED_FIELDS
    : [...DEFAULT_REQUIRED_FIELDS];
}

// Get repo info from environment (GITHUB_REPOSITORY is set by GitHub Actions)
export function getRepoInfo(config: Env = env): { owner: string; repo: string } {
  if (config.GITHUB_REPO_OWNER && config.GITHUB_REPO_NAME) {
    return {
      owner: config.GITHUB_REPO_OWNER,
      repo: config.GITHUB_REPO_NAME,
    };
  }

  if (config.GITHUB_REPOSITORY) {
    const [owner, repo] = config.GITHUB_REPOSITORY.split("/");
    if (owner && repo) {
      return { owner, repo };
    }
  }

  throw new Error(
    "GitHub repository is not configured: set GITHUB_REPO_OWNER and GITHUB_REPO_NAME, or GITHUB_REPOSITORY"
  );
}
