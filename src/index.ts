// Main entrypoint - exports for use in scripts and other tools
export { LintWorkflow } from "./presentation/workflows/LintWorkflow.js";
export { IndexWorkflow } from "./presentation/workflows/IndexWorkflow.js";
export { NewPostWorkflow } from "./presentation/workflows/NewPostWorkflow.js";
export { formatLintReport } from "./presentation/formatters/textReport.js";

// Domain exports
export type { Post, PostDocument, PostDraft } from "./domain/entities/Post.js";
export type {
  Diagnostic,
  LintReport,
  RuleId,
  Severity,
} from "./domain/entities/Diagnostic.js";
export type { PostRepository } from "./domain/repositories/PostRepository.js";
export {
  PostExistsError,
  PostFormatError,
  PostNotFoundError,
} from "./domain/errors/PostErrors.js";
export { FrontMatterParser } from "./domain/services/FrontMatterParser.js";
export { PostLinter } from "./domain/services/PostLinter.js";
export { PostService } from "./domain/services/PostService.js";
export { ExcerptService } from "./domain/services/ExcerptService.js";
export { CategoryService } from "./domain/services/CategoryService.js";
export { MarkdownService } from "./domain/services/MarkdownService.js";
export { scanFences } from "./domain/services/CodeFenceScanner.js";
export {
  buildPostFileName,
  parsePostFileName,
  slugify,
} from "./domain/value-objects/PostFileName.js";
export { FileSystemPostRepository } from "./infrastructure/filesystem/FileSystemPostRepository.js";
export { GitHubPostRepository } from "./infrastructure/github/GitHubPostRepository.js";
