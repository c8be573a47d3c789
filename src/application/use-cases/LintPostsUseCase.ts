import type { PostDocument } from "../../domain/entities/Post.js";
import type { LintReport } from "../../domain/entities/Diagnostic.js";
import type { PostLinter } from "../../domain/services/PostLinter.js";

export class LintPostsUseCase {
  constructor(private readonly linter: PostLinter) {}

  execute(documents: PostDocument[]): LintReport {
    const diagnostics = this.linter.lintCollection(documents);
    return {
      files: documents.length,
      errorCount: diagnostics.filter((d) => d.severity === "error").length,
      warningCount: diagnostics.filter((d) => d.severity === "warning").length,
      diagnostics,
    };
  }
}
