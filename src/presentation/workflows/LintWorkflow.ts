import type { LintReport } from "../../domain/entities/Diagnostic.js";
import { LoadPostsUseCase } from "../../application/use-cases/LoadPostsUseCase.js";
import { LintPostsUseCase } from "../../application/use-cases/LintPostsUseCase.js";
import { MarkdownService } from "../../domain/services/MarkdownService.js";
import { formatLintReport } from "../formatters/textReport.js";
import { container } from "../../infrastructure/di/container.js";
import { logger } from "../../shared/utils/logger.js";

export type ReportFormat = "text" | "markdown";

export interface LintResult {
  report: LintReport;
  output: string;
  passed: boolean;
}

export class LintWorkflow {
  private readonly loadPostsUseCase: LoadPostsUseCase;
  private readonly lintPostsUseCase: LintPostsUseCase;
  private readonly markdownService = new MarkdownService();

  constructor() {
    this.loadPostsUseCase = new LoadPostsUseCase(
      container.getPostRepository(),
      container.getParser()
    );
    this.lintPostsUseCase = new LintPostsUseCase(container.getLinter());
  }

  async execute(
    format: ReportFormat = "text",
    maxWarnings?: number
  ): Promise<LintResult> {
    logger.info({ format, maxWarnings }, "Starting lint workflow");

    const documents = await this.loadPostsUseCase.execute();
    const report = this.lintPostsUseCase.execute(documents);

    const output =
      format === "markdown"
        ? this.markdownService.lintReportToMarkdown(report)
        : formatLintReport(report);

    const passed =
      report.errorCount === 0 &&
      (maxWarnings === undefined || report.warningCount <= maxWarnings);

    logger.info(
      {
        files: report.files,
        errors: report.errorCount,
        warnings: report.warningCount,
        passed,
      },
      "Lint workflow completed"
    );
    return { report, output, passed };
  }
}
