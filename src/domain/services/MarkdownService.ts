import matter from "gray-matter";
import { format } from "date-fns";
import type { Post, PostDraft } from "../entities/Post.js";
import type { LintReport } from "../entities/Diagnostic.js";
import type { ArchiveYear, CategoryEntry } from "./CategoryService.js";

function escapeLinkText(text: string): string {
  return text.replace(/([[\]\\])/g, "\\$1");
}

function escapeTableCell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\n/g, " ");
}

function postLink(post: Post): string {
  return `- ${post.fileDate} [${escapeLinkText(post.title)}](${post.path})\n`;
}

export class MarkdownService {
  categoryIndexToMarkdown(index: CategoryEntry[]): string {
    let markdown = `# Categories\n\n`;

    if (index.length === 0) {
      markdown += `No categorized posts.\n`;
      return markdown;
    }

    for (const category of index) {
      markdown += `## ${category.name}\n\n`;
      for (const post of category.posts) {
        markdown += postLink(post);
      }
      markdown += `\n`;
    }

    return markdown;
  }

  archiveToMarkdown(archive: ArchiveYear[]): string {
    let markdown = `# Archive\n\n`;

    for (const year of archive) {
      markdown += `## ${year.year}\n\n`;
      for (const month of year.months) {
        const monthName = format(
          new Date(Number(year.year), Number(month.month) - 1, 1),
          "MMMM"
        );
        markdown += `### ${monthName}\n\n`;
        for (const post of month.posts) {
          markdown += postLink(post);
        }
        markdown += `\n`;
      }
    }

    return markdown;
  }

  lintReportToMarkdown(report: LintReport): string {
    let markdown = `# Post lint report\n\n`;
    markdown += `**Files:** ${report.files} | **Errors:** ${report.errorCount} | **Warnings:** ${report.warningCount}\n\n`;

    if (report.diagnostics.length === 0) {
      markdown += `No problems found.\n`;
      return markdown;
    }

    markdown += `| File | Line | Severity | Rule | Message |\n`;
    markdown += `| --- | --- | --- | --- | --- |\n`;
    for (const d of report.diagnostics) {
      markdown += `| ${escapeTableCell(d.path)} | ${d.line ?? ""} | ${d.severity} | ${d.rule} | ${escapeTableCell(d.message)} |\n`;
    }

    return markdown;
  }

  postToMarkdown(draft: PostDraft): string {
    return matter.stringify(draft.body, {
      layout: draft.layout,
      title: draft.title,
      date: draft.date,
      categories: draft.categories,
    });
  }
}
