import type { LintReport } from "../../domain/entities/Diagnostic.js";

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

/**
 * Terminal output: one `path:line  severity  message  rule` line per
 * diagnostic, then a summary line.
 */
export function formatLintReport(report: LintReport): string {
  const lines = report.diagnostics.map((d) => {
    const location = d.line === undefined ? d.path : `${d.path}:${d.line}`;
    return `${location}  ${d.severity}  ${d.message}  ${d.rule}`;
  });

  const problems = report.errorCount + report.warningCount;
  lines.push(
    problems === 0
      ? `${plural(report.files, "file")} checked, no problems`
      : `${plural(report.files, "file")} checked, ${plural(problems, "problem")} (${plural(report.errorCount, "error")}, ${plural(report.warningCount, "warning")})`
  );

  return `${lines.join("\n")}\n`;
}
