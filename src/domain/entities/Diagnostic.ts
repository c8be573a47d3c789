export type Severity = "error" | "warning";

export type RuleId =
  | "front-matter-missing"
  | "front-matter-unclosed"
  | "front-matter-syntax"
  | "required-field"
  | "field-type"
  | "title-empty"
  | "date-invalid"
  | "file-name"
  | "slug-format"
  | "date-mismatch"
  | "categories-empty"
  | "fence-unclosed"
  | "excerpt-in-code"
  | "duplicate-slug";

export interface Diagnostic {
  rule: RuleId;
  severity: Severity;
  message: string;
  path: string;
  line?: number;
}

export interface LintReport {
  files: number;
  errorCount: number;
  warningCount: number;
  diagnostics: Diagnostic[];
}
