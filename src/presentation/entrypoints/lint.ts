import { LintWorkflow } from "../workflows/LintWorkflow.js";
import { env } from "../../shared/config/index.js";
import { logger } from "../../shared/utils/logger.js";

async function main() {
  try {
    const workflow = new LintWorkflow();
    const { output, passed } = await workflow.execute(
      env.LINT_FORMAT,
      env.LINT_MAX_WARNINGS
    );
    process.stdout.write(output);
    process.exitCode = passed ? 0 : 1;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorStack = error instanceof Error ? error.stack : undefined;
    logger.error(
      {
        error: errorMessage,
        stack: errorStack,
        errorType: error instanceof Error ? error.name : typeof error,
      },
      "Lint workflow failed"
    );
    process.exitCode = 1;
  }
}

void main();
