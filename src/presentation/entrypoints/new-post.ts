import { NewPostWorkflow } from "../workflows/NewPostWorkflow.js";
import { parsePostDate } from "../../shared/utils/dates.js";
import { logger } from "../../shared/utils/logger.js";

/**
 * TITLE is required. CATEGORIES is space or comma separated, DATE any
 * front matter date format, LAYOUT overrides DEFAULT_LAYOUT.
 */
async function main() {
  const title = process.env.TITLE ?? "";
  const categories = (process.env.CATEGORIES ?? "").split(/[\s,]+/);
  const layout = process.env.LAYOUT || undefined;

  let date: Date | undefined;
  if (process.env.DATE) {
    const parsed = parsePostDate(process.env.DATE);
    if (!parsed) {
      logger.error({ date: process.env.DATE }, "Invalid DATE");
      process.exitCode = 1;
      return;
    }
    date = parsed;
  }

  try {
    const workflow = new NewPostWorkflow();
    const path = await workflow.execute({ title, categories, date, layout });
    process.stdout.write(`${path}\n`);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorStack = error instanceof Error ? error.stack : undefined;
    logger.error(
      {
        error: errorMessage,
        stack: errorStack,
        errorType: error instanceof Error ? error.name : typeof error,
      },
      "New post workflow failed"
    );
    process.exitCode = 1;
  }
}

void main();
