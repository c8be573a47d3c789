import { writeFile } from "fs/promises";
import { IndexWorkflow } from "../workflows/IndexWorkflow.js";
import { env } from "../../shared/config/index.js";
import { logger } from "../../shared/utils/logger.js";

async function main() {
  try {
    const workflow = new IndexWorkflow();
    const { markdown } = await workflow.execute();
    if (env.INDEX_OUTPUT) {
      await writeFile(env.INDEX_OUTPUT, markdown, "utf-8");
      logger.info({ output: env.INDEX_OUTPUT }, "Wrote index");
    } else {
      process.stdout.write(markdown);
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorStack = error instanceof Error ? error.stack : undefined;
    logger.error(
      {
        error: errorMessage,
        stack: errorStack,
        errorType: error instanceof Error ? error.name : typeof error,
      },
      "Index workflow failed"
    );
    process.exitCode = 1;
  }
}

void main();
