import { parseArgs } from "util";
import { PipelineError, errorMessage } from "../services/errors.js";
import { createLogger, setVerbose } from "../services/logger.js";
import { createPipelineDeps, runEditionsPipeline } from "../services/runEditionsPipeline.js";

const logger = createLogger("generate");

async function main() {
  const { values } = parseArgs({
    options: {
      verbose: { type: "boolean", short: "v", default: false },
      "skip-external-fetch": { type: "boolean", default: false }
    }
  });

  setVerbose(values.verbose === true);

  const deps = await createPipelineDeps();
  const outcome = await runEditionsPipeline(deps, {
    skipExternalFetch: values["skip-external-fetch"] === true
  });

  switch (outcome.status) {
    case "unchanged":
      logger.info("Raw data unchanged, catalog left as is");
      break;
    case "processed":
      logger.info(`Catalog generated after ${outcome.attempts} normalization attempt(s)`);
      break;
    case "normalization_failed":
      logger.error(`Normalization failed (${outcome.failure.kind}): ${outcome.failure.message}`);
      if (outcome.failure.responseText !== undefined) {
        logger.debug("Raw response text", outcome.failure.responseText);
      }
      process.exitCode = 1;
      break;
  }
}

main().catch(err => {
  if (err instanceof PipelineError) {
    logger.error(`${err.code}: ${err.message}`);
  } else {
    logger.error(`Unexpected error: ${errorMessage(err)}`, err);
  }
  process.exitCode = 1;
});
