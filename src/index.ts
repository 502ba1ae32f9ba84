#!/usr/bin/env node
import "./dot-env.config"
import { buildQuestionsCheckDeps } from "./app";
import { loadConfig } from "./config";
import { ConfigError, errorMessage } from "./errors";
import { logger } from "./logger";
import { connectDb, disconnectDb } from "./model/dbConnection";
import { runQuestionsCheck } from "./service/questions.service";

const main = async () => {
  const config = loadConfig();

  if (config.mongodbUri) await connectDb(config.mongodbUri, logger);

  try {
    logger.info({ sheet: config.sheetName, column: config.columnFragment }, "Processing sheet...");
    await runQuestionsCheck(buildQuestionsCheckDeps(config, logger));
    logger.info({ outputDir: config.outputDir }, "Results saved");
  } finally {
    if (config.mongodbUri) await disconnectDb();
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: errorMessage(error) }, error instanceof ConfigError ? "Configuration error" : "Run failed");
  process.exitCode = 1;
});
