import "../dot-env.config"
import { Worker } from 'bullmq';
import { buildQuestionsCheckDeps } from "../app";
import { loadConfig } from "../config";
import { ConfigError, errorMessage } from "../errors";
import { createLogger } from "../logger";
import { connectDb, disconnectDb } from "../model/dbConnection";
import { DiscordWebhook } from "../notifier/discord";
import { QUESTIONS_QUEUE, createQuestionsQueue, scheduleRepeatableCheck } from "../queue/queue";
import { createRedisConnection } from "../redis";
import { createQuestionsProcessor } from "./processor";

const log = createLogger("questions-worker");

const main = async () => {
  const config = loadConfig();
  if (!config.redisUrl) throw new ConfigError(["REDIS_URL environment variable not set (required by the worker)"]);

  if (config.mongodbUri) await connectDb(config.mongodbUri, log);

  const connection = createRedisConnection(config.redisUrl);
  const queue = createQuestionsQueue(connection);
  const deps = buildQuestionsCheckDeps(config, log);
  const alerts = config.discordWebhookUrl ? new DiscordWebhook(config.discordWebhookUrl, log) : undefined;

  const worker = new Worker(QUESTIONS_QUEUE, createQuestionsProcessor(deps), { connection, concurrency: 1 });

  worker.on('completed', (job) => {
    log.info({ job: job.id }, 'Questions check completed');
  });

  worker.on('failed', (job, err) => {
    log.error({ job: job?.id, err: errorMessage(err) }, 'Questions check failed');
    if (alerts) {
      alerts.sendSimpleMessage(`❌ Scheduled questions check failed: ${errorMessage(err)}`).catch((error: unknown) => {
        log.error({ err: errorMessage(error) }, 'Could not report failed check');
      });
    }
  });

  await scheduleRepeatableCheck(queue, config.checkIntervalMs, log);

  const shutdown = async () => {
    log.info('Closing worker...');
    await worker.close();
    await queue.close();
    await connection.quit();
    if (config.mongodbUri) await disconnectDb();
    process.exit(0);
  };

  process.on('SIGINT', () => { void shutdown(); });
  process.on('SIGTERM', () => { void shutdown(); });
}

main().catch((error: unknown) => {
  log.fatal({ err: errorMessage(error) }, error instanceof ConfigError ? 'Configuration error' : 'Worker crashed');
  process.exit(1);
});
