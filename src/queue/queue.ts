import { Queue, type ConnectionOptions } from 'bullmq';
import type { Logger } from '../logger';

export const QUESTIONS_QUEUE = 'QuestionsCheckQueue'
export const CHECK_QUESTIONS_JOB = 'checkQuestionsJob'
export const SCHEDULER_JOB_ID = 'checkQuestionsRepeatableJob'

export const createQuestionsQueue = (connection: ConnectionOptions) => new Queue(QUESTIONS_QUEUE, { connection })

// Drops earlier schedules of the check before adding the current one.
export const scheduleRepeatableCheck = async (queue: Queue, everyMs: number, log: Logger) => {
  const existing = await queue.getRepeatableJobs();
  for (const job of existing) {
    if (job.name === CHECK_QUESTIONS_JOB) {
      await queue.removeRepeatableByKey(job.key);
    }
  }

  await queue.add(CHECK_QUESTIONS_JOB, { scheduledAt: new Date().toISOString() },
    {
      repeat: { every: everyMs, immediately: true },
      jobId: SCHEDULER_JOB_ID,
      removeOnComplete: true,
      removeOnFail: 50,
    });
  log.info({ everyMs }, 'Repeatable questions check scheduled');
};
