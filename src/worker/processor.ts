import type { Job } from "bullmq";
import type { QuestionsCheckDeps, QuestionsCheckOutcome } from "../service/questions.service";
import { runQuestionsCheck } from "../service/questions.service";
import { CHECK_QUESTIONS_JOB } from "../queue/queue";
import type { RunSummary } from "../types";

export type QuestionsJob = Pick<Job, "name" | "updateProgress">;

export const createQuestionsProcessor = (deps: QuestionsCheckDeps, run: (deps: QuestionsCheckDeps) => Promise<QuestionsCheckOutcome> = runQuestionsCheck) => {
    return async (job: QuestionsJob): Promise<RunSummary | undefined> => {
        if (job.name !== CHECK_QUESTIONS_JOB) {
            deps.log.warn({ job: job.name }, "Ignoring unknown job");
            return undefined;
        }

        await job.updateProgress({ step: 1, message: "checking questions" });
        const { summary } = await run(deps);
        await job.updateProgress({ step: 2, message: `done=${summary.doneCount} todo=${summary.todoCount}` });
        return summary;
    }
}
