import { describe, expect, it, vi } from "vitest";
import { CHECK_QUESTIONS_JOB } from "../queue/queue";
import type { QuestionsCheckDeps, QuestionsCheckOutcome } from "../service/questions.service";
import { errorResult } from "../parser/questionParser";
import { createQuestionsProcessor, type QuestionsJob } from "../worker/processor";
import { fixedNow, silentLogger } from "./helpers";

const fakeJob = (name: string) => {
    const updateProgress = vi.fn(async () => undefined);
    const job: QuestionsJob = { name, updateProgress };
    return { job, updateProgress };
}

const deps: QuestionsCheckDeps = {
    source: { fetchSheet: async () => ({ values: [], formatting: {} }) },
    stores: [],
    options: { sheetName: "Questions", columnFragment: "Group4", now: fixedNow },
    log: silentLogger,
};

describe("createQuestionsProcessor", () => {
    it("runs one check per scheduled job and returns its summary", async () => {
        const result = errorResult("No data found in Questions sheet", fixedNow);
        const outcome: QuestionsCheckOutcome = {
            result,
            summary: { status: "error", timestamp: result.timestamp, hasNewQuestions: false, todoCount: 0, doneCount: 0, totalQuestions: 0 },
        };
        const run = vi.fn(async () => outcome);
        const { job, updateProgress } = fakeJob(CHECK_QUESTIONS_JOB);

        await expect(createQuestionsProcessor(deps, run)(job)).resolves.toEqual(outcome.summary);

        expect(run).toHaveBeenCalledWith(deps);
        expect(updateProgress).toHaveBeenLastCalledWith({ step: 2, message: "done=0 todo=0" });
    });

    it("ignores unknown jobs", async () => {
        const run = vi.fn();
        const { job } = fakeJob("somethingElse");

        await expect(createQuestionsProcessor(deps, run)(job)).resolves.toBeUndefined();
        expect(run).not.toHaveBeenCalled();
    });

    it("lets a failed check fail the job", async () => {
        const run = vi.fn(async () => { throw new Error("disk full"); });
        const { job } = fakeJob(CHECK_QUESTIONS_JOB);

        await expect(createQuestionsProcessor(deps, run)(job)).rejects.toThrow("disk full");
    });
});
