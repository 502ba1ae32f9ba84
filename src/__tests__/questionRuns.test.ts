import { describe, expect, it } from "vitest";
import { toQuestionRun } from "../model/questionRuns";
import { errorResult } from "../parser/questionParser";
import type { SuccessResult } from "../types";
import { fixedNow, question } from "./helpers";

describe("toQuestionRun", () => {
    it("maps a success result onto a run document", () => {
        const done = [question(3, "Where do we meet?", true)];
        const todo = [question(2, "What is the budget?")];
        const result: SuccessResult = {
            status: "success",
            timestamp: "2026-03-01T12:00:00.000Z",
            columnIndex: 2,
            columnHeader: "Group4",
            totalQuestions: 2,
            doneCount: 1,
            todoCount: 1,
            hasNewQuestions: true,
            doneQuestions: done,
            todoQuestions: todo,
            allQuestions: [...todo, ...done],
        };

        expect(toQuestionRun(result)).toEqual({
            runAt: "2026-03-01T12:00:00.000Z",
            status: "success",
            message: undefined,
            columnHeader: "Group4",
            totalQuestions: 2,
            doneCount: 1,
            todoCount: 1,
            hasNewQuestions: true,
            doneQuestions: done,
            todoQuestions: todo,
        });
    });

    it("keeps the message of an error result", () => {
        const run = toQuestionRun(errorResult("Sheet 'Questions' not found", fixedNow));
        expect(run.status).toBe("error");
        expect(run.message).toBe("Sheet 'Questions' not found");
        expect(run.columnHeader).toBeUndefined();
    });
});
