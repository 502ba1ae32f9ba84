import mongoose from "mongoose";
import type { QuestionRecord, QuestionsResult, RunSummary } from "../types";

export interface QuestionRun {
    readonly _id: string;
    runAt: string;
    status: QuestionsResult["status"];
    message?: string;
    columnHeader?: string;
    totalQuestions: number;
    doneCount: number;
    todoCount: number;
    hasNewQuestions: boolean;
    doneQuestions: QuestionRecord[];
    todoQuestions: QuestionRecord[];
    summary?: RunSummary;
    createdAt: Date;
    updatedAt: Date;
}

const QuestionSchema = new mongoose.Schema<QuestionRecord>({
    rowNumber: { type: Number, required: true },
    text: { type: String, required: true },
    isCrossedOut: { type: Boolean, required: true },
    formattingSource: { type: String, enum: ['api_formatting', 'manual_indicators'], required: true },
}, { _id: false });

const QuestionRunSchema = new mongoose.Schema<QuestionRun>({
    runAt: { type: String, required: true },
    status: { type: String, enum: ['success', 'error'], required: true },
    message: String,
    columnHeader: String,
    totalQuestions: { type: Number, default: 0 },
    doneCount: { type: Number, default: 0 },
    todoCount: { type: Number, default: 0 },
    hasNewQuestions: { type: Boolean, default: false },
    doneQuestions: [QuestionSchema],
    todoQuestions: [QuestionSchema],
    summary: mongoose.Schema.Types.Mixed,
}, { timestamps: true });

QuestionRunSchema.index({ runAt: 1 }, { unique: true })

export const questionRunModel = mongoose.model('QuestionRun', QuestionRunSchema);

export const toQuestionRun = (result: QuestionsResult): Omit<QuestionRun, '_id' | 'createdAt' | 'updatedAt'> => ({
    runAt: result.timestamp,
    status: result.status,
    message: result.status === 'error' ? result.message : undefined,
    columnHeader: result.status === 'success' ? result.columnHeader : undefined,
    totalQuestions: result.totalQuestions,
    doneCount: result.doneCount,
    todoCount: result.todoCount,
    hasNewQuestions: result.hasNewQuestions,
    doneQuestions: [...result.doneQuestions],
    todoQuestions: [...result.todoQuestions],
})

export const createQuestionRun = async (result: QuestionsResult) => {
    await questionRunModel.findOneAndUpdate({ runAt: result.timestamp }, toQuestionRun(result), { upsert: true })
}

export const updateQuestionRunSummary = async (summary: RunSummary) => {
    await questionRunModel.findOneAndUpdate({ runAt: summary.timestamp }, { summary }, { upsert: true })
}
