import { hasStrikethrough } from "./formatting";
import { hasManualMarker } from "./markers";
import type { DetectionStats, ErrorResult, FormattingDocument, QuestionRecord, QuestionsResult, SheetGrid } from "../types";

export interface ExtractQuestionsInput {
    grid: SheetGrid;
    formatting: FormattingDocument | null | undefined;
    sheetName: string;
    /** Substring looked up in the header row, e.g. "Group4". */
    columnFragment: string;
    sheetUrl?: string;
    now?: () => Date;
}

export interface QuestionExtraction {
    result: QuestionsResult;
    stats: DetectionStats;
}

const emptyStats = (): DetectionStats => ({ rowsScanned: 0, rowsSkipped: 0, formattingHits: 0, manualMarkerHits: 0 });

export const errorResult = (message: string, now: () => Date = () => new Date()): ErrorResult => ({
    status: "error",
    message,
    timestamp: now().toISOString(),
    totalQuestions: 0,
    doneCount: 0,
    todoCount: 0,
    hasNewQuestions: false,
    doneQuestions: [],
    todoQuestions: [],
    allQuestions: [],
});

export const findColumnIndex = (headerRow: readonly string[] | undefined, fragment: string): number => {
    return (headerRow ?? []).findIndex((header) => Boolean(header) && String(header).includes(fragment));
}

export const extractQuestions = (input: ExtractQuestionsInput): QuestionExtraction => {
    const { grid, formatting, sheetName, columnFragment, sheetUrl } = input;
    const now = input.now ?? (() => new Date());
    const stats = emptyStats();

    if (!grid.length) {
        return { result: errorResult(`No data found in ${sheetName} sheet`, now), stats };
    }

    const columnIndex = findColumnIndex(grid[0], columnFragment);
    if (columnIndex === -1) {
        return { result: errorResult(`Column containing "${columnFragment}" not found in ${sheetName} sheet`, now), stats };
    }

    const allQuestions: QuestionRecord[] = [];

    for (let rowIndex = 1; rowIndex < grid.length; rowIndex++) {
        stats.rowsScanned++;
        const row = grid[rowIndex] ?? [];
        const text = columnIndex < row.length ? String(row[columnIndex] ?? "").trim() : "";
        if (!text) {
            stats.rowsSkipped++;
            continue;
        }

        const formattingHit = hasStrikethrough(formatting, sheetName, rowIndex, columnIndex);
        const markerHit = !formattingHit && hasManualMarker(row[columnIndex]);
        if (formattingHit) stats.formattingHits++;
        if (markerHit) stats.manualMarkerHits++;

        allQuestions.push({
            rowNumber: rowIndex + 1,
            text,
            isCrossedOut: formattingHit || markerHit,
            formattingSource: formattingHit ? "api_formatting" : "manual_indicators",
        });
    }

    const doneQuestions = allQuestions.filter((q) => q.isCrossedOut);
    const todoQuestions = allQuestions.filter((q) => !q.isCrossedOut);

    return {
        result: {
            status: "success",
            timestamp: now().toISOString(),
            sheetUrl,
            columnIndex: columnIndex + 1,
            columnHeader: grid[0][columnIndex],
            totalQuestions: allQuestions.length,
            doneCount: doneQuestions.length,
            todoCount: todoQuestions.length,
            hasNewQuestions: todoQuestions.length > 0,
            doneQuestions,
            todoQuestions,
            allQuestions,
        },
        stats,
    };
}
