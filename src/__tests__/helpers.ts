import pino from "pino";
import type { CellData, FormattingDocument, QuestionRecord } from "../types";

export const silentLogger = pino({ level: "silent" });

export const fixedNow = () => new Date("2026-03-01T12:00:00.000Z");

export const struckCell = (): CellData => ({ effectiveFormat: { textFormat: { strikethrough: true } } });
export const plainCell = (): CellData => ({ effectiveFormat: { textFormat: { strikethrough: false } } });

/** Builds a grid-data document for one sheet from per-row cell records. */
export const formattingDoc = (sheetName: string, rows: CellData[][]): FormattingDocument => ({
    sheets: [
        {
            properties: { title: sheetName },
            data: [{ rowData: rows.map((values) => ({ values })) }],
        },
    ],
});

export const question = (rowNumber: number, text: string, isCrossedOut = false): QuestionRecord => ({
    rowNumber,
    text,
    isCrossedOut,
    formattingSource: isCrossedOut ? "api_formatting" : "manual_indicators",
});
