import type { FormattingDocument } from "../types";

type PathKey = string | number;

/**
 * Safe navigation over an untrusted nested payload.
 * Returns undefined as soon as a step is missing or is not an object.
 */
export const dig = (value: unknown, ...path: PathKey[]): unknown => {
    let current = value;
    for (const key of path) {
        if (current === null || typeof current !== "object") return undefined;
        current = Reflect.get(current, key);
    }
    return current;
}

const asArray = (value: unknown): unknown[] => Array.isArray(value) ? value : [];

const isStruck = (textFormat: unknown): boolean => dig(textFormat, "strikethrough") === true;

const findSheet = (doc: FormattingDocument | null | undefined, sheetName: string): unknown => {
    return asArray(dig(doc, "sheets")).find((sheet) => dig(sheet, "properties", "title") === sheetName);
}

/**
 * True when the cell at (rowIndex, colIndex) of `sheetName` is struck through in the
 * effective format, the user-entered format or any of its text format runs.
 * Indices are 0-based and relative to the first grid block of the sheet.
 */
export const hasStrikethrough = (
    doc: FormattingDocument | null | undefined,
    sheetName: string,
    rowIndex: number,
    colIndex: number,
): boolean => {
    const sheet = findSheet(doc, sheetName);
    if (sheet === undefined) return false;

    const rows = asArray(dig(sheet, "data", 0, "rowData"));
    if (rowIndex < 0 || rowIndex >= rows.length) return false;

    const cells = asArray(dig(rows[rowIndex], "values"));
    if (colIndex < 0 || colIndex >= cells.length) return false;

    const cell = cells[colIndex];

    if (isStruck(dig(cell, "effectiveFormat", "textFormat"))) return true;
    if (isStruck(dig(cell, "userEnteredFormat", "textFormat"))) return true;

    return asArray(dig(cell, "textFormatRuns")).some((run) => isStruck(dig(run, "format")));
}
