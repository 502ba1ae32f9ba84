// Google Sheets v4 shapes, only the parts this service reads. Every level is optional:
// the API omits empty objects and we never trust the payload to be complete.

export interface TextFormat {
    strikethrough?: boolean;
    bold?: boolean;
    italic?: boolean;
    [key: string]: unknown;
}

export interface CellFormat {
    textFormat?: TextFormat;
    [key: string]: unknown;
}

export interface TextFormatRun {
    startIndex?: number;
    format?: TextFormat;
}

export interface CellData {
    formattedValue?: string;
    effectiveFormat?: CellFormat;
    userEnteredFormat?: CellFormat;
    textFormatRuns?: TextFormatRun[];
    [key: string]: unknown;
}

export interface RowData {
    values?: CellData[];
}

export interface GridData {
    startRow?: number;
    startColumn?: number;
    rowData?: RowData[];
}

export interface SheetProperties {
    sheetId?: number;
    title?: string;
    index?: number;
    gridProperties?: {
        rowCount?: number;
        columnCount?: number;
    };
    [key: string]: unknown;
}

export interface Sheet {
    properties?: SheetProperties;
    data?: GridData[];
    [key: string]: unknown;
}

export interface Spreadsheet {
    spreadsheetId?: string;
    properties?: {
        title?: string;
        locale?: string;
        timeZone?: string;
        [key: string]: unknown;
    };
    sheets?: Sheet[];
    spreadsheetUrl?: string;
    [key: string]: unknown;
}

/** The `includeGridData=true` response: cell formats per sheet. */
export type FormattingDocument = Spreadsheet;

/** Rows of cell text; row 0 is the header row. */
export type SheetGrid = string[][];

export interface SheetSnapshot {
    values: SheetGrid;
    formatting: FormattingDocument;
}

export type FormattingSource = "api_formatting" | "manual_indicators";

export interface QuestionRecord {
    readonly rowNumber: number;
    readonly text: string;
    readonly isCrossedOut: boolean;
    readonly formattingSource: FormattingSource;
}

interface ResultBase {
    readonly timestamp: string;
    readonly totalQuestions: number;
    readonly doneCount: number;
    readonly todoCount: number;
    /** True whenever unfinished entries exist. No comparison with earlier runs happens. */
    readonly hasNewQuestions: boolean;
    readonly doneQuestions: readonly QuestionRecord[];
    readonly todoQuestions: readonly QuestionRecord[];
    readonly allQuestions: readonly QuestionRecord[];
}

export interface SuccessResult extends ResultBase {
    readonly status: "success";
    readonly sheetUrl?: string;
    /** 1-indexed, for display. */
    readonly columnIndex: number;
    readonly columnHeader: string;
}

export interface ErrorResult extends ResultBase {
    readonly status: "error";
    readonly message: string;
}

export type QuestionsResult = SuccessResult | ErrorResult;

export interface DetectionStats {
    rowsScanned: number;
    rowsSkipped: number;
    formattingHits: number;
    manualMarkerHits: number;
}

export interface RunSummary {
    status: QuestionsResult["status"];
    timestamp: string;
    hasNewQuestions: boolean;
    todoCount: number;
    doneCount: number;
    totalQuestions: number;
    notificationSent?: boolean;
}

// Discord webhook payload

export interface DiscordEmbedField {
    name: string;
    value: string;
    inline: boolean;
}

export interface DiscordEmbed {
    title?: string;
    description?: string;
    color: number;
    timestamp?: string;
    footer?: { text: string };
    fields: DiscordEmbedField[];
}

export interface DiscordWebhookPayload {
    content?: string;
    embeds: DiscordEmbed[];
}

// Collaborators of a run

export interface SpreadsheetSource {
    fetchSheet(sheetName: string): Promise<SheetSnapshot>;
}

export interface NotificationSink {
    send(payload: DiscordWebhookPayload): Promise<boolean>;
}

export interface PersistenceSink {
    saveResult(result: QuestionsResult): Promise<void>;
    saveSummary(summary: RunSummary): Promise<void>;
}
