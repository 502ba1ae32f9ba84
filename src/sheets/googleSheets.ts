import axios, { isAxiosError } from "axios";
import type { AccessTokenProvider } from "../credentials/credential";
import { SourceAccessError, errorMessage } from "../errors";
import type { FormattingDocument, SheetGrid, SheetSnapshot, Spreadsheet, SpreadsheetSource } from "../types";

const SHEETS_API = "https://sheets.googleapis.com/v4/spreadsheets";

interface ValueRange {
    range?: string;
    majorDimension?: string;
    values?: unknown[][];
}

export interface GoogleSheetsSourceOptions {
    spreadsheetId: string;
    getAccessToken: AccessTokenProvider;
    /** Column span read from the tab. */
    columns?: string;
}

/** A1 range for a tab; the name is quoted so spaces, symbols and cell-like names parse. */
export const a1Range = (sheetName: string, columns: string) => `'${sheetName.replace(/'/g, "''")}'!${columns}`;

const toGrid = (values: unknown[][] | undefined): SheetGrid => {
    return (values ?? []).map((row) => (row ?? []).map((cell) => cell === null || cell === undefined ? "" : String(cell)));
}

export class GoogleSheetsSource implements SpreadsheetSource {
    private readonly spreadsheetId: string;
    private readonly getAccessToken: AccessTokenProvider;
    private readonly columns: string;

    constructor(opts: GoogleSheetsSourceOptions) {
        this.spreadsheetId = opts.spreadsheetId;
        this.getAccessToken = opts.getAccessToken;
        this.columns = opts.columns ?? "A:Z";
    }

    private get baseUrl() {
        return `${SHEETS_API}/${encodeURIComponent(this.spreadsheetId)}`;
    }

    async fetchSpreadsheetMetadata(headers: Record<string, string>): Promise<Spreadsheet> {
        const { data } = await axios.get<Spreadsheet>(this.baseUrl, {
            headers,
            params: { fields: "spreadsheetId,properties.title,sheets.properties" },
        });
        return data;
    }

    async fetchSheet(sheetName: string): Promise<SheetSnapshot> {
        try {
            const accessToken = await this.getAccessToken();
            const headers = { "Content-Type": "application/json", Authorization: `Bearer ${accessToken}` };

            const spreadsheet = await this.fetchSpreadsheetMetadata(headers);
            const exists = (spreadsheet.sheets ?? []).some((s) => s.properties?.title === sheetName);
            if (!exists) throw new SourceAccessError(`Sheet '${sheetName}' not found`);

            const range = a1Range(sheetName, this.columns);

            const { data: valueRange } = await axios.get<ValueRange>(`${this.baseUrl}/values/${encodeURIComponent(range)}`, { headers });

            const { data: formatting } = await axios.get<FormattingDocument>(this.baseUrl, {
                headers,
                params: { ranges: range, includeGridData: true },
            });

            return { values: toGrid(valueRange.values), formatting };
        } catch (error) {
            if (error instanceof SourceAccessError) throw error;
            const status = isAxiosError(error) ? error.response?.status : undefined;
            throw new SourceAccessError(errorMessage(error), status);
        }
    }
}
