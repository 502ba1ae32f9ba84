import { isAxiosError } from "axios";

export class ConfigError extends Error {
    readonly problems: string[];

    constructor(problems: string[]) {
        super(`Invalid configuration: ${problems.join("; ")}`);
        this.name = "ConfigError";
        this.problems = problems;
    }
}

/** The spreadsheet (or the tab inside it) could not be read. */
export class SourceAccessError extends Error {
    readonly status?: number;

    constructor(message: string, status?: number) {
        super(message);
        this.name = "SourceAccessError";
        this.status = status;
    }
}

const SHARING_HINT = "Make sure the spreadsheet is shared with the account behind GOOGLE_REFRESH_TOKEN.";

export const errorMessage = (error: unknown): string => {
    if (isAxiosError(error)) {
        const status = error.response?.status;
        if (status === 403 || status === 404) {
            return `${SHARING_HINT} ${error.message}`;
        }
        return status ? `${error.message} (HTTP ${status})` : error.message;
    }
    if (error instanceof Error) return error.message;
    return String(error);
}
