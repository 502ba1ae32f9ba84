import fs from "fs/promises";
import path from "path";
import type { PersistenceSink, QuestionsResult, RunSummary } from "../types";

export const RESULT_FILE = "questions.json";
export const SUMMARY_FILE = "summary.json";

/** Writes the latest run as pretty-printed JSON, overwriting the previous run. */
export class FileStore implements PersistenceSink {
    constructor(private readonly outputDir: string) { }

    private async write(fileName: string, data: unknown) {
        await fs.mkdir(this.outputDir, { recursive: true });
        await fs.writeFile(path.join(this.outputDir, fileName), `${JSON.stringify(data, null, 2)}\n`, "utf8");
    }

    async saveResult(result: QuestionsResult): Promise<void> {
        await this.write(RESULT_FILE, result);
    }

    async saveSummary(summary: RunSummary): Promise<void> {
        await this.write(SUMMARY_FILE, summary);
    }
}
