import { describe, expect, it } from "vitest";
import { COMPLETION_MARKERS, hasManualMarker } from "../parser/markers";

describe("hasManualMarker", () => {
    it("rejects non-string and empty input", () => {
        expect(hasManualMarker(undefined)).toBe(false);
        expect(hasManualMarker(null)).toBe(false);
        expect(hasManualMarker(42)).toBe(false);
        expect(hasManualMarker("")).toBe(false);
    });

    it("matches every marker case-insensitively anywhere in the text", () => {
        for (const marker of COMPLETION_MARKERS) {
            expect(hasManualMarker(`How do we deploy? ${marker.toLowerCase()}`)).toBe(true);
        }
    });

    it("matches bracketed, colon and dash forms", () => {
        expect(hasManualMarker("[Done] What is the budget?")).toBe(true);
        expect(hasManualMarker("completed: who owns the API")).toBe(true);
        expect(hasManualMarker("Who reviews the PR - finished")).toBe(true);
        expect(hasManualMarker("✓ Pick a venue")).toBe(true);
    });

    it("detects markdown strikethrough delimiters", () => {
        expect(hasManualMarker("~~Pick a venue~~")).toBe(true);
        expect(hasManualMarker("~~a~~ and ~~b~~")).toBe(true);
    });

    it("needs two pairs of tildes", () => {
        expect(hasManualMarker("~~Pick a venue")).toBe(false);
        expect(hasManualMarker("~~~")).toBe(false);
    });

    it("does not flag ordinary questions", () => {
        expect(hasManualMarker("Is the work done yet?")).toBe(false);
        expect(hasManualMarker("Which tasks are completed")).toBe(false);
    });
});
