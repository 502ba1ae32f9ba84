// Completion conventions people type by hand when they can't (or don't) use strikethrough.
export const COMPLETION_MARKERS: readonly string[] = [
    "[DONE]", "[COMPLETED]", "[FINISHED]", "[COMPLETE]",
    "✓", "✗",
    "DONE:", "COMPLETED:", "FINISHED:",
    "(DONE)", "(COMPLETED)", "(FINISHED)",
    "- DONE", "- COMPLETED", "- FINISHED",
];

const MARKDOWN_STRIKE = "~~";

const countOccurrences = (text: string, needle: string) => text.split(needle).length - 1;

export const hasManualMarker = (text: unknown): boolean => {
    if (typeof text !== "string" || !text) return false;

    const normalized = text.toUpperCase().trim();
    if (COMPLETION_MARKERS.some((marker) => normalized.includes(marker))) return true;

    // ~~text~~
    return countOccurrences(text, MARKDOWN_STRIKE) >= 2;
}
