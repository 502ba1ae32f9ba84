import { describe, expect, it } from "vitest";
import { errorMessage } from "../errors";
import { httpError } from "./axiosMock";

describe("errorMessage", () => {
    it("adds a sharing hint for forbidden and missing spreadsheets", () => {
        expect(errorMessage(httpError(403))).toBe(
            "Make sure the spreadsheet is shared with the account behind GOOGLE_REFRESH_TOKEN. Request failed with status code 403",
        );
    });

    it("adds the HTTP status to other request failures", () => {
        expect(errorMessage(httpError(500, "Server error"))).toBe("Server error (HTTP 500)");
    });

    it("handles plain errors and thrown values", () => {
        expect(errorMessage(new Error("boom"))).toBe("boom");
        expect(errorMessage("nope")).toBe("nope");
    });
});
