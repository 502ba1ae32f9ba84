import { beforeEach, describe, expect, it, vi } from "vitest";

const { refresh, createToken } = vi.hoisted(() => {
    const refresh = vi.fn();
    const createToken = vi.fn(() => ({ refresh }));
    return { refresh, createToken };
});

vi.mock("client-oauth2", () => ({
    default: class {
        createToken = createToken;
    },
}));

import { refreshTokenProvider } from "../credentials/credential";

const google = { clientId: "test-client", clientSecret: "test-secret", refreshToken: "test-refresh-token" };

describe("refreshTokenProvider", () => {
    beforeEach(() => {
        refresh.mockReset();
        createToken.mockClear();
    });

    it("exchanges the refresh token for an access token", async () => {
        refresh.mockResolvedValue({ accessToken: "test-access-token" });

        await expect(refreshTokenProvider(google)()).resolves.toBe("test-access-token");
        expect(createToken).toHaveBeenCalledWith("", "test-refresh-token", "Bearer", {});
        expect(refresh).toHaveBeenCalledWith(expect.objectContaining({ clientId: "test-client", clientSecret: "test-secret" }));
    });

    it("fails when the token endpoint returns no access token", async () => {
        refresh.mockResolvedValue({ accessToken: "" });
        await expect(refreshTokenProvider(google)()).rejects.toThrow("Token endpoint returned no access token");
    });
});
