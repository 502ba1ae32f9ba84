import ClientOAuth2 from "client-oauth2";
import type { AppConfig } from "../config";

export const SHEETS_SCOPES = ["https://www.googleapis.com/auth/spreadsheets.readonly"];

const getOAuthOption = (google: AppConfig["google"]): ClientOAuth2.Options => {
    return {
        clientId: google.clientId,
        clientSecret: google.clientSecret,
        accessTokenUri: "https://oauth2.googleapis.com/token",
        authorizationUri: "https://accounts.google.com/o/oauth2/auth?access_type=offline&prompt=consent",
        scopes: SHEETS_SCOPES,
    }
}

export type AccessTokenProvider = () => Promise<string>;

/** Exchanges the long-lived refresh token for a fresh access token on every call. */
export const refreshTokenProvider = (google: AppConfig["google"]): AccessTokenProvider => {
    const oAuthOptions = getOAuthOption(google);
    const oAuthObj = new ClientOAuth2(oAuthOptions);

    return async () => {
        const token = oAuthObj.createToken("", google.refreshToken, "Bearer", {});
        const refreshed = await token.refresh(oAuthOptions);
        if (!refreshed.accessToken) throw new Error("Token endpoint returned no access token");
        return refreshed.accessToken;
    }
}
