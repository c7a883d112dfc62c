import { describe, expect, it } from "vitest";
import {
  createGoogleAuth,
  loadGoogleCredentials,
} from "../../../src/connectors/google/auth.js";

describe("loadGoogleCredentials", () => {
  it("reads the three OAuth variables", () => {
    expect(
      loadGoogleCredentials({
        GOOGLE_CLIENT_ID: "test-client",
        GOOGLE_CLIENT_SECRET: "test-secret",
        GOOGLE_REFRESH_TOKEN: "test-refresh",
      }),
    ).toEqual({
      clientId: "test-client",
      clientSecret: "test-secret",
      refreshToken: "test-refresh",
    });
  });

  it("names the missing variables", () => {
    expect(() => loadGoogleCredentials({ GOOGLE_CLIENT_ID: "test-client" })).toThrow(
      "Missing required environment variables",
    );
  });
});

describe("createGoogleAuth", () => {
  it("carries the refresh token", () => {
    const auth = createGoogleAuth({
      clientId: "test-client",
      clientSecret: "test-secret",
      refreshToken: "test-refresh",
    });
    expect(auth.credentials.refresh_token).toBe("test-refresh");
  });
});
