/**
 * OAuth2 client shared by the Gmail and Sheets connectors. The refresh
 * token must carry both the `gmail.modify` and `spreadsheets` scopes.
 */

import { google } from "googleapis";

export interface GoogleCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export type GoogleAuth = InstanceType<typeof google.auth.OAuth2>;

export function loadGoogleCredentials(
  env: NodeJS.ProcessEnv = process.env,
): GoogleCredentials {
  const clientId = env.GOOGLE_CLIENT_ID;
  const clientSecret = env.GOOGLE_CLIENT_SECRET;
  const refreshToken = env.GOOGLE_REFRESH_TOKEN;

  if (!clientId || !clientSecret || !refreshToken) {
    throw new Error(
      "Missing required environment variables: GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET, GOOGLE_REFRESH_TOKEN",
    );
  }
  return { clientId, clientSecret, refreshToken };
}

export function createGoogleAuth(creds: GoogleCredentials): GoogleAuth {
  const auth = new google.auth.OAuth2(creds.clientId, creds.clientSecret);
  auth.setCredentials({ refresh_token: creds.refreshToken });
  return auth;
}
