import { spawn } from "node:child_process";
import { randomBytes } from "node:crypto";
import http from "node:http";
import pc from "picocolors";
import type { AppConfig } from "../config";
import { writeCredentials } from "../credentials-store";
import { logger } from "../logger";
import { requestToken, SpotifyClient } from "../spotify-client";

export const APP_SCOPES = [
  "playlist-read-private",
  "playlist-read-collaborative",
  "playlist-modify-private",
  "playlist-modify-public",
  "user-library-read",
  "user-library-modify",
  "user-read-private"
];

export function buildAuthUrl(params: { clientId: string; redirectUri: string; state: string }): string {
  const query = new URLSearchParams({
    client_id: params.clientId,
    response_type: "code",
    redirect_uri: params.redirectUri,
    scope: APP_SCOPES.join(" "),
    state: params.state
  });

  return `https://accounts.spotify.com/authorize?${query.toString()}`;
}

function openBrowser(url: string): void {
  const platform = process.platform;

  if (platform === "win32") {
    spawn("cmd", ["/c", "start", "", url], { detached: true, stdio: "ignore" }).unref();
    return;
  }

  spawn(platform === "darwin" ? "open" : "xdg-open", [url], { detached: true, stdio: "ignore" })
    .on("error", () => logger.debug("Could not open a browser automatically."))
    .unref();
}

/** Resolves with the authorization code once the redirect reaches the local callback server. */
export function waitForAuthorizationCode(port: number, callbackPath: string, expectedState: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const server = http.createServer((req, res) => {
      const requestUrl = req.url ? new URL(req.url, `http://127.0.0.1:${port}`) : null;

      if (!requestUrl || requestUrl.pathname !== callbackPath) {
        res.statusCode = 404;
        res.end("Not found");
        return;
      }

      const code = requestUrl.searchParams.get("code");
      const returnedState = requestUrl.searchParams.get("state");
      const error = requestUrl.searchParams.get("error");

      let failure: string | null = null;
      if (error) {
        failure = `Spotify auth failed: ${error}`;
      } else if (!code || !returnedState) {
        failure = "Missing code/state in callback.";
      } else if (returnedState !== expectedState) {
        failure = "State mismatch in OAuth callback.";
      }

      if (failure || !code) {
        const message = failure ?? "Missing code in callback.";
        res.statusCode = 400;
        res.end(message);
        server.close(() => reject(new Error(message)));
        return;
      }

      res.statusCode = 200;
      res.end("Authorization complete. Return to the terminal.");
      server.close(() => resolve(code));
    });

    server.on("error", reject);
    server.listen(port, "127.0.0.1");
  });
}

export async function loginCommand(config: AppConfig): Promise<void> {
  const state = randomBytes(16).toString("hex");
  const authUrl = buildAuthUrl({ clientId: config.spotifyClientId, redirectUri: config.redirectUri, state });
  const callbackPath = new URL(config.redirectUri).pathname;

  console.log(pc.yellow("Opening the Spotify authorization page in your browser."));
  console.log(pc.dim("If it does not open automatically, visit:\n"));
  console.log(authUrl);

  const codePromise = waitForAuthorizationCode(config.authPort, callbackPath, state);
  openBrowser(authUrl);
  const code = await codePromise;

  const grant = await requestToken(
    new URLSearchParams({
      grant_type: "authorization_code",
      code,
      redirect_uri: config.redirectUri,
      client_id: config.spotifyClientId,
      client_secret: config.spotifyClientSecret
    })
  );

  if (!grant.refreshToken) {
    throw new Error("Spotify token response did not include refresh_token.");
  }

  await writeCredentials(config.credentialsFilePath, grant.refreshToken);

  const client = new SpotifyClient(config.spotifyClientId, config.spotifyClientSecret, grant.refreshToken);
  const user = await client.getCurrentUser(grant.accessToken);

  console.log(
    pc.green(`Authenticated as ${user.display_name ?? user.id} (ID: ${user.id}). Wrote credentials to ${config.credentialsFilePath}`)
  );
}
