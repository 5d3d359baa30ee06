import type { AppConfig } from "./config";
import { resolveRefreshToken, writeCredentials } from "./credentials-store";
import { logger } from "./logger";
import { SpotifyClient } from "./spotify-client";

export interface SpotifySession {
  client: SpotifyClient;
  accessToken: string;
}

export async function openSession(config: AppConfig): Promise<SpotifySession> {
  const refreshToken = await resolveRefreshToken(config);
  const client = new SpotifyClient(config.spotifyClientId, config.spotifyClientSecret, refreshToken);

  logger.debug("Refreshing access token.");
  const grant = await client.refreshAccessToken();

  if (grant.refreshToken && grant.refreshToken !== refreshToken) {
    if (config.spotifyRefreshToken) {
      logger.warn("Spotify rotated the refresh token. Update SPOTIFY_REFRESH_TOKEN to the value in the credentials file.");
    }

    await writeCredentials(config.credentialsFilePath, grant.refreshToken);
    logger.info(`Stored rotated refresh token in ${config.credentialsFilePath}.`);
  }

  return { client, accessToken: grant.accessToken };
}
