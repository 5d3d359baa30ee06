import { promises as fs } from "node:fs";
import path from "node:path";
import type { AppConfig } from "./config";

export interface StoredCredentials {
  refreshToken: string;
  updatedAt: string;
}

export async function readCredentials(credentialsFilePath: string): Promise<StoredCredentials | null> {
  let raw: string;
  try {
    raw = await fs.readFile(credentialsFilePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }

    throw error;
  }

  let parsed: { refreshToken?: unknown; updatedAt?: unknown };
  try {
    parsed = JSON.parse(raw) as { refreshToken?: unknown; updatedAt?: unknown };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read credentials file (${credentialsFilePath}): ${message}`);
  }

  if (typeof parsed.refreshToken !== "string" || !parsed.refreshToken) {
    throw new Error(`Credentials file (${credentialsFilePath}) is missing refreshToken`);
  }

  return {
    refreshToken: parsed.refreshToken,
    updatedAt: typeof parsed.updatedAt === "string" ? parsed.updatedAt : ""
  };
}

export async function writeCredentials(credentialsFilePath: string, refreshToken: string): Promise<void> {
  const credentials: StoredCredentials = {
    refreshToken,
    updatedAt: new Date().toISOString()
  };

  await fs.mkdir(path.dirname(credentialsFilePath), { recursive: true });
  await fs.writeFile(credentialsFilePath, `${JSON.stringify(credentials, null, 2)}\n`, { encoding: "utf8", mode: 0o600 });
}

export async function resolveRefreshToken(config: AppConfig): Promise<string> {
  if (config.spotifyRefreshToken) {
    return config.spotifyRefreshToken;
  }

  const stored = await readCredentials(config.credentialsFilePath);
  if (!stored) {
    throw new Error(
      `No refresh token found. Set SPOTIFY_REFRESH_TOKEN or run "spotify-snapshot login" (expected ${config.credentialsFilePath}).`
    );
  }

  return stored.refreshToken;
}
