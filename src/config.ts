import "dotenv/config";
import os from "node:os";
import path from "node:path";
import { parseLogLevel, type LogLevel } from "./logger";

export interface AppConfig {
  spotifyClientId: string;
  spotifyClientSecret: string;
  /** From SPOTIFY_REFRESH_TOKEN; null means use the stored credentials. */
  spotifyRefreshToken: string | null;
  configDir: string;
  credentialsFilePath: string;
  backupDirPath: string;
  restoreLogPath: string;
  redirectUri: string;
  authPort: number;
  logLevel: LogLevel;
}

export const DEFAULT_REDIRECT_URI = "http://127.0.0.1:8888/callback";

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }

  return value;
}

function parsePort(value: string | undefined): number {
  const port = Number(value?.trim() || "8888");
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error("SPOTIFY_AUTH_PORT must be a valid TCP port number");
  }

  return port;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const configDir = path.resolve(env.SPOTIFY_SNAPSHOT_HOME?.trim() || path.join(os.homedir(), ".config", "spotify-snapshot"));

  return {
    spotifyClientId: requireEnv(env, "SPOTIFY_CLIENT_ID"),
    spotifyClientSecret: requireEnv(env, "SPOTIFY_CLIENT_SECRET"),
    spotifyRefreshToken: env.SPOTIFY_REFRESH_TOKEN?.trim() || null,
    configDir,
    credentialsFilePath: path.join(configDir, "credentials.json"),
    backupDirPath: path.join(configDir, "backup.snapshot"),
    restoreLogPath: path.join(configDir, "restore.log"),
    redirectUri: env.SPOTIFY_REDIRECT_URI?.trim() || DEFAULT_REDIRECT_URI,
    authPort: parsePort(env.SPOTIFY_AUTH_PORT),
    logLevel: parseLogLevel(env.LOG_LEVEL)
  };
}
