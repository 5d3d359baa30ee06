import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config";

const baseEnv = {
  SPOTIFY_CLIENT_ID: "test-client",
  SPOTIFY_CLIENT_SECRET: "test-secret"
};

describe("loadConfig", () => {
  it("applies defaults for optional settings", () => {
    const config = loadConfig({ ...baseEnv });
    const configDir = path.join(os.homedir(), ".config", "spotify-snapshot");

    expect(config).toEqual({
      spotifyClientId: "test-client",
      spotifyClientSecret: "test-secret",
      spotifyRefreshToken: null,
      configDir,
      credentialsFilePath: path.join(configDir, "credentials.json"),
      backupDirPath: path.join(configDir, "backup.snapshot"),
      restoreLogPath: path.join(configDir, "restore.log"),
      redirectUri: "http://127.0.0.1:8888/callback",
      authPort: 8888,
      logLevel: "info"
    });
  });

  it("reads overrides and trims whitespace", () => {
    const config = loadConfig({
      ...baseEnv,
      SPOTIFY_REFRESH_TOKEN: "  test-refresh  ",
      SPOTIFY_SNAPSHOT_HOME: "/tmp/snapshot-home",
      SPOTIFY_AUTH_PORT: "9090",
      LOG_LEVEL: "DEBUG"
    });

    expect(config.spotifyRefreshToken).toBe("test-refresh");
    expect(config.credentialsFilePath).toBe(path.resolve("/tmp/snapshot-home", "credentials.json"));
    expect(config.authPort).toBe(9090);
    expect(config.logLevel).toBe("debug");
  });

  it("requires the client credentials", () => {
    expect(() => loadConfig({ SPOTIFY_CLIENT_ID: "test-client" })).toThrow(
      "Missing required environment variable: SPOTIFY_CLIENT_SECRET"
    );
  });

  it("rejects an invalid callback port", () => {
    expect(() => loadConfig({ ...baseEnv, SPOTIFY_AUTH_PORT: "70000" })).toThrow(
      "SPOTIFY_AUTH_PORT must be a valid TCP port number"
    );
  });
});
