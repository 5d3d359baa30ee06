#!/usr/bin/env node
import { Command } from "commander";
import { backupCommand } from "./commands/backup";
import { countCommand } from "./commands/count";
import { idCommand } from "./commands/id";
import { loginCommand } from "./commands/login";
import { restoreCommand, type RestoreOptions } from "./commands/restore";
import { transferCommand, type TransferOptions } from "./commands/transfer";
import { loadConfig, type AppConfig } from "./config";
import { logger, setLogLevel } from "./logger";

function configure(verbose?: boolean): AppConfig {
  const config = loadConfig();
  setLogLevel(verbose ? "debug" : config.logLevel);
  return config;
}

async function run(name: string, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`${name} failed: ${message}`);
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name("spotify-snapshot")
  .description("Back up a Spotify library to JSON snapshots and restore playlists from them")
  .version("0.1.0");

program
  .command("login")
  .description("Authorize this app and store a refresh token")
  .action(() => run("login", () => loginCommand(configure())));

program
  .command("backup")
  .description("Write a snapshot of the current library")
  .option("-o, --output <dir>", "Snapshot directory (default: ./<timestamp>.snapshot)")
  .option("-v, --verbose", "Log every API request")
  .action((options: { output?: string; verbose?: boolean }) =>
    run("backup", () => backupCommand(configure(options.verbose), options))
  );

program
  .command("restore")
  .description("Reconcile one playlist, or Liked Songs, with a snapshot")
  .requiredOption("-i, --input <path>", "Snapshot directory or JSON file")
  .option("--playlist <id>", "Snapshot playlist to restore")
  .option("--liked", "Restore Liked Songs")
  .option("--target <id>", "Live playlist to reconcile (default: the snapshot playlist's ID)")
  .option("--dry-run", "Show the change set without applying it")
  .option("-y, --yes", "Do not ask before removing tracks")
  .option("--no-backup", "Skip the library backup taken before removing tracks")
  .option("--add-only", "Only add missing tracks; never remove anything")
  .option("-v, --verbose", "Print every added and removed track")
  .action((options: RestoreOptions) => run("restore", () => restoreCommand(configure(options.verbose), options)));

program
  .command("transfer")
  .description("Add tracks of one playlist that another playlist lacks")
  .argument("<sourceId>", "Playlist to copy from")
  .argument("<destinationId>", "Playlist to add to")
  .option("--dry-run", "Count the tracks without adding them")
  .action((sourceId: string, destinationId: string, options: TransferOptions) =>
    run("transfer", () => transferCommand(configure(), sourceId, destinationId, options))
  );

program
  .command("count")
  .description("Print track counts for a snapshot")
  .argument("<path>", "Snapshot directory or JSON file")
  .action((snapshotPath: string) => run("count", () => countCommand(snapshotPath)));

program
  .command("id")
  .description("Show what kind of resource a Spotify ID refers to")
  .argument("<spotifyId>", "Track, playlist, artist, user, album, episode, show, chapter or audiobook ID")
  .action((spotifyId: string) => run("id", () => idCommand(configure(), spotifyId)));

program.parseAsync().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error(message);
  process.exitCode = 1;
});
