import * as readline from "node:readline/promises";
import pc from "picocolors";
import { appendChangeLog } from "../change-log";
import type { AppConfig } from "../config";
import { logger } from "../logger";
import { formatFull, formatSummary } from "../report";
import {
  executeRestorePlan,
  planLikedSongsRestore,
  planPlaylistRestore,
  type RestoreClient,
  type RestorePlan
} from "../restore-service";
import { serializeLibrary, type LibraryReader } from "../serializer";
import { openSession } from "../session";
import { readSnapshot, writeSnapshot } from "../snapshot-store";

export interface RestoreOptions {
  input: string;
  playlist?: string;
  liked?: boolean;
  target?: string;
  dryRun?: boolean;
  yes?: boolean;
  backup: boolean;
  addOnly?: boolean;
  verbose?: boolean;
}

export interface RestoreSession {
  client: RestoreClient & LibraryReader;
  accessToken: string;
}

export interface RestoreDeps {
  openSession(config: AppConfig): Promise<RestoreSession>;
  confirm(question: string): Promise<boolean>;
}

export const REPLACEMENT_NOTICE =
  "WARNING: This restore will REMOVE tracks from your library that are not in the snapshot.";

async function confirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
  });

  try {
    const answer = await rl.question(`${question} [y/N] `);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

const defaultDeps: RestoreDeps = { openSession, confirm };

async function createBackup(config: AppConfig, session: RestoreSession): Promise<void> {
  console.log(pc.dim(`Creating backup at ${config.backupDirPath}...`));
  const { snapshot } = await serializeLibrary(session.client, session.accessToken);
  await writeSnapshot(config.backupDirPath, snapshot);
  console.log(pc.dim("Finished creating backup."));
}

export function validateRestoreOptions(options: Pick<RestoreOptions, "playlist" | "liked" | "target">): void {
  if (options.playlist && options.liked) {
    throw new Error("Pass either --playlist or --liked, not both");
  }

  if (!options.playlist && !options.liked) {
    throw new Error("Pass --playlist <id> or --liked to choose what to restore");
  }

  if (options.target && !options.playlist) {
    throw new Error("--target only applies to --playlist");
  }
}

export async function restoreCommand(
  config: AppConfig,
  options: RestoreOptions,
  deps: RestoreDeps = defaultDeps
): Promise<void> {
  validateRestoreOptions(options);

  const snapshot = await readSnapshot(options.input);
  logger.info(`Loaded snapshot of user ${snapshot.user.displayName} (${snapshot.user.id}).`);

  const session = await deps.openSession(config);
  const plan: RestorePlan = options.playlist
    ? await planPlaylistRestore(session.client, session.accessToken, snapshot, options.playlist, {
        target: options.target,
        addOnly: options.addOnly
      })
    : await planLikedSongsRestore(session.client, session.accessToken, snapshot, { addOnly: options.addOnly });

  const destructive = !options.dryRun && plan.removals.length > 0;
  if (destructive) {
    if (!options.yes) {
      console.log(pc.red(`${REPLACEMENT_NOTICE} ${plan.removals.length} item(s) will be removed from ${plan.label}.`));
      if (!(await deps.confirm("Proceed?"))) {
        console.log("Aborted.");
        return;
      }
    }

    if (options.backup) {
      await createBackup(config, session);
    }
  }

  const outcome = await executeRestorePlan(session.client, session.accessToken, plan, { dryRun: options.dryRun });
  const full = formatFull(outcome);

  console.log(options.verbose || options.dryRun ? full : formatSummary(outcome));

  if (!options.dryRun) {
    await appendChangeLog(config.restoreLogPath, full);
  }

  if (outcome.result.failures.length > 0) {
    throw new Error(
      `${outcome.result.failures.length} batch(es) failed. Changes already applied were kept; re-run restore to retry.`
    );
  }
}
