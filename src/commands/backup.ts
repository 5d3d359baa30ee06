import path from "node:path";
import pc from "picocolors";
import type { AppConfig } from "../config";
import { logger } from "../logger";
import { serializeLibrary } from "../serializer";
import { openSession } from "../session";
import { defaultSnapshotDirName, writeSnapshot } from "../snapshot-store";

export interface BackupOptions {
  output?: string;
}

export async function backupCommand(config: AppConfig, options: BackupOptions): Promise<void> {
  const { client, accessToken } = await openSession(config);
  const snapshotDir = path.resolve(options.output ?? defaultSnapshotDirName(new Date()));

  const { snapshot, skippedCount } = await serializeLibrary(client, accessToken);
  const filePath = await writeSnapshot(snapshotDir, snapshot);

  if (skippedCount > 0) {
    logger.warn(`Skipped ${skippedCount} local or unavailable items and unreadable playlists.`);
  }

  console.log(
    pc.green(
      `Wrote snapshot of ${snapshot.likedSongs.length} liked songs, ${snapshot.ownedPlaylists.length} owned and ${snapshot.followedPlaylists.length} followed playlists to ${filePath}`
    )
  );
}
