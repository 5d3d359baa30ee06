import type { Snapshot } from "../snapshot-schema";
import { readSnapshot } from "../snapshot-store";

export function formatCounts(snapshot: Snapshot): string[] {
  return [
    `likedSongs: ${snapshot.likedSongs.length}`,
    `ownedPlaylists: ${snapshot.ownedPlaylists.length}`,
    ...snapshot.ownedPlaylists.map((playlist) => `  ${playlist.name}: ${playlist.tracks.length}`),
    `followedPlaylists: ${snapshot.followedPlaylists.length}`,
    ...snapshot.followedPlaylists.map((playlist) => `  ${playlist.name}: ${playlist.tracks.length}`)
  ];
}

export async function countCommand(snapshotPath: string): Promise<void> {
  const snapshot = await readSnapshot(snapshotPath);
  console.log(formatCounts(snapshot).join("\n"));
}
