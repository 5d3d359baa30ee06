import { logger } from "./logger";
import type {
  FollowedSnapshotPlaylist,
  Snapshot,
  SnapshotPlaylist,
  SnapshotTrack,
  SnapshotUser
} from "./snapshot-schema";
import { SpotifyApiError, type SpotifyClient } from "./spotify-client";
import type { PlaylistItem, SpotifyUser } from "./types";

export type LibraryReader = Pick<
  SpotifyClient,
  "getCurrentUser" | "fetchAllLikedTracks" | "fetchAllPlaylists" | "fetchPlaylistItems"
>;

export interface SerializeResult {
  snapshot: Snapshot;
  skippedCount: number;
}

export function toSnapshotUser(user: SpotifyUser): SnapshotUser {
  return {
    id: user.id,
    displayName: user.display_name ?? user.id,
    numFollowers: user.followers?.total ?? null
  };
}

/** Returns null for items that cannot be restored later: removed tracks and local files. */
export function toSnapshotTrack(item: PlaylistItem): SnapshotTrack | null {
  const track = item.track;
  if (!track || !track.id || track.is_local === true) {
    return null;
  }

  const artists =
    track.type === "episode"
      ? track.show
        ? [track.show.name]
        : []
      : (track.artists ?? []).map((artist) => artist.name);

  return {
    id: track.id,
    name: track.name,
    artists,
    addedAt: item.added_at,
    type: track.type
  };
}

function collectTracks(items: PlaylistItem[]): { tracks: SnapshotTrack[]; skipped: number } {
  const tracks: SnapshotTrack[] = [];
  let skipped = 0;

  for (const item of items) {
    const track = toSnapshotTrack(item);
    if (track) {
      tracks.push(track);
    } else {
      skipped += 1;
    }
  }

  return { tracks, skipped };
}

export async function serializeLibrary(reader: LibraryReader, accessToken: string): Promise<SerializeResult> {
  logger.info("Stage: fetching current user.");
  const currentUser = await reader.getCurrentUser(accessToken);
  const user = toSnapshotUser(currentUser);

  logger.info("Stage: fetching liked songs.");
  const liked = collectTracks(await reader.fetchAllLikedTracks(accessToken));
  let skippedCount = liked.skipped;

  logger.info("Stage: fetching playlists.");
  const playlists = await reader.fetchAllPlaylists(accessToken);

  const ownedPlaylists: SnapshotPlaylist[] = [];
  const followedPlaylists: FollowedSnapshotPlaylist[] = [];

  for (const [index, playlist] of playlists.entries()) {
    logger.info(`Stage: fetching playlist ${index + 1}/${playlists.length} (${playlist.name}).`);
    let items: PlaylistItem[];
    try {
      items = await reader.fetchPlaylistItems(playlist.id, accessToken);
    } catch (error) {
      if (error instanceof SpotifyApiError && (error.status === 403 || error.status === 404)) {
        logger.warn(`Skipping playlist ${playlist.name} (${playlist.id}): ${error.message}`);
        skippedCount += 1;
        continue;
      }

      throw error;
    }

    const collected = collectTracks(items);
    skippedCount += collected.skipped;

    const entry: SnapshotPlaylist = {
      id: playlist.id,
      name: playlist.name,
      description: playlist.description || null,
      tracks: collected.tracks
    };

    if (playlist.owner.id === currentUser.id) {
      ownedPlaylists.push(entry);
    } else {
      followedPlaylists.push({ ...entry, owner: toSnapshotUser(playlist.owner) });
    }
  }

  return {
    snapshot: {
      user,
      likedSongs: liked.tracks,
      ownedPlaylists,
      followedPlaylists
    },
    skippedCount
  };
}
