import { applyChangeSet, type ApplyResult, type ApplyTarget } from "./applier";
import { logger } from "./logger";
import { reconcile, type ChangeSet } from "./reconciler";
import { trackUri, type Snapshot, type SnapshotPlaylist, type SnapshotTrack } from "./snapshot-schema";
import type { SpotifyClient } from "./spotify-client";
import type { PlaylistItem, SpotifyTrack } from "./types";

export type RestoreClient = Pick<
  SpotifyClient,
  "getPlaylist" | "createPlaylist" | "fetchPlaylistItems" | "fetchAllLikedTracks" | "mutatorFor"
>;

export type RestoreTarget =
  | { kind: "playlist"; playlistId: string }
  | { kind: "new-playlist"; name: string; description: string | null }
  | { kind: "liked" };

export interface RestorePlan {
  label: string;
  target: RestoreTarget;
  /** Set difference over track IDs. */
  changeSet: ChangeSet;
  /** Wire identifiers for the API: URIs for playlists, IDs for Liked Songs. */
  additions: string[];
  removals: string[];
  /** Snapshot entries that cannot be restored to this target. */
  ignored: string[];
  /** Display text per track ID, from both sides. */
  trackLabels: Map<string, string>;
}

export interface PlanOptions {
  /** Live playlist to reconcile instead of the snapshot playlist's own ID. */
  target?: string;
  /** Leave tracks missing from the snapshot in place. */
  addOnly?: boolean;
}

export interface RestoreOutcome {
  plan: RestorePlan;
  playlistId: string | null;
  createdPlaylist: boolean;
  dryRun: boolean;
  result: ApplyResult;
}

export interface TransferOutcome {
  sourceName: string;
  destinationName: string;
  sourceCount: number;
  alreadyPresent: number;
  result: ApplyResult;
}

function labelSnapshotTrack(track: SnapshotTrack): string {
  return track.artists.length > 0 ? `${track.name} - ${track.artists.join(", ")}` : track.name;
}

function labelLiveTrack(track: SpotifyTrack): string {
  const artists = track.type === "episode" ? (track.show ? [track.show.name] : []) : (track.artists ?? []).map((a) => a.name);
  return artists.length > 0 ? `${track.name} - ${artists.join(", ")}` : track.name;
}

/** Live items with a catalog ID. Local files and removed tracks have none and are left alone. */
function liveTracks(items: PlaylistItem[]): Array<SpotifyTrack & { id: string }> {
  const tracks: Array<SpotifyTrack & { id: string }> = [];

  for (const item of items) {
    const track = item.track;
    if (track && track.id && track.is_local !== true) {
      tracks.push({ ...track, id: track.id });
    }
  }

  return tracks;
}

function reconcileFor(snapshotIds: string[], liveIds: string[], addOnly: boolean | undefined): ChangeSet {
  const changeSet = reconcile(snapshotIds, liveIds);
  return addOnly ? { ...changeSet, toRemove: [] } : changeSet;
}

function lookupAll(ids: string[], wireIds: Map<string, string>): string[] {
  return ids.flatMap((id) => {
    const wire = wireIds.get(id);
    return wire ? [wire] : [];
  });
}

export function findSnapshotPlaylist(snapshot: Snapshot, playlistId: string): SnapshotPlaylist {
  const playlist =
    snapshot.ownedPlaylists.find((candidate) => candidate.id === playlistId) ??
    snapshot.followedPlaylists.find((candidate) => candidate.id === playlistId);

  if (!playlist) {
    throw new Error(`Playlist ${playlistId} is not in the snapshot`);
  }

  return playlist;
}

export async function planPlaylistRestore(
  client: RestoreClient,
  accessToken: string,
  snapshot: Snapshot,
  snapshotPlaylistId: string,
  options: PlanOptions = {}
): Promise<RestorePlan> {
  const snapshotPlaylist = findSnapshotPlaylist(snapshot, snapshotPlaylistId);
  const liveId = options.target ?? snapshotPlaylist.id;

  const trackLabels = new Map<string, string>();
  const uris = new Map<string, string>();
  for (const track of snapshotPlaylist.tracks) {
    trackLabels.set(track.id, labelSnapshotTrack(track));
    uris.set(track.id, trackUri(track));
  }
  const snapshotIds = snapshotPlaylist.tracks.map((track) => track.id);

  const live = await client.getPlaylist(liveId, accessToken);
  if (!live) {
    logger.warn(`Live playlist ${liveId} was not found. A new playlist will be created.`);
    const changeSet = reconcile(snapshotIds, []);

    return {
      label: `new playlist "${snapshotPlaylist.name}"`,
      target: { kind: "new-playlist", name: snapshotPlaylist.name, description: snapshotPlaylist.description },
      changeSet,
      additions: lookupAll(changeSet.toAdd, uris),
      removals: [],
      ignored: [],
      trackLabels
    };
  }

  const tracks = liveTracks(await client.fetchPlaylistItems(live.id, accessToken));
  for (const track of tracks) {
    if (!uris.has(track.id)) {
      uris.set(track.id, track.uri);
    }
    if (!trackLabels.has(track.id)) {
      trackLabels.set(track.id, labelLiveTrack(track));
    }
  }

  const changeSet = reconcileFor(
    snapshotIds,
    tracks.map((track) => track.id),
    options.addOnly
  );

  return {
    label: `playlist "${live.name}" (${live.id})`,
    target: { kind: "playlist", playlistId: live.id },
    changeSet,
    additions: lookupAll(changeSet.toAdd, uris),
    removals: lookupAll(changeSet.toRemove, uris),
    ignored: [],
    trackLabels
  };
}

export async function planLikedSongsRestore(
  client: RestoreClient,
  accessToken: string,
  snapshot: Snapshot,
  options: Pick<PlanOptions, "addOnly"> = {}
): Promise<RestorePlan> {
  const trackLabels = new Map<string, string>();
  const ignored: string[] = [];
  const snapshotIds: string[] = [];

  for (const track of snapshot.likedSongs) {
    trackLabels.set(track.id, labelSnapshotTrack(track));
    if (track.type === "episode") {
      ignored.push(track.id);
      logger.warn(`Episode ${track.id} cannot be saved to Liked Songs. Skipping.`);
      continue;
    }

    snapshotIds.push(track.id);
  }

  const tracks = liveTracks(await client.fetchAllLikedTracks(accessToken));
  for (const track of tracks) {
    if (!trackLabels.has(track.id)) {
      trackLabels.set(track.id, labelLiveTrack(track));
    }
  }

  const changeSet = reconcileFor(
    snapshotIds,
    tracks.map((track) => track.id),
    options.addOnly
  );

  return {
    label: "Liked Songs",
    target: { kind: "liked" },
    changeSet,
    additions: changeSet.toAdd,
    removals: changeSet.toRemove,
    ignored,
    trackLabels
  };
}

export async function executeRestorePlan(
  client: RestoreClient,
  accessToken: string,
  plan: RestorePlan,
  options: { dryRun?: boolean } = {}
): Promise<RestoreOutcome> {
  const dryRun = options.dryRun === true;
  let target: ApplyTarget;
  let createdPlaylist = false;

  if (plan.target.kind === "new-playlist") {
    if (dryRun) {
      logger.info(`Dry run: would create playlist "${plan.target.name}" with ${plan.additions.length} tracks.`);
      return {
        plan,
        playlistId: null,
        createdPlaylist: false,
        dryRun,
        result: { added: 0, removed: 0, skipped: [], failures: [] }
      };
    }

    const created = await client.createPlaylist(plan.target.name, plan.target.description, accessToken);
    logger.info(`Created playlist "${plan.target.name}" (${created.id}).`);
    if (created.externalUrl) {
      logger.info(`Playlist URL: ${created.externalUrl}`);
    }
    target = { kind: "playlist", playlistId: created.id };
    createdPlaylist = true;
  } else if (plan.target.kind === "playlist") {
    target = { kind: "playlist", playlistId: plan.target.playlistId };
  } else {
    target = { kind: "liked" };
  }

  const result = await applyChangeSet(
    client.mutatorFor(accessToken),
    target,
    { toAdd: plan.additions, toRemove: plan.removals },
    { dryRun }
  );

  return {
    plan,
    playlistId: target.kind === "playlist" ? target.playlistId : null,
    createdPlaylist,
    dryRun,
    result
  };
}

/** Adds the source playlist's tracks that the destination lacks. Never removes. */
export async function transferPlaylist(
  client: RestoreClient,
  accessToken: string,
  sourceId: string,
  destinationId: string,
  options: { dryRun?: boolean } = {}
): Promise<TransferOutcome> {
  const source = await client.getPlaylist(sourceId, accessToken);
  if (!source) {
    throw new Error(`Source playlist ${sourceId} was not found`);
  }

  const destination = await client.getPlaylist(destinationId, accessToken);
  if (!destination) {
    throw new Error(`Destination playlist ${destinationId} was not found`);
  }

  const sourceTracks = liveTracks(await client.fetchPlaylistItems(source.id, accessToken));
  const destinationTracks = liveTracks(await client.fetchPlaylistItems(destination.id, accessToken));

  const uris = new Map<string, string>();
  for (const track of sourceTracks) {
    if (!uris.has(track.id)) {
      uris.set(track.id, track.uri);
    }
  }

  const changeSet = reconcile(
    sourceTracks.map((track) => track.id),
    destinationTracks.map((track) => track.id)
  );

  const result = await applyChangeSet(
    client.mutatorFor(accessToken),
    { kind: "playlist", playlistId: destination.id },
    { toAdd: lookupAll(changeSet.toAdd, uris), toRemove: [] },
    options
  );

  return {
    sourceName: source.name,
    destinationName: destination.name,
    sourceCount: uris.size,
    alreadyPresent: changeSet.unchanged.length,
    result
  };
}
