import { z } from "zod";

export const UserSchema = z.object({
  id: z.string().min(1),
  displayName: z.string(),
  numFollowers: z.number().int().nonnegative().nullable()
});

export const TrackSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  artists: z.array(z.string()),
  addedAt: z.string().nullable(),
  type: z.enum(["track", "episode"])
});

export const PlaylistSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string().nullable(),
  tracks: z.array(TrackSchema)
});

export const FollowedPlaylistSchema = PlaylistSchema.extend({
  owner: UserSchema
});

export const SnapshotSchema = z.object({
  user: UserSchema,
  likedSongs: z.array(TrackSchema),
  ownedPlaylists: z.array(PlaylistSchema),
  followedPlaylists: z.array(FollowedPlaylistSchema)
});

export type SnapshotUser = z.infer<typeof UserSchema>;
export type SnapshotTrack = z.infer<typeof TrackSchema>;
export type SnapshotPlaylist = z.infer<typeof PlaylistSchema>;
export type FollowedSnapshotPlaylist = z.infer<typeof FollowedPlaylistSchema>;
export type Snapshot = z.infer<typeof SnapshotSchema>;

export function trackUri(track: Pick<SnapshotTrack, "id" | "type">): string {
  return `spotify:${track.type}:${track.id}`;
}
