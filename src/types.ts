export interface SpotifyUser {
  id: string;
  display_name: string | null;
  followers?: { total: number | null } | null;
}

export interface SpotifyArtist {
  id: string | null;
  name: string;
}

export type SpotifyItemType = "track" | "episode";

export interface SpotifyTrack {
  id: string | null;
  uri: string;
  name: string;
  type: SpotifyItemType;
  artists?: SpotifyArtist[];
  show?: { name: string };
  is_local?: boolean;
  is_playable?: boolean | null;
}

export interface SavedTrackItem {
  added_at: string;
  track: SpotifyTrack | null;
}

export interface PlaylistItem {
  added_at: string | null;
  track: SpotifyTrack | null;
}

export interface SpotifyPlaylist {
  id: string;
  name: string;
  description: string | null;
  owner: SpotifyUser;
  snapshot_id?: string;
}

export interface PagingResponse<T> {
  items: T[];
  limit: number;
  offset: number;
  total: number;
  next: string | null;
}

export interface TokenGrant {
  accessToken: string;
  refreshToken: string | null;
}
