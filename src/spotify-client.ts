import type { LibraryMutator } from "./applier";
import { logger } from "./logger";
import type {
  PagingResponse,
  PlaylistItem,
  SavedTrackItem,
  SpotifyPlaylist,
  SpotifyUser,
  TokenGrant
} from "./types";

const SPOTIFY_API_BASE = "https://api.spotify.com/v1";
const SPOTIFY_ACCOUNTS_BASE = "https://accounts.spotify.com/api";
const MAX_RETRIES = 4;
const REQUEST_TIMEOUT_MS = 30000;

/** Lookup order for resolveId, most likely first. */
export const RESOURCE_TYPES = [
  "track",
  "playlist",
  "artist",
  "user",
  "album",
  "episode",
  "show",
  "chapter",
  "audiobook"
] as const;

export type ResourceType = (typeof RESOURCE_TYPES)[number];

export interface ResolvedResource {
  type: ResourceType;
  name: string;
  uri: string;
}

const PLAYLIST_FIELDS = "id,name,description,owner(id,display_name),snapshot_id";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function parseRetryAfterMs(headerValue: string | null): number | null {
  if (!headerValue) {
    return null;
  }

  const seconds = Number(headerValue);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return null;
  }

  return seconds * 1000;
}

function backoffMs(attempt: number): number {
  return 500 * 2 ** (attempt - 1);
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function buildErrorMessage(status: number, bodyText: string): string {
  if (!bodyText) {
    return `Spotify API request failed with status ${status}`;
  }

  try {
    const parsed = JSON.parse(bodyText) as {
      error?: { message?: string } | string;
      error_description?: string;
      message?: string;
    };

    if (typeof parsed.error === "string") {
      const detail = parsed.error_description ? `${parsed.error} (${parsed.error_description})` : parsed.error;
      return `Spotify API request failed with status ${status}: ${detail}`;
    }

    const errorMessage = parsed.error?.message || parsed.message;
    if (errorMessage) {
      return `Spotify API request failed with status ${status}: ${errorMessage}`;
    }
  } catch {
    // Not JSON; fall through to the raw body.
  }

  return `Spotify API request failed with status ${status}: ${bodyText}`;
}

export class SpotifyApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "SpotifyApiError";
    this.status = status;
  }
}

interface RequestOptions {
  method?: "GET" | "POST" | "PUT" | "DELETE";
  body?: unknown;
  accessToken?: string;
}

export class SpotifyClient {
  constructor(
    private readonly clientId: string,
    private readonly clientSecret: string,
    private readonly refreshToken: string
  ) {}

  async refreshAccessToken(): Promise<TokenGrant> {
    return requestToken(
      new URLSearchParams({
        grant_type: "refresh_token",
        refresh_token: this.refreshToken,
        client_id: this.clientId,
        client_secret: this.clientSecret
      })
    );
  }

  async getCurrentUser(accessToken: string): Promise<SpotifyUser> {
    return this.request<SpotifyUser>(`${SPOTIFY_API_BASE}/me`, {
      method: "GET",
      accessToken
    });
  }

  async getPlaylist(playlistId: string, accessToken: string): Promise<SpotifyPlaylist | null> {
    logger.debug(`Checking playlist existence for playlistId=${playlistId}.`);

    try {
      return await this.request<SpotifyPlaylist>(
        `${SPOTIFY_API_BASE}/playlists/${encodeURIComponent(playlistId)}?fields=${encodeURIComponent(PLAYLIST_FIELDS)}`,
        {
          method: "GET",
          accessToken
        }
      );
    } catch (error) {
      if (error instanceof SpotifyApiError && error.status === 404) {
        return null;
      }

      throw error;
    }
  }

  async createPlaylist(
    name: string,
    description: string | null,
    accessToken: string
  ): Promise<{ id: string; externalUrl: string | null }> {
    const payload = {
      name,
      public: false,
      description: description ?? ""
    };

    const response = await this.request<{ id: string; external_urls?: { spotify?: string } }>(
      `${SPOTIFY_API_BASE}/me/playlists`,
      {
        method: "POST",
        body: payload,
        accessToken
      }
    );

    return {
      id: response.id,
      externalUrl: response.external_urls?.spotify || null
    };
  }

  async fetchAllLikedTracks(accessToken: string): Promise<SavedTrackItem[]> {
    return this.fetchAllPages<SavedTrackItem>(`${SPOTIFY_API_BASE}/me/tracks`, 50, "liked tracks", accessToken);
  }

  async fetchAllPlaylists(accessToken: string): Promise<SpotifyPlaylist[]> {
    return this.fetchAllPages<SpotifyPlaylist>(`${SPOTIFY_API_BASE}/me/playlists`, 50, "playlists", accessToken);
  }

  async fetchPlaylistItems(playlistId: string, accessToken: string): Promise<PlaylistItem[]> {
    return this.fetchAllPages<PlaylistItem>(
      `${SPOTIFY_API_BASE}/playlists/${encodeURIComponent(playlistId)}/items`,
      100,
      `playlist ${playlistId} items`,
      accessToken
    );
  }

  async addPlaylistItems(playlistId: string, uris: string[], accessToken: string): Promise<void> {
    await this.request<void>(`${SPOTIFY_API_BASE}/playlists/${encodeURIComponent(playlistId)}/items`, {
      method: "POST",
      body: { uris },
      accessToken
    });
  }

  /** Removes every occurrence of each URI from the playlist. */
  async removePlaylistItems(playlistId: string, uris: string[], accessToken: string): Promise<void> {
    await this.request<void>(`${SPOTIFY_API_BASE}/playlists/${encodeURIComponent(playlistId)}/items`, {
      method: "DELETE",
      body: { tracks: uris.map((uri) => ({ uri })) },
      accessToken
    });
  }

  async saveTracks(ids: string[], accessToken: string): Promise<void> {
    await this.request<void>(`${SPOTIFY_API_BASE}/me/tracks`, {
      method: "PUT",
      body: { ids },
      accessToken
    });
  }

  async removeSavedTracks(ids: string[], accessToken: string): Promise<void> {
    await this.request<void>(`${SPOTIFY_API_BASE}/me/tracks`, {
      method: "DELETE",
      body: { ids },
      accessToken
    });
  }

  /**
   * Finds what a bare ID refers to by trying each resource type in turn.
   * A 400 or 404 means "not this type"; null when nothing matches.
   */
  async resolveId(id: string, accessToken: string): Promise<ResolvedResource | null> {
    for (const type of RESOURCE_TYPES) {
      try {
        const resource = await this.request<{ name?: string; display_name?: string | null; uri?: string }>(
          `${SPOTIFY_API_BASE}/${type}s/${encodeURIComponent(id)}`,
          { method: "GET", accessToken }
        );

        return {
          type,
          name: resource.name ?? resource.display_name ?? id,
          uri: resource.uri ?? `spotify:${type}:${id}`
        };
      } catch (error) {
        if (error instanceof SpotifyApiError && (error.status === 400 || error.status === 404)) {
          logger.debug(`No ${type} with id ${id}.`);
          continue;
        }

        throw error;
      }
    }

    return null;
  }

  mutatorFor(accessToken: string): LibraryMutator {
    return {
      addPlaylistItems: (playlistId, uris) => this.addPlaylistItems(playlistId, uris, accessToken),
      removePlaylistItems: (playlistId, uris) => this.removePlaylistItems(playlistId, uris, accessToken),
      saveTracks: (ids) => this.saveTracks(ids, accessToken),
      removeSavedTracks: (ids) => this.removeSavedTracks(ids, accessToken)
    };
  }

  private async fetchAllPages<T>(baseUrl: string, limit: number, label: string, accessToken: string): Promise<T[]> {
    const results: T[] = [];
    let offset = 0;
    let total = Number.POSITIVE_INFINITY;

    while (results.length < total) {
      const page = await this.request<PagingResponse<T>>(`${baseUrl}?limit=${limit}&offset=${offset}`, {
        method: "GET",
        accessToken
      });

      total = page.total;
      logger.debug(`Fetched ${label} page offset=${page.offset} items=${page.items.length} collected=${results.length}/${total}`);

      if (page.items.length === 0) {
        break;
      }

      results.push(...page.items);
      offset += page.items.length;
    }

    logger.info(`Completed ${label} fetch. collected=${results.length} total=${total}`);

    return results;
  }

  private async request<T>(url: string, options: RequestOptions): Promise<T> {
    const headers: Record<string, string> = {
      Accept: "application/json"
    };

    if (options.accessToken) {
      headers.Authorization = `Bearer ${options.accessToken}`;
    }

    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    const bodyText = await fetchWithRetry(url, {
      method: options.method || "GET",
      headers,
      body: options.body !== undefined ? JSON.stringify(options.body) : undefined
    });

    if (!bodyText) {
      return undefined as T;
    }

    return JSON.parse(bodyText) as T;
  }
}

/**
 * Sends a request with a timeout per attempt. Timeouts, 429 and 5xx are
 * retried with backoff (or Retry-After); any other non-2xx response throws
 * SpotifyApiError. Resolves with the response body text.
 */
async function fetchWithRetry(url: string, init: Omit<RequestInit, "signal">): Promise<string> {
  let attempt = 0;

  while (true) {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

    logger.debug(`Spotify request attempt ${attempt + 1}: ${init.method || "GET"} ${url}`);

    let response: Response;
    try {
      response = await fetch(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (isAbortError(error) && attempt < MAX_RETRIES) {
        attempt += 1;
        logger.warn(`Spotify request timed out after ${REQUEST_TIMEOUT_MS}ms. Retrying attempt ${attempt}.`);
        await sleep(backoffMs(attempt));
        continue;
      }

      throw error;
    } finally {
      clearTimeout(timeoutId);
    }

    const bodyText = await response.text();

    if (response.ok) {
      return bodyText;
    }

    const shouldRetry = response.status === 429 || response.status >= 500;
    if (shouldRetry && attempt < MAX_RETRIES) {
      attempt += 1;
      const retryAfterMs = parseRetryAfterMs(response.headers.get("retry-after"));
      logger.warn(`Spotify responded ${response.status}. Retrying attempt ${attempt}.`);
      await sleep(retryAfterMs ?? backoffMs(attempt));
      continue;
    }

    throw new SpotifyApiError(response.status, buildErrorMessage(response.status, bodyText));
  }
}

/**
 * Posts a grant to the accounts service token endpoint. Used both for the
 * refresh-token grant and for the authorization-code exchange at login.
 */
export async function requestToken(params: URLSearchParams): Promise<TokenGrant> {
  const bodyText = await fetchWithRetry(`${SPOTIFY_ACCOUNTS_BASE}/token`, {
    method: "POST",
    headers: {
      "Content-Type": "application/x-www-form-urlencoded"
    },
    body: params
  });

  const parsed = JSON.parse(bodyText) as { access_token?: string; refresh_token?: string };
  if (!parsed.access_token) {
    throw new Error("Spotify token response did not include access_token");
  }

  return {
    accessToken: parsed.access_token,
    refreshToken: parsed.refresh_token ?? null
  };
}
