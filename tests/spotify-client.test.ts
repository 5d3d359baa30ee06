import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildErrorMessage, SpotifyApiError, SpotifyClient } from "../src/spotify-client";

interface RecordedRequest {
  url: string;
  method: string;
  body: string | null;
}

interface FakeResponse {
  status: number;
  body?: unknown;
  headers?: Record<string, string>;
}

/** "hang" never answers; the request only ends when its signal aborts. */
function installFetch(responses: Array<FakeResponse | "hang">): RecordedRequest[] {
  const requests: RecordedRequest[] = [];
  let callCount = 0;

  globalThis.fetch = (async (input: string | URL | Request, init?: RequestInit) => {
    const next = responses[callCount++];
    if (!next) {
      throw new Error(`Unexpected request #${callCount}`);
    }

    requests.push({
      url: String(input),
      method: init?.method ?? "GET",
      body: typeof init?.body === "string" ? init.body : init?.body instanceof URLSearchParams ? init.body.toString() : null
    });

    if (next === "hang") {
      return new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          const error = new Error("This operation was aborted");
          error.name = "AbortError";
          reject(error);
        });
      });
    }

    const text = next.body === undefined ? "" : typeof next.body === "string" ? next.body : JSON.stringify(next.body);
    return {
      ok: next.status >= 200 && next.status < 300,
      status: next.status,
      headers: new Headers(next.headers),
      text: async () => text
    } as Response;
  }) as typeof fetch;

  return requests;
}

describe("SpotifyClient", () => {
  const originalFetch = globalThis.fetch;
  let client: SpotifyClient;

  beforeEach(() => {
    client = new SpotifyClient("test-client", "test-secret", "test-refresh");
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.useRealTimers();
  });

  it("collects all liked track pages", async () => {
    const requests = installFetch([
      {
        status: 200,
        body: {
          items: [{ added_at: "2026-01-02T00:00:00.000Z", track: { id: "1", uri: "spotify:track:1", name: "One", type: "track" } }],
          limit: 1,
          offset: 0,
          total: 2,
          next: "next"
        }
      },
      {
        status: 200,
        body: {
          items: [{ added_at: "2026-01-01T00:00:00.000Z", track: { id: "2", uri: "spotify:track:2", name: "Two", type: "track" } }],
          limit: 1,
          offset: 1,
          total: 2,
          next: null
        }
      }
    ]);

    const result = await client.fetchAllLikedTracks("token");

    expect(result.map((item) => item.track?.id)).toEqual(["1", "2"]);
    expect(requests.map((request) => request.url)).toEqual([
      "https://api.spotify.com/v1/me/tracks?limit=50&offset=0",
      "https://api.spotify.com/v1/me/tracks?limit=50&offset=1"
    ]);
  });

  it("stops paging when a page comes back empty", async () => {
    installFetch([{ status: 200, body: { items: [], limit: 100, offset: 0, total: 5, next: null } }]);

    expect(await client.fetchPlaylistItems("pl1", "token")).toEqual([]);
  });

  it("returns the access token and any rotated refresh token", async () => {
    const requests = installFetch([{ status: 200, body: { access_token: "access-1", refresh_token: "refresh-2" } }]);

    const grant = await client.refreshAccessToken();

    expect(grant).toEqual({ accessToken: "access-1", refreshToken: "refresh-2" });
    expect(requests[0]?.url).toBe("https://accounts.spotify.com/api/token");
    expect(requests[0]?.body).toBe(
      "grant_type=refresh_token&refresh_token=test-refresh&client_id=test-client&client_secret=test-secret"
    );
  });

  it("reports a missing rotated refresh token as null", async () => {
    installFetch([{ status: 200, body: { access_token: "access-1" } }]);

    expect(await client.refreshAccessToken()).toEqual({ accessToken: "access-1", refreshToken: null });
  });

  it("returns null for a playlist that no longer exists", async () => {
    installFetch([{ status: 404, body: { error: { status: 404, message: "Resource not found" } } }]);

    expect(await client.getPlaylist("missing", "token")).toBeNull();
  });

  it("sends removals as track objects in a DELETE body", async () => {
    const requests = installFetch([{ status: 200, body: { snapshot_id: "s2" } }]);

    await client.removePlaylistItems("pl1", ["spotify:track:a", "spotify:episode:b"], "token");

    expect(requests[0]).toEqual({
      url: "https://api.spotify.com/v1/playlists/pl1/items",
      method: "DELETE",
      body: JSON.stringify({ tracks: [{ uri: "spotify:track:a" }, { uri: "spotify:episode:b" }] })
    });
  });

  it("binds a library mutator to an access token", async () => {
    const requests = installFetch([{ status: 200 }, { status: 200 }]);
    const mutator = client.mutatorFor("token");

    await mutator.saveTracks(["a", "b"]);
    await mutator.removeSavedTracks(["c"]);

    expect(requests.map((request) => [request.method, request.url, request.body])).toEqual([
      ["PUT", "https://api.spotify.com/v1/me/tracks", JSON.stringify({ ids: ["a", "b"] })],
      ["DELETE", "https://api.spotify.com/v1/me/tracks", JSON.stringify({ ids: ["c"] })]
    ]);
  });

  it("retries a rate-limited request after Retry-After", async () => {
    vi.useFakeTimers();
    const requests = installFetch([
      { status: 429, headers: { "retry-after": "1" } },
      { status: 200, body: { id: "user-1", display_name: "Test" } }
    ]);

    const pending = client.getCurrentUser("token");
    await vi.advanceTimersByTimeAsync(999);
    expect(requests).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(1);
    const user = await pending;

    expect(user.id).toBe("user-1");
    expect(requests).toHaveLength(2);
  });

  it("backs off and retries server errors", async () => {
    vi.useFakeTimers();
    const requests = installFetch([{ status: 503 }, { status: 200, body: { id: "user-1", display_name: "Test" } }]);

    const pending = client.getCurrentUser("token");
    await vi.advanceTimersByTimeAsync(500);
    const user = await pending;

    expect(user.id).toBe("user-1");
    expect(requests).toHaveLength(2);
  });

  it("gives up on server errors after the last retry", async () => {
    vi.useFakeTimers();
    const requests = installFetch([{ status: 500 }, { status: 500 }, { status: 500 }, { status: 500 }, { status: 500 }]);

    const pending = client.getCurrentUser("token").catch((caught: unknown) => caught);
    await vi.advanceTimersByTimeAsync(500 + 1000 + 2000 + 4000);
    const error = await pending;

    expect(requests).toHaveLength(5);
    expect(error instanceof SpotifyApiError ? error.status : null).toBe(500);
  });

  it("retries a request that timed out", async () => {
    vi.useFakeTimers();
    const requests = installFetch(["hang", { status: 200, body: { id: "user-1", display_name: "Test" } }]);

    const pending = client.getCurrentUser("token");
    await vi.advanceTimersByTimeAsync(30000);
    expect(requests).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(500);
    const user = await pending;

    expect(user.id).toBe("user-1");
    expect(requests).toHaveLength(2);
  });

  it("resolves a bare ID by trying each resource type", async () => {
    const requests = installFetch([
      { status: 404, body: { error: { status: 404, message: "Resource not found" } } },
      { status: 400, body: { error: { status: 400, message: "Invalid playlist Id" } } },
      { status: 200, body: { name: "Band", uri: "spotify:artist:abc" } }
    ]);

    expect(await client.resolveId("abc", "token")).toEqual({ type: "artist", name: "Band", uri: "spotify:artist:abc" });
    expect(requests.map((request) => request.url)).toEqual([
      "https://api.spotify.com/v1/tracks/abc",
      "https://api.spotify.com/v1/playlists/abc",
      "https://api.spotify.com/v1/artists/abc"
    ]);
  });

  it("names a user by display name", async () => {
    installFetch([{ status: 404 }, { status: 404 }, { status: 404 }, { status: 200, body: { display_name: "Test User" } }]);

    expect(await client.resolveId("user-1", "token")).toEqual({
      type: "user",
      name: "Test User",
      uri: "spotify:user:user-1"
    });
  });

  it("returns null when no resource type matches", async () => {
    const requests = installFetch(Array.from({ length: 9 }, () => ({ status: 404 })));

    expect(await client.resolveId("nothing", "token")).toBeNull();
    expect(requests).toHaveLength(9);
  });

  it("does not swallow authorization errors while resolving an ID", async () => {
    installFetch([{ status: 401, body: { error: { status: 401, message: "Invalid access token" } } }]);

    await expect(client.resolveId("abc", "token")).rejects.toThrow(
      "Spotify API request failed with status 401: Invalid access token"
    );
  });

  it("throws SpotifyApiError with the API message for client errors", async () => {
    installFetch([{ status: 400, body: { error: { status: 400, message: "Invalid base62 id" } } }]);

    const error = await client.addPlaylistItems("pl1", ["spotify:track:x"], "token").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SpotifyApiError);
    expect(error instanceof SpotifyApiError ? [error.status, error.message] : []).toEqual([
      400,
      "Spotify API request failed with status 400: Invalid base62 id"
    ]);
  });
});

describe("buildErrorMessage", () => {
  it("formats OAuth errors with their description", () => {
    expect(buildErrorMessage(400, JSON.stringify({ error: "invalid_grant", error_description: "Refresh token revoked" }))).toBe(
      "Spotify API request failed with status 400: invalid_grant (Refresh token revoked)"
    );
  });

  it("falls back to the raw body and to the bare status", () => {
    expect(buildErrorMessage(502, "Bad Gateway")).toBe("Spotify API request failed with status 502: Bad Gateway");
    expect(buildErrorMessage(500, "")).toBe("Spotify API request failed with status 500");
  });
});
