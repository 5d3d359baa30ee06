import { describe, expect, it } from "vitest";
import { applyChangeSet, chunk, isItemNotFoundError, type LibraryMutator } from "../src/applier";
import { SpotifyApiError } from "../src/spotify-client";

interface Call {
  method: keyof LibraryMutator;
  target: string | null;
  items: string[];
}

class RecordingMutator implements LibraryMutator {
  readonly calls: Call[] = [];

  constructor(private readonly fail: (call: Call) => Error | null = () => null) {}

  private async record(call: Call): Promise<void> {
    this.calls.push(call);
    const error = this.fail(call);
    if (error) {
      throw error;
    }
  }

  addPlaylistItems(playlistId: string, uris: string[]): Promise<void> {
    return this.record({ method: "addPlaylistItems", target: playlistId, items: uris });
  }

  removePlaylistItems(playlistId: string, uris: string[]): Promise<void> {
    return this.record({ method: "removePlaylistItems", target: playlistId, items: uris });
  }

  saveTracks(ids: string[]): Promise<void> {
    return this.record({ method: "saveTracks", target: null, items: ids });
  }

  removeSavedTracks(ids: string[]): Promise<void> {
    return this.record({ method: "removeSavedTracks", target: null, items: ids });
  }
}

function uris(count: number, prefix = "spotify:track:t"): string[] {
  return Array.from({ length: count }, (_, index) => `${prefix}${index}`);
}

describe("chunk", () => {
  it("splits into fixed-size batches with a short tail", () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 3)).toEqual([]);
  });
});

describe("applyChangeSet", () => {
  const playlist = { kind: "playlist", playlistId: "pl1" } as const;

  it("issues no calls for an empty change set", async () => {
    const mutator = new RecordingMutator();

    const result = await applyChangeSet(mutator, playlist, { toAdd: [], toRemove: [] });

    expect(mutator.calls).toEqual([]);
    expect(result).toEqual({ added: 0, removed: 0, skipped: [], failures: [] });
  });

  it("issues no calls on a dry run", async () => {
    const mutator = new RecordingMutator();

    const result = await applyChangeSet(mutator, playlist, { toAdd: ["a"], toRemove: ["b"] }, { dryRun: true });

    expect(mutator.calls).toEqual([]);
    expect(result.added).toBe(0);
  });

  it("removes before adding and batches playlist writes by 100", async () => {
    const mutator = new RecordingMutator();
    const toAdd = uris(150);

    const result = await applyChangeSet(mutator, playlist, { toAdd, toRemove: ["spotify:track:old"] });

    expect(mutator.calls.map((call) => [call.method, call.items.length])).toEqual([
      ["removePlaylistItems", 1],
      ["addPlaylistItems", 100],
      ["addPlaylistItems", 50]
    ]);
    expect(mutator.calls[0]?.target).toBe("pl1");
    expect(result).toEqual({ added: 150, removed: 1, skipped: [], failures: [] });
  });

  it("batches Liked Songs writes by 50", async () => {
    const mutator = new RecordingMutator();

    await applyChangeSet(mutator, { kind: "liked" }, { toAdd: uris(120, "id"), toRemove: uris(51, "gone") });

    expect(mutator.calls.map((call) => [call.method, call.items.length])).toEqual([
      ["removeSavedTracks", 50],
      ["removeSavedTracks", 1],
      ["saveTracks", 50],
      ["saveTracks", 50],
      ["saveTracks", 20]
    ]);
  });

  it("falls back to single writes and skips identifiers the catalog rejects", async () => {
    const mutator = new RecordingMutator((call) => {
      if (call.method !== "addPlaylistItems") {
        return null;
      }
      if (call.items.length > 1) {
        return new SpotifyApiError(400, "Spotify API request failed with status 400: Payload contains a non-existing ID");
      }
      return call.items[0] === "spotify:track:gone"
        ? new SpotifyApiError(400, "Spotify API request failed with status 400: Invalid base62 id")
        : null;
    });

    const result = await applyChangeSet(mutator, playlist, {
      toAdd: ["spotify:track:a", "spotify:track:gone", "spotify:track:b"],
      toRemove: []
    });

    expect(result.added).toBe(2);
    expect(result.skipped).toEqual(["spotify:track:gone"]);
    expect(result.failures).toEqual([]);
    expect(mutator.calls).toHaveLength(4);
  });

  it("records a failed batch and continues with the next one", async () => {
    const mutator = new RecordingMutator((call) =>
      call.method === "removePlaylistItems" ? new SpotifyApiError(403, "Spotify API request failed with status 403: Forbidden") : null
    );

    const result = await applyChangeSet(mutator, playlist, { toAdd: ["spotify:track:a"], toRemove: ["spotify:track:b"] });

    expect(result.removed).toBe(0);
    expect(result.added).toBe(1);
    expect(result.failures).toEqual([
      {
        operation: "remove",
        items: ["spotify:track:b"],
        status: 403,
        message: "Spotify API request failed with status 403: Forbidden"
      }
    ]);
  });

  it("reports errors without a status as failures", async () => {
    const mutator = new RecordingMutator(() => new Error("socket hang up"));

    const result = await applyChangeSet(mutator, { kind: "liked" }, { toAdd: ["a"], toRemove: [] });

    expect(result.failures).toEqual([{ operation: "add", items: ["a"], status: null, message: "socket hang up" }]);
  });
});

describe("isItemNotFoundError", () => {
  it("matches 400 responses about missing or invalid ids only", () => {
    expect(isItemNotFoundError(new SpotifyApiError(400, "Track not found"))).toBe(true);
    expect(isItemNotFoundError(new SpotifyApiError(400, "Invalid track uri: spotify:track:x"))).toBe(true);
    expect(isItemNotFoundError(new SpotifyApiError(404, "Track not found"))).toBe(false);
    expect(isItemNotFoundError(new SpotifyApiError(400, "Too many ids requested"))).toBe(false);
    expect(isItemNotFoundError(new Error("not found"))).toBe(false);
  });
});
