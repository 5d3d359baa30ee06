import { logger } from "./logger";
import { isNoop } from "./reconciler";
import { SpotifyApiError } from "./spotify-client";

export const PLAYLIST_WRITE_BATCH_SIZE = 100;
export const SAVED_TRACKS_WRITE_BATCH_SIZE = 50;

/**
 * The mutations the applier needs from the live library. Playlist methods
 * take track URIs; saved-track methods take bare track IDs.
 */
export interface LibraryMutator {
  addPlaylistItems(playlistId: string, uris: string[]): Promise<void>;
  removePlaylistItems(playlistId: string, uris: string[]): Promise<void>;
  saveTracks(ids: string[]): Promise<void>;
  removeSavedTracks(ids: string[]): Promise<void>;
}

export type ApplyTarget = { kind: "playlist"; playlistId: string } | { kind: "liked" };

export type ApplyOperation = "add" | "remove";

export interface BatchFailure {
  operation: ApplyOperation;
  items: string[];
  status: number | null;
  message: string;
}

export interface ApplyResult {
  added: number;
  removed: number;
  skipped: string[];
  failures: BatchFailure[];
}

export interface ApplyOptions {
  dryRun?: boolean;
}

export function chunk<T>(items: T[], size: number): T[][] {
  const result: T[][] = [];

  for (let i = 0; i < items.length; i += size) {
    result.push(items.slice(i, i + size));
  }

  return result;
}

function shouldFallbackToSingleWrites(error: unknown): boolean {
  return error instanceof SpotifyApiError && error.status === 400;
}

export function isItemNotFoundError(error: unknown): boolean {
  if (!(error instanceof SpotifyApiError) || error.status !== 400) {
    return false;
  }

  const message = error.message.toLowerCase();

  return (
    message.includes("not available") ||
    message.includes("unavailable") ||
    message.includes("not found") ||
    message.includes("invalid track uri") ||
    message.includes("invalid base62") ||
    message.includes("invalid id")
  );
}

function toFailure(operation: ApplyOperation, items: string[], error: unknown): BatchFailure {
  return {
    operation,
    items,
    status: error instanceof SpotifyApiError ? error.status : null,
    message: error instanceof Error ? error.message : String(error)
  };
}

function describeTarget(target: ApplyTarget): string {
  return target.kind === "playlist" ? `playlist ${target.playlistId}` : "Liked Songs";
}

function writer(
  mutator: LibraryMutator,
  target: ApplyTarget,
  operation: ApplyOperation
): (items: string[]) => Promise<void> {
  if (target.kind === "playlist") {
    return operation === "add"
      ? (items: string[]) => mutator.addPlaylistItems(target.playlistId, items)
      : (items: string[]) => mutator.removePlaylistItems(target.playlistId, items);
  }

  return operation === "add"
    ? (items: string[]) => mutator.saveTracks(items)
    : (items: string[]) => mutator.removeSavedTracks(items);
}

async function addWithFallback(
  write: (items: string[]) => Promise<void>,
  batch: string[],
  result: ApplyResult
): Promise<void> {
  for (const item of batch) {
    try {
      await write([item]);
      result.added += 1;
    } catch (error) {
      if (isItemNotFoundError(error)) {
        result.skipped.push(item);
        logger.warn(`Skipping identifier not found in catalog: ${item}`);
        continue;
      }

      const failure = toFailure("add", [item], error);
      result.failures.push(failure);
      logger.error(`Add failed for ${item}: ${failure.message}`);
    }
  }
}

/**
 * Realizes a change set against the live library, removals first. A failed
 * batch is recorded and the remaining batches still run; nothing is rolled
 * back.
 */
export async function applyChangeSet(
  mutator: LibraryMutator,
  target: ApplyTarget,
  changeSet: { toAdd: string[]; toRemove: string[] },
  options: ApplyOptions = {}
): Promise<ApplyResult> {
  const result: ApplyResult = { added: 0, removed: 0, skipped: [], failures: [] };

  if (isNoop(changeSet)) {
    logger.info(`No changes needed for ${describeTarget(target)}.`);
    return result;
  }

  if (options.dryRun) {
    logger.info(
      `Dry run for ${describeTarget(target)}: would add ${changeSet.toAdd.length} and remove ${changeSet.toRemove.length}.`
    );
    return result;
  }

  const batchSize = target.kind === "playlist" ? PLAYLIST_WRITE_BATCH_SIZE : SAVED_TRACKS_WRITE_BATCH_SIZE;

  const removeBatches = chunk(changeSet.toRemove, batchSize);
  const remove = writer(mutator, target, "remove");
  for (const [index, batch] of removeBatches.entries()) {
    logger.info(`Removing batch ${index + 1}/${removeBatches.length} size=${batch.length} from ${describeTarget(target)}.`);
    try {
      await remove(batch);
      result.removed += batch.length;
    } catch (error) {
      const failure = toFailure("remove", batch, error);
      result.failures.push(failure);
      logger.error(`Remove batch ${index + 1} failed: ${failure.message}`);
    }
  }

  const addBatches = chunk(changeSet.toAdd, batchSize);
  const add = writer(mutator, target, "add");
  for (const [index, batch] of addBatches.entries()) {
    logger.info(`Adding batch ${index + 1}/${addBatches.length} size=${batch.length} to ${describeTarget(target)}.`);
    try {
      await add(batch);
      result.added += batch.length;
      continue;
    } catch (error) {
      if (!shouldFallbackToSingleWrites(error)) {
        const failure = toFailure("add", batch, error);
        result.failures.push(failure);
        logger.error(`Add batch ${index + 1} failed: ${failure.message}`);
        continue;
      }

      logger.warn(`Add batch of ${batch.length} failed with status 400. Falling back to single-item writes.`);
    }

    await addWithFallback(add, batch, result);
  }

  return result;
}
