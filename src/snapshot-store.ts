import { promises as fs } from "node:fs";
import path from "node:path";
import { ZodError } from "zod";
import { SnapshotSchema, type Snapshot } from "./snapshot-schema";

export const SNAPSHOT_FILE_NAME = "snapshot.json";
export const SNAPSHOT_DIR_SUFFIX = ".snapshot";

export class SnapshotFormatError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Malformed snapshot (${source}): ${issues.join("; ")}`);
    this.name = "SnapshotFormatError";
    this.issues = issues;
  }
}

function describeIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `${location}: ${issue.message}`;
  });
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }

  return value;
}

export async function resolveSnapshotFile(inputPath: string): Promise<string> {
  const stat = await fs.stat(inputPath);
  return stat.isDirectory() ? path.join(inputPath, SNAPSHOT_FILE_NAME) : inputPath;
}

export function parseSnapshot(raw: string, source: string): Snapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SnapshotFormatError(source, [`invalid JSON: ${message}`]);
  }

  const result = SnapshotSchema.safeParse(parsed);
  if (!result.success) {
    throw new SnapshotFormatError(source, describeIssues(result.error));
  }

  return deepFreeze(result.data);
}

export async function readSnapshot(inputPath: string): Promise<Snapshot> {
  const filePath = await resolveSnapshotFile(inputPath);
  const raw = await fs.readFile(filePath, "utf8");
  return parseSnapshot(raw, filePath);
}

export async function writeSnapshot(snapshotDir: string, snapshot: Snapshot): Promise<string> {
  const filePath = path.join(snapshotDir, SNAPSHOT_FILE_NAME);
  await fs.mkdir(snapshotDir, { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(snapshot, null, 2)}\n`, "utf8");
  return filePath;
}

export function defaultSnapshotDirName(now: Date): string {
  const stamp = now.toISOString().slice(0, 19).replace(/:/g, "-");
  return `${stamp}${SNAPSHOT_DIR_SUFFIX}`;
}
