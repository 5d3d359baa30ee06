import { promises as fs } from "node:fs";
import path from "node:path";

export const ENTRY_FOOTER = "[/]";

export function formatLogEntry(body: string, now: Date): string {
  return `[${now.toISOString()}]\n${body}\n${ENTRY_FOOTER}\n\n`;
}

export async function appendChangeLog(logPath: string, body: string, now: Date = new Date()): Promise<void> {
  await fs.mkdir(path.dirname(logPath), { recursive: true });
  await fs.appendFile(logPath, formatLogEntry(body, now), "utf8");
}
