// Operation log: one JSON line per converted file

import { appendFile, mkdir } from "fs/promises";
import { join, resolve } from "path";
import type { ExtractResult } from "./extractor";

export const LOG_FILE_NAME = "iof-results-csv.jsonl";

export type LogEntry = {
  timestamp: string;
  operation: string;
  durationMs: number;
  details?: Record<string, unknown>;
};

export async function appendLog(entry: LogEntry, dir: string): Promise<string> {
  const resolvedDir = resolve(dir);
  await mkdir(resolvedDir, { recursive: true });
  const logPath = join(resolvedDir, LOG_FILE_NAME);
  await appendFile(logPath, `${JSON.stringify(entry)}\n`, "utf-8");
  return logPath;
}

export function extractLogEntry(
  result: ExtractResult,
  timestamp: Date = new Date(),
): LogEntry {
  return {
    timestamp: timestamp.toISOString(),
    operation: "extract",
    durationMs: result.durationMs,
    details: {
      input: result.inputPath,
      output: result.outputPath,
      classId: result.classInfo.id,
      className: result.classInfo.name,
      competitors: result.competitors.length,
    },
  };
}
