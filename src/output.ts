// CSV output generation

import { addMinutes } from "date-fns";
import { writeFile } from "fs/promises";
import { extname } from "path";
import type {
  CompetitorResult,
  CsvDialect,
  CsvOptions,
  SplitTime,
} from "./types";

export const HEADERS = [
  "Position",
  "Name",
  "Team",
  "Time",
  "Status",
  "Controls",
  "Split Times",
  "Start Date",
  "Start Time",
];

export const ENGLISH_DIALECT: CsvDialect = {
  delimiter: ",",
  lineTerminator: "\r\n",
};

/** Excel in most non-English latin locales (German, French, Swedish...) */
export const EUROPEAN_DIALECT: CsvDialect = {
  delimiter: ";",
  lineTerminator: "\r\n",
};

/** Central European Summer Time, applied regardless of date */
export const CEST_OFFSET_MINUTES = 120;

/**
 * Convert ordered competitors to CSV string
 */
export function toCSV(
  competitors: readonly CompetitorResult[],
  options: CsvOptions,
): string {
  const rows: string[][] = [HEADERS];

  for (const competitor of competitors) {
    const [startDate, startTime] = competitor.startTime
      ? formatCivilTime(competitor.startTime, options.utcOffsetMinutes)
      : ["", ""];
    rows.push([
      toText(competitor.position),
      competitor.name,
      competitor.team,
      toText(competitor.time),
      competitor.status,
      controlsText(competitor.splitTimes),
      splitTimesText(competitor.splitTimes),
      startDate,
      startTime,
    ]);
  }

  const { delimiter, lineTerminator } = options.dialect;
  return rows
    .map((row) => row.map(quote).join(delimiter) + lineTerminator)
    .join("");
}

/**
 * Write competitors to a CSV file, replacing any existing file
 */
export async function writeCSV(
  path: string,
  competitors: readonly CompetitorResult[],
  options: CsvOptions,
): Promise<void> {
  await writeFile(path, toCSV(competitors, options), "utf-8");
}

/**
 * Output path for an input file: same directory and base name, .csv extension
 */
export function csvPathFor(inputPath: string): string {
  const ext = extname(inputPath);
  const base = ext ? inputPath.slice(0, -ext.length) : inputPath;
  return `${base}.csv`;
}

export function toText(value: number | undefined): string {
  return value === undefined ? "" : String(value);
}

/**
 * Render a timestamp at a fixed UTC offset as [YYYY-MM-DD, HH:MM:SS]
 */
export function formatCivilTime(
  date: Date,
  utcOffsetMinutes: number,
): [string, string] {
  const iso = addMinutes(date, utcOffsetMinutes).toISOString();
  return [iso.slice(0, 10), iso.slice(11, 19)];
}

export function controlsText(splitTimes: readonly SplitTime[]): string {
  return splitTimes.map((split) => toText(split.controlCode)).join(", ");
}

export function splitTimesText(splitTimes: readonly SplitTime[]): string {
  return splitTimes
    .map((split) => `${toText(split.controlCode)}: ${toText(split.time)}`)
    .join(", ");
}

// Helper functions

function quote(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}
