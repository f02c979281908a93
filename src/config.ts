import { z } from "zod";
import {
  CEST_OFFSET_MINUTES,
  ENGLISH_DIALECT,
  EUROPEAN_DIALECT,
} from "./output";
import type { CsvDialect } from "./types";

const unsetWhenEmpty = (value: unknown) => (value === "" ? undefined : value);

const envSchema = z.object({
  // Delimiter for the default (non-English Excel) dialect
  IOF_CSV_DELIMITER: z.string().length(1).default(EUROPEAN_DIALECT.delimiter),
  // Start times are shown at this fixed offset from UTC (CEST by default)
  IOF_CSV_UTC_OFFSET_MINUTES: z.preprocess(
    unsetWhenEmpty,
    z.coerce.number().int().min(-720).max(840).default(CEST_OFFSET_MINUTES),
  ),
  IOF_CSV_LOG_DIR: z.preprocess(unsetWhenEmpty, z.string().optional()),
});

export interface Config {
  defaultDelimiter: string;
  utcOffsetMinutes: number;
  logDir?: string;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Config {
  const parsed = envSchema.parse(env);
  return {
    defaultDelimiter: parsed.IOF_CSV_DELIMITER,
    utcOffsetMinutes: parsed.IOF_CSV_UTC_OFFSET_MINUTES,
    logDir: parsed.IOF_CSV_LOG_DIR,
  };
}

/**
 * Pick the CSV dialect for the run: --en selects the English Excel dialect,
 * otherwise the configured European one
 */
export function selectDialect(english: boolean, config: Config): CsvDialect {
  if (english) {
    return ENGLISH_DIALECT;
  }
  return { ...EUROPEAN_DIALECT, delimiter: config.defaultDelimiter };
}
