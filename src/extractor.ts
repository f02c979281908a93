import { readFile } from "fs/promises";
import { csvPathFor, writeCSV } from "./output";
import { parseClassResultList } from "./parser";
import type { ClassResultList, CsvOptions, ProgressCallback } from "./types";

export interface ExtractOptions extends CsvOptions {
  onProgress?: ProgressCallback;
  onSaved?: (result: ExtractResult) => Promise<void> | void;
}

export interface ExtractResult extends ClassResultList {
  inputPath: string;
  outputPath: string;
  durationMs: number;
}

/**
 * Read an IOF XML result file, extract one class and write it beside the input as CSV
 */
export async function extractResultFile(
  inputPath: string,
  options: ExtractOptions,
): Promise<ExtractResult> {
  const startedAt = Date.now();
  const xml = await readFile(inputPath, "utf-8");
  const { classInfo, competitors } = parseClassResultList(xml, {
    onProgress: options.onProgress,
  });

  const outputPath = csvPathFor(inputPath);
  await writeCSV(outputPath, competitors, options);

  return {
    inputPath,
    outputPath,
    classInfo,
    competitors,
    durationMs: Date.now() - startedAt,
  };
}

/**
 * Convert files strictly in order; the first failure stops the run
 */
export async function extractResultFiles(
  inputPaths: string[],
  options: ExtractOptions,
): Promise<ExtractResult[]> {
  const results: ExtractResult[] = [];

  for (const inputPath of inputPaths) {
    const result = await extractResultFile(inputPath, options);
    await options.onSaved?.(result);
    results.push(result);
  }

  return results;
}
