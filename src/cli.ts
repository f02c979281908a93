#!/usr/bin/env node

import chalk from "chalk";
import { Command } from "commander";
import { loadConfig, selectDialect } from "./config";
import { extractResultFiles } from "./extractor";
import { appendLog, extractLogEntry } from "./log";

const program = new Command()
  .name("iof-results-csv")
  .version("1.0.0")
  .description("Extracts results from IOF 3.0 XML file to CSV")
  .argument("[files...]", "IOF 3.0 XML result files to read")
  .option(
    "--en",
    "Use the comma-separated CSV dialect of Excel for English",
  )
  .addHelpText(
    "after",
    `
By default the CSV dialect matches Excel for most other latin languages
like German, French, Swedish etc. (semicolon-separated).

Output:
  One matching .csv file for each input XML file`,
  )
  .action(async (files: string[], opts: { en?: boolean }) => {
    if (files.length === 0) {
      program.outputHelp();
      process.exit(1);
    }

    try {
      const config = loadConfig();
      const { logDir } = config;

      await extractResultFiles(files, {
        dialect: selectDialect(Boolean(opts.en), config),
        utcOffsetMinutes: config.utcOffsetMinutes,
        onProgress: (msg) => console.log(chalk.gray(msg)),
        onSaved: async (result) => {
          console.log(chalk.green(`Saved ${result.outputPath}`));
          if (!logDir) return;
          const logPath = await appendLog(extractLogEntry(result), logDir);
          console.log(chalk.gray(`  Log: ${logPath}`));
        },
      });
    } catch (error) {
      fail(error);
    }
  });

function fail(error: unknown): never {
  const msg = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`Error: ${msg}`));
  process.exit(1);
}

program.parseAsync().catch(fail);
