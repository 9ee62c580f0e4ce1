#!/usr/bin/env node
/**
 * Conversion CLI
 *
 * Usage:
 *   npm run convert -- convert <book_dir> <output.pdf> [options]
 */

import { loadBookConfig, loadConfig } from "../config";
import { loadBookPackage } from "../books";
import { BookPressError } from "../pipeline/errors";
import {
  createConsoleProgress,
  jobResult,
  observeConversionJob,
} from "../pipeline/runner";
import { createDefaultTools } from "../pipeline/tools";
import { parseConvertArgs } from "./args";

const USAGE = `Usage: book-press convert <book_dir> <output.pdf> [options]

Options:
  --mode <mode>          single | booklet | newspaper (default from config)
  --size <name|WxH>      Named page size, or a custom size in points
  --gutter <pt>          Binding gutter offset (booklet mode)
  --reversed             Rotate the finished document 180 degrees
  --columns <n>          Pages per sheet in newspaper mode
  --column-width <pt>    Column page width in newspaper mode
  --contents-depth <n>   Heading depth listed in the table of contents
  --config <path>        Alternative defaults file`;

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    console.log(USAGE);
    process.exit(0);
  }
  if (command !== "convert") {
    console.error(`Unknown command: ${command}\n\n${USAGE}`);
    process.exit(1);
  }

  const { bookDir, request, configPath } = parseConvertArgs(args.slice(1));
  const config = loadBookConfig(bookDir, loadConfig(configPath));
  const book = loadBookPackage(bookDir, config);

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  const result = await jobResult(
    observeConversionJob(book, request, {
      config,
      tools: createDefaultTools(config),
      progress: createConsoleProgress(),
      signal: controller.signal,
    })
  );

  if (result.status === "DONE") return;

  // Stage and message were already printed as progress
  if (result.failure?.diagnostic) console.error(result.failure.diagnostic);
  if (result.toolLog) console.error(`Tool log: ${result.toolLog}`);
  process.exit(1);
}

main().catch((err) => {
  if (err instanceof BookPressError) {
    console.error(err.message);
  } else {
    console.error("\nConversion failed:", err instanceof Error ? err.message : String(err));
  }
  process.exit(1);
});
