/**
 * CLI: validate an SOP review payload and write the Markdown report.
 * Usage:
 *   npx tsx server/cli.ts --in payload.json --out report.md
 *   npx tsx server/cli.ts --dump-schema sop.artwork-review.schema.json
 *
 * Exit codes: 0 success, 1 unreadable/malformed/invalid payload, 2 usage error.
 */

import "dotenv/config";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "url";
import { loadConfig, type AppConfig } from "./config";
import { log } from "./log";
import { formatValidationErrors } from "./src/sop/errors";
import { processReviewPayload } from "./src/sop/pipeline";
import { sopSchema } from "./src/sop/schemaModel";

export const USAGE = [
  "Usage: sop-review --in <payload.json> [--out <report.md>]",
  "       sop-review --dump-schema <schema.json>",
].join("\n");

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliOptions {
  input?: string;
  output?: string;
  dumpSchema?: string;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Parse command line arguments
 */
export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = { help: false };

  const valueAfter = (flag: string, i: number): string => {
    const value = args[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new UsageError(`${flag} requires a file path`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--in") {
      options.input = valueAfter(arg, i++);
    } else if (arg === "--out") {
      options.output = valueAfter(arg, i++);
    } else if (arg === "--dump-schema") {
      options.dumpSchema = valueAfter(arg, i++);
    } else if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else {
      throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

export async function runCli(args: string[], config: AppConfig = loadConfig()): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(args);
  } catch (e) {
    if (e instanceof UsageError) {
      console.error(`ERROR: ${e.message}`);
      console.error(USAGE);
      return EXIT_USAGE;
    }
    throw e;
  }

  if (options.help) {
    console.log(USAGE);
    return EXIT_OK;
  }

  if (options.dumpSchema) {
    await fs.writeFile(options.dumpSchema, sopSchema.exportText(), "utf-8");
    log(`Wrote schema to ${options.dumpSchema}`, "cli");
    return EXIT_OK;
  }

  if (!options.input) {
    console.error("ERROR: --in payload.json is required (or use --dump-schema).");
    return EXIT_USAGE;
  }

  let text: string;
  try {
    text = await fs.readFile(options.input, "utf-8");
  } catch (e) {
    console.error(`ERROR: Failed to read payload file: ${e instanceof Error ? e.message : String(e)}`);
    return EXIT_FAILURE;
  }

  const outcome = processReviewPayload(text, config.render);
  switch (outcome.status) {
    case "malformed":
      console.error(`ERROR: ${outcome.message}`);
      return EXIT_FAILURE;
    case "invalid":
      console.error(formatValidationErrors(outcome.errors));
      return EXIT_FAILURE;
    case "rendered":
      if (options.output) {
        await fs.writeFile(options.output, outcome.markdown, "utf-8");
        log(`Wrote report to ${options.output}`, "cli");
      } else {
        process.stdout.write(outcome.markdown);
      }
      return EXIT_OK;
  }
}

const isMainModule = process.argv[1] !== undefined &&
  path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isMainModule) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(e => {
      console.error("SOP review failed:", e);
      process.exitCode = EXIT_FAILURE;
    });
}
