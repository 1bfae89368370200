#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { readFileSync, writeFileSync } from "fs";
import { expandPath, loadConfig, mergeConfig, InputEncodingSchema } from "./config/index.js";
import type { InputEncoding } from "./config/index.js";
import { runConversion } from "./convert.js";
import { isValidDateFormat } from "./stf/date-table.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read version from package.json
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, "..", "package.json"), "utf-8")
);

interface CliOptions {
  output?: string;
  config?: string;
  dateFormat?: number;
  encoding?: InputEncoding;
  quiet?: boolean;
  verbose?: boolean;
}

function parseDateFormatOption(value: string): number {
  const index = Number(value);
  if (!isValidDateFormat(index)) {
    throw new InvalidArgumentError("Date format must be an integer from 1 to 12.");
  }
  return index;
}

function parseEncodingOption(value: string): InputEncoding {
  const result = InputEncodingSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError("Encoding must be latin1 or utf8.");
  }
  return result.data;
}

async function readInput(input?: string): Promise<Buffer> {
  if (input) {
    return readFileSync(expandPath(input));
  }

  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

const program = new Command();

program
  .name("agenda-stf")
  .description("Convert a Lotus Agenda STF export into JSON")
  .version(packageJson.version)
  .argument("[input]", "STF file to convert (reads stdin when omitted)")
  .option("-o, --output <file>", "Write JSON to a file instead of stdout")
  .option("-c, --config <file>", "Settings file (default: ~/.agenda-stf.json)")
  .option("-d, --date-format <n>", "Initial date format, 1-12", parseDateFormatOption)
  .option("-e, --encoding <encoding>", "Input encoding: latin1 or utf8", parseEncodingOption)
  .option("-q, --quiet", "Do not echo comment text to stderr")
  .option("-v, --verbose", "Print a summary to stderr")
  .action(async (inputPath: string | undefined, options: CliOptions) => {
    try {
      const config = mergeConfig(loadConfig(options.config), {
        dateFormat: options.dateFormat,
        encoding: options.encoding,
        showComments: options.quiet ? false : undefined,
      });

      const input = await readInput(inputPath);
      const output = {
        write: (json: string) => {
          if (options.output) {
            writeFileSync(expandPath(options.output), json);
          } else {
            process.stdout.write(json);
          }
        },
        log: (line: string) => console.error(line),
      };

      const exitCode = runConversion(input, config, output, options.verbose);
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    } catch (error) {
      console.error(chalk.red(`error: ${error instanceof Error ? error.message : String(error)}`));
      process.exit(1);
    }
  });

await program.parseAsync();
