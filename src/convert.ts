import chalk from "chalk";
import { DocumentBuilder } from "./stf/builder.js";
import { ChunkLexer } from "./stf/lexer.js";
import type { Diagnostics, StfDocument } from "./stf/types.js";
import { formatDocument, summarizeDocument } from "./stf/output.js";
import { createConsoleDiagnostics } from "./diagnostics.js";
import type { ConverterConfig, InputEncoding } from "./config/schema.js";

export interface ConvertOptions {
  dateFormat?: number;
  diagnostics?: Diagnostics;
}

/** Agenda writes 8-bit text; latin1 keeps every byte as one character. */
export function decodeInput(input: Buffer, encoding: InputEncoding = "latin1"): string {
  return input.toString(encoding);
}

export function convertStf(source: string, options: ConvertOptions = {}): StfDocument {
  const lexer = new ChunkLexer(source, options.diagnostics);
  const builder = new DocumentBuilder(lexer, options);
  return builder.build();
}

export interface ConversionOutput {
  write(json: string): void;
  log(line: string): void;
}

/**
 * Convert one export end to end: JSON goes to `output.write` only when the
 * whole input converted, everything else to `output.log`. Returns the exit
 * code.
 */
export function runConversion(
  input: Buffer,
  config: ConverterConfig,
  output: ConversionOutput,
  verbose = false
): number {
  let json: string;
  let document: StfDocument;
  try {
    document = convertStf(decodeInput(input, config.encoding), {
      dateFormat: config.dateFormat,
      diagnostics: createConsoleDiagnostics({ showComments: config.showComments, write: output.log }),
    });
    json = formatDocument(document, config.indent);
  } catch (error) {
    output.log(chalk.red(`error: ${error instanceof Error ? error.message : String(error)}`));
    return 1;
  }

  output.write(json);
  if (verbose) {
    const summary = summarizeDocument(document);
    output.log(
      chalk.green(
        `Converted ${summary.blocks} block(s): ${summary.categories} categories, ` +
          `${summary.items} items, ${summary.links} category links`
      )
    );
  }
  return 0;
}
