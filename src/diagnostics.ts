import chalk from "chalk";
import type { Diagnostics } from "./stf/types.js";

export interface ConsoleDiagnosticsOptions {
  showComments?: boolean;
  write?: (line: string) => void;
}

/**
 * Diagnostics for the command line. Everything goes to stderr so that
 * stdout carries nothing but the JSON document.
 */
export function createConsoleDiagnostics(options: ConsoleDiagnosticsOptions = {}): Diagnostics {
  const write = options.write ?? ((line: string) => console.error(line));
  const showComments = options.showComments ?? true;

  return {
    comment(text: string): void {
      if (showComments) {
        write(chalk.dim(`Comment: ${text}`));
      }
    },
    warn(message: string): void {
      write(chalk.yellow(`warning: ${message}`));
    },
  };
}

// Keeps everything in memory, for library callers and tests.
export class CollectingDiagnostics implements Diagnostics {
  readonly comments: string[] = [];
  readonly warnings: string[] = [];

  comment(text: string): void {
    this.comments.push(text);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }
}
