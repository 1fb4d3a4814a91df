// src/runner/repl.ts
//
// Lox REPL
// --------
// Reads one line at a time, runs it as an independent unit and prints the value.
// The run context is shared across lines; beginUnit() clears the syntax flag after each
// line so one bad line never blocks the next.

import * as readline from "readline/promises";

import { Reporter, silentSink } from "../diagnostics/reporter";
import { createLogger, type Logger } from "../utils/logger";
import { createDefaultNodeIO, EXIT_CODES, runSource, type LoxIO, type RunResult } from "./run";

export type ReplOptions = {
  input?: NodeJS.ReadableStream;

  io?: LoxIO;

  // Writes the prompt without a newline (default: process.stdout)
  writePrompt?: (text: string) => void;
  prompt?: string;

  printTokens?: boolean;
  printAst?: boolean;

  logger?: Logger;
};

export type ReplSummary = {
  // Non-blank lines run
  units: number;
  syntaxErrors: number;
  runtimeErrors: number;
};

export async function runRepl(options: ReplOptions = {}): Promise<ReplSummary> {
  const io = options.io ?? createDefaultNodeIO();
  const writePrompt = options.writePrompt ?? ((text: string) => void process.stdout.write(text));
  const prompt = options.prompt ?? "> ";
  const log = options.logger ?? createLogger({ name: "lox:repl" });

  // runSource routes each line's diagnostics through io
  const reporter = new Reporter(silentSink);
  const summary: ReplSummary = { units: 0, syntaxErrors: 0, runtimeErrors: 0 };

  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    crlfDelay: Infinity,
    terminal: false,
  });

  try {
    writePrompt(prompt);

    for await (const raw of rl) {
      const line = raw.trim();

      if (line) {
        const result = runSource(line, {
          io,
          reporter,
          logger: log,
          filename: `<repl:${summary.units + 1}>`,
          printTokens: options.printTokens,
          printAst: options.printAst,
        });
        tally(summary, result);
        reporter.beginUnit();
      }

      writePrompt(prompt);
    }
  } finally {
    rl.close();
  }

  log.debug("repl closed", summary);
  return summary;
}

function tally(summary: ReplSummary, result: RunResult): void {
  summary.units++;
  if (result.exitCode === EXIT_CODES.syntax) summary.syntaxErrors++;
  else if (result.exitCode === EXIT_CODES.runtime) summary.runtimeErrors++;
}
