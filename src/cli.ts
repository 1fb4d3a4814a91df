// src/cli.ts
//
// lox [options] [script]
//
// No script starts the REPL; one script runs it as a single unit. Exit status follows
// sysexits (see EXIT_CODES in runner/run.ts).

import { loadLoxConfig } from "./language/configuration";
import { createDefaultNodeIO, EXIT_CODES, runFile, type LoxIO } from "./runner/run";
import { runRepl } from "./runner/repl";
import { createLogger, parseLogLevel, type LogLevel, type LogSink } from "./utils/logger";
import { hasSourceExtension, resolveUserPath } from "./utils/paths";

export const USAGE = "Usage: lox [options] [script]";

const HELP = [
  USAGE,
  "",
  "Evaluates one Lox expression per script, or one per line in the REPL.",
  "",
  "Options:",
  "  --tokens               print the token table before the value",
  "  --ast                  print the parenthesised syntax tree before the value",
  "  --log-level <level>    silent | error | warn | info | debug | trace",
  "  --help                 show this help",
].join("\n");

export type CliArgs = {
  script: string | null;
  printTokens: boolean;
  printAst: boolean;
  logLevel: LogLevel | null;
  help: boolean;
};

export type ParsedArgs = { ok: true; args: CliArgs } | { ok: false; message: string };

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const args: CliArgs = { script: null, printTokens: false, printAst: false, logLevel: null, help: false };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];

    if (a === "--tokens") args.printTokens = true;
    else if (a === "--ast") args.printAst = true;
    else if (a === "--help" || a === "-h") args.help = true;
    else if (a === "--log-level") {
      const value = argv[i + 1];
      const level = parseLogLevel(value);
      if (!level) return { ok: false, message: `Invalid log level '${value ?? ""}'.` };
      args.logLevel = level;
      i++;
    } else if (a.startsWith("--")) return { ok: false, message: `Unknown option '${a}'.` };
    else positional.push(a);
  }

  if (positional.length > 1) return { ok: false, message: "Expected at most one script." };
  args.script = positional[0] ?? null;

  return { ok: true, args };
}

export type CliHost = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  io?: LoxIO;
  input?: NodeJS.ReadableStream;
  writePrompt?: (text: string) => void;
  // Log lines (default: stderr)
  logSink?: LogSink;
};

export async function main(argv: readonly string[], host: CliHost = {}): Promise<number> {
  const io = host.io ?? createDefaultNodeIO();
  const cwd = host.cwd ?? process.cwd();
  const env = host.env ?? process.env;

  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    io.error(parsed.message);
    io.error(USAGE);
    return EXIT_CODES.usage;
  }

  const args = parsed.args;
  if (args.help) {
    io.print(HELP);
    return EXIT_CODES.ok;
  }

  const scriptPath = args.script ? resolveUserPath(args.script, { cwd }) : null;
  const config = await loadLoxConfig(scriptPath ?? cwd, { env });

  const log = createLogger({ name: "lox", level: args.logLevel ?? config.logLevel, sink: host.logSink });
  log.debug(`config for ${config.name}`, { projectRoot: config.projectRoot, configPath: config.configPath });

  const printTokens = args.printTokens || config.debug.printTokens;
  const printAst = args.printAst || config.debug.printAst;

  if (scriptPath) {
    if (!hasSourceExtension(scriptPath, config.files.extensions)) {
      log.warn(`'${args.script ?? scriptPath}' does not end in ${config.files.extensions.join(", ")}`);
    }

    const result = await runFile(scriptPath, { io, logger: log, printTokens, printAst });
    return result.exitCode;
  }

  await runRepl({
    io,
    input: host.input,
    writePrompt: host.writePrompt,
    prompt: config.repl.prompt,
    logger: log,
    printTokens,
    printAst,
  });
  return EXIT_CODES.ok;
}
