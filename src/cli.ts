import { Command, CommanderError, InvalidArgumentError } from "commander";
import { translateFile } from "./translator.js";
import { formatDiagnostics } from "./errors/reporter.js";
import { serialize } from "./value/json.js";
import { runSelfTests } from "./selftest.js";

interface CliOptions {
  input?: string;
  runTests?: boolean;
  emitTokens?: boolean;
  indent: number;
  strictConstants?: boolean;
}

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function parseIndent(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new InvalidArgumentError("Indent must be an integer from 0 to 8.");
  }
  const n = Number(raw);
  if (n > 8) {
    throw new InvalidArgumentError("Indent must be an integer from 0 to 8.");
  }
  return n;
}

async function execute(opts: CliOptions, command: Command, io: CliIO): Promise<number> {
  if (opts.runTests) {
    // A failing fixture throws and aborts the process.
    runSelfTests(undefined, (line) => io.stdout(`${line}\n`));
    return 0;
  }

  if (!opts.input) {
    command.error("error: pass --input <file> or use --run-tests");
  }

  try {
    const result = await translateFile(opts.input, {
      emitTokens: !!opts.emitTokens,
      rejectDuplicateConstants: !!opts.strictConstants,
    });

    if (result.errors.length > 0) {
      io.stderr(`${formatDiagnostics(result.source, result.errors)}\n`);
      return 1;
    }

    if (result.warnings.length > 0) {
      io.stderr(`${formatDiagnostics(result.source, result.warnings)}\n`);
    }

    if (opts.emitTokens && result.tokens) {
      for (const tok of result.tokens) {
        io.stdout(`${tok.kind}\t${JSON.stringify(tok.value)}\t${tok.span.start.line}:${tok.span.start.column}\n`);
      }
      return 0;
    }

    if (result.value) {
      io.stdout(`${serialize(result.value, opts.indent)}\n`);
    }
    return 0;
  } catch (e) {
    io.stderr(`Error: ${e instanceof Error ? e.message : String(e)}\n`);
    return 1;
  }
}

export function createProgram(io: CliIO, onExit: (code: number) => void): Command {
  return new Command()
    .name("atconf")
    .description("Translate @{ } configuration files with binary literals and constants into JSON")
    .version("0.1.0")
    .option("-i, --input <file>", "Input configuration file")
    .option("--run-tests", "Run the built-in self-tests and exit")
    .option("--emit-tokens", "Print the token stream instead of JSON")
    .option("--indent <n>", "JSON indentation width (0 for compact output)", parseIndent, 2)
    .option("--strict-constants", "Reject constants that are defined more than once")
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })
    .action(async (opts: CliOptions, command: Command) => {
      onExit(await execute(opts, command, io));
    });
}

/**
 * Run the CLI on user arguments (without the node and script entries) and
 * return the process exit code. A failing self-test throws instead.
 */
export async function run(args: string[], io: CliIO = processIO): Promise<number> {
  let exitCode = 0;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync(args, { from: "user" });
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode;
    throw e;
  }
  return exitCode;
}
