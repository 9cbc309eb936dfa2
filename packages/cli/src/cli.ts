/**
 * @payledger/cli — Command dispatch.
 *
 *   payledger convert <balance_history.csv> --config <config.json> [--output <out.csv>]
 *                     [--start <YYYY-MM-DD>] [--end <YYYY-MM-DD>]
 *   payledger check   <balance_history.csv> --config <config.json>
 *
 * Exit codes: 0 clean, 2 completed with warnings, 1 aborted or unusable
 * input. An aborted run writes no output. The date window limits what
 * `convert` writes; every row still runs through the engine so running
 * totals stay correct.
 */

import { readFile, writeFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import type { Logger } from "pino";
import { z } from "zod";
import { AccrualEngine, AccrualError } from "@payledger/accrual";
import type { EngineConfig, RunReport } from "@payledger/accrual";
import { formatGnuCashCsv, withinWindow } from "@payledger/gnucash";
import type { ExportWindow } from "@payledger/gnucash";
import { StripeImportError, parseBalanceHistory } from "@payledger/stripe";
import { ConfigurationError, loadEngineConfig, loadEnv } from "./config.js";
import { createLogger } from "./logger.js";
import { EXIT_CODES, renderSummary } from "./summary.js";

export const USAGE = [
  "Usage:",
  "  payledger convert <balance_history.csv> --config <config.json> [--output <out.csv>]",
  "                    [--start <YYYY-MM-DD>] [--end <YYYY-MM-DD>]",
  "  payledger check <balance_history.csv> --config <config.json>",
  "",
  "Options:",
  "  -c, --config   engine configuration (JSON)",
  "  -o, --output   GnuCash CSV destination (default: stdout)",
  "      --start    first posting date to write (inclusive)",
  "      --end      last posting date to write (inclusive)",
  "  -h, --help     show this help",
].join("\n");

export type CliErrorCode = "USAGE" | "INPUT" | "OUTPUT";

export class CliError extends Error {
  public readonly code: CliErrorCode;

  constructor(code: CliErrorCode, message: string) {
    super(message);
    this.name = "CliError";
    this.code = code;
  }
}

export interface CliIo {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

export interface CliDeps {
  readonly env?: Record<string, string | undefined>;
  readonly io?: CliIo;
  /** Overrides the logger built from the environment */
  readonly logger?: Logger;
}

type Command = "convert" | "check";

interface Invocation {
  readonly command: Command;
  readonly input: string;
  readonly config: string;
  readonly output: string | undefined;
  readonly window: ExportWindow;
}

const DATE = z.string().date("must be a date, YYYY-MM-DD");

const WindowSchema = z
  .object({ start: DATE.optional(), end: DATE.optional() })
  .refine((w) => w.start === undefined || w.end === undefined || w.start <= w.end, {
    message: "--end is before --start",
  });

/** @throws {CliError} USAGE */
function readWindow(start: string | undefined, end: string | undefined): ExportWindow {
  const result = WindowSchema.safeParse({ start, end });
  if (!result.success) {
    throw new CliError(
      "USAGE",
      result.error.issues
        .map((issue) => (issue.path.length > 0 ? `--${issue.path.join(".")} ${issue.message}` : issue.message))
        .join("; "),
    );
  }
  return result.data;
}

const PROCESS_IO: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function isCommand(value: string | undefined): value is Command {
  return value === "convert" || value === "check";
}

/** @throws {CliError} USAGE on unknown options or missing option values */
function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        config: { type: "string", short: "c" },
        output: { type: "string", short: "o" },
        start: { type: "string" },
        end: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (err) {
    throw new CliError("USAGE", err instanceof Error ? err.message : String(err));
  }
}

/**
 * @returns the invocation, or undefined when help was asked for
 * @throws {CliError} USAGE
 */
export function parseInvocation(argv: readonly string[]): Invocation | undefined {
  const parsed = readArgs(argv);

  if (parsed.values.help === true) return undefined;

  const [command, input, ...rest] = parsed.positionals;
  if (!isCommand(command)) {
    throw new CliError("USAGE", command === undefined ? "Missing command" : `Unknown command "${command}"`);
  }
  if (input === undefined || rest.length > 0) {
    throw new CliError("USAGE", `"${command}" takes exactly one input file`);
  }
  if (parsed.values.config === undefined) {
    throw new CliError("USAGE", "Missing --config");
  }
  const { output, start, end } = parsed.values;
  if (command === "check" && (output !== undefined || start !== undefined || end !== undefined)) {
    throw new CliError("USAGE", '"check" writes no output; drop --output, --start and --end');
  }
  return { command, input, config: parsed.values.config, output, window: readWindow(start, end) };
}

async function readInput(path: string): Promise<string> {
  return readFile(path, "utf8").catch((err: unknown) => {
    throw new CliError("INPUT", `Cannot read input "${path}": ${err instanceof Error ? err.message : String(err)}`);
  });
}

async function writeOutput(path: string, content: string): Promise<void> {
  await writeFile(path, content, "utf8").catch((err: unknown) => {
    throw new CliError("OUTPUT", `Cannot write output "${path}": ${err instanceof Error ? err.message : String(err)}`);
  });
}

function isExpected(err: unknown): err is Error {
  return (
    err instanceof CliError ||
    err instanceof ConfigurationError ||
    err instanceof StripeImportError ||
    (err instanceof AccrualError && err.code === "INVALID_CONFIGURATION")
  );
}

function execute(config: EngineConfig, content: string, logger: Logger): RunReport {
  const rows = parseBalanceHistory(content);
  logger.debug({ rows: rows.length }, "Balance history parsed");

  const engine = new AccrualEngine(config, {
    onWarning: (warning) => {
      logger.warn(
        { code: warning.code, kind: warning.kind, rowIndex: warning.rowIndex, eventId: warning.eventId },
        warning.message,
      );
    },
  });
  return engine.run(rows);
}

/** Parse arguments and environment; a number is an early exit code. */
function prepare(
  argv: readonly string[],
  deps: CliDeps,
  io: CliIo,
): { invocation: Invocation; logger: Logger } | number {
  try {
    const invocation = parseInvocation(argv);
    if (invocation === undefined) {
      io.stdout(`${USAGE}\n`);
      return 0;
    }
    const logger = deps.logger ?? createLogger(loadEnv(deps.env ?? process.env));
    return { invocation, logger };
  } catch (err) {
    if (!isExpected(err)) throw err;
    io.stderr(`${err.message}\n\n${USAGE}\n`);
    return EXIT_CODES.aborted;
  }
}

/**
 * Run the CLI and return its exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? PROCESS_IO;

  const prepared = prepare(argv, deps, io);
  if (typeof prepared === "number") return prepared;
  const { invocation, logger } = prepared;

  try {
    const config = await loadEngineConfig(invocation.config);
    const report = execute(config, await readInput(invocation.input), logger);

    if (report.status === "aborted") {
      logger.error({ err: report.error }, "Run aborted; no output written");
    } else if (invocation.command === "convert") {
      const selected = withinWindow(report.transactions, invocation.window);
      const csv = formatGnuCashCsv(selected);
      if (invocation.output === undefined) {
        io.stdout(csv);
      } else {
        await writeOutput(invocation.output, csv);
        logger.info(
          { output: invocation.output, transactions: selected.length },
          "GnuCash CSV written",
        );
      }
    }

    io.stderr(`${renderSummary(report, config.currency).join("\n")}\n`);
    return EXIT_CODES[report.status];
  } catch (err) {
    if (!isExpected(err)) throw err;
    logger.error({ err }, err.message);
    return EXIT_CODES.aborted;
  }
}
