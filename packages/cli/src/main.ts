/**
 * packages/cli/src/main.ts: The `ls-live` program.
 *
 * Exit codes: 0 success, 1 the directory could not be listed, 2 usage error.
 */

import { resolve } from "node:path";
import { exit } from "node:process";
import { fileURLToPath } from "node:url";
import {
  type LayoutConfig,
  buildColumns,
  composeRenderer,
  createRenderContext,
  isLsLiveError,
} from "@ls-live/core";
import {
  type Env,
  NodeTerminal,
  type ProbeInput,
  type ProbeOutput,
  type TerminalStream,
  createAuditLogger,
  listDirectory,
  probeCursorRow,
  readLsLiveEnv,
  resolveScreenColumns,
} from "@ls-live/node";
import {
  type CliOptions,
  columnSelection,
  parseArgs,
  resolveFilter,
  resolveMaxColumns,
  resolveSortKey,
} from "./args.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const MAX_TOTAL_WIDTH = 100;

export type CliOutput = TerminalStream & ProbeOutput;

export type CliIO = Readonly<{
  stdout: CliOutput;
  stderr: { write(chunk: string): unknown };
  stdin?: ProbeInput;
  env: Env;
  nowMs?: number;
}>;

const HELP = `usage: ls-live [PATH] [options]

List a directory, printing entries sorted as they are read.

options:
  -h, --help                show this help and exit
  -f, --files               list only files
  -d, --directories         list only directories
  -c, --ctime               include creation time
  -C, --long-ctime          '-c' in long format
  -m, --mtime               include last modification time
  -M, --long-mtime          '-m' in long format
  -n, --sub-counts          include sub-file/sub-directory counts for directories
  -N, --long-sub-counts     '-n' in long format
  -s, --size                include size
  -S, --long-size           '-s' in long format
  -e, --extensions          highlight extensions
  -x, --sort [KEY]          sort ascending by KEY, inferred from the included
                            attribute when omitted
                            (n name, c ctime, m mtime, nf sub-files,
                            nd sub-directories, s size, e extension)
  -X, --reverse-sort [KEY]  '-x' in descending order
  -1, --single-column       display as a single column
  --columns COUNT           display with at most COUNT columns
  --no-colour, --no-color   display without colour
  --no-running              display only once finished
  --row-wise                fill rows before columns
  --uniform-width           give all columns the same width
`;

function errorLine(message: string): string {
  return `ls-live: error: ${message}\n`;
}

/**
 * 100 cells, or less on a narrower terminal (one cell goes to the indent).
 * Piped output keeps the full 100.
 */
function maxTotalWidth(stdout: CliOutput, tty: boolean): number {
  if (!tty) return MAX_TOTAL_WIDTH;
  const columns = resolveScreenColumns(stdout);
  return columns > 1 ? Math.min(MAX_TOTAL_WIDTH, columns - 1) : MAX_TOTAL_WIDTH;
}

function layoutFor(options: CliOptions, stdout: CliOutput, tty: boolean): Partial<LayoutConfig> {
  return {
    maxTotalWidth: maxTotalWidth(stdout, tty),
    maxColumns: resolveMaxColumns(options),
    rowWise: options.rowWise,
    uniformWidth: options.uniformWidth,
  };
}

export async function run(argv: readonly string[], io: CliIO): Promise<number> {
  let options: CliOptions;
  let sortKey: ReturnType<typeof resolveSortKey>;
  try {
    options = parseArgs(argv);
    sortKey = resolveSortKey(options);
  } catch (err) {
    if (!isLsLiveError(err, "LSL_INVALID_ARGUMENT")) throw err;
    io.stderr.write("usage: ls-live [PATH] [options]\n");
    io.stderr.write(errorLine(err.message));
    return EXIT_USAGE;
  }

  if (options.help) {
    io.stdout.write(HELP);
    return EXIT_OK;
  }

  const env = readLsLiveEnv(io.env);
  const tty = io.stdout.isTTY === true;
  const context = createRenderContext({
    nowMs: io.nowMs ?? Date.now(),
    colour: tty && !options.noColour && !env.noColor,
  });
  const render = composeRenderer(buildColumns(columnSelection(options), context));
  const audit = createAuditLogger("cli", { env, stderr: io.stderr });

  let startRow: number | undefined;
  if (tty && env.cursorProbe && io.stdin !== undefined) {
    startRow = (await probeCursorRow(io.stdin, io.stdout)) ?? undefined;
  }

  audit.emit("start", {
    path: options.path,
    sortKey: sortKey.id,
    tty,
    startRow: startRow ?? null,
  });
  try {
    listDirectory({
      path: options.path,
      filter: resolveFilter(options),
      session: {
        sortKey,
        render,
        terminal: new NodeTerminal(io.stdout, { startRow, controlSequences: tty }),
        layout: layoutFor(options, io.stdout, tty),
        finalOnly: options.noRunning || !tty,
        audit,
      },
      audit,
    });
  } catch (err) {
    if (!isLsLiveError(err, "LSL_ENUMERATION_FAILED")) throw err;
    io.stderr.write(errorLine(err.message));
    return EXIT_FAILURE;
  }
  return EXIT_OK;
}

export async function main(): Promise<void> {
  const code = await run(process.argv.slice(2), {
    stdout: process.stdout,
    stderr: process.stderr,
    stdin: process.stdin,
    env: process.env,
  });
  process.exitCode = code;
}

const isMain = process.argv[1] && fileURLToPath(import.meta.url) === resolve(process.argv[1]);
if (isMain) {
  main().catch((err: unknown) => {
    process.stderr.write(errorLine(err instanceof Error ? err.message : String(err)));
    exit(EXIT_FAILURE);
  });
}
