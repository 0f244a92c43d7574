#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { CrsError } from "./errors.js";
import { readLasCrs } from "./file.js";

/**
 * CLI exit codes following Unix conventions.
 */
export const ExitCode = {
  Found: 0,
  NoCrs: 1,
  Error: 2,
} as const;

/** Where the CLI writes. Swapped out in tests. */
export type CliOutput = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
};

const USAGE = `
las-crs - Print the EPSG code(s) of a LAS, LAZ or COPC file

Usage:
  las-crs <file>
  las-crs <file> --json

Options:
  --json      Output results as JSON
  --help      Show this help message

Exit codes:
  0  CRS found
  1  No CRS records in the file
  2  Error (file not found, not LAS, unreadable CRS, etc.)
`.trim();

/**
 * Parses command line arguments.
 *
 * @param args - User arguments, without the node binary and script path
 */
export function parseArgs(args: string[]): {
  file: string | null;
  json: boolean;
  help: boolean;
} {
  return {
    file: args.find((arg) => !arg.startsWith("--")) ?? null,
    json: args.includes("--json"),
    help: args.includes("--help"),
  };
}

/**
 * Reads the CRS of one file and reports it.
 *
 * @returns The process exit code
 */
export async function run(
  args: string[],
  out: CliOutput = {
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
  },
): Promise<number> {
  const { file, json, help } = parseArgs(args);

  if (help) {
    out.stdout(USAGE);
    return ExitCode.Found;
  }

  if (file === null) {
    out.stderr("Error: No file specified\n");
    out.stderr(USAGE);
    return ExitCode.Error;
  }

  // Warnings would corrupt JSON on stdout, so they always go to stderr.
  const logger = { warn: (message: string) => out.stderr(`Warning: ${message}`) };

  try {
    const crs = await readLasCrs(file, { logger });

    if (json) {
      out.stdout(JSON.stringify({ file, crs }, null, 2));
    } else if (crs === null) {
      out.stdout(`${file}: no CRS records`);
    } else {
      out.stdout(`${file}: ${crs.toString()}`);
    }

    return crs === null ? ExitCode.NoCrs : ExitCode.Found;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (json) {
      const kind = err instanceof CrsError ? err.kind : null;
      out.stdout(JSON.stringify({ file, error: message, kind }, null, 2));
    } else {
      out.stderr(`Error: ${message}`);
    }
    return ExitCode.Error;
  }
}

function isMain(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) {
    return false;
  }
  return realpathSync(entry) === fileURLToPath(import.meta.url);
}

if (isMain()) {
  run(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = ExitCode.Error;
    },
  );
}
