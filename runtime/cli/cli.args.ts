import { ConfigurationError } from "../../src/core/errors/errors";

export const CLI_COMMANDS = ["serve", "validate", "export", "import", "help"] as const;

export type CliCommand = (typeof CLI_COMMANDS)[number];

export type CliArgs =
  | {
      readonly command: "serve";
      readonly transport?: string;
      readonly host?: string;
      readonly port?: string;
      readonly program?: string;
    }
  | { readonly command: "validate"; readonly snapshotPath: string }
  | { readonly command: "export"; readonly program: string; readonly out?: string }
  | {
      readonly command: "import";
      readonly snapshotPath: string;
      readonly program: string;
      readonly dryRun: boolean;
    }
  | { readonly command: "help" };

export const USAGE = [
  "usage:",
  "  kb-session-mcp serve [--transport stdio|streamable-http] [--host <host>] [--port <port>] [--program <db>]",
  "  kb-session-mcp validate <snapshot.json>",
  "  kb-session-mcp export --program <db> [--out <file>]",
  "  kb-session-mcp import <snapshot.json> --program <db> [--dry-run]",
].join("\n");

const VALUE_FLAGS = ["--transport", "--host", "--port", "--program", "--out"] as const;

type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(token: string): token is ValueFlag {
  return (VALUE_FLAGS as readonly string[]).includes(token);
}

function isCliCommand(value: string): value is CliCommand {
  return (CLI_COMMANDS as readonly string[]).includes(value);
}

interface ScannedArgs {
  readonly positional: readonly string[];
  readonly values: ReadonlyMap<ValueFlag, string>;
  readonly dryRun: boolean;
}

function scan(argv: readonly string[]): ScannedArgs {
  const positional: string[] = [];
  const values = new Map<ValueFlag, string>();
  let dryRun = false;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === undefined || token === "--") {
      continue;
    }
    if (token === "--dry-run") {
      dryRun = true;
      continue;
    }
    if (isValueFlag(token)) {
      const next = argv[i + 1];
      if (typeof next !== "string" || next.trim() === "" || next.startsWith("--")) {
        throw new ConfigurationError(`${token} requires a value`);
      }
      values.set(token, next.trim());
      i += 1;
      continue;
    }
    if (token.startsWith("--")) {
      throw new ConfigurationError(`unknown option ${token}`);
    }
    positional.push(token);
  }
  return { positional, values, dryRun };
}

function requirePositional(scanned: ScannedArgs, index: number, label: string): string {
  const value = scanned.positional[index];
  if (value === undefined) {
    throw new ConfigurationError(`missing ${label}`);
  }
  return value;
}

function requireFlag(scanned: ScannedArgs, flag: ValueFlag): string {
  const value = scanned.values.get(flag);
  if (value === undefined) {
    throw new ConfigurationError(`${flag} is required`);
  }
  return value;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const scanned = scan(argv);
  const commandRaw = scanned.positional[0];
  if (commandRaw === undefined) {
    return { command: "help" };
  }
  if (!isCliCommand(commandRaw)) {
    throw new ConfigurationError(
      `unknown command "${commandRaw}". expected one of: ${CLI_COMMANDS.join(", ")}`
    );
  }

  switch (commandRaw) {
    case "serve":
      return {
        command: "serve",
        transport: scanned.values.get("--transport"),
        host: scanned.values.get("--host"),
        port: scanned.values.get("--port"),
        program: scanned.values.get("--program"),
      };
    case "validate":
      return { command: "validate", snapshotPath: requirePositional(scanned, 1, "<snapshot.json>") };
    case "export":
      return {
        command: "export",
        program: requireFlag(scanned, "--program"),
        out: scanned.values.get("--out"),
      };
    case "import":
      return {
        command: "import",
        snapshotPath: requirePositional(scanned, 1, "<snapshot.json>"),
        program: requireFlag(scanned, "--program"),
        dryRun: scanned.dryRun,
      };
    case "help":
      return { command: "help" };
  }
}
