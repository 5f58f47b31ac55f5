import fs from "node:fs";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  createProgramDatabaseLoader,
  openProgramDatabase,
} from "../../src/adapter/storage/sqlite";
import { policyFor, toToolError } from "../../src/adapter/_shared/response_policy";
import { EmbeddedMcpServer } from "../../src/adapters/mcp/mcp.embedded";
import { createMcpServer } from "../../src/adapters/mcp/mcp.server";
import { SessionAdapter } from "../../src/session/session.adapter";
import { stableStringify } from "../../src/session/stable_stringify";
import { decodeSnapshot, loadSnapshotFile } from "../../src/sync/snapshot.codec";
import { applySnapshot } from "../../src/sync/snapshot.import";
import { exportSnapshot } from "../../src/tools/sync.tools";
import { createToolRegistry } from "../../src/tools/tool.registry";
import { resolveServerConfig, type ServerConfigEnv } from "../config/server.config";
import { USAGE, parseCliArgs, type CliArgs } from "./cli.args";
import { createDevProgram } from "./dev_program";

export interface CliIo {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly env: ServerConfigEnv;
  /** Resolves when the serving process should shut down. */
  readonly untilShutdown?: () => Promise<void>;
}

function processIo(): CliIo {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    env: process.env,
    untilShutdown: () =>
      new Promise((resolve) => {
        process.once("SIGINT", () => resolve());
        process.once("SIGTERM", () => resolve());
      }),
  };
}

function runValidate(snapshotPath: string, io: CliIo): number {
  try {
    const snapshot = decodeSnapshot(fs.readFileSync(snapshotPath, "utf8"));
    io.stdout(
      `${stableStringify(
        {
          valid: true,
          schema_version: snapshot.schema_version,
          program: snapshot.program,
          counts: {
            functions: snapshot.functions.length,
            strings: snapshot.strings.length,
            comments: snapshot.comments.length,
          },
        },
        { indent: 2 }
      )}\n`
    );
    return 0;
  } catch (error) {
    const failure = toToolError(error);
    io.stdout(`${stableStringify({ valid: false, error: failure.message }, { indent: 2 })}\n`);
    return policyFor(failure).cliExitCode;
  }
}

function runExport(programPath: string, out: string | undefined, io: CliIo): number {
  const database = openProgramDatabase(programPath, { readonly: true });
  try {
    const session = new SessionAdapter();
    session.setProject(database.program);
    const result = exportSnapshot(session, out === undefined ? {} : { output_path: out });
    if (result.output_path === null) {
      io.stdout(`${result.snapshot}\n`);
    } else {
      io.stderr(`[cli] snapshot written to ${result.output_path}\n`);
    }
    return 0;
  } finally {
    database.close();
  }
}

function runImport(snapshotPath: string, programPath: string, dryRun: boolean, io: CliIo): number {
  const snapshot = loadSnapshotFile(snapshotPath);
  const database = openProgramDatabase(programPath, { readonly: dryRun });
  try {
    const session = new SessionAdapter();
    session.setProject(database.program);
    const result = applySnapshot(snapshot, session, !dryRun);
    io.stdout(`${stableStringify(result, { indent: 2 })}\n`);
    return result.apply_errors.length === 0 ? 0 : 1;
  } finally {
    database.close();
  }
}

async function runServe(args: Extract<CliArgs, { command: "serve" }>, io: CliIo): Promise<number> {
  const config = resolveServerConfig(args, io.env);
  const session = new SessionAdapter({ loader: createProgramDatabaseLoader() });
  const database = args.program === undefined ? null : openProgramDatabase(args.program);
  session.setProject(database === null ? createDevProgram() : database.program);
  if (database === null) {
    io.stderr("[cli] no --program given; serving the placeholder development program\n");
  }
  const registry = createToolRegistry(session);

  try {
    if (config.transport === "stdio") {
      const server = createMcpServer(registry);
      await server.connect(new StdioServerTransport());
      io.stderr("[cli] serving MCP over stdio\n");
      await io.untilShutdown?.();
      await server.close();
      return 0;
    }

    const embedded = new EmbeddedMcpServer(registry, config);
    const status = await embedded.start();
    io.stderr(`[cli] serving MCP at ${status.url}\n`);
    await io.untilShutdown?.();
    await embedded.stop();
    return 0;
  } finally {
    database?.close();
  }
}

export async function runCli(argv: readonly string[], io: CliIo = processIo()): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    switch (args.command) {
      case "help":
        io.stdout(`${USAGE}\n`);
        return 0;
      case "validate":
        return runValidate(args.snapshotPath, io);
      case "export":
        return runExport(args.program, args.out, io);
      case "import":
        return runImport(args.snapshotPath, args.program, args.dryRun, io);
      case "serve":
        return await runServe(args, io);
    }
  } catch (error) {
    const failure = toToolError(error);
    io.stderr(`[cli] ${failure.message}\n`);
    return policyFor(failure).cliExitCode;
  }
}
