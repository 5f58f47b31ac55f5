import fs from "node:fs";
import type { JsonObject } from "../core/_shared/json";
import { InvalidArgumentError } from "../core/errors/errors";
import { createActionExecutorRegistry, type ActionExecutorRegistry } from "../batch/action.registry";
import { runBatch } from "../batch/batch.runner";
import { BATCH_ACTION_TYPES, type BatchOutcome } from "../batch/batch.types";
import type { SessionAdapter } from "../session/session.adapter";
import { decodeSnapshot, encodeSnapshot, saveSnapshotFile } from "../sync/snapshot.codec";
import { buildSnapshot } from "../sync/snapshot.export";
import { applySnapshot, type ImportResult } from "../sync/snapshot.import";
import { optionalBoolean, optionalString } from "./tool.args";
import type { ToolArguments, ToolContext, ToolDefinition } from "./tool.types";

export const EXPORT_METADATA: JsonObject = Object.freeze({
  tool: "kb-session-mcp",
  mode: "session_bound",
});

export interface SyncExportResult {
  readonly snapshot: string;
  readonly output_path: string | null;
}

export interface SyncToolOptions {
  readonly now?: () => Date;
}

export function exportSnapshot(
  session: SessionAdapter,
  args: ToolArguments,
  options: SyncToolOptions = {}
): SyncExportResult {
  const outputPath = optionalString(args, "output_path");
  const program = session.requireProject();
  const snapshot = buildSnapshot(program, session.getProgramDescriptor(), {
    now: options.now,
    metadata: EXPORT_METADATA,
  });
  if (outputPath) {
    saveSnapshotFile(outputPath, snapshot);
  }
  return { snapshot: encodeSnapshot(snapshot), output_path: outputPath ?? null };
}

export function importSnapshot(session: SessionAdapter, args: ToolArguments): ImportResult {
  const snapshotJson = optionalString(args, "snapshot_json");
  const snapshotPath = optionalString(args, "snapshot_path");
  const applyChanges = optionalBoolean(args, "apply_changes", true);
  if (!snapshotJson && !snapshotPath) {
    throw new InvalidArgumentError(
      "snapshot_json",
      "either snapshot_json or snapshot_path must be provided"
    );
  }
  const payload = snapshotPath ? fs.readFileSync(snapshotPath, "utf8") : snapshotJson ?? "";
  return applySnapshot(decodeSnapshot(payload), session, applyChanges);
}

export function createBatchRegistry(
  session: SessionAdapter,
  options: SyncToolOptions = {}
): ActionExecutorRegistry {
  return createActionExecutorRegistry()
    .register("sync_export", (action) => exportSnapshot(session, action, options))
    .register("sync_import", (action) => importSnapshot(session, action))
    .register("current_program", () => session.getProgramDescriptor());
}

export function createSyncTools(
  { session }: ToolContext,
  options: SyncToolOptions = {}
): ToolDefinition[] {
  const registry = createBatchRegistry(session, options);
  return [
    {
      name: "sync_export",
      description: "Export a deterministic snapshot of the active analysis state.",
      inputSchema: {
        type: "object",
        properties: {
          output_path: { type: "string", description: "Also write the snapshot to this file" },
        },
      },
      handler: (args) => exportSnapshot(session, args, options),
    },
    {
      name: "sync_import",
      description:
        "Validate a snapshot and, when apply_changes is true, apply its function names and comments.",
      inputSchema: {
        type: "object",
        properties: {
          snapshot_json: { type: "string" },
          snapshot_path: { type: "string" },
          apply_changes: { type: "boolean", default: true },
        },
      },
      handler: (args) => importSnapshot(session, args),
    },
    {
      name: "run_batch",
      description: "Run sync_export, sync_import and current_program actions in order.",
      inputSchema: {
        type: "object",
        properties: {
          actions: {
            type: "array",
            items: {
              type: "object",
              properties: { type: { type: "string", enum: BATCH_ACTION_TYPES } },
              required: ["type"],
            },
          },
        },
        required: ["actions"],
      },
      handler: (args): Promise<BatchOutcome> => runBatch(args.actions, registry),
    },
  ];
}
