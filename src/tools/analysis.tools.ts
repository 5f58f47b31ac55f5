import { isCallable, readProperty } from "../core/_shared/probe";
import { AnalysisUnavailableError } from "../core/errors/errors";
import { formatAddress } from "../host/address";
import { analysisEngineOf } from "../host/host.guards";
import {
  optionalAddressList,
  optionalBoolean,
  optionalString,
  optionalTimeoutSeconds,
  requireAddress,
  requireString,
} from "./tool.args";
import type { ToolContext, ToolDefinition } from "./tool.types";
import { MAX_TIMEOUT_SECONDS, withTimeout } from "./with_timeout";

export const SYMBOLIC_STDIN_BYTES = 128;
const DEFAULT_CFG_TIMEOUT_SECONDS = 60;
const DEFAULT_EXPLORE_TIMEOUT_SECONDS = 120;

const BINARY_PATH_SCHEMA = {
  type: "string",
  description: "Open this program database instead of the bound session",
};

function countOf(graph: unknown, method: string): number {
  const fn = readProperty(graph, method);
  if (!isCallable(fn)) {
    return 0;
  }
  const value: unknown = Reflect.apply(fn, graph, []);
  return typeof value === "number" && Number.isInteger(value) ? value : 0;
}

function countField(result: unknown, field: string): number {
  const value = readProperty(result, field);
  return typeof value === "number" && Number.isInteger(value) ? value : 0;
}

export function createAnalysisTools({ session }: ToolContext): ToolDefinition[] {
  return [
    {
      name: "program_entry",
      description: "Return the loader-reported entry point of the program.",
      inputSchema: { type: "object", properties: { binary_path: BINARY_PATH_SCHEMA } },
      handler(args) {
        const resolved = session.resolveProject(optionalString(args, "binary_path"));
        try {
          const entry = readProperty(readProperty(resolved.program.loader, "mainObject"), "entry");
          return {
            entry: typeof entry === "number" && Number.isInteger(entry) ? formatAddress(entry) : null,
          };
        } finally {
          resolved.release();
        }
      },
    },
    {
      name: "build_cfg",
      description: "Recover the control-flow graph and summarize its size.",
      inputSchema: {
        type: "object",
        properties: {
          timeout: {
            type: "integer",
            default: DEFAULT_CFG_TIMEOUT_SECONDS,
            maximum: MAX_TIMEOUT_SECONDS,
          },
          binary_path: BINARY_PATH_SCHEMA,
        },
      },
      async handler(args) {
        const timeout = optionalTimeoutSeconds(args, "timeout", DEFAULT_CFG_TIMEOUT_SECONDS);
        const resolved = session.resolveProject(optionalString(args, "binary_path"));
        try {
          const engine = analysisEngineOf(resolved.program);
          const cfgFast = engine?.cfgFast;
          if (engine === null || typeof cfgFast !== "function") {
            throw new AnalysisUnavailableError("cfgFast");
          }
          const cfg = await withTimeout(timeout, () => cfgFast.call(engine, { normalize: true }));
          const graph = readProperty(cfg, "graph");
          return {
            nodes: countOf(graph, "numberOfNodes"),
            edges: countOf(graph, "numberOfEdges"),
          };
        } finally {
          resolved.release();
        }
      },
    },
    {
      name: "explore_paths",
      description: "Search for an execution path that reaches a target address.",
      inputSchema: {
        type: "object",
        properties: {
          find_addr: { type: "string", description: "Hex address to reach" },
          avoid_addrs: { type: "array", items: { type: "string" } },
          timeout: {
            type: "integer",
            default: DEFAULT_EXPLORE_TIMEOUT_SECONDS,
            maximum: MAX_TIMEOUT_SECONDS,
          },
          stdin_symbolic: { type: "boolean", default: true },
          binary_path: BINARY_PATH_SCHEMA,
        },
        required: ["find_addr"],
      },
      async handler(args) {
        const findAddress = requireAddress(args, "find_addr");
        const avoidAddresses = optionalAddressList(args, "avoid_addrs");
        const timeout = optionalTimeoutSeconds(args, "timeout", DEFAULT_EXPLORE_TIMEOUT_SECONDS);
        const stdinSymbolic = optionalBoolean(args, "stdin_symbolic", true);
        const resolved = session.resolveProject(optionalString(args, "binary_path"));
        try {
          const engine = analysisEngineOf(resolved.program);
          const explore = engine?.explore;
          if (engine === null || typeof explore !== "function") {
            throw new AnalysisUnavailableError("explore");
          }
          const outcome = await withTimeout(timeout, () =>
            explore.call(engine, {
              findAddress,
              avoidAddresses,
              symbolicStdinBytes: stdinSymbolic ? SYMBOLIC_STDIN_BYTES : null,
            })
          );

          const found = countField(outcome, "found") > 0;
          const summary = {
            found,
            active_states: countField(outcome, "active"),
            deadended_states: countField(outcome, "deadended"),
          };
          const solution = readProperty(outcome, "stdinSolution");
          if (!found || !(solution instanceof Uint8Array)) {
            return summary;
          }
          const bytes = Buffer.from(solution);
          return {
            ...summary,
            stdin_solution: bytes.toString("hex"),
            stdin_solution_utf8: bytes.toString("utf8"),
          };
        } finally {
          resolved.release();
        }
      },
    },
    {
      name: "decompile_function",
      description: "Decompile a function. Failures come back as an error field, not a tool error.",
      inputSchema: {
        type: "object",
        properties: { address: { type: "string", description: "Hex address of the function" } },
        required: ["address"],
      },
      async handler(args) {
        const addressText = requireString(args, "address");
        const address = requireAddress(args, "address");
        const program = session.requireProject();
        try {
          const engine = analysisEngineOf(program);
          const decompile = engine?.decompile;
          if (engine === null || typeof decompile !== "function") {
            throw new AnalysisUnavailableError("decompile");
          }
          const result = await decompile.call(engine, address);
          const text = readProperty(result, "text");
          return { address: addressText, decompilation: typeof text === "string" ? text : "" };
        } catch (error) {
          return {
            address: addressText,
            error: error instanceof Error ? error.message : String(error),
            note: "Decompilation may need further analyses or engine plugins for this binary.",
          };
        }
      },
    },
  ];
}
