import { readProperty, toOptionalInteger } from "../core/_shared/probe";
import { InvalidArgumentError } from "../core/errors/errors";
import { formatAddress } from "../host/address";
import {
  commentTableOf,
  functionTableOf,
  xrefIndexOf,
} from "../host/host.guards";
import type { Address, HostFunction, HostXref } from "../host/host.types";
import { deriveProgramDescriptor } from "../session/program_descriptor";
import { stringItems, toStringRow } from "../sync/snapshot.export";
import { optionalInteger, optionalString, requireAddress, requireString } from "./tool.args";
import type { ToolContext, ToolDefinition } from "./tool.types";

const ADDRESS_SCHEMA = { type: "string", description: "Hex address, e.g. 0x401000" };
const BINARY_PATH_SCHEMA = {
  type: "string",
  description: "Open this program database instead of the bound session",
};

export function functionToRow(address: Address, func: HostFunction) {
  return {
    address: formatAddress(address),
    name: typeof func.name === "string" ? func.name : null,
    size: toOptionalInteger(func.size),
    is_plt: func.isPlt === true,
    is_syscall: func.isSyscall === true,
  };
}

function xrefToRow(ref: HostXref, target: Address) {
  const src = readProperty(ref, "insAddr");
  const dst = readProperty(ref, "dst");
  const type = readProperty(ref, "type");
  return {
    src: formatAddress(typeof src === "number" ? src : 0),
    dst: formatAddress(typeof dst === "number" ? dst : target),
    type: typeof type === "string" ? type : "",
  };
}

export function createQueryTools({ session }: ToolContext): ToolDefinition[] {
  return [
    {
      name: "get_current_program",
      description: "Return the descriptor of the program active in the session.",
      inputSchema: {
        type: "object",
        properties: { binary_path: BINARY_PATH_SCHEMA },
      },
      handler(args) {
        const binaryPath = optionalString(args, "binary_path");
        if (binaryPath === undefined) {
          return session.getProgramDescriptor();
        }
        const resolved = session.resolveProject(binaryPath);
        try {
          return deriveProgramDescriptor(resolved.program);
        } finally {
          resolved.release();
        }
      },
    },
    {
      name: "list_functions",
      description: "List functions from the knowledge base of the active program.",
      inputSchema: {
        type: "object",
        properties: {
          offset: { type: "integer", minimum: 0, default: 0 },
          limit: { type: "integer", minimum: 0, default: 100 },
        },
      },
      handler(args) {
        const offset = optionalInteger(args, "offset", 0, 0);
        const limit = optionalInteger(args, "limit", 100, 0);
        const functions = functionTableOf(session.requireProject());
        if (functions === null) {
          return { functions: [], total: 0, offset, limit };
        }
        const all = [...functions.entries()];
        return {
          functions: all
            .slice(offset, offset + limit)
            .map(([address, func]) => functionToRow(address, func)),
          total: all.length,
          offset,
          limit,
        };
      },
    },
    {
      name: "get_function",
      description: "Get details for the function starting at an address.",
      inputSchema: {
        type: "object",
        properties: { address: ADDRESS_SCHEMA },
        required: ["address"],
      },
      handler(args) {
        const address = requireAddress(args, "address");
        const functions = functionTableOf(session.requireProject());
        const func = functions !== null && functions.has(address) ? functions.get(address) : undefined;
        if (func === undefined) {
          return { error: `Function not found at ${requireString(args, "address")}` };
        }
        return functionToRow(address, func);
      },
    },
    {
      name: "list_strings",
      description: "List strings known to the active program.",
      inputSchema: {
        type: "object",
        properties: {
          offset: { type: "integer", minimum: 0, default: 0 },
          limit: { type: "integer", minimum: 0, default: 200 },
        },
      },
      handler(args) {
        const offset = optionalInteger(args, "offset", 0, 0);
        const limit = optionalInteger(args, "limit", 200, 0);
        const items = stringItems(session.requireProject());
        return {
          strings: items.slice(offset, offset + limit).map((item) => toStringRow(item)),
          total: items.length,
          offset,
          limit,
        };
      },
    },
    {
      name: "get_xrefs_to",
      description: "List cross-references whose destination is an address.",
      inputSchema: {
        type: "object",
        properties: {
          address: ADDRESS_SCHEMA,
          offset: { type: "integer", minimum: 0, default: 0 },
          limit: { type: "integer", minimum: 0, default: 100 },
        },
        required: ["address"],
      },
      handler(args) {
        const address = requireAddress(args, "address");
        const offset = optionalInteger(args, "offset", 0, 0);
        const limit = optionalInteger(args, "limit", 100, 0);
        const xrefs = xrefIndexOf(session.requireProject());
        if (xrefs === null) {
          return {
            xrefs: [],
            total: 0,
            note: "xrefs API unavailable in current program context",
          };
        }
        const refs = [...xrefs.getXrefsByDst(address)];
        return {
          xrefs: refs.slice(offset, offset + limit).map((ref) => xrefToRow(ref, address)),
          total: refs.length,
          offset,
          limit,
        };
      },
    },
    {
      name: "rename_function",
      description: "Rename the function at an address and ask the host UI to refresh.",
      inputSchema: {
        type: "object",
        properties: { address: ADDRESS_SCHEMA, new_name: { type: "string" } },
        required: ["address", "new_name"],
      },
      handler(args) {
        const newName = args.new_name;
        if (typeof newName !== "string" || newName.trim() === "") {
          throw new InvalidArgumentError("new_name", "must be a non-empty string");
        }
        const addressText = requireString(args, "address");
        const address = requireAddress(args, "address");
        const functions = functionTableOf(session.requireProject());
        const func = functions !== null && functions.has(address) ? functions.get(address) : undefined;
        if (func === undefined) {
          return { error: `Function not found at ${addressText}` };
        }
        const oldName = typeof func.name === "string" ? func.name : null;
        try {
          func.name = newName;
        } catch (error) {
          return {
            error: `Failed to rename function: ${error instanceof Error ? error.message : String(error)}`,
          };
        }
        return {
          address: addressText,
          old_name: oldName,
          new_name: newName,
          refresh: session.refreshGui(),
        };
      },
    },
    {
      name: "set_comment",
      description: "Set the comment at an address and ask the host UI to refresh.",
      inputSchema: {
        type: "object",
        properties: { address: ADDRESS_SCHEMA, comment: { type: "string" } },
        required: ["address", "comment"],
      },
      handler(args) {
        const addressText = requireString(args, "address");
        const address = requireAddress(args, "address");
        const comment = args.comment;
        if (typeof comment !== "string") {
          throw new InvalidArgumentError("comment", "expected a string");
        }
        const comments = commentTableOf(session.requireProject());
        if (comments === null) {
          return { error: "Comments API unavailable on this program context" };
        }
        const previous = comments.get(address);
        try {
          comments.set(address, comment);
        } catch (error) {
          return {
            error: `Failed to set comment: ${error instanceof Error ? error.message : String(error)}`,
          };
        }
        return {
          address: addressText,
          old_comment: previous ?? null,
          new_comment: comment,
          refresh: session.refreshGui(),
        };
      },
    },
  ];
}
