import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { ERROR_CODES } from "../../core/errors/canonical_error_codes";
import { publicMessageOf, toToolError } from "../../adapter/_shared/response_policy";
import type { ToolDefinition } from "../../tools/tool.types";
import type { ToolRegistry } from "../../tools/tool.registry";
import { SERVER_INFO } from "./mcp.types";

export function toMcpTool(definition: ToolDefinition): Tool {
  const { properties, required } = definition.inputSchema;
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: {
      type: "object",
      properties: { ...properties },
      ...(required ? { required: [...required] } : {}),
    },
  };
}

export function toCallToolResult(result: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
}

export function toCallToolError(toolName: string, error: unknown): CallToolResult {
  const toolError = toToolError(error);
  if (toolError.code === ERROR_CODES.INTERNAL_ERROR) {
    console.error(`[mcp] tool ${toolName} failed: ${toolError.message}`);
  }
  return {
    content: [{ type: "text", text: publicMessageOf(toolError) }],
    isError: true,
  };
}

export function createMcpServer(registry: ToolRegistry): Server {
  const server = new Server(
    { name: SERVER_INFO.name, version: SERVER_INFO.version },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.list().map(toMcpTool),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const toolName = request.params.name;
    try {
      const result = await registry.call(toolName, request.params.arguments ?? {});
      return toCallToolResult(result);
    } catch (error) {
      return toCallToolError(toolName, error);
    }
  });

  return server;
}
