import { InvalidArgumentError } from "../core/errors/errors";
import type { SessionAdapter } from "../session/session.adapter";
import { createAnalysisTools } from "./analysis.tools";
import { createQueryTools } from "./query.tools";
import { createSyncTools, type SyncToolOptions } from "./sync.tools";
import type { ToolArguments, ToolDefinition } from "./tool.types";

export interface ToolRegistry {
  list(): readonly ToolDefinition[];
  call(name: string, args: ToolArguments): Promise<unknown>;
}

class DefaultToolRegistry implements ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  constructor(definitions: readonly ToolDefinition[]) {
    for (const definition of definitions) {
      if (this.tools.has(definition.name)) {
        throw new Error(`TOOL_REGISTRY_ERROR duplicate tool name: ${definition.name}`);
      }
      this.tools.set(definition.name, definition);
    }
  }

  list(): readonly ToolDefinition[] {
    return [...this.tools.values()];
  }

  async call(name: string, args: ToolArguments): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new InvalidArgumentError("name", `unknown tool: ${name}`);
    }
    return tool.handler(args);
  }
}

export function createToolRegistry(
  session: SessionAdapter,
  options: SyncToolOptions = {}
): ToolRegistry {
  const context = { session };
  return new DefaultToolRegistry([
    ...createQueryTools(context),
    ...createAnalysisTools(context),
    ...createSyncTools(context, options),
  ]);
}
