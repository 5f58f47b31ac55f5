import type { SessionAdapter } from "../session/session.adapter";

export type ToolArguments = Readonly<Record<string, unknown>>;

export interface ToolInputSchema {
  readonly type: "object";
  readonly properties: Readonly<Record<string, object>>;
  readonly required?: readonly string[];
}

export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  handler(args: ToolArguments): Promise<unknown> | unknown;
}

export interface ToolContext {
  readonly session: SessionAdapter;
}
