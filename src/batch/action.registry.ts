import { UnsupportedActionTypeError } from "../core/errors/errors";
import type { BatchAction } from "./batch.types";

export type ActionExecutionResult =
  | {
      kind: "ok";
      data: unknown;
    }
  | {
      kind: "error";
      error: {
        message: string;
        name?: string;
      };
    };

export type ActionExecutor = (action: BatchAction) => Promise<unknown> | unknown;

export interface ActionExecutorRegistry {
  register(type: string, executor: ActionExecutor): this;
  isRegistered(type: string): boolean;
  execute(type: string | null, action: BatchAction): Promise<ActionExecutionResult>;
}

function toResultError(error: unknown): { message: string; name?: string } {
  return error instanceof Error
    ? { message: error.message, name: error.name }
    : { message: String(error) };
}

class DefaultActionExecutorRegistry implements ActionExecutorRegistry {
  private readonly executors = new Map<string, ActionExecutor>();

  register(type: string, executor: ActionExecutor): this {
    this.executors.set(type, executor);
    return this;
  }

  isRegistered(type: string): boolean {
    return this.executors.has(type);
  }

  async execute(type: string | null, action: BatchAction): Promise<ActionExecutionResult> {
    const executor = type === null ? undefined : this.executors.get(type);
    if (!executor) {
      return { kind: "error", error: toResultError(new UnsupportedActionTypeError(type)) };
    }

    try {
      return { kind: "ok", data: await executor(action) };
    } catch (error) {
      return { kind: "error", error: toResultError(error) };
    }
  }
}

export function createActionExecutorRegistry(): ActionExecutorRegistry {
  return new DefaultActionExecutorRegistry();
}
