import { isPlainObject } from "../core/_shared/json";
import { InvalidArgumentError, InvalidBatchInputError } from "../core/errors/errors";
import type { ActionExecutorRegistry } from "./action.registry";
import type { BatchOutcome, BatchSlot } from "./batch.types";

function actionTypeOf(action: unknown): string | null {
  if (!isPlainObject(action)) {
    return null;
  }
  return typeof action.type === "string" ? action.type : null;
}

/**
 * Runs every action in input order. A failing slot is recorded and the run
 * moves on; there is no rollback of earlier slots.
 */
export async function runBatch(
  actions: unknown,
  registry: ActionExecutorRegistry
): Promise<BatchOutcome> {
  if (!Array.isArray(actions)) {
    throw new InvalidBatchInputError("actions must be a list");
  }

  const requested: readonly unknown[] = actions;
  const results: BatchSlot[] = [];
  for (const [index, action] of requested.entries()) {
    const type = actionTypeOf(action);
    if (!isPlainObject(action)) {
      results.push({
        index,
        ok: false,
        type,
        error: new InvalidArgumentError(`actions[${index}]`, "must be an object").message,
      });
      continue;
    }

    const outcome = await registry.execute(type, action);
    if (outcome.kind === "ok") {
      results.push({ index, ok: true, type, result: outcome.data });
    } else {
      results.push({ index, ok: false, type, error: outcome.error.message });
    }
  }

  return {
    results,
    total: results.length,
    failed: results.filter((slot) => !slot.ok).length,
  };
}
