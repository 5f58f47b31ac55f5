export const BATCH_ACTION_TYPES = Object.freeze([
  "sync_export",
  "sync_import",
  "current_program",
] as const);

/** One request inside a batch: a `type` plus the parameters that type reads. */
export type BatchAction = Readonly<Record<string, unknown>> & {
  readonly type?: unknown;
};

export type BatchSlot =
  | {
      readonly index: number;
      readonly ok: true;
      readonly type: string | null;
      readonly result: unknown;
    }
  | {
      readonly index: number;
      readonly ok: false;
      readonly type: string | null;
      readonly error: string;
    };

export interface BatchOutcome {
  readonly results: readonly BatchSlot[];
  readonly total: number;
  readonly failed: number;
}
