import type { Store } from "../db/store.js";
import { AppError, StoreError } from "../errors.js";
import type { PracticeRecord } from "../types.js";
import { canFinishToday } from "./eligibility.js";

export type FinishInput = {
  userId: number;
  actionId: number;
  now: Date;
  note?: string | null;
};

/**
 * Marks an action finished for now's UTC date. Ownership check, eligibility
 * re-check, last_finish_time update and record insert share one transaction;
 * the action row is locked first so concurrent finishes of the same action
 * queue behind each other.
 */
export async function finishAction(store: Store, input: FinishInput): Promise<PracticeRecord> {
  const { userId, actionId, now } = input;
  try {
    return await store.transaction(async (tx) => {
      const action = await tx.findAction(userId, actionId, { forUpdate: true });
      if (!action) throw new AppError("not_found", "Action not found");

      if (!(await canFinishToday(tx, userId, action.id, now))) {
        throw new AppError("conflict", "Already completed today");
      }

      await tx.setLastFinishTime(action.id, now);
      return tx.insertRecord({ actionId: action.id, finishTime: now, note: input.note ?? null });
    });
  } catch (e) {
    // Lost the race to practice_record_action_day_key.
    if (e instanceof StoreError && e.reason === "unique_violation") {
      throw new AppError("conflict", "Already completed today", { cause: e });
    }
    throw e;
  }
}
