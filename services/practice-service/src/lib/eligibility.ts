import type { StoreScope } from "../db/store.js";
import { utcDayWindow } from "./calendarDay.js";

/**
 * True iff the action has no record on now's UTC date. Read-only; pass the
 * transaction scope when the answer gates a write.
 */
export async function canFinishToday(
  store: StoreScope,
  userId: number,
  actionId: number,
  now: Date,
): Promise<boolean> {
  const count = await store.countRecordsInWindow(userId, actionId, utcDayWindow(now));
  return count === 0;
}
