import type { StoreScope } from "../db/store.js";
import type { ActionWithStats } from "../types.js";
import { utcDayWindow } from "./calendarDay.js";

/**
 * Display order: still-to-do today first, then most recently finished
 * (never-finished last), then newest created.
 */
export function compareForDisplay(a: ActionWithStats, b: ActionWithStats): number {
  if (a.finishedToday !== b.finishedToday) return a.finishedToday ? 1 : -1;

  const la = a.lastFinishTime?.getTime() ?? null;
  const lb = b.lastFinishTime?.getTime() ?? null;
  if (la !== lb) {
    if (la === null) return 1;
    if (lb === null) return -1;
    return lb - la;
  }

  return b.createTime.getTime() - a.createTime.getTime();
}

export async function listWithStats(store: StoreScope, userId: number, now: Date): Promise<ActionWithStats[]> {
  const rows = await store.listActionCounts(userId, utcDayWindow(now));
  const withStats = rows.map(({ finishedInWindow, ...action }): ActionWithStats => ({
    ...action,
    finishedToday: finishedInWindow > 0,
  }));
  return withStats.sort(compareForDisplay);
}
