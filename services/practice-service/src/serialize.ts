import { toEpochSeconds } from "./lib/calendarDay.js";
import type { ActionWithStats, PracticeAction, PracticeRecord, User } from "./types.js";

// Wire shapes: snake_case keys, timestamps as integer epoch seconds.

export type WireUser = { id: number; username: string; create_time: number };

export type WireAction = {
  id: number;
  user_id: number;
  name: string;
  create_time: number;
  last_finish_time: number | null;
};

export type WireActionWithStats = WireAction & { total_finished: number; finished_today: boolean };

export type WireRecord = { id: number; action_id: number; finish_time: number; note: string | null };

export function toWireUser(user: User): WireUser {
  return { id: user.id, username: user.username, create_time: toEpochSeconds(user.createTime) };
}

export function toWireAction(action: PracticeAction): WireAction {
  return {
    id: action.id,
    user_id: action.userId,
    name: action.name,
    create_time: toEpochSeconds(action.createTime),
    last_finish_time: action.lastFinishTime ? toEpochSeconds(action.lastFinishTime) : null,
  };
}

export function toWireActionWithStats(action: ActionWithStats): WireActionWithStats {
  return {
    ...toWireAction(action),
    total_finished: action.totalFinished,
    finished_today: action.finishedToday,
  };
}

export function toWireRecord(record: PracticeRecord): WireRecord {
  return {
    id: record.id,
    action_id: record.actionId,
    finish_time: toEpochSeconds(record.finishTime),
    note: record.note,
  };
}
