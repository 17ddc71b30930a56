import type { DayWindow, PracticeAction, PracticeRecord, User } from "../types.js";

export type NewUser = { username: string; passwordHash: string; createTime: Date };
export type NewAction = { userId: number; name: string; createTime: Date };
export type NewRecord = { actionId: number; finishTime: Date; note: string | null };

export type ActionCounts = PracticeAction & {
  totalFinished: number;
  finishedInWindow: number;
};

/**
 * Every read that takes a userId filters by owner: a row belonging to someone
 * else is indistinguishable from a missing one.
 */
export interface StoreScope {
  createUser(input: NewUser): Promise<User>;
  findUserByUsername(username: string): Promise<User | null>;

  createAction(input: NewAction): Promise<PracticeAction>;
  /** forUpdate locks the row until the surrounding transaction ends. */
  findAction(userId: number, actionId: number, opts?: { forUpdate?: boolean }): Promise<PracticeAction | null>;
  listActionCounts(userId: number, window: DayWindow): Promise<ActionCounts[]>;
  setLastFinishTime(actionId: number, at: Date): Promise<void>;

  countRecordsInWindow(userId: number, actionId: number, window: DayWindow): Promise<number>;
  listRecords(userId: number, actionId: number): Promise<PracticeRecord[]>;
  insertRecord(input: NewRecord): Promise<PracticeRecord>;
}

export interface Store extends StoreScope {
  /** Runs fn atomically: every write made through tx commits together or not at all. */
  transaction<T>(fn: (tx: StoreScope) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
