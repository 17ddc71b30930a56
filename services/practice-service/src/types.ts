export type User = {
  id: number;
  username: string;
  passwordHash: string;
  createTime: Date;
};

export type PracticeAction = {
  id: number;
  userId: number;
  name: string;
  createTime: Date;
  /** Mirrors the finishTime of the newest record; written in the same transaction. */
  lastFinishTime: Date | null;
};

export type PracticeRecord = {
  id: number;
  actionId: number;
  finishTime: Date;
  note: string | null;
};

export type ActionWithStats = PracticeAction & {
  totalFinished: number;
  finishedToday: boolean;
};

/** Half-open UTC day: dayStart <= t < dayEnd */
export type DayWindow = {
  dayStart: Date;
  dayEnd: Date;
  dayKey: string;
};
