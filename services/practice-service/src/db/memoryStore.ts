import { isWithinWindow } from "../lib/calendarDay.js";
import { StoreError } from "../errors.js";
import type { DayWindow, PracticeAction, PracticeRecord, User } from "../types.js";
import type { ActionCounts, NewAction, NewRecord, NewUser, Store, StoreScope } from "./store.js";

type State = {
  users: User[];
  actions: PracticeAction[];
  records: PracticeRecord[];
  nextId: { user: number; action: number; record: number };
};

/**
 * Rows are replaced, never mutated. A scope opened by a transaction logs an
 * undo step for each of its own writes; ids it handed out are not reused.
 */
class MemoryScope implements StoreScope {
  constructor(
    protected readonly state: State,
    private readonly undo: (() => void)[] | null = null,
  ) {}

  private onRollback(step: () => void): void {
    this.undo?.push(step);
  }

  async createUser(input: NewUser): Promise<User> {
    if (this.state.users.some((u) => u.username === input.username)) {
      throw new StoreError("unique_violation", "users_username_key");
    }
    const user: User = { id: this.state.nextId.user++, ...input };
    this.state.users.push(user);
    this.onRollback(() => {
      this.state.users = this.state.users.filter((u) => u.id !== user.id);
    });
    return user;
  }

  async findUserByUsername(username: string): Promise<User | null> {
    return this.state.users.find((u) => u.username === username) ?? null;
  }

  async createAction(input: NewAction): Promise<PracticeAction> {
    if (!this.state.users.some((u) => u.id === input.userId)) {
      throw new StoreError("foreign_key_violation", "practice_action_user_id_fkey");
    }
    const action: PracticeAction = { id: this.state.nextId.action++, ...input, lastFinishTime: null };
    this.state.actions.push(action);
    this.onRollback(() => {
      this.state.actions = this.state.actions.filter((a) => a.id !== action.id);
    });
    return action;
  }

  async findAction(userId: number, actionId: number): Promise<PracticeAction | null> {
    return this.state.actions.find((a) => a.id === actionId && a.userId === userId) ?? null;
  }

  async listActionCounts(userId: number, window: DayWindow): Promise<ActionCounts[]> {
    return this.state.actions
      .filter((a) => a.userId === userId)
      .map((a) => {
        const records = this.state.records.filter((r) => r.actionId === a.id);
        return {
          ...a,
          totalFinished: records.length,
          finishedInWindow: records.filter((r) => isWithinWindow(r.finishTime, window)).length,
        };
      });
  }

  async setLastFinishTime(actionId: number, at: Date): Promise<void> {
    const previous = this.state.actions.find((a) => a.id === actionId);
    if (!previous) return;
    this.replaceAction(actionId, at);
    this.onRollback(() => this.replaceAction(actionId, previous.lastFinishTime));
  }

  private replaceAction(actionId: number, lastFinishTime: Date | null): void {
    this.state.actions = this.state.actions.map((a) => (a.id === actionId ? { ...a, lastFinishTime } : a));
  }

  async countRecordsInWindow(userId: number, actionId: number, window: DayWindow): Promise<number> {
    if (!(await this.findAction(userId, actionId))) return 0;
    return this.state.records.filter((r) => r.actionId === actionId && isWithinWindow(r.finishTime, window)).length;
  }

  async listRecords(userId: number, actionId: number): Promise<PracticeRecord[]> {
    if (!(await this.findAction(userId, actionId))) return [];
    return this.state.records
      .filter((r) => r.actionId === actionId)
      .sort((a, b) => b.finishTime.getTime() - a.finishTime.getTime() || b.id - a.id);
  }

  async insertRecord(input: NewRecord): Promise<PracticeRecord> {
    if (!this.state.actions.some((a) => a.id === input.actionId)) {
      throw new StoreError("foreign_key_violation", "practice_record_action_id_fkey");
    }
    const record: PracticeRecord = { id: this.state.nextId.record++, ...input };
    this.state.records.push(record);
    this.onRollback(() => {
      this.state.records = this.state.records.filter((r) => r.id !== record.id);
    });
    return record;
  }
}

/**
 * In-process store for local runs (DATA_STORE=memory) and tests. Transactions
 * run one at a time against each other; top-level calls are not queued.
 */
export class MemoryStore extends MemoryScope implements Store {
  private queue: Promise<void> = Promise.resolve();

  constructor() {
    super({ users: [], actions: [], records: [], nextId: { user: 1, action: 1, record: 1 } });
  }

  transaction<T>(fn: (tx: StoreScope) => Promise<T>): Promise<T> {
    const result = this.queue.then(async () => {
      const undo: (() => void)[] = [];
      try {
        return await fn(new MemoryScope(this.state, undo));
      } catch (e) {
        // Only this transaction's writes are reverted; writes made outside it meanwhile stay.
        for (const step of undo.reverse()) step();
        throw e;
      }
    });
    // Failures reach the caller through `result`; the queue only orders work.
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  async close(): Promise<void> {}
}
