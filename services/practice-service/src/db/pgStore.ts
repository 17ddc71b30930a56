import pg from "pg";
import { StoreError } from "../errors.js";
import type { DayWindow, PracticeAction, PracticeRecord, User } from "../types.js";
import { SCHEMA_SQL } from "./schema.js";
import type { ActionCounts, NewAction, NewRecord, NewUser, Store, StoreScope } from "./store.js";

const { Pool, DatabaseError } = pg;

type Query = (text: string, values?: unknown[]) => Promise<pg.QueryResult>;

/** The slice of pg.Pool / pg.PoolClient the store uses. */
export type SqlClient = {
  query: Query;
  release(err?: Error): void;
};

export type SqlPool = {
  query: Query;
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
};

function wrapPool(pool: pg.Pool): SqlPool {
  return {
    query: (text, values) => pool.query(text, values),
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: (err) => client.release(err),
      };
    },
    end: () => pool.end(),
  };
}

// BIGSERIAL and COUNT(*) arrive as strings.
type UserRow = { id: string; username: string; password_hash: string; create_time: Date };
type ActionRow = { id: string; user_id: string; name: string; create_time: Date; last_finish_time: Date | null };
type RecordRow = { id: string; action_id: string; finish_time: Date; note: string | null };
type ActionCountsRow = ActionRow & { total_finished: string; finished_in_window: string };

const ACTION_COLUMNS = "id, user_id, name, create_time, last_finish_time";

function toUser(row: UserRow): User {
  return {
    id: Number(row.id),
    username: row.username,
    passwordHash: row.password_hash,
    createTime: row.create_time,
  };
}

function toAction(row: ActionRow): PracticeAction {
  return {
    id: Number(row.id),
    userId: Number(row.user_id),
    name: row.name,
    createTime: row.create_time,
    lastFinishTime: row.last_finish_time,
  };
}

function toRecord(row: RecordRow): PracticeRecord {
  return {
    id: Number(row.id),
    actionId: Number(row.action_id),
    finishTime: row.finish_time,
    note: row.note,
  };
}

function firstRow<R extends pg.QueryResultRow>(res: pg.QueryResult<R>, what: string): R {
  const row = res.rows[0];
  if (!row) throw new Error(`${what}: no row returned`);
  return row;
}

/** Constraint failures become StoreError; everything else propagates unchanged. */
export function translatePgError(e: unknown): unknown {
  if (e instanceof DatabaseError) {
    if (e.code === "23505") return new StoreError("unique_violation", e.constraint ?? null, { cause: e });
    if (e.code === "23503") return new StoreError("foreign_key_violation", e.constraint ?? null, { cause: e });
  }
  return e;
}

class PgScope implements StoreScope {
  constructor(private readonly query: Query) {}

  private async run<R extends pg.QueryResultRow>(text: string, values: unknown[]): Promise<pg.QueryResult<R>> {
    try {
      return await this.query(text, values);
    } catch (e) {
      throw translatePgError(e);
    }
  }

  async createUser(input: NewUser): Promise<User> {
    const res = await this.run<UserRow>(
      `INSERT INTO users (username, password_hash, create_time)
       VALUES ($1, $2, $3)
       RETURNING id, username, password_hash, create_time`,
      [input.username, input.passwordHash, input.createTime],
    );
    return toUser(firstRow(res, "createUser"));
  }

  async findUserByUsername(username: string): Promise<User | null> {
    const res = await this.run<UserRow>(
      `SELECT id, username, password_hash, create_time FROM users WHERE username = $1`,
      [username],
    );
    const row = res.rows[0];
    return row ? toUser(row) : null;
  }

  async createAction(input: NewAction): Promise<PracticeAction> {
    const res = await this.run<ActionRow>(
      `INSERT INTO practice_action (user_id, name, create_time)
       VALUES ($1, $2, $3)
       RETURNING ${ACTION_COLUMNS}`,
      [input.userId, input.name, input.createTime],
    );
    return toAction(firstRow(res, "createAction"));
  }

  async findAction(userId: number, actionId: number, opts?: { forUpdate?: boolean }): Promise<PracticeAction | null> {
    const res = await this.run<ActionRow>(
      `SELECT ${ACTION_COLUMNS}
       FROM practice_action
       WHERE id = $1 AND user_id = $2${opts?.forUpdate ? " FOR UPDATE" : ""}`,
      [actionId, userId],
    );
    const row = res.rows[0];
    return row ? toAction(row) : null;
  }

  async listActionCounts(userId: number, window: DayWindow): Promise<ActionCounts[]> {
    const res = await this.run<ActionCountsRow>(
      `SELECT a.id, a.user_id, a.name, a.create_time, a.last_finish_time,
              COUNT(r.id) AS total_finished,
              COUNT(r.id) FILTER (WHERE r.finish_time >= $2 AND r.finish_time < $3) AS finished_in_window
       FROM practice_action a
       LEFT JOIN practice_record r ON r.action_id = a.id
       WHERE a.user_id = $1
       GROUP BY a.id`,
      [userId, window.dayStart, window.dayEnd],
    );
    return res.rows.map((row) => ({
      ...toAction(row),
      totalFinished: Number(row.total_finished),
      finishedInWindow: Number(row.finished_in_window),
    }));
  }

  async setLastFinishTime(actionId: number, at: Date): Promise<void> {
    await this.run(`UPDATE practice_action SET last_finish_time = $1 WHERE id = $2`, [at, actionId]);
  }

  async countRecordsInWindow(userId: number, actionId: number, window: DayWindow): Promise<number> {
    const res = await this.run<{ count: string }>(
      `SELECT COUNT(*) AS count
       FROM practice_record r
       JOIN practice_action a ON r.action_id = a.id
       WHERE r.action_id = $1
         AND a.user_id = $2
         AND r.finish_time >= $3 AND r.finish_time < $4`,
      [actionId, userId, window.dayStart, window.dayEnd],
    );
    return Number(firstRow(res, "countRecordsInWindow").count);
  }

  async listRecords(userId: number, actionId: number): Promise<PracticeRecord[]> {
    const res = await this.run<RecordRow>(
      `SELECT r.id, r.action_id, r.finish_time, r.note
       FROM practice_record r
       JOIN practice_action a ON r.action_id = a.id
       WHERE r.action_id = $1 AND a.user_id = $2
       ORDER BY r.finish_time DESC, r.id DESC`,
      [actionId, userId],
    );
    return res.rows.map(toRecord);
  }

  async insertRecord(input: NewRecord): Promise<PracticeRecord> {
    const res = await this.run<RecordRow>(
      `INSERT INTO practice_record (action_id, finish_time, note)
       VALUES ($1, $2, $3)
       RETURNING id, action_id, finish_time, note`,
      [input.actionId, input.finishTime, input.note],
    );
    return toRecord(firstRow(res, "insertRecord"));
  }
}

export type PoolErrorListener = (err: Error) => void;

export class PgStore extends PgScope implements Store {
  private poolErrorListener: PoolErrorListener = (err) => console.error("[pg] idle client error", err);

  constructor(private readonly pool: SqlPool) {
    super((text, values) => pool.query(text, values));
  }

  /** Builds the pool lazily; nothing connects until migrate() or the first query. */
  static create(connectionString: string): PgStore {
    return PgStore.fromPool(new Pool({ connectionString, connectionTimeoutMillis: 5000 }));
  }

  static fromPool(pool: pg.Pool): PgStore {
    const store = new PgStore(wrapPool(pool));
    // An idle client that loses its connection is reported here; without a listener the process exits.
    pool.on("error", (err) => store.poolErrorListener(err));
    return store;
  }

  onPoolError(listener: PoolErrorListener): void {
    this.poolErrorListener = listener;
  }

  async migrate(): Promise<void> {
    await this.pool.query(SCHEMA_SQL);
  }

  async transaction<T>(fn: (tx: StoreScope) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    let broken: Error | undefined;
    try {
      await client.query("BEGIN");
      const result = await fn(new PgScope((text, values) => client.query(text, values)));
      await client.query("COMMIT");
      return result;
    } catch (e) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        // The caller gets the original error; the client is discarded instead of pooled.
        broken = rollbackError instanceof Error ? rollbackError : new Error("ROLLBACK failed");
      }
      throw e;
    } finally {
      client.release(broken);
    }
  }

  close(): Promise<void> {
    return this.pool.end();
  }
}
