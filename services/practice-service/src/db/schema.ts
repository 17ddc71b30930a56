/**
 * Applied on every startup; each statement is idempotent.
 * practice_record_action_day_key backs up the in-transaction eligibility
 * check: one record per action per UTC date.
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS users (
  id BIGSERIAL PRIMARY KEY,
  username TEXT NOT NULL UNIQUE,
  password_hash TEXT NOT NULL,
  create_time TIMESTAMPTZ NOT NULL
);

CREATE TABLE IF NOT EXISTS practice_action (
  id BIGSERIAL PRIMARY KEY,
  user_id BIGINT NOT NULL REFERENCES users(id),
  name TEXT NOT NULL,
  create_time TIMESTAMPTZ NOT NULL,
  last_finish_time TIMESTAMPTZ
);

CREATE INDEX IF NOT EXISTS practice_action_user_id_idx ON practice_action (user_id);

CREATE TABLE IF NOT EXISTS practice_record (
  id BIGSERIAL PRIMARY KEY,
  action_id BIGINT NOT NULL REFERENCES practice_action(id),
  finish_time TIMESTAMPTZ NOT NULL,
  note TEXT
);

CREATE UNIQUE INDEX IF NOT EXISTS practice_record_action_day_key
  ON practice_record (action_id, ((finish_time AT TIME ZONE 'UTC')::date));
`;
