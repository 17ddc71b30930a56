import { test } from "node:test";
import { strict as assert } from "node:assert";
import { MemoryStore } from "../db/memoryStore.js";
import { canFinishToday } from "./eligibility.js";
import { finishAction } from "./recorder.js";

async function seed() {
  const store = new MemoryStore();
  const user = await store.createUser({ username: "alice", passwordHash: "x", createTime: new Date("2026-03-01T00:00:00Z") });
  const action = await store.createAction({ userId: user.id, name: "Scales", createTime: new Date("2026-03-01T00:00:00Z") });
  return { store, userId: user.id, actionId: action.id };
}

test("action with no records is eligible at any time", async () => {
  const { store, userId, actionId } = await seed();
  for (const iso of ["2026-03-01T00:00:00Z", "2026-03-10T23:59:59Z", "2030-01-01T12:00:00Z"]) {
    assert.equal(await canFinishToday(store, userId, actionId, new Date(iso)), true);
  }
});

test("finished on a date blocks that whole UTC date only", async () => {
  const { store, userId, actionId } = await seed();
  await finishAction(store, { userId, actionId, now: new Date("2026-03-10T23:30:00.000Z") });

  assert.equal(await canFinishToday(store, userId, actionId, new Date("2026-03-10T00:00:00.000Z")), false);
  assert.equal(await canFinishToday(store, userId, actionId, new Date("2026-03-10T23:59:59.999Z")), false);
  assert.equal(await canFinishToday(store, userId, actionId, new Date("2026-03-11T00:00:00.000Z")), true);
  assert.equal(await canFinishToday(store, userId, actionId, new Date("2026-03-09T23:59:59.999Z")), true);
});

test("eligibility check does not write", async () => {
  const { store, userId, actionId } = await seed();
  await canFinishToday(store, userId, actionId, new Date("2026-03-10T08:00:00Z"));
  assert.deepEqual(await store.listRecords(userId, actionId), []);
  assert.equal((await store.findAction(userId, actionId))?.lastFinishTime, null);
});
