import { test } from "node:test";
import { strict as assert } from "node:assert";
import { AppError, StoreError, toAppError } from "./errors.js";

test("AppError kinds map to HTTP statuses", () => {
  assert.equal(new AppError("unauthorized", "x").statusCode, 401);
  assert.equal(new AppError("not_found", "x").statusCode, 404);
  assert.equal(new AppError("conflict", "x").statusCode, 409);
  assert.equal(new AppError("invalid_request", "x").statusCode, 400);
  assert.equal(new AppError("internal", "x").statusCode, 500);
});

test("payload carries kind and message, issues only when present", () => {
  assert.deepEqual(new AppError("conflict", "Already completed today").toPayload(), {
    error: "conflict",
    message: "Already completed today",
  });
  assert.deepEqual(new AppError("invalid_request", "Invalid request body", { details: { a: 1 } }).toPayload(), {
    error: "invalid_request",
    message: "Invalid request body",
    issues: { a: 1 },
  });
});

test("store constraint errors translate to conflict and not_found", () => {
  const conflict = toAppError(new StoreError("unique_violation", "users_username_key"));
  assert.equal(conflict.kind, "conflict");
  assert.equal(conflict.message, "Resource already exists");

  const missing = toAppError(new StoreError("foreign_key_violation", null));
  assert.equal(missing.kind, "not_found");
});

test("anything else becomes an opaque internal error", () => {
  const original = new Error("connection refused 10.0.0.5:5432");
  const translated = toAppError(original);
  assert.equal(translated.kind, "internal");
  assert.equal(translated.message, "Internal server error");
  assert.equal(translated.cause, original);
});

test("AppError passes through unchanged", () => {
  const e = new AppError("not_found", "Action not found");
  assert.equal(toAppError(e), e);
});
