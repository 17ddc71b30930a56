import { test } from "node:test";
import { strict as assert } from "node:assert";
import jwt from "jsonwebtoken";
import { AppError } from "../errors.js";
import { INSECURE_DEFAULT_JWT_SECRET, TokenService } from "./tokens.js";

const SECRET = "test-secret";

function isUnauthorized(e: unknown): boolean {
  return e instanceof AppError && e.kind === "unauthorized" && e.message === "Invalid token";
}

function base64urlJson(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString("base64url");
}

test("issued token validates back to the user id", () => {
  const tokens = new TokenService({ secret: SECRET });
  assert.equal(tokens.validate(tokens.issue(42)), 42);
});

test("issued token carries no exp and stays valid far in the future", () => {
  const tokens = new TokenService({ secret: SECRET });
  const token = tokens.issue(7);
  const decoded = jwt.decode(token);
  assert.ok(decoded && typeof decoded === "object");
  assert.equal(decoded.exp, undefined);
  assert.equal(decoded.sub, "7");
  assert.equal(tokens.validate(token, new Date("2125-01-01T00:00:00.000Z")), 7);
});

test("default policy ignores a past exp claim", () => {
  const expired = jwt.sign({ sub: "9", exp: 1_000_000 }, SECRET, { algorithm: "HS256" });
  const tokens = new TokenService({ secret: SECRET });
  assert.equal(tokens.expiryPolicy, "ignore");
  assert.equal(tokens.validate(expired), 9);
});

test("enforce policy rejects a past exp claim", () => {
  const expired = jwt.sign({ sub: "9", exp: 1_000_000 }, SECRET, { algorithm: "HS256" });
  const tokens = new TokenService({ secret: SECRET, expiryPolicy: "enforce" });
  assert.throws(() => tokens.validate(expired), isUnauthorized);
});

test("token signed with another secret is rejected", () => {
  const other = new TokenService({ secret: "other-secret" });
  const tokens = new TokenService({ secret: SECRET });
  assert.throws(() => tokens.validate(other.issue(1)), isUnauthorized);
});

test("malformed tokens are rejected", () => {
  const tokens = new TokenService({ secret: SECRET });
  assert.throws(() => tokens.validate("not-a-token"), isUnauthorized);
  assert.throws(() => tokens.validate(""), isUnauthorized);
});

test("unsigned alg=none token is rejected", () => {
  const token = `${base64urlJson({ alg: "none", typ: "JWT" })}.${base64urlJson({ sub: "1" })}.`;
  const tokens = new TokenService({ secret: SECRET });
  assert.throws(() => tokens.validate(token), isUnauthorized);
});

test("missing or non-numeric subject is rejected", () => {
  const tokens = new TokenService({ secret: SECRET });
  assert.throws(() => tokens.validate(jwt.sign({}, SECRET)), isUnauthorized);
  assert.throws(() => tokens.validate(jwt.sign({ sub: "alice" }, SECRET)), isUnauthorized);
  assert.throws(() => tokens.validate(jwt.sign({ sub: "0" }, SECRET)), isUnauthorized);
});

test("tokens minted by earlier deployments on the default secret still validate", () => {
  const legacy = jwt.sign({ sub: "5" }, "ThisISMYSectKeyXHaxx1234", { algorithm: "HS256" });
  const tokens = new TokenService({ secret: INSECURE_DEFAULT_JWT_SECRET });
  assert.equal(tokens.validate(legacy), 5);
});

test("empty secret is refused at construction", () => {
  assert.throws(() => new TokenService({ secret: "" }), /non-empty secret/);
});
