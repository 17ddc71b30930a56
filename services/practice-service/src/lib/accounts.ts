import type { Store } from "../db/store.js";
import { AppError, StoreError } from "../errors.js";
import type { User } from "../types.js";
import { hashPassword, verifyPassword } from "./passwords.js";
import type { TokenService } from "./tokens.js";

export type AccountDeps = {
  store: Store;
  tokens: TokenService;
  now: () => Date;
  passwordRounds?: number;
};

export type Credentials = { username: string; password: string };
export type Session = { token: string; user: User };

export async function register(deps: AccountDeps, input: Credentials): Promise<Session> {
  const passwordHash = await hashPassword(input.password, deps.passwordRounds);
  let user: User;
  try {
    user = await deps.store.createUser({ username: input.username, passwordHash, createTime: deps.now() });
  } catch (e) {
    if (e instanceof StoreError && e.reason === "unique_violation") {
      throw new AppError("conflict", "Username already taken", { cause: e });
    }
    throw e;
  }
  return { token: deps.tokens.issue(user.id), user };
}

/** Unknown username and wrong password fail identically. */
export async function login(deps: AccountDeps, input: Credentials): Promise<Session> {
  const user = await deps.store.findUserByUsername(input.username);
  if (!user || !(await verifyPassword(input.password, user.passwordHash))) {
    throw new AppError("unauthorized", "Invalid credentials");
  }
  return { token: deps.tokens.issue(user.id), user };
}
