import jwt, { type JwtPayload } from "jsonwebtoken";
import { AppError } from "../errors.js";

/**
 * Used when JWT_SECRET is unset. Anyone who knows it can mint tokens for any
 * user, so the server logs a warning at startup while it is in effect. The
 * value is fixed: tokens issued by earlier deployments that ran on the
 * default keep validating.
 */
export const INSECURE_DEFAULT_JWT_SECRET = "ThisISMYSectKeyXHaxx1234";

/**
 * "ignore": tokens never expire; exp/nbf are not checked (the service issues
 * none). "enforce": standard exp/nbf checks for tokens that carry them.
 */
export type ExpiryPolicy = "ignore" | "enforce";

export type TokenServiceOptions = {
  secret: string;
  expiryPolicy?: ExpiryPolicy;
};

const ALGORITHM = "HS256";

function parseSubject(sub: unknown): number | null {
  if (typeof sub === "number" && Number.isSafeInteger(sub) && sub > 0) return sub;
  if (typeof sub === "string" && /^[1-9]\d*$/.test(sub)) {
    const n = Number(sub);
    return Number.isSafeInteger(n) ? n : null;
  }
  return null;
}

export class TokenService {
  private readonly secret: string;
  readonly expiryPolicy: ExpiryPolicy;

  constructor(options: TokenServiceOptions) {
    if (!options.secret) throw new Error("TokenService requires a non-empty secret");
    this.secret = options.secret;
    this.expiryPolicy = options.expiryPolicy ?? "ignore";
  }

  issue(userId: number): string {
    return jwt.sign({}, this.secret, { algorithm: ALGORITHM, subject: String(userId) });
  }

  /** Returns the user id bound to the token, or throws AppError("unauthorized"). */
  validate(token: string, now: Date = new Date()): number {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.secret, {
        algorithms: [ALGORITHM],
        ignoreExpiration: this.expiryPolicy === "ignore",
        ignoreNotBefore: this.expiryPolicy === "ignore",
        clockTimestamp: Math.floor(now.getTime() / 1000),
      });
    } catch (e) {
      throw new AppError("unauthorized", "Invalid token", { cause: e });
    }
    if (typeof payload === "string") throw new AppError("unauthorized", "Invalid token");
    const userId = parseSubject(payload.sub);
    if (userId === null) throw new AppError("unauthorized", "Invalid token");
    return userId;
  }
}
