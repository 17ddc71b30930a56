import bcrypt from "bcryptjs";

export const BCRYPT_ROUNDS = 10;

export function hashPassword(password: string, rounds: number = BCRYPT_ROUNDS): Promise<string> {
  return bcrypt.hash(password, rounds);
}

/** False for a mismatch and for a malformed hash. */
export async function verifyPassword(password: string, hash: string): Promise<boolean> {
  try {
    return await bcrypt.compare(password, hash);
  } catch {
    return false;
  }
}
