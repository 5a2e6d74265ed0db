/**
 * Clinic Management - Password Hashing
 *
 * scrypt from node:crypto. Stored form: `scrypt$N$r$p$salt$hash`, base64url salt and hash.
 * Fits the 255-character `users.password_hash` column.
 */

import { scrypt, randomBytes, timingSafeEqual, type ScryptOptions } from "node:crypto";

const SALT_BYTES = 16;
const KEY_BYTES = 64;
const COST: Required<Pick<ScryptOptions, "N" | "r" | "p">> = { N: 16384, r: 8, p: 1 };

function deriveKey(
  password: string,
  salt: Buffer,
  keyLength: number,
  options: ScryptOptions,
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, keyLength, options, (err, key) => (err ? reject(err) : resolve(key)));
  });
}

export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SALT_BYTES);
  const key = await deriveKey(password, salt, KEY_BYTES, COST);
  return ["scrypt", COST.N, COST.r, COST.p, salt.toString("base64url"), key.toString("base64url")].join(
    "$",
  );
}

/**
 * Check a plain-text password against a stored hash.
 * Malformed or foreign hash formats never match.
 */
export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const [scheme, n, r, p, salt, hash] = stored.split("$");
  if (scheme !== "scrypt" || !n || !r || !p || !salt || !hash) return false;

  const cost = { N: Number(n), r: Number(r), p: Number(p) };
  if (!Object.values(cost).every((v) => Number.isInteger(v) && v > 0)) return false;
  // scrypt's cost must be a power of two above 1
  if (cost.N < 2 || (cost.N & (cost.N - 1)) !== 0) return false;

  const expected = Buffer.from(hash, "base64url");
  if (expected.length === 0) return false;

  const actual = await deriveKey(password, Buffer.from(salt, "base64url"), expected.length, cost);
  return timingSafeEqual(actual, expected);
}
