import { createHash } from "crypto";

/**
 * Compute SHA-256 hash of provided content.
 *
 * @param content - Content to hash.
 * @returns Hexadecimal SHA-256 digest.
 */
export function sha256(content: Buffer | string): string {
  return createHash("sha256").update(content).digest("hex");
}
