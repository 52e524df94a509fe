import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";

/**
 * SHA-256 (hex) of the RFC 8785 canonical JSON form of `value`, so
 * key order never changes the digest.
 */
export function hashCanonical(value: unknown): string {
  return createHash("sha256").update(canonicalize(value)).digest("hex");
}
