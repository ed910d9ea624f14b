/**
 * Hashing utilities
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import type { Digest } from "../types";

/**
 * Hash data using SHA-256 and return as hex string
 */
export function sha256Hex(data: string | Uint8Array): Digest {
  const input = typeof data === "string" ? utf8ToBytes(data) : data;
  return bytesToHex(sha256(input));
}

/**
 * Hash two digests concatenated, left first
 */
export function hashPair(left: Digest, right: Digest): Digest {
  return sha256Hex(left + right);
}

/**
 * Hash every fragment into a leaf digest, keeping order
 */
export function hashLeaves(fragments: readonly string[]): Digest[] {
  return fragments.map((fragment) => sha256Hex(fragment));
}
