/**
 * @clauseproof/integrity
 * Merkle commitments and inclusion proofs over ordered text fragments
 */

export * from "./crypto/merkle";
export * from "./crypto/hash";
export * from "./constants";
export * from "./types";
export * from "./errors";
