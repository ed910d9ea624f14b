/**
 * Core types for clause integrity proofs
 */

/** Lowercase hex SHA-256 digest */
export type Digest = string;

/** Position of a sibling relative to the node being authenticated */
export enum ProofSide {
  Left = "left",
  Right = "right",
}

/** One step of an authentication path */
export interface ProofStep {
  readonly sibling: Digest;
  readonly side: ProofSide;
}

/** Authentication path from a leaf to the root, bottom to top */
export type MerkleProof = readonly ProofStep[];

/** Merkle tree structure. `layers[0]` holds the leaves, the last layer the root. */
export interface MerkleTree {
  readonly leaves: readonly Digest[];
  readonly layers: readonly (readonly Digest[])[];
}

/** Outcome of proving a leaf, separating "absent" from "trivial tree" */
export type ProofResult =
  | { readonly found: true; readonly leafIndex: number; readonly proof: MerkleProof }
  | { readonly found: false };
