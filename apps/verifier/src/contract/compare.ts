/**
 * Contract comparison
 *
 * Snapshots a contract into clause digests and a Merkle root, compares two
 * snapshots clause by clause, and demonstrates inclusion proofs across them.
 */

import {
  buildMerkleTree,
  compareMerkleRoots,
  generateMerkleProof,
  getMerkleRoot,
  hashLeaves,
  verifyMerkleProof,
  type Digest,
  type MerkleTree,
  type ProofStep,
} from "@clauseproof/integrity";
import { extractClauses } from "./clauses";

/** Contract version with its clause digests and tree */
export interface ContractSnapshot {
  label: string;
  clauses: string[];
  hashes: Digest[];
  tree: MerkleTree;
  root: Digest;
}

/** Clause present in both versions at the same position */
export interface ClauseComparison {
  /** 1-based clause number */
  number: number;
  status: "match" | "different";
  base: string;
  revised: string;
}

/** Clauses past the end of the shorter version */
export interface AdditionalClauses {
  source: "base" | "revised";
  clauses: { number: number; text: string }[];
}

export interface ContractComparison {
  identical: boolean;
  /** False when either version has no clauses */
  comparable: boolean;
  clauses: ClauseComparison[];
  additional: AdditionalClauses | null;
}

/** Proof for one clause, checked against its own root and another */
export interface ProofDemonstration {
  clauseIndex: number;
  clause: string;
  digest: Digest;
  proof: ProofStep[];
  verifiedAgainstOwner: boolean;
  verifiedAgainstOther: boolean;
}

/**
 * Split contract text into clauses and commit to them
 */
export function snapshotContract(label: string, text: string): ContractSnapshot {
  const clauses = extractClauses(text);
  const hashes = hashLeaves(clauses);
  const tree = buildMerkleTree(hashes);

  return { label, clauses, hashes, tree, root: getMerkleRoot(tree) };
}

/**
 * Compare two contract versions.
 *
 * Clause detail is only filled in when the roots differ.
 */
export function compareContracts(
  base: ContractSnapshot,
  revised: ContractSnapshot
): ContractComparison {
  const identical = compareMerkleRoots(base.root, revised.root);
  const comparable = base.clauses.length > 0 && revised.clauses.length > 0;

  if (identical || !comparable) {
    return { identical, comparable, clauses: [], additional: null };
  }

  const shared = Math.min(base.hashes.length, revised.hashes.length);
  const clauses: ClauseComparison[] = [];

  for (let i = 0; i < shared; i++) {
    clauses.push({
      number: i + 1,
      status: base.hashes[i] === revised.hashes[i] ? "match" : "different",
      base: base.clauses[i],
      revised: revised.clauses[i],
    });
  }

  let additional: AdditionalClauses | null = null;
  if (base.clauses.length !== revised.clauses.length) {
    const longer = base.clauses.length > revised.clauses.length ? base : revised;
    additional = {
      source: longer === base ? "base" : "revised",
      clauses: longer.clauses
        .slice(shared)
        .map((text, offset) => ({ number: shared + offset + 1, text })),
    };
  }

  return { identical, comparable, clauses, additional };
}

/**
 * Prove a clause of `owner` and check the proof against both roots
 *
 * @returns null when `owner` has no clause at `clauseIndex`
 */
export function demonstrateProof(
  owner: ContractSnapshot,
  other: ContractSnapshot,
  clauseIndex: number
): ProofDemonstration | null {
  if (clauseIndex < 0 || clauseIndex >= owner.hashes.length) {
    return null;
  }

  const digest = owner.hashes[clauseIndex];
  const proof = generateMerkleProof(owner.tree, digest);

  return {
    clauseIndex,
    clause: owner.clauses[clauseIndex],
    digest,
    proof,
    verifiedAgainstOwner: verifyMerkleProof(proof, digest, owner.root),
    verifiedAgainstOther: verifyMerkleProof(proof, digest, other.root),
  };
}

/**
 * Check whether two proofs have the same steps
 */
export function proofsEqual(
  a: readonly ProofStep[],
  b: readonly ProofStep[]
): boolean {
  return (
    a.length === b.length &&
    a.every((step, i) => step.sibling === b[i].sibling && step.side === b[i].side)
  );
}
