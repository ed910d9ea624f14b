/**
 * Merkle tree implementation for clause commitment
 *
 * Levels are paired left to right. An unpaired last node is paired with
 * itself, so every parent is `hash(left + right)`. Proof generation and
 * verification walk the same pairing.
 */

import { hashPair } from "./hash";
import { EMPTY_ROOT } from "../constants";
import { InvalidProofError } from "../errors";
import {
  ProofSide,
  type Digest,
  type MerkleProof,
  type MerkleTree,
  type ProofResult,
  type ProofStep,
} from "../types";

function nextLayer(layer: readonly Digest[]): Digest[] {
  const parents: Digest[] = [];

  for (let i = 0; i < layer.length; i += 2) {
    const left = layer[i];
    const right = i + 1 < layer.length ? layer[i + 1] : left;
    parents.push(hashPair(left, right));
  }

  return parents;
}

/**
 * Build a Merkle tree from ordered leaf digests
 */
export function buildMerkleTree(leaves: readonly Digest[]): MerkleTree {
  if (leaves.length === 0) {
    return Object.freeze({ leaves: Object.freeze([]), layers: Object.freeze([]) });
  }

  const base = Object.freeze([...leaves]);
  const layers: (readonly Digest[])[] = [base];
  let top: readonly Digest[] = base;

  while (top.length > 1) {
    top = Object.freeze(nextLayer(top));
    layers.push(top);
  }

  return Object.freeze({ leaves: base, layers: Object.freeze(layers) });
}

/**
 * Get the Merkle root, or EMPTY_ROOT for an empty tree
 */
export function getMerkleRoot(tree: MerkleTree): Digest {
  const top = tree.layers[tree.layers.length - 1];
  if (top === undefined || top.length === 0) {
    return EMPTY_ROOT;
  }
  return top[0];
}

/**
 * Compare two Merkle roots
 */
export function compareMerkleRoots(a: Digest, b: Digest): boolean {
  return a === b;
}

/**
 * Index of the first leaf equal to the target, or -1
 */
export function findLeafIndex(tree: MerkleTree, target: Digest): number {
  return tree.leaves.indexOf(target);
}

export function hasLeaf(tree: MerkleTree, target: Digest): boolean {
  return findLeafIndex(tree, target) !== -1;
}

/**
 * Generate a Merkle proof for a leaf digest.
 *
 * Each layer below the root is scanned in build order for the pair holding
 * the running digest. Returns an empty proof when a layer does not contain
 * it; a single-leaf tree also yields an empty proof, use `proveLeaf` to tell
 * the two apart.
 */
export function generateMerkleProof(
  tree: MerkleTree,
  target: Digest
): ProofStep[] {
  if (tree.leaves.length === 0) {
    return [];
  }

  const proof: ProofStep[] = [];
  let current = target;

  for (let level = 0; level < tree.layers.length - 1; level++) {
    const layer = tree.layers[level];
    let found = false;

    for (let i = 0; i < layer.length; i += 2) {
      const left = layer[i];
      const right = i + 1 < layer.length ? layer[i + 1] : left;

      if (current === left) {
        proof.push({ sibling: right, side: ProofSide.Right });
      } else if (current === right) {
        proof.push({ sibling: left, side: ProofSide.Left });
      } else {
        continue;
      }

      current = hashPair(left, right);
      found = true;
      break;
    }

    if (!found) {
      return [];
    }
  }

  return proof;
}

/**
 * Prove membership of a leaf, reporting absence explicitly
 */
export function proveLeaf(tree: MerkleTree, target: Digest): ProofResult {
  const leafIndex = findLeafIndex(tree, target);
  if (leafIndex === -1) {
    return { found: false };
  }

  return { found: true, leafIndex, proof: generateMerkleProof(tree, target) };
}

/**
 * Verify a Merkle proof against an expected root
 */
export function verifyMerkleProof(
  proof: MerkleProof,
  target: Digest,
  expectedRoot: Digest
): boolean {
  let computed = target;

  for (const { sibling, side } of proof) {
    computed =
      side === ProofSide.Left
        ? hashPair(sibling, computed)
        : hashPair(computed, sibling);
  }

  return computed === expectedRoot;
}

/**
 * Verify a Merkle proof and throw if invalid
 */
export function assertValidProof(
  proof: MerkleProof,
  target: Digest,
  expectedRoot: Digest
): void {
  if (!verifyMerkleProof(proof, target, expectedRoot)) {
    throw new InvalidProofError(target, expectedRoot);
  }
}

/**
 * Render a proof on one line as `[(sibling, side), ...]`
 */
export function formatProof(proof: MerkleProof): string {
  return `[${proof.map(({ sibling, side }) => `(${sibling}, ${side})`).join(", ")}]`;
}
