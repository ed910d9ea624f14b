/**
 * Full verification report across contract versions
 *
 * Compares the first version with every other one, demonstrates the proof
 * for one clause of the first two versions, then closes with the
 * verification log for those two.
 */

import type { ProofStep } from "@clauseproof/integrity";
import { compareContracts, demonstrateProof, proofsEqual, type ContractSnapshot } from "./compare";
import {
  formatComparison,
  formatMissingClause,
  formatProofDemonstration,
  formatRoots,
  formatVerificationLog,
} from "./report";

export interface SummaryOptions {
  /** 1-based clause number to prove */
  proofClause: number;
  rootPrefix: number;
}

export function buildVerificationSummary(
  snapshots: readonly ContractSnapshot[],
  options: SummaryOptions
): string[] {
  const [base, revised, ...rest] = snapshots;
  if (base === undefined || revised === undefined) {
    throw new RangeError("At least two contract versions are required");
  }

  const lines = ["--- Overall Contract Comparison (using Merkle Root) ---"];
  lines.push(...formatRoots(snapshots));

  for (const other of [revised, ...rest]) {
    lines.push("", ...formatComparison(base, other, compareContracts(base, other)));
  }

  lines.push("", "--- Merkle Proof Demonstration ---");

  const clauseIndex = options.proofClause - 1;
  const pairs: [ContractSnapshot, ContractSnapshot][] = [
    [base, revised],
    [revised, base],
  ];
  const proofs: ProofStep[][] = [];

  for (const [owner, other] of pairs) {
    const demo = demonstrateProof(owner, other, clauseIndex);
    lines.push("");
    if (demo) {
      lines.push(...formatProofDemonstration(demo, owner, other, options.rootPrefix));
      proofs.push(demo.proof);
    } else {
      lines.push(formatMissingClause(owner.label, options.proofClause));
    }
  }

  lines.push("");
  if (proofs.length === 2) {
    lines.push(
      `Are proofs for Clause ${options.proofClause} (${base.label} vs ${revised.label}) identical? ${proofsEqual(proofs[0], proofs[1]) ? "Yes" : "No"}`
    );
  } else {
    lines.push("Skipping direct proof comparison as one or both proofs could not be generated.");
  }

  lines.push("", ...formatVerificationLog(base, revised));
  return lines;
}
