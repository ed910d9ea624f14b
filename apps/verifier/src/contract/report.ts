/**
 * Human-readable report lines
 */

import { formatProof } from "@clauseproof/integrity";
import type {
  ContractComparison,
  ContractSnapshot,
  ProofDemonstration,
} from "./compare";

function status(passed: boolean): string {
  return passed ? "PASSED" : "FAILED";
}

function shortRoot(root: string, prefix: number): string {
  return `${root.slice(0, prefix)}...`;
}

export function formatRoots(snapshots: readonly ContractSnapshot[]): string[] {
  return snapshots.map((s) => `${s.label} Root: ${s.root}`);
}

/**
 * Overall verdict, then clause detail when the versions differ
 */
export function formatComparison(
  base: ContractSnapshot,
  revised: ContractSnapshot,
  comparison: ContractComparison
): string[] {
  const lines = [
    `${base.label} vs ${revised.label}: ${comparison.identical ? "Identical" : "Different"}`,
  ];

  if (!comparison.comparable) {
    lines.push("Cannot perform clause-level comparison due to empty clause lists.");
    return lines;
  }

  if (comparison.identical) {
    return lines;
  }

  lines.push("", "Clause-Level Comparison:");
  for (const clause of comparison.clauses) {
    if (clause.status === "match") {
      lines.push(`Clause ${clause.number}: Match`);
    } else {
      lines.push(
        `Clause ${clause.number}: Difference`,
        `   ${base.label}: ${clause.base}`,
        `   ${revised.label}: ${clause.revised}`
      );
    }
  }

  if (comparison.additional) {
    const label =
      comparison.additional.source === "base" ? base.label : revised.label;
    lines.push("", "Additional Clauses:", `   ${label} has additional clauses:`);
    for (const extra of comparison.additional.clauses) {
      lines.push(`      Clause ${extra.number}: ${extra.text}`);
    }
  }

  return lines;
}

export function formatProofDemonstration(
  demo: ProofDemonstration,
  owner: ContractSnapshot,
  other: ContractSnapshot,
  rootPrefix: number
): string[] {
  return [
    `Generating proof for: '${demo.clause}' (Clause ${demo.clauseIndex + 1}) in ${owner.label}`,
    `Proof: ${formatProof(demo.proof)}`,
    `Verification against ${owner.label} Root (${shortRoot(owner.root, rootPrefix)}): ${status(demo.verifiedAgainstOwner)}`,
    `Verification against ${other.label} Root (${shortRoot(other.root, rootPrefix)}): ${status(demo.verifiedAgainstOther)}`,
  ];
}

export function formatMissingClause(label: string, clauseNumber: number): string {
  return `Cannot demonstrate proof for Clause ${clauseNumber} in ${label} (not enough clauses).`;
}

export function formatVerificationLog(
  base: ContractSnapshot,
  revised: ContractSnapshot
): string[] {
  const identical = base.root === revised.root;
  return [
    "[Verification Log]",
    `Root ${base.label}: ${base.root}`,
    `Root ${revised.label}: ${revised.root}`,
    `Status: ${identical ? "Identical" : "Different"}`,
  ];
}
