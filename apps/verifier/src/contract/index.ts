/**
 * Contract verification module
 */

export { extractClauses } from "./clauses";
export {
  snapshotContract,
  compareContracts,
  demonstrateProof,
  proofsEqual,
  type ContractSnapshot,
  type ContractComparison,
  type ClauseComparison,
  type AdditionalClauses,
  type ProofDemonstration,
} from "./compare";
export {
  formatRoots,
  formatComparison,
  formatProofDemonstration,
  formatMissingClause,
  formatVerificationLog,
} from "./report";
export { buildVerificationSummary, type SummaryOptions } from "./summary";
export { loadContract } from "./source";
