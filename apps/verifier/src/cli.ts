/**
 * Verifier command
 *
 * Loads each contract file as V1, V2, ... and builds the report lines.
 * Printing and exit handling stay in the entry point.
 */

import type { Logger } from "pino";
import { buildVerificationSummary, loadContract, type SummaryOptions } from "./contract";
import { env } from "./utils/env";
import { logger } from "./utils/logger";

export const USAGE = "Usage: npm run verify -- <base.txt> <revised.txt> [more.txt...]";

export interface VerifierResult {
  exitCode: number;
  lines: string[];
}

export async function runVerifier(
  files: readonly string[],
  options: SummaryOptions = {
    proofClause: env.CLAUSEPROOF_PROOF_CLAUSE,
    rootPrefix: env.CLAUSEPROOF_ROOT_PREFIX,
  }
): Promise<VerifierResult> {
  if (files.length < 2) {
    return { exitCode: 1, lines: [USAGE] };
  }

  const snapshots = await Promise.all(
    files.map((file, i) => loadContract(`V${i + 1}`, file))
  );

  const lines = buildVerificationSummary(snapshots, options);
  logger.info({ versions: snapshots.length }, "Verification complete");

  return { exitCode: 0, lines };
}

/**
 * Log a top-level failure under `err` so pino serializes message and stack
 */
export function reportFailure(log: Logger, error: unknown): void {
  log.error({ err: error }, "Verification failed");
}
