/**
 * Contract Verifier
 *
 * Usage: npm run verify -- <base.txt> <revised.txt> [more.txt...]
 *
 * Commits each contract version to a Merkle root, reports clause-level
 * differences against the first version and demonstrates inclusion proofs.
 */

import { reportFailure, runVerifier } from "./cli";
import { logger } from "./utils/logger";

async function main(): Promise<void> {
  const { exitCode, lines } = await runVerifier(process.argv.slice(2));

  if (exitCode === 0) {
    console.log(lines.join("\n"));
  } else {
    console.error(lines.join("\n"));
  }
  process.exitCode = exitCode;
}

main().catch((error) => {
  reportFailure(logger, error);
  process.exit(1);
});
