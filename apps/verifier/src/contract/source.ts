/**
 * Contract file loading
 */

import { readFile } from "fs/promises";
import { ContractSourceError } from "@clauseproof/integrity";
import { snapshotContract, type ContractSnapshot } from "./compare";
import { logger } from "../utils/logger";

/**
 * Read a contract file and snapshot its clauses
 */
export async function loadContract(
  label: string,
  path: string
): Promise<ContractSnapshot> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ContractSourceError(
      path,
      error instanceof Error ? error.message : "Unknown error"
    );
  }

  const snapshot = snapshotContract(label, text);
  logger.info(
    { label, path, clauses: snapshot.clauses.length, root: snapshot.root },
    "Contract loaded"
  );

  return snapshot;
}
