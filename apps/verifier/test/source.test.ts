/**
 * Contract Loading Tests
 */

import { describe, it, expect } from "vitest";
import { fileURLToPath } from "url";
import { ContractSourceError, hashLeaves } from "@clauseproof/integrity";
import { loadContract } from "../src/contract/source";

const fixture = (name: string): string =>
  fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe("Contract Loading", () => {
  it("should read clauses from a file", async () => {
    const snapshot = await loadContract("V1", fixture("contract-v1.txt"));

    expect(snapshot.label).toBe("V1");
    expect(snapshot.clauses).toEqual([
      "Clause 1: The buyer pays the full price within 30 days.",
      "Clause 2: The seller provides a 1-year warranty.",
      "Clause 3: Disputes are settled in Oregon.",
    ]);
    expect(snapshot.hashes).toEqual(hashLeaves(snapshot.clauses));
  });

  it("should ignore blank lines when computing the root", async () => {
    const spaced = await loadContract("V1", fixture("contract-v1.txt"));
    const compact = await loadContract("V2", fixture("contract-v2.txt"));

    // Only clause 2 differs between the fixtures
    expect(spaced.hashes[0]).toBe(compact.hashes[0]);
    expect(spaced.hashes[2]).toBe(compact.hashes[2]);
    expect(spaced.root).not.toBe(compact.root);
  });

  it("should wrap read failures in ContractSourceError", async () => {
    const missing = fixture("missing-contract.txt");

    await expect(loadContract("V1", missing)).rejects.toBeInstanceOf(ContractSourceError);
    await expect(loadContract("V1", missing)).rejects.toMatchObject({
      code: "CONTRACT_SOURCE_ERROR",
      details: { source: missing },
    });
  });
});
