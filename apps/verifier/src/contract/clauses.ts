/**
 * Clause extraction
 *
 * One clause per non-blank line. Lines keep their original spacing so
 * that whitespace edits still change the clause digest.
 */

export function extractClauses(text: string): string[] {
  return text
    .trim()
    .split("\n")
    .filter((line) => line.trim().length > 0);
}
