/**
 * Constants for the clause integrity protocol
 */

/** Root reported for a tree built from zero leaves */
export const EMPTY_ROOT = "EMPTY_CONTRACT";
