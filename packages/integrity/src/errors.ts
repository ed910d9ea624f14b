/**
 * Error classes for clause integrity
 */

/** Base error class */
export class IntegrityError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "IntegrityError";
  }
}

/** Invalid Merkle proof */
export class InvalidProofError extends IntegrityError {
  constructor(target: string, expectedRoot: string) {
    super(
      `Invalid Merkle proof for ${target} against root ${expectedRoot}`,
      "INVALID_PROOF",
      { target, expectedRoot }
    );
    this.name = "InvalidProofError";
  }
}

/** Contract text could not be read */
export class ContractSourceError extends IntegrityError {
  constructor(source: string, reason: string) {
    super(`Cannot read contract ${source}: ${reason}`, "CONTRACT_SOURCE_ERROR", {
      source,
    });
    this.name = "ContractSourceError";
  }
}

/** Environment failed validation */
export class ConfigurationError extends IntegrityError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", details);
    this.name = "ConfigurationError";
  }
}
