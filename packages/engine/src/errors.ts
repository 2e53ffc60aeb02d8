/**
 * Error taxonomy for the coordination engine.
 *
 * Ledger integrity errors are always surfaced. The rest are recovered locally
 * by the component that raises them and only reach callers through logs or
 * degraded results.
 */

export type CorridorErrorCode =
  | "INSUFFICIENT_DATA"
  | "PARSE_FAILURE"
  | "DUPLICATE_COMMITMENT"
  | "UNKNOWN_COMMITMENT"
  | "ALREADY_RESOLVED"
  | "INVALID_COMMITMENT"
  | "NEGOTIATION_TIMEOUT"
  | "CAPABILITY_UNAVAILABLE"
  | "LEDGER_FORMAT"
  | "CONFIG"
  | "CANCELLED"
  | "PROTOCOL_VIOLATION";

export class CorridorError extends Error {
  constructor(public readonly code: CorridorErrorCode, message: string) {
    super(message);
    this.name = "CorridorError";
  }
}

/**
 * No classrooms (or no usable counts) to estimate traffic from.
 * Fatal to the episode, which closes as skipped.
 */
export class InsufficientDataError extends CorridorError {
  constructor(message: string) {
    super("INSUFFICIENT_DATA", message);
    this.name = "InsufficientDataError";
  }
}

/**
 * Text could not be turned back into structured terms.
 */
export class ParseFailure extends CorridorError {
  constructor(message: string, public readonly text?: string) {
    super("PARSE_FAILURE", message);
    this.name = "ParseFailure";
  }
}

export class DuplicateCommitmentError extends CorridorError {
  constructor(
    public readonly debtor: string,
    public readonly creditor: string,
    public readonly episode: string
  ) {
    super(
      "DUPLICATE_COMMITMENT",
      `Commitment ${debtor} -> ${creditor} already recorded for episode ${episode}`
    );
    this.name = "DuplicateCommitmentError";
  }
}

export class UnknownCommitmentError extends CorridorError {
  constructor(public readonly commitmentId: string) {
    super("UNKNOWN_COMMITMENT", `Unknown commitment: ${commitmentId}`);
    this.name = "UnknownCommitmentError";
  }
}

export class AlreadyResolvedError extends CorridorError {
  constructor(public readonly commitmentId: string, public readonly status: string) {
    super("ALREADY_RESOLVED", `Commitment ${commitmentId} is already ${status}`);
    this.name = "AlreadyResolvedError";
  }
}

export class InvalidCommitmentError extends CorridorError {
  constructor(message: string) {
    super("INVALID_COMMITMENT", message);
    this.name = "InvalidCommitmentError";
  }
}

/**
 * A negotiation session ran past its deadline. Equivalent to REJECT.
 */
export class NegotiationTimeout extends CorridorError {
  constructor(public readonly sessionId: string, public readonly deadlineMs: number) {
    super("NEGOTIATION_TIMEOUT", `Session ${sessionId} exceeded deadline of ${deadlineMs}ms`);
    this.name = "NegotiationTimeout";
  }
}

/**
 * An external collaborator (text capability, event sink) failed or is absent.
 */
export class CapabilityUnavailable extends CorridorError {
  constructor(public readonly capability: string, message: string) {
    super("CAPABILITY_UNAVAILABLE", `${capability}: ${message}`);
    this.name = "CapabilityUnavailable";
  }
}

export class LedgerFormatError extends CorridorError {
  constructor(message: string, public readonly errors: Array<{ path: string; message: string }> = []) {
    super("LEDGER_FORMAT", message);
    this.name = "LedgerFormatError";
  }
}

export class ConfigError extends CorridorError {
  constructor(public readonly key: string, message: string) {
    super("CONFIG", `${key}: ${message}`);
    this.name = "ConfigError";
  }
}

export class CancelledError extends CorridorError {
  constructor(message = "Operation cancelled") {
    super("CANCELLED", message);
    this.name = "CancelledError";
  }
}

/**
 * Illegal session transition (wrong phase or order).
 */
export class ProtocolViolationError extends CorridorError {
  constructor(message: string) {
    super("PROTOCOL_VIOLATION", message);
    this.name = "ProtocolViolationError";
  }
}

export type LedgerIntegrityError =
  | DuplicateCommitmentError
  | UnknownCommitmentError
  | AlreadyResolvedError;

export function isLedgerIntegrityError(err: unknown): err is LedgerIntegrityError {
  return (
    err instanceof DuplicateCommitmentError ||
    err instanceof UnknownCommitmentError ||
    err instanceof AlreadyResolvedError
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
