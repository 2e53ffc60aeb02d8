import type { SignedEnvelope } from "../protocol/envelope";
import type { AcceptMessage, CommitmentTerms, NegotiationMessage } from "../protocol/types";
import type { Commitment } from "../ledger/types";

export type SessionStatus =
  | "idle"
  | "proposed"
  | "counter_offered"
  | "accepted"
  | "rejected"
  | "timed_out"
  | "failed";

export type TerminalOutcome = "accepted" | "rejected" | "timed_out" | "failed";

export type FailureCode =
  | "REJECTED"
  | "CAPACITY_CLAIMED"
  | "NEGOTIATION_TIMEOUT"
  | "CANCELLED"
  | "BAD_SIGNATURE"
  | "PROTOCOL_VIOLATION"
  | "AGENT_ERROR";

export interface SessionResultSuccess {
  ok: true;
  outcome: "accepted";
  accept: AcceptMessage;
  terms: CommitmentTerms;
  /** Hash of the PROPOSE or COUNTER that was accepted. */
  accepted_hash_hex: string;
  degraded_parse: boolean;
  transcript: SignedEnvelope<NegotiationMessage>[];
}

export interface SessionResultFailure {
  ok: false;
  outcome: Exclude<TerminalOutcome, "accepted">;
  code: FailureCode;
  reason: string;
  transcript: SignedEnvelope<NegotiationMessage>[];
}

export type SessionResult = SessionResultSuccess | SessionResultFailure;

export interface SessionParties {
  session_id: string;
  episode: string;
  initiator: string;
  responder: string;
}

/**
 * What the engine hands back for one proposal. An accepted session carries
 * the commitment the ledger recorded.
 */
export type NegotiationResult =
  | (SessionResultSuccess & SessionParties & { commitment: Commitment })
  | (SessionResultFailure & SessionParties);

export function isTerminal(status: SessionStatus): boolean {
  return status === "accepted" || status === "rejected" || status === "timed_out" || status === "failed";
}

/**
 * Cancellation and a refused capacity claim both count as REJECT.
 */
export function mapFailureCodeToOutcome(code: FailureCode): Exclude<TerminalOutcome, "accepted"> {
  switch (code) {
    case "NEGOTIATION_TIMEOUT":
      return "timed_out";
    case "REJECTED":
    case "CAPACITY_CLAIMED":
    case "CANCELLED":
      return "rejected";
    case "BAD_SIGNATURE":
    case "PROTOCOL_VIOLATION":
    case "AGENT_ERROR":
      return "failed";
  }
}
