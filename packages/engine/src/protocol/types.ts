/**
 * Negotiation wire messages.
 *
 * Terms are structured; `text` is the optional human-readable rendering from
 * the text capability and is never needed to resolve a session.
 */

export interface CommitmentTerms {
  debtor: string;
  creditor: string;
  /** Signed minutes; negative means the debtor's class exits earlier. */
  time_adjustment: number;
  future_obligation: string;
}

interface MessageBase {
  session_id: string;
  episode: string;
  from: string;
  to: string;
  sent_at_ms: number;
}

export interface ProposeMessage extends MessageBase {
  type: "PROPOSE";
  terms: CommitmentTerms;
  text?: string;
}

export interface CounterMessage extends MessageBase {
  type: "COUNTER";
  terms: CommitmentTerms;
  text?: string;
  degraded_parse?: boolean;
}

export interface AcceptMessage extends MessageBase {
  type: "ACCEPT";
  /** Hash of the PROPOSE or COUNTER being accepted. */
  accepted_hash_hex: string;
}

export interface RejectMessage extends MessageBase {
  type: "REJECT";
  reason: string;
}

export type NegotiationMessage = ProposeMessage | CounterMessage | AcceptMessage | RejectMessage;
export type NegotiationMessageType = NegotiationMessage["type"];
