/**
 * NegotiationSession
 *
 * One bilateral exchange between an initiator and a responder. Holds the
 * signed transcript and enforces the message order:
 *
 *   idle -> proposed -> accepted | rejected | counter_offered
 *   counter_offered -> accepted | rejected
 *   any non-terminal -> timed_out | failed
 *
 * Out-of-order messages throw ProtocolViolationError. An envelope that does
 * not verify against the sender's registered key fails the session.
 */

import { verifyEnvelope, type SignedEnvelope } from "../protocol/envelope";
import type {
  AcceptMessage,
  CommitmentTerms,
  CounterMessage,
  NegotiationMessage,
  ProposeMessage,
  RejectMessage,
} from "../protocol/types";
import { ProtocolViolationError } from "../errors";
import { isTerminal, mapFailureCodeToOutcome, type FailureCode, type SessionResult, type SessionStatus } from "./state";

export interface NegotiationSessionParams {
  session_id: string;
  episode: string;
  initiator: string;
  responder: string;
  /** Base58 public keys the parties must sign with. */
  initiatorKeyB58: string;
  responderKeyB58: string;
}

type Step = { ok: true } | { ok: false; code: FailureCode; reason: string };

export class NegotiationSession {
  private status: SessionStatus = "idle";
  private transcript: SignedEnvelope<NegotiationMessage>[] = [];
  private latestOffer?: SignedEnvelope<ProposeMessage | CounterMessage>;
  private degradedParse = false;
  private terminalResult?: SessionResult;

  constructor(private readonly params: NegotiationSessionParams) {}

  get id(): string {
    return this.params.session_id;
  }

  getStatus(): SessionStatus {
    return this.status;
  }

  getTranscript(): readonly SignedEnvelope<NegotiationMessage>[] {
    return this.transcript;
  }

  getResult(): SessionResult | undefined {
    return this.terminalResult;
  }

  /**
   * Terms on the table: the counter when there is one, else the proposal.
   */
  currentTerms(): CommitmentTerms | undefined {
    return this.latestOffer?.message.terms;
  }

  currentOfferHash(): string | undefined {
    return this.latestOffer?.message_hash_hex;
  }

  propose(envelope: SignedEnvelope<ProposeMessage>): Step {
    this.expect(envelope.message, "PROPOSE", ["idle"], this.params.initiator);
    this.checkTerms(envelope.message.terms);
    const verified = this.admit(envelope, this.params.initiatorKeyB58);
    if (!verified.ok) return verified;

    this.latestOffer = envelope;
    this.status = "proposed";
    return { ok: true };
  }

  counter(envelope: SignedEnvelope<CounterMessage>): Step {
    this.expect(envelope.message, "COUNTER", ["proposed"], this.params.responder);
    this.checkTerms(envelope.message.terms);
    const verified = this.admit(envelope, this.params.responderKeyB58);
    if (!verified.ok) return verified;

    this.latestOffer = envelope;
    this.degradedParse = envelope.message.degraded_parse ?? false;
    this.status = "counter_offered";
    return { ok: true };
  }

  accept(envelope: SignedEnvelope<AcceptMessage>): Step {
    const { sender, key } = this.answeringParty();
    this.expect(envelope.message, "ACCEPT", ["proposed", "counter_offered"], sender);
    const offer = this.latestOffer;
    if (!offer) {
      throw new ProtocolViolationError(`Session ${this.id} has no offer to accept`);
    }
    if (envelope.message.accepted_hash_hex !== offer.message_hash_hex) {
      throw new ProtocolViolationError(`Session ${this.id}: ACCEPT does not reference the current offer`);
    }
    const verified = this.admit(envelope, key);
    if (!verified.ok) return verified;

    this.status = "accepted";
    this.terminalResult = {
      ok: true,
      outcome: "accepted",
      accept: envelope.message,
      terms: { ...offer.message.terms },
      accepted_hash_hex: offer.message_hash_hex,
      degraded_parse: this.degradedParse,
      transcript: [...this.transcript],
    };
    return { ok: true };
  }

  reject(envelope: SignedEnvelope<RejectMessage>, code: FailureCode = "REJECTED"): Step {
    const { sender, key } = this.answeringParty();
    this.expect(envelope.message, "REJECT", ["proposed", "counter_offered"], sender);
    const verified = this.admit(envelope, key);
    if (!verified.ok) return verified;

    this.terminate(code, envelope.message.reason);
    return { ok: true };
  }

  /**
   * Deadline passed. No-op once terminal.
   */
  timeout(deadlineMs: number): void {
    if (isTerminal(this.status)) return;
    this.terminate("NEGOTIATION_TIMEOUT", `deadline of ${deadlineMs}ms exceeded`);
  }

  /**
   * End the session without a message from either party (cancellation,
   * agent error, protocol violation). No-op once terminal.
   */
  abort(code: FailureCode, reason: string): void {
    if (isTerminal(this.status)) return;
    this.terminate(code, reason);
  }

  private answeringParty(): { sender: string; key: string } {
    return this.status === "counter_offered"
      ? { sender: this.params.initiator, key: this.params.initiatorKeyB58 }
      : { sender: this.params.responder, key: this.params.responderKeyB58 };
  }

  private expect(
    message: NegotiationMessage,
    type: NegotiationMessage["type"],
    allowed: SessionStatus[],
    sender: string
  ): void {
    if (message.type !== type) {
      throw new ProtocolViolationError(`Expected ${type} message, got ${message.type}`);
    }
    if (!allowed.includes(this.status)) {
      throw new ProtocolViolationError(`Cannot ${type} in session ${this.id}: session is ${this.status}`);
    }
    if (message.session_id !== this.id || message.episode !== this.params.episode) {
      throw new ProtocolViolationError(`${type} addressed to session ${message.session_id}, not ${this.id}`);
    }
    if (message.from !== sender) {
      throw new ProtocolViolationError(`${type} in session ${this.id} must come from ${sender}, not ${message.from}`);
    }
  }

  private checkTerms(terms: CommitmentTerms): void {
    const parties = [this.params.initiator, this.params.responder];
    if (terms.debtor === terms.creditor || !parties.includes(terms.debtor) || !parties.includes(terms.creditor)) {
      throw new ProtocolViolationError(
        `Terms ${terms.debtor} -> ${terms.creditor} do not match session parties ${parties.join(", ")}`
      );
    }
  }

  private admit(envelope: SignedEnvelope<NegotiationMessage>, expectedKeyB58: string): Step {
    if (!verifyEnvelope(envelope, expectedKeyB58)) {
      const reason = `${envelope.message.type} from ${envelope.message.from} failed signature verification`;
      this.terminate("BAD_SIGNATURE", reason);
      return { ok: false, code: "BAD_SIGNATURE", reason };
    }
    this.transcript.push(envelope);
    return { ok: true };
  }

  private terminate(code: FailureCode, reason: string): void {
    const outcome = mapFailureCodeToOutcome(code);
    this.status = outcome;
    this.terminalResult = {
      ok: false,
      outcome,
      code,
      reason,
      transcript: [...this.transcript],
    };
  }
}
