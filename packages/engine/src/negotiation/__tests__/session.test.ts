import { describe, it, expect } from "vitest";
import { NegotiationSession } from "../index";
import { keypairFromSeed, publicKeyB58, signEnvelope } from "../../protocol";
import type { AcceptMessage, CounterMessage, ProposeMessage, RejectMessage } from "../../protocol";
import { ProtocolViolationError } from "../../errors";

const c1 = keypairFromSeed("C1");
const c2 = keypairFromSeed("C2");
const header = { session_id: "ep-0-s0", episode: "ep-0", sent_at_ms: 1_000 };

function newSession(): NegotiationSession {
  return new NegotiationSession({
    session_id: "ep-0-s0",
    episode: "ep-0",
    initiator: "C1",
    responder: "C2",
    initiatorKeyB58: publicKeyB58(c1),
    responderKeyB58: publicKeyB58(c2),
  });
}

const proposal: ProposeMessage = {
  ...header,
  type: "PROPOSE",
  from: "C1",
  to: "C2",
  terms: { debtor: "C1", creditor: "C2", time_adjustment: -4, future_obligation: "C2 may extend its lecture by 4 minutes in episode 1" },
};

const counter: CounterMessage = {
  ...header,
  type: "COUNTER",
  from: "C2",
  to: "C1",
  terms: { ...proposal.terms, time_adjustment: -2 },
};

describe("NegotiationSession", () => {
  it("accepts a proposal and keeps the signed transcript", () => {
    const session = newSession();
    const proposed = signEnvelope(proposal, c1, 1_000);
    expect(session.propose(proposed)).toEqual({ ok: true });
    expect(session.getStatus()).toBe("proposed");

    const accept: AcceptMessage = { ...header, type: "ACCEPT", from: "C2", to: "C1", accepted_hash_hex: proposed.message_hash_hex };
    expect(session.accept(signEnvelope(accept, c2, 1_001))).toEqual({ ok: true });

    const result = session.getResult();
    expect(session.getStatus()).toBe("accepted");
    expect(result?.ok).toBe(true);
    if (result?.ok) {
      expect(result.terms).toEqual(proposal.terms);
      expect(result.accepted_hash_hex).toBe(proposed.message_hash_hex);
      expect(result.degraded_parse).toBe(false);
      expect(result.transcript.map((e) => e.message.type)).toEqual(["PROPOSE", "ACCEPT"]);
    }
  });

  it("lets the initiator answer a counter", () => {
    const session = newSession();
    session.propose(signEnvelope(proposal, c1));
    const countered = signEnvelope({ ...counter, degraded_parse: true }, c2);
    session.counter(countered);
    expect(session.getStatus()).toBe("counter_offered");
    expect(session.currentTerms()?.time_adjustment).toBe(-2);

    const accept: AcceptMessage = { ...header, type: "ACCEPT", from: "C1", to: "C2", accepted_hash_hex: countered.message_hash_hex };
    session.accept(signEnvelope(accept, c1));

    const result = session.getResult();
    expect(result?.ok && result.degraded_parse).toBe(true);
    expect(result?.ok && result.terms.time_adjustment).toBe(-2);
  });

  it("records a rejection with its reason", () => {
    const session = newSession();
    session.propose(signEnvelope(proposal, c1));
    const reject: RejectMessage = { ...header, type: "REJECT", from: "C2", to: "C1", reason: "not today" };
    session.reject(signEnvelope(reject, c2));

    expect(session.getStatus()).toBe("rejected");
    expect(session.getResult()).toMatchObject({ ok: false, outcome: "rejected", code: "REJECTED", reason: "not today" });
  });

  it("refuses messages out of order", () => {
    const session = newSession();
    expect(() => session.counter(signEnvelope(counter, c2))).toThrow(ProtocolViolationError);

    session.propose(signEnvelope(proposal, c1));
    session.counter(signEnvelope(counter, c2));
    expect(() => session.counter(signEnvelope(counter, c2))).toThrow("Cannot COUNTER in session ep-0-s0: session is counter_offered");
  });

  it("refuses a message from the wrong party", () => {
    const session = newSession();
    session.propose(signEnvelope(proposal, c1));
    const accept: AcceptMessage = { ...header, type: "ACCEPT", from: "C1", to: "C2", accepted_hash_hex: "ab".repeat(32) };
    expect(() => session.accept(signEnvelope(accept, c1))).toThrow("ACCEPT in session ep-0-s0 must come from C2, not C1");
  });

  it("refuses an ACCEPT of a stale offer", () => {
    const session = newSession();
    const proposed = signEnvelope(proposal, c1);
    session.propose(proposed);
    session.counter(signEnvelope(counter, c2));
    const accept: AcceptMessage = { ...header, type: "ACCEPT", from: "C1", to: "C2", accepted_hash_hex: proposed.message_hash_hex };
    expect(() => session.accept(signEnvelope(accept, c1))).toThrow("ACCEPT does not reference the current offer");
  });

  it("refuses terms naming outsiders", () => {
    const session = newSession();
    const stray: ProposeMessage = { ...proposal, terms: { ...proposal.terms, creditor: "C9" } };
    expect(() => session.propose(signEnvelope(stray, c1))).toThrow(ProtocolViolationError);
  });

  it("fails on a signature from the wrong key", () => {
    const session = newSession();
    const step = session.propose(signEnvelope(proposal, c2));

    expect(step).toEqual({ ok: false, code: "BAD_SIGNATURE", reason: "PROPOSE from C1 failed signature verification" });
    expect(session.getStatus()).toBe("failed");
    expect(session.getTranscript()).toHaveLength(0);
  });

  it("times out only while open", () => {
    const session = newSession();
    session.propose(signEnvelope(proposal, c1));
    session.timeout(50);
    expect(session.getResult()).toMatchObject({ outcome: "timed_out", code: "NEGOTIATION_TIMEOUT", reason: "deadline of 50ms exceeded" });

    session.abort("CANCELLED", "late");
    expect(session.getStatus()).toBe("timed_out");
  });
});
