import { describe, it, expect } from "vitest";
import {
  stableCanonicalize,
  signEnvelope,
  verifyEnvelope,
  keypairFromSeed,
  publicKeyB58,
  hashMessage,
  type ProposeMessage,
} from "../index";

const propose: ProposeMessage = {
  type: "PROPOSE",
  session_id: "ep-1-s0",
  episode: "ep-1",
  from: "C1",
  to: "C2",
  sent_at_ms: 1000,
  terms: { debtor: "C1", creditor: "C2", time_adjustment: -2, future_obligation: "C2 may extend 2 minutes next episode" },
};

describe("stableCanonicalize", () => {
  it("sorts keys recursively and keeps array order", () => {
    expect(stableCanonicalize({ b: 1, a: { d: [3, 1], c: "x" } })).toBe('{"a":{"c":"x","d":[3,1]},"b":1}');
  });

  it("drops undefined members", () => {
    expect(stableCanonicalize({ a: 1, b: undefined })).toBe('{"a":1}');
  });
});

describe("envelopes", () => {
  const c1 = keypairFromSeed("test-seed:C1");
  const c2 = keypairFromSeed("test-seed:C2");

  it("derives the same keypair from the same seed", () => {
    expect(publicKeyB58(keypairFromSeed("test-seed:C1"))).toBe(publicKeyB58(c1));
    expect(publicKeyB58(c2)).not.toBe(publicKeyB58(c1));
  });

  it("signs and verifies a message", () => {
    const env = signEnvelope(propose, c1, 1234);
    expect(env.envelope_version).toBe("corridor-envelope/1.0");
    expect(env.signed_at_ms).toBe(1234);
    expect(env.message_hash_hex).toBe(hashMessage(propose).hashHex);
    expect(verifyEnvelope(env)).toBe(true);
    expect(verifyEnvelope(env, publicKeyB58(c1))).toBe(true);
  });

  it("rejects the wrong signer", () => {
    const env = signEnvelope(propose, c1);
    expect(verifyEnvelope(env, publicKeyB58(c2))).toBe(false);
  });

  it("rejects a tampered message", () => {
    const env = signEnvelope(propose, c1);
    const tampered = { ...env, message: { ...propose, terms: { ...propose.terms, time_adjustment: -9 } } };
    expect(verifyEnvelope(tampered)).toBe(false);
  });

  it("hashes independently of key order", () => {
    const reordered = { terms: propose.terms, type: propose.type, to: "C2", from: "C1", episode: "ep-1", session_id: "ep-1-s0", sent_at_ms: 1000 };
    expect(hashMessage(reordered).hashHex).toBe(hashMessage(propose).hashHex);
  });
});
