import nacl from "tweetnacl";
import bs58 from "bs58";
import { createHash } from "node:crypto";
import { stableCanonicalize } from "./canonical";
import type { NegotiationMessage } from "./types";

export const ENVELOPE_VERSION = "corridor-envelope/1.0";

export type Keypair = {
  publicKey: Uint8Array;
  secretKey: Uint8Array;
};

export type SignedEnvelope<T = NegotiationMessage> = {
  envelope_version: typeof ENVELOPE_VERSION;
  message: T;
  message_hash_hex: string;
  signer_public_key_b58: string;
  signature_b58: string;
  signed_at_ms: number;
};

/**
 * Derive a keypair from a seed string, so seeded runs sign identically.
 */
export function keypairFromSeed(seed: string): Keypair {
  const digest = createHash("sha256").update(seed, "utf8").digest();
  return nacl.sign.keyPair.fromSeed(new Uint8Array(digest));
}

export function publicKeyB58(keypair: Keypair): string {
  return bs58.encode(keypair.publicKey);
}

/**
 * Hashes the message ONLY (not the envelope), using stable canonical JSON.
 */
export function hashMessage(message: unknown): { hashBytes: Uint8Array; hashHex: string } {
  const canon = stableCanonicalize(message);
  const digest = createHash("sha256").update(canon, "utf8").digest();
  return { hashBytes: new Uint8Array(digest), hashHex: digest.toString("hex") };
}

/**
 * Signs the message hash with Ed25519.
 */
export function signEnvelope<T = NegotiationMessage>(
  message: T,
  keypair: Keypair,
  signedAtMs: number = Date.now()
): SignedEnvelope<T> {
  const { hashBytes, hashHex } = hashMessage(message);
  const sigBytes = nacl.sign.detached(hashBytes, keypair.secretKey);

  return {
    envelope_version: ENVELOPE_VERSION,
    message,
    message_hash_hex: hashHex,
    signer_public_key_b58: bs58.encode(keypair.publicKey),
    signature_b58: bs58.encode(sigBytes),
    signed_at_ms: signedAtMs,
  };
}

/**
 * Verifies:
 * 1) envelope version
 * 2) message_hash_hex matches recomputed hash(message)
 * 3) signature verifies over the hash bytes using signer_public_key_b58
 * 4) when given, the signer is the expected party
 */
export function verifyEnvelope(envelope: SignedEnvelope<unknown>, expectedSignerB58?: string): boolean {
  try {
    if (envelope.envelope_version !== ENVELOPE_VERSION) return false;
    if (expectedSignerB58 !== undefined && envelope.signer_public_key_b58 !== expectedSignerB58) {
      return false;
    }

    const msgHashHex = envelope.message_hash_hex;
    if (typeof msgHashHex !== "string" || msgHashHex.length !== 64) return false;

    const { hashBytes, hashHex } = hashMessage(envelope.message);
    if (hashHex !== msgHashHex.toLowerCase()) return false;

    const pubBytes = bs58.decode(envelope.signer_public_key_b58);
    const sigBytes = bs58.decode(envelope.signature_b58);

    return nacl.sign.detached.verify(hashBytes, sigBytes, pubBytes);
  } catch {
    return false;
  }
}
