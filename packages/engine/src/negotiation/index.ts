/**
 * Negotiation Module
 *
 * Bilateral sessions between classrooms: the signed message state machine
 * and the engine that drives it to a commitment.
 */

export * from "./state";
export { NegotiationSession, type NegotiationSessionParams } from "./session";
export { NegotiationEngine, type NegotiationEngineOptions, type SessionRequest, type RunSessionOptions } from "./engine";
