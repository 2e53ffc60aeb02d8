/**
 * NegotiationEngine
 *
 * Drives one session per proposal: PROPOSE, the responder's decision, at most
 * one COUNTER, and the final ACCEPT or REJECT. Every agent and capability call
 * is bounded by the session deadline. An accepted session is committed to the
 * ledger while both classrooms are locked.
 */

import type { CorridorConfig } from "../config";
import { KeyedMutex } from "../concurrency/mutex";
import { raceDeadline } from "../concurrency/deadline";
import {
  CancelledError,
  CapabilityUnavailable,
  NegotiationTimeout,
  ParseFailure,
  ProtocolViolationError,
  errorMessage,
} from "../errors";
import type { CommitmentLedger } from "../ledger/ledger";
import { silentLogger, type Logger } from "../logging";
import type { ClassroomAgent, Decision, Offer } from "../policy/types";
import type { Commitment } from "../ledger/types";
import { publicKeyB58, signEnvelope } from "../protocol/envelope";
import type { AcceptMessage, CommitmentTerms, CounterMessage, ProposeMessage, RejectMessage } from "../protocol/types";
import { invokeCapability } from "../text/invoke";
import type { TextCapability, TextContext } from "../text/types";
import { NegotiationSession } from "./session";
import type { FailureCode, NegotiationResult, SessionParties } from "./state";

export interface NegotiationEngineOptions {
  ledger: CommitmentLedger;
  config: CorridorConfig;
  text?: TextCapability;
  /** Registered signing keys by classroom id. Unlisted classrooms verify against their own agent key. */
  directory?: ReadonlyMap<string, string>;
  logger?: Logger;
  now?: () => number;
}

export interface SessionRequest {
  session_id: string;
  episode: string;
  episodeIndex: number;
  initiator: ClassroomAgent;
  responder: ClassroomAgent;
  terms: CommitmentTerms;
}

export interface RunSessionOptions {
  signal?: AbortSignal;
  /** Called once the signed PROPOSE is on the transcript. */
  onProposal?: (message: ProposeMessage) => void;
}

type MessageHeader = Pick<ProposeMessage, "session_id" | "episode" | "from" | "to" | "sent_at_ms">;
type FinalDecision = Exclude<Decision, { type: "COUNTER" }>;
type Within = <T>(work: () => T | Promise<T>) => Promise<T>;

/**
 * An agent callback threw. Ends the session as failed.
 */
class AgentError extends Error {
  constructor(classroom: string, cause: unknown) {
    super(`agent ${classroom} failed: ${errorMessage(cause)}`);
    this.name = "AgentError";
  }
}

export class NegotiationEngine {
  private readonly locks = new KeyedMutex();
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly opts: NegotiationEngineOptions) {
    this.logger = opts.logger ?? silentLogger;
    this.now = opts.now ?? Date.now;
  }

  /**
   * Negotiate one proposal to a terminal result.
   *
   * Protocol outcomes (reject, timeout, cancellation, bad signature) come back
   * as `{ ok: false }`. Ledger integrity errors are thrown.
   */
  async runSession(request: SessionRequest, options: RunSessionOptions = {}): Promise<NegotiationResult> {
    const { initiator, responder } = request;
    const parties: SessionParties = {
      session_id: request.session_id,
      episode: request.episode,
      initiator: initiator.classroom.id,
      responder: responder.classroom.id,
    };
    const session = new NegotiationSession({
      ...parties,
      initiatorKeyB58: this.keyOf(initiator),
      responderKeyB58: this.keyOf(responder),
    });
    const deadlineAt = this.now() + this.opts.config.sessionDeadlineMs;

    const within: Within = async (work) => {
      const remaining = deadlineAt - this.now();
      if (remaining <= 0) throw new NegotiationTimeout(request.session_id, this.opts.config.sessionDeadlineMs);
      const raced = await raceDeadline(Promise.resolve().then(work), remaining, options.signal);
      if (raced.ok) return raced.value;
      if (raced.reason === "cancelled") throw new CancelledError(`Session ${request.session_id} cancelled`);
      throw new NegotiationTimeout(request.session_id, this.opts.config.sessionDeadlineMs);
    };

    let commitment: Commitment | undefined;
    try {
      commitment = await this.drive(session, request, within, options);
    } catch (err) {
      if (err instanceof NegotiationTimeout) {
        session.timeout(this.opts.config.sessionDeadlineMs);
      } else if (err instanceof CancelledError) {
        session.abort("CANCELLED", err.message);
      } else if (err instanceof ProtocolViolationError) {
        this.logger.warn(`Session ${request.session_id}: ${err.message}`);
        session.abort("PROTOCOL_VIOLATION", err.message);
      } else if (err instanceof AgentError) {
        this.logger.warn(`Session ${request.session_id}: ${err.message}`);
        session.abort("AGENT_ERROR", err.message);
      } else {
        throw err;
      }
    }

    const result = session.getResult();
    if (!result) {
      throw new ProtocolViolationError(`Session ${request.session_id} ended without a result`);
    }
    if (!result.ok) {
      this.logger.debug(`Session ${request.session_id} ${result.outcome} (${result.code}): ${result.reason}`);
      return { ...result, ...parties };
    }

    if (!commitment) {
      throw new ProtocolViolationError(`Session ${request.session_id} accepted without a recorded commitment`);
    }
    return { ...result, ...parties, commitment };
  }

  private async drive(
    session: NegotiationSession,
    request: SessionRequest,
    within: Within,
    options: RunSessionOptions
  ): Promise<Commitment | undefined> {
    const { initiator, responder, episode } = request;
    const from = initiator.classroom.id;
    const to = responder.classroom.id;

    // PROPOSE
    const proposalText = await this.render(request.terms, { kind: "proposal", from, to, episode }, within, options.signal);
    const propose: ProposeMessage = {
      type: "PROPOSE",
      session_id: request.session_id,
      episode,
      from,
      to,
      sent_at_ms: this.now(),
      terms: request.terms,
      ...(proposalText !== undefined ? { text: proposalText } : {}),
    };
    if (!session.propose(signEnvelope(propose, initiator.keypair, this.now())).ok) return undefined;
    options.onProposal?.(propose);

    // Responder decides.
    const offer: Offer = {
      session_id: request.session_id,
      episode,
      from,
      terms: request.terms,
      round: "proposal",
      ...(proposalText !== undefined ? { text: proposalText } : {}),
    };
    const decision = await within(() => this.decide(responder, offer));
    if (decision.type !== "COUNTER") {
      return this.answer(session, request, responder, decision);
    }

    // COUNTER: render, then read the terms back from the text.
    const counterContext: TextContext = { kind: "counter", from: to, to: from, episode };
    const counterText = await this.render(decision.terms, counterContext, within, options.signal);
    let counterTerms = decision.terms;
    let degraded = false;
    if (counterText !== undefined && this.opts.text) {
      const parsed = await this.parse(counterText, within, options.signal);
      if (parsed instanceof ParseFailure || !sameParties(parsed, decision.terms)) {
        const reason = parsed instanceof ParseFailure ? parsed.message : "parsed terms name different parties";
        this.logger.warn(`Session ${request.session_id}: counter parse degraded, using structured terms (${reason})`);
        degraded = true;
      } else {
        counterTerms = parsed;
      }
    }

    const counter: CounterMessage = {
      type: "COUNTER",
      session_id: request.session_id,
      episode,
      from: to,
      to: from,
      sent_at_ms: this.now(),
      terms: counterTerms,
      ...(counterText !== undefined ? { text: counterText } : {}),
      ...(degraded ? { degraded_parse: true } : {}),
    };
    if (!session.counter(signEnvelope(counter, responder.keypair, this.now())).ok) return undefined;

    // Initiator answers the counter; only ACCEPT or REJECT remain.
    const reply = await within(() =>
      this.decide(initiator, {
        session_id: request.session_id,
        episode,
        from: to,
        terms: counterTerms,
        round: "counter",
        ...(counterText !== undefined ? { text: counterText } : {}),
      })
    );
    const final: FinalDecision =
      reply.type === "COUNTER" ? { type: "REJECT", reason: "only one counter round is allowed" } : reply;
    return this.answer(session, request, initiator, final);
  }

  /**
   * Send the answering party's ACCEPT or REJECT. ACCEPT happens under both
   * classrooms' locks together with the ledger write.
   */
  private async answer(
    session: NegotiationSession,
    request: SessionRequest,
    party: ClassroomAgent,
    decision: FinalDecision
  ): Promise<Commitment | undefined> {
    if (decision.type === "REJECT") {
      this.sendReject(session, request, party, decision.reason, "REJECTED");
      return undefined;
    }

    const initiator = request.initiator.classroom.id;
    const responder = request.responder.classroom.id;
    return this.locks.runExclusiveAll([initiator, responder], async () => {
      const claimed = [initiator, responder].find((id) => this.opts.ledger.holdsCapacity(id, request.episode));
      if (claimed !== undefined) {
        this.sendReject(session, request, party, `${claimed} already holds a commitment in ${request.episode}`, "CAPACITY_CLAIMED");
        return undefined;
      }

      const terms = session.currentTerms();
      const offerHash = session.currentOfferHash();
      if (!terms || offerHash === undefined) {
        throw new ProtocolViolationError(`Session ${request.session_id} has no offer to accept`);
      }

      const accept: AcceptMessage = {
        type: "ACCEPT",
        ...this.envelopeFields(request, party),
        accepted_hash_hex: offerHash,
      };
      if (!session.accept(signEnvelope(accept, party.keypair, this.now())).ok) return undefined;

      const result = session.getResult();
      return this.opts.ledger.record({
        debtor: terms.debtor,
        creditor: terms.creditor,
        time_adjustment: terms.time_adjustment,
        future_obligation: terms.future_obligation,
        episode: request.episode,
        episode_index: request.episodeIndex,
        due_episode_index: request.episodeIndex + this.opts.config.obligationHorizon,
        session_id: request.session_id,
        proposal_hash_hex: offerHash,
        degraded: result?.ok === true && result.degraded_parse,
      });
    });
  }

  private sendReject(
    session: NegotiationSession,
    request: SessionRequest,
    party: ClassroomAgent,
    reason: string,
    code: FailureCode
  ): void {
    const reject: RejectMessage = {
      type: "REJECT",
      ...this.envelopeFields(request, party),
      reason,
    };
    session.reject(signEnvelope(reject, party.keypair, this.now()), code);
  }

  private envelopeFields(request: SessionRequest, party: ClassroomAgent): MessageHeader {
    const initiator = request.initiator.classroom.id;
    const responder = request.responder.classroom.id;
    const from = party.classroom.id;
    return {
      session_id: request.session_id,
      episode: request.episode,
      from,
      to: from === initiator ? responder : initiator,
      sent_at_ms: this.now(),
    };
  }

  private async decide(agent: ClassroomAgent, offer: Offer): Promise<Decision> {
    try {
      return await agent.respond(offer, this.opts.ledger, this.opts.config);
    } catch (err) {
      throw new AgentError(agent.classroom.id, err);
    }
  }

  /**
   * Render terms to text. Absent or failing capabilities give undefined.
   */
  private async render(
    terms: CommitmentTerms,
    context: TextContext,
    within: Within,
    signal?: AbortSignal
  ): Promise<string | undefined> {
    const text = this.opts.text;
    if (!text) return undefined;
    try {
      return await within(() =>
        invokeCapability(text.name, () => text.generate(terms, context), this.invokeOptions(signal))
      );
    } catch (err) {
      if (err instanceof CapabilityUnavailable) {
        this.logger.warn(`Text capability unavailable, continuing with structured terms: ${err.message}`);
        return undefined;
      }
      throw err;
    }
  }

  private async parse(
    rendered: string,
    within: Within,
    signal?: AbortSignal
  ): Promise<CommitmentTerms | ParseFailure> {
    const text = this.opts.text;
    if (!text) return new ParseFailure("no text capability", rendered);
    try {
      return await within(() => invokeCapability(text.name, () => text.parse(rendered), this.invokeOptions(signal)));
    } catch (err) {
      if (err instanceof CapabilityUnavailable) {
        return new ParseFailure(errorMessage(err), rendered);
      }
      throw err;
    }
  }

  private invokeOptions(signal?: AbortSignal): { timeoutMs: number; retries: number; signal?: AbortSignal } {
    return {
      timeoutMs: this.opts.config.capabilityTimeoutMs,
      retries: this.opts.config.capabilityRetries,
      signal,
    };
  }

  private keyOf(agent: ClassroomAgent): string {
    return this.opts.directory?.get(agent.classroom.id) ?? publicKeyB58(agent.keypair);
  }
}

function sameParties(a: CommitmentTerms, b: CommitmentTerms): boolean {
  return a.debtor === b.debtor && a.creditor === b.creditor;
}
