/**
 * EpisodeOrchestrator
 *
 * Runs one coordination episode through its phases:
 *
 *   monitor -> assess -> negotiate -> execute -> record -> closed
 *
 * Phases never overlap and episodes are never pipelined. Cancellation is
 * checked between phases and handed to every negotiation session. Whatever
 * happens, the episode is recorded and the ledger saved before returning.
 */

import type { CorridorConfig } from "../config";
import { runPool } from "../concurrency/pool";
import { throwIfAborted } from "../concurrency/deadline";
import { CancelledError, InsufficientDataError, errorMessage, isLedgerIntegrityError } from "../errors";
import type { EventBus } from "../events/bus";
import type { Phase } from "../events/types";
import type { CommitmentLedger } from "../ledger/ledger";
import type { Commitment, EpisodeRecord, EpisodeStatus } from "../ledger/types";
import { silentLogger, type Logger } from "../logging";
import type { NegotiationEngine } from "../negotiation/engine";
import type { NegotiationResult } from "../negotiation/state";
import type { ClassroomAgent, Intent } from "../policy/types";
import { estimateTraffic } from "../traffic/estimate";
import type { TrafficState } from "../traffic/types";
import { exitSchedule, firstBatchMinute } from "./schedule";

export interface EpisodeOrchestratorOptions {
  ledger: CommitmentLedger;
  engine: NegotiationEngine;
  bus: EventBus;
  config: CorridorConfig;
  /** Source of every random choice the agents make. */
  rng: () => number;
  logger?: Logger;
  now?: () => number;
}

export interface EpisodeSummary {
  id: string;
  index: number;
  status: EpisodeStatus;
  reason?: string;
  created: number;
  resolved: number;
  violations: number;
}

type ProposeIntent = Extract<Intent, { kind: "propose" }>;

export function episodeId(index: number): string {
  return `ep-${index}`;
}

export class EpisodeOrchestrator {
  private phase?: Phase;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly opts: EpisodeOrchestratorOptions) {
    this.logger = opts.logger ?? silentLogger;
    this.now = opts.now ?? Date.now;
  }

  currentPhase(): Phase | undefined {
    return this.phase;
  }

  async runEpisode(index: number, agents: readonly ClassroomAgent[], signal?: AbortSignal): Promise<EpisodeSummary> {
    const id = episodeId(index);
    const record: EpisodeRecord = {
      id,
      index,
      status: "closed",
      created: [],
      resolved: [],
      attempts: [],
      closed_at: "",
    };
    let violations = 0;

    try {
      throwIfAborted(signal);
      const traffic = this.monitor(id, agents);
      record.traffic = traffic;

      throwIfAborted(signal);
      const proposals = await this.assess(id, index, traffic, agents);

      throwIfAborted(signal);
      const created = await this.negotiate(id, index, proposals, agents, record, signal);

      throwIfAborted(signal);
      violations = await this.execute(id, index, traffic, agents, created, record);
    } catch (err) {
      if (err instanceof InsufficientDataError) {
        record.status = "skipped";
        record.reason = err.message;
      } else if (err instanceof CancelledError) {
        record.status = "cancelled";
        record.reason = err.message;
        this.logger.info(`Episode ${id} cancelled`);
      } else if (isLedgerIntegrityError(err)) {
        record.status = "aborted";
        record.reason = err.message;
        this.logger.error(`Episode ${id} aborted: ${err.message}`);
      } else {
        record.status = "aborted";
        record.reason = errorMessage(err);
        this.logger.error(`Episode ${id} aborted by unexpected error:`, err);
      }
    }

    await this.record(id, record);
    return {
      id,
      index,
      status: record.status,
      ...(record.reason !== undefined ? { reason: record.reason } : {}),
      created: record.created.length,
      resolved: record.resolved.length,
      violations,
    };
  }

  private enter(episode: string, phase: Phase, traffic?: TrafficState): void {
    this.phase = phase;
    this.logger.debug(`${episode}: ${phase}`);
    this.opts.bus.emit(episode, { type: "phase_started", phase, ...(traffic ? { traffic } : {}) });
  }

  private monitor(episode: string, agents: readonly ClassroomAgent[]): TrafficState {
    this.enter(episode, "monitor");
    const traffic = estimateTraffic(
      agents.map((a) => a.classroom),
      this.opts.config.capacity,
      this.now()
    );
    this.logger.info(
      `${episode}: ${traffic.total_students} students, congestion ratio ${traffic.congestion_ratio.toFixed(2)}`
    );
    return traffic;
  }

  private async assess(
    episode: string,
    index: number,
    traffic: TrafficState,
    agents: readonly ClassroomAgent[]
  ): Promise<ProposeIntent[]> {
    this.enter(episode, "assess", traffic);
    const classrooms = agents.map((a) => a.classroom);
    const proposals: ProposeIntent[] = [];

    const cap = this.opts.config.maxProposalsPerEpisode;
    for (const agent of agents) {
      const proposedTo: string[] = [];
      while (proposedTo.length < cap) {
        const intent = await agent.propose(traffic, this.opts.ledger, {
          episode,
          episodeIndex: index,
          classrooms,
          proposalsMade: proposedTo.length,
          proposedTo: [...proposedTo],
          config: this.opts.config,
        });
        if (intent.kind === "idle") {
          this.logger.debug(`${episode}: ${intent.classroom} idle (${intent.reason})`);
          break;
        }
        if (proposedTo.includes(intent.target)) {
          this.logger.warn(`${episode}: ${intent.classroom} proposed to ${intent.target} twice, ignoring the repeat`);
          break;
        }
        proposedTo.push(intent.target);
        proposals.push(intent);
      }
    }
    return proposals;
  }

  private async negotiate(
    episode: string,
    index: number,
    proposals: readonly ProposeIntent[],
    agents: readonly ClassroomAgent[],
    record: EpisodeRecord,
    signal?: AbortSignal
  ): Promise<Commitment[]> {
    this.enter(episode, "negotiate");
    const byId = new Map(agents.map((a) => [a.classroom.id, a]));

    const tasks = proposals.flatMap((intent, n) => {
      const initiator = byId.get(intent.classroom);
      const responder = byId.get(intent.target);
      if (!initiator || !responder) {
        this.logger.warn(`${episode}: dropping proposal ${intent.classroom} -> ${intent.target}, unknown classroom`);
        return [];
      }
      const session_id = `${episode}-s${n}`;
      return [
        () =>
          this.opts.engine.runSession(
            { session_id, episode, episodeIndex: index, initiator, responder, terms: intent.terms },
            {
              signal,
              onProposal: (message) => {
                this.opts.bus.emit(episode, {
                  type: "proposal_made",
                  session_id,
                  from: message.from,
                  to: message.to,
                  terms: message.terms,
                  ...(message.text !== undefined ? { text: message.text } : {}),
                });
              },
            }
          ),
      ];
    });

    const settled = await runPool(tasks, this.opts.config.maxConcurrentSessions);

    const created: Commitment[] = [];
    let failure: unknown;
    for (const outcome of settled) {
      if (outcome.status === "rejected") {
        if (failure === undefined) failure = outcome.reason;
        continue;
      }
      this.settle(episode, outcome.value, agents, record, created);
    }
    if (failure !== undefined) {
      throw failure;
    }
    return created;
  }

  private settle(
    episode: string,
    result: NegotiationResult,
    agents: readonly ClassroomAgent[],
    record: EpisodeRecord,
    created: Commitment[]
  ): void {
    record.attempts.push({
      session_id: result.session_id,
      initiator: result.initiator,
      responder: result.responder,
      outcome: result.outcome,
      ...(result.ok ? {} : { code: result.code }),
    });
    this.opts.bus.emit(episode, {
      type: "negotiation_resolved",
      session_id: result.session_id,
      initiator: result.initiator,
      responder: result.responder,
      outcome: result.outcome,
      ...(result.ok ? {} : { code: result.code, reason: result.reason }),
    });
    if (!result.ok) return;

    const commitment = result.commitment;
    created.push(commitment);
    record.created.push(commitment.id);
    this.opts.bus.emit(episode, { type: "commitment_created", commitment });

    const minutes = Math.abs(commitment.time_adjustment);
    const direction = commitment.time_adjustment < 0 ? "earlier" : "later";
    const message = `${commitment.debtor} releases ${minutes} minute${minutes === 1 ? "" : "s"} ${direction} for ${commitment.creditor}; ${commitment.future_obligation}`;
    for (const agent of agents) {
      const recipient = agent.classroom.id;
      if (recipient === commitment.debtor || recipient === commitment.creditor) continue;
      this.opts.bus.emit(episode, { type: "commitment_broadcast", recipient, commitment_id: commitment.id, message });
    }
  }

  /**
   * Settle the obligations that fall due and lay out the exit batches.
   *
   * Each due creditor claims its extension. A debtor that gives way holds its
   * own release until the creditor's; the schedule then shows whether it
   * actually left first, which decides fulfilled or violated. Returns the
   * number of strike-limit violation events raised.
   */
  private async execute(
    episode: string,
    index: number,
    traffic: TrafficState,
    agents: readonly ClassroomAgent[],
    created: readonly Commitment[],
    record: EpisodeRecord
  ): Promise<number> {
    this.enter(episode, "execute");
    const { config, ledger, bus } = this.opts;
    const byId = new Map(agents.map((a) => [a.classroom.id, a]));

    const adjustments = new Map<string, number>();
    const shift = (id: string, minutes: number): void => {
      adjustments.set(id, (adjustments.get(id) ?? 0) + minutes);
    };
    for (const c of created) shift(c.debtor, c.time_adjustment);

    const claims: Array<{ commitment: Commitment; gaveWay: boolean }> = [];
    for (const commitment of ledger.dueAt(index)) {
      const debtor = byId.get(commitment.debtor);
      const missing = [commitment.debtor, commitment.creditor].filter((id) => !byId.has(id));
      if (!debtor || missing.length > 0) {
        this.logger.warn(`${episode}: ${commitment.id} is due but ${missing.join(" and ")} is not taking part`);
        continue;
      }
      const extension = Math.abs(commitment.time_adjustment);
      shift(commitment.creditor, extension);
      const gaveWay = await debtor.giveWay(
        { commitment, episode, extension_minutes: extension, traffic },
        config,
        this.opts.rng
      );
      this.logger.debug(`${episode}: ${commitment.debtor} ${gaveWay ? "gives way to" : "refuses"} ${commitment.creditor}`);
      claims.push({ commitment, gaveWay });
    }

    // Holding back can raise a creditor that is itself a debtor, so settle
    // the releases until nothing moves.
    const yielding = claims.filter((c) => c.gaveWay).map((c) => c.commitment);
    let moved = true;
    for (let pass = 0; moved && pass <= yielding.length; pass++) {
      moved = false;
      for (const c of yielding) {
        const held = adjustments.get(c.creditor) ?? 0;
        if ((adjustments.get(c.debtor) ?? 0) < held) {
          adjustments.set(c.debtor, held);
          moved = true;
        }
      }
    }

    const plan = exitSchedule(
      agents.map((a) => a.classroom),
      adjustments,
      config.capacity,
      config.exitIntervalMinutes,
      yielding.map((c) => c.creditor)
    );
    record.peak_batch_load = plan.peak_load;
    bus.emit(episode, { type: "exit_schedule", ...plan });

    let violations = 0;
    for (const { commitment } of claims) {
      const debtorLeft = firstBatchMinute(plan, commitment.debtor);
      const creditorLeft = firstBatchMinute(plan, commitment.creditor);
      const cutAhead = debtorLeft !== undefined && creditorLeft !== undefined && debtorLeft < creditorLeft;

      const { commitment: resolved, reputation, violation } = await ledger.resolve(
        commitment.id,
        cutAhead ? "violated" : "fulfilled"
      );
      record.resolved.push(resolved.id);
      bus.emit(episode, { type: "commitment_resolved", commitment: resolved, reputation });
      if (violation) {
        violations++;
        bus.emit(episode, { type: "violation_raised", violation });
      }
    }
    return violations;
  }

  private async record(episode: string, record: EpisodeRecord): Promise<void> {
    this.enter(episode, "record");
    record.closed_at = new Date(this.now()).toISOString();
    this.opts.ledger.appendEpisode(record);
    await this.opts.ledger.save();

    this.phase = "closed";
    this.opts.bus.emit(episode, {
      type: "episode_closed",
      status: record.status,
      ...(record.reason !== undefined ? { reason: record.reason } : {}),
      created: record.created.length,
      resolved: record.resolved.length,
    });
    this.logger.info(
      `${episode} ${record.status}: ${record.created.length} created, ${record.resolved.length} resolved` +
        (record.reason ? ` (${record.reason})` : "")
    );
  }
}
