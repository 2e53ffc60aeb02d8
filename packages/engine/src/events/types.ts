/**
 * Dashboard events.
 *
 * Each event carries enough structured data for a consumer to rebuild the
 * display without querying the engine.
 */

import type { Commitment, EpisodeStatus, ReputationEntry, ViolationEvent } from "../ledger/types";
import type { CommitmentTerms } from "../protocol/types";
import type { TrafficState } from "../traffic/types";

export type Phase = "monitor" | "assess" | "negotiate" | "execute" | "record" | "closed";

export interface ExitBatch {
  minute: number;
  classroom: string;
  students: number;
}

export type CorridorEventBody =
  | { type: "phase_started"; phase: Phase; traffic?: TrafficState }
  | { type: "proposal_made"; session_id: string; from: string; to: string; terms: CommitmentTerms; text?: string }
  | {
      type: "negotiation_resolved";
      session_id: string;
      initiator: string;
      responder: string;
      outcome: "accepted" | "rejected" | "timed_out" | "failed";
      code?: string;
      reason?: string;
    }
  | { type: "commitment_created"; commitment: Commitment }
  | { type: "commitment_broadcast"; recipient: string; commitment_id: string; message: string }
  | { type: "commitment_resolved"; commitment: Commitment; reputation: ReputationEntry }
  | { type: "violation_raised"; violation: ViolationEvent }
  | { type: "exit_schedule"; batches: ExitBatch[]; peak_load: number; batch_capacity: number; clear_minute: number }
  | { type: "episode_closed"; status: EpisodeStatus; reason?: string; created: number; resolved: number };

export type CorridorEvent = CorridorEventBody & {
  event_id: string;
  sequence: number;
  run_id: string;
  episode: string;
  timestamp_ms: number;
};

export type EventHandler = (event: CorridorEvent) => void | Promise<void>;
