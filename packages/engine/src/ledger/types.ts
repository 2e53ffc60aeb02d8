/**
 * Ledger Types
 *
 * Commitments, reputation entries and closed-episode records. The ledger is
 * the only writer of these; everything else reads snapshots.
 */

import type { TrafficState } from "../traffic/types";

export type CommitmentStatus = "proposed" | "accepted" | "rejected" | "fulfilled" | "violated";
export type ResolutionOutcome = "fulfilled" | "violated";

export interface Commitment {
  id: string;
  debtor: string;
  creditor: string;
  /** Signed minutes; negative means the debtor's class exits earlier. */
  time_adjustment: number;
  future_obligation: string;
  episode: string;
  episode_index: number;
  /** Episode index at which the obligation is checked. */
  due_episode_index: number;
  session_id: string;
  proposal_hash_hex: string;
  /** Terms came from a structured fallback after a failed parse. */
  degraded: boolean;
  created_at: string;
  resolved_at?: string;
  status: CommitmentStatus;
}

export interface ReputationEntry {
  truster: string;
  trustee: string;
  trust_score: number;
  violation_count: number;
  fulfilled_count: number;
  /** Strike limit reached; set once and only cleared by resetViolations. */
  flagged: boolean;
  updated_at: string;
}

export interface ViolationEvent {
  truster: string;
  trustee: string;
  violation_count: number;
  commitment_id: string;
  episode: string;
}

export type EpisodeStatus = "closed" | "skipped" | "cancelled" | "aborted";

export interface NegotiationAttempt {
  session_id: string;
  initiator: string;
  responder: string;
  outcome: "accepted" | "rejected" | "timed_out" | "failed";
  code?: string;
}

export interface EpisodeRecord {
  id: string;
  index: number;
  status: EpisodeStatus;
  reason?: string;
  traffic?: TrafficState;
  created: string[];
  resolved: string[];
  attempts: NegotiationAttempt[];
  peak_batch_load?: number;
  closed_at: string;
}

export const LEDGER_FORMAT = "corridor-ledger/1";

/**
 * Serialized ledger. The format marker lets later readers reject or migrate
 * files they do not understand.
 */
export interface LedgerSnapshot {
  format: typeof LEDGER_FORMAT;
  saved_at: string;
  commitments: Commitment[];
  reputations: ReputationEntry[];
  episodes: EpisodeRecord[];
}

export interface LedgerStore {
  load(): Promise<LedgerSnapshot | null>;
  save(snapshot: LedgerSnapshot): Promise<void>;
}

export interface ReputationParams {
  neutralTrust: number;
  minTrust: number;
  maxTrust: number;
  violationPenalty: number;
  fulfillmentReward: number;
  strikeLimit: number;
}
