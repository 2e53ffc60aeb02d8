import type { CorridorConfig } from "../config";
import type { Keypair } from "../protocol/envelope";
import type { CommitmentTerms } from "../protocol/types";
import type { Commitment, ReputationEntry } from "../ledger/types";
import type { Classroom, TrafficState } from "../traffic/types";

/**
 * Read-only slice of the ledger a classroom consults. Missing entries mean
 * no history and read as neutral trust.
 */
export interface ReputationView {
  reputationOf(truster: string, trustee: string): ReputationEntry | undefined;
  outstanding(debtor: string): Commitment[];
}

export type Decision =
  | { type: "ACCEPT" }
  | { type: "REJECT"; reason: string }
  | { type: "COUNTER"; terms: CommitmentTerms };

/**
 * Terms put in front of a classroom. `round` is "proposal" for the responder
 * and "counter" when the initiator answers a counter-offer.
 */
export interface Offer {
  session_id: string;
  episode: string;
  from: string;
  terms: CommitmentTerms;
  round: "proposal" | "counter";
  text?: string;
}

export type Intent =
  | { kind: "idle"; classroom: string; reason: string }
  | { kind: "propose"; classroom: string; target: string; terms: CommitmentTerms; basis: "debt" | "ranked" };

export interface AssessContext {
  episode: string;
  episodeIndex: number;
  classrooms: readonly Classroom[];
  /** Proposals this classroom already made in the episode. */
  proposalsMade: number;
  /** Peers it already proposed to this episode; never asked twice. */
  proposedTo: readonly string[];
  config: CorridorConfig;
}

/**
 * A creditor claiming its extension at the obligation point. The debtor gives
 * way by holding its own release until the creditor's extended release.
 */
export interface GiveWayRequest {
  commitment: Commitment;
  episode: string;
  /** Minutes the creditor's release moves back. */
  extension_minutes: number;
  traffic: TrafficState;
}

/**
 * A classroom taking part in the protocol. The default is `policyAgent`;
 * anything implementing this can stand in for it.
 */
export interface ClassroomAgent {
  readonly classroom: Classroom;
  readonly keypair: Keypair;
  propose(traffic: TrafficState, view: ReputationView, context: AssessContext): Intent | Promise<Intent>;
  respond(offer: Offer, view: ReputationView, config: CorridorConfig): Decision | Promise<Decision>;
  giveWay(request: GiveWayRequest, config: CorridorConfig, rng: () => number): boolean | Promise<boolean>;
}
