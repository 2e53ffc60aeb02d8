/**
 * Classroom Policy
 *
 * Deterministic decision logic: when to propose, how much to offer, whom to
 * ask, and how to answer.
 */

import type { CorridorConfig, Flexibility } from "../config";
import type { Keypair } from "../protocol/envelope";
import type { CommitmentTerms } from "../protocol/types";
import type { ReputationEntry } from "../ledger/types";
import type { Classroom, TrafficState } from "../traffic/types";
import type { AssessContext, ClassroomAgent, Decision, GiveWayRequest, Intent, Offer, ReputationView } from "./types";

type OfferParams = Pick<CorridorConfig, "offerMinutesPerRatio" | "maxAdjustmentMinutes" | "flexibilityWeights">;

/**
 * Minutes a classroom offers to shift. Grows with congestion and with the
 * professor's flexibility; always within [1, maxAdjustmentMinutes].
 */
export function offerMinutes(congestionRatio: number, flexibility: Flexibility, params: OfferParams): number {
  const raw = Math.ceil(congestionRatio * params.offerMinutesPerRatio * params.flexibilityWeights[flexibility]);
  return Math.max(1, Math.min(params.maxAdjustmentMinutes, raw));
}

function trustOf(view: ReputationView, truster: string, trustee: string, neutral: number): {
  trust: number;
  violations: number;
  fulfilled: number;
  flagged: boolean;
} {
  const entry: ReputationEntry | undefined = view.reputationOf(truster, trustee);
  return {
    trust: entry?.trust_score ?? neutral,
    violations: entry?.violation_count ?? 0,
    fulfilled: entry?.fulfilled_count ?? 0,
    flagged: entry?.flagged ?? false,
  };
}

/**
 * Pick a negotiation partner.
 *
 * A creditor the classroom still owes comes first. Otherwise peers are ranked:
 * unflagged before flagged, fewer violations, higher trust, more fulfilled
 * commitments, then id ascending.
 */
export function selectTarget(
  self: string,
  peers: readonly Classroom[],
  view: ReputationView,
  neutralTrust: number,
  exclude: readonly string[] = []
): { target: string; basis: "debt" | "ranked" } | null {
  const candidates = peers.map((p) => p.id).filter((id) => id !== self && !exclude.includes(id));
  if (candidates.length === 0) return null;

  const owed = view
    .outstanding(self)
    .map((c) => c.creditor)
    .filter((id) => candidates.includes(id))
    .sort(compareIds);
  if (owed.length > 0) {
    return { target: owed[0], basis: "debt" };
  }

  const ranked = candidates
    .map((id) => ({ id, ...trustOf(view, self, id, neutralTrust) }))
    .sort(
      (a, b) =>
        Number(a.flagged) - Number(b.flagged) ||
        a.violations - b.violations ||
        b.trust - a.trust ||
        b.fulfilled - a.fulfilled ||
        compareIds(a.id, b.id)
    );
  return { target: ranked[0].id, basis: "ranked" };
}

/**
 * Order classroom ids like "C2" before "C10"; falls back to plain comparison.
 */
export function compareIds(a: string, b: string): number {
  return a.localeCompare(b, "en", { numeric: true });
}

export function obligationText(creditor: string, minutes: number, dueEpisodeIndex: number): string {
  return `${creditor} may extend its lecture by ${minutes} minute${minutes === 1 ? "" : "s"} in episode ${dueEpisodeIndex}`;
}

/**
 * Decide what one classroom does this episode.
 */
export function assess(
  classroom: Classroom,
  traffic: TrafficState,
  view: ReputationView,
  context: AssessContext
): Intent {
  const { config } = context;

  if (traffic.congestion_ratio <= config.proposeThreshold) {
    return { kind: "idle", classroom: classroom.id, reason: "congestion below threshold" };
  }

  const counts = context.classrooms.map((c) => c.student_count);
  const mean = counts.reduce((sum, n) => sum + n, 0) / Math.max(1, counts.length);
  if (classroom.student_count < mean) {
    return { kind: "idle", classroom: classroom.id, reason: "below mean demand" };
  }

  if (context.proposalsMade >= config.maxProposalsPerEpisode) {
    return { kind: "idle", classroom: classroom.id, reason: "proposal cap reached" };
  }

  const choice = selectTarget(classroom.id, context.classrooms, view, config.neutralTrust, context.proposedTo);
  if (!choice) {
    return { kind: "idle", classroom: classroom.id, reason: "no peers" };
  }

  const minutes = offerMinutes(traffic.congestion_ratio, classroom.professor_flexibility, config);
  const terms: CommitmentTerms = {
    debtor: classroom.id,
    creditor: choice.target,
    time_adjustment: -minutes,
    future_obligation: obligationText(choice.target, minutes, context.episodeIndex + config.obligationHorizon),
  };
  return { kind: "propose", classroom: classroom.id, target: choice.target, terms, basis: choice.basis };
}

/**
 * Answer an offer.
 *
 * A flagged counterpart is always refused. On a proposal: high flexibility
 * accepts, medium accepts on sufficient trust, low counters with half the
 * shift. On a counter-offer only ACCEPT or REJECT are possible.
 */
export function respond(classroom: Classroom, offer: Offer, view: ReputationView, config: CorridorConfig): Decision {
  const { trust, flagged } = trustOf(view, classroom.id, offer.from, config.neutralTrust);
  if (flagged) {
    return { type: "REJECT", reason: `${offer.from} is flagged for repeated violations` };
  }

  if (offer.round === "counter") {
    return trust >= config.acceptTrustThreshold
      ? { type: "ACCEPT" }
      : { type: "REJECT", reason: `trust in ${offer.from} too low (${trust.toFixed(2)})` };
  }

  switch (classroom.professor_flexibility) {
    case "high":
      return { type: "ACCEPT" };
    case "medium":
      return trust >= config.acceptTrustThreshold
        ? { type: "ACCEPT" }
        : { type: "REJECT", reason: `trust in ${offer.from} too low (${trust.toFixed(2)})` };
    case "low": {
      const requested = Math.abs(offer.terms.time_adjustment);
      const minutes = Math.max(1, Math.floor(requested / 2));
      const sign = offer.terms.time_adjustment < 0 ? -1 : 1;
      return {
        type: "COUNTER",
        terms: {
          ...offer.terms,
          time_adjustment: sign * minutes,
          future_obligation: `${offer.terms.future_obligation} (countered by ${classroom.id}: ${minutes} minute window)`,
        },
      };
    }
  }
}

/**
 * Debtor's answer when its creditor claims the extension. Giving way costs
 * nothing while the bottleneck has room; under congestion the classroom's
 * reliability decides.
 */
export function giveWay(
  classroom: Classroom,
  request: GiveWayRequest,
  config: Pick<CorridorConfig, "proposeThreshold">,
  rng: () => number
): boolean {
  if (request.traffic.congestion_ratio <= config.proposeThreshold) return true;
  return rng() < classroom.reliability;
}

/**
 * Default agent backed by the functions above.
 */
export function policyAgent(classroom: Classroom, keypair: Keypair): ClassroomAgent {
  return {
    classroom,
    keypair,
    propose: (traffic: TrafficState, view: ReputationView, context: AssessContext) =>
      assess(classroom, traffic, view, context),
    respond: (offer: Offer, view: ReputationView, config: CorridorConfig) => respond(classroom, offer, view, config),
    giveWay: (request: GiveWayRequest, config: CorridorConfig, rng: () => number) =>
      giveWay(classroom, request, config, rng),
  };
}
