/**
 * Reputation update rules.
 *
 * Pure functions over a single (truster, trustee) entry. Trust moves by fixed
 * configured steps and is clamped to [minTrust, maxTrust].
 */

import type { ReputationEntry, ReputationParams } from "./types";

export function neutralEntry(truster: string, trustee: string, params: ReputationParams, now: string): ReputationEntry {
  return {
    truster,
    trustee,
    trust_score: params.neutralTrust,
    violation_count: 0,
    fulfilled_count: 0,
    flagged: false,
    updated_at: now,
  };
}

function clamp(value: number, params: ReputationParams): number {
  return Math.max(params.minTrust, Math.min(params.maxTrust, value));
}

/**
 * Apply a violation. `struck` is true only on the update that reaches the
 * strike limit for an unflagged entry.
 */
export function applyViolation(
  entry: ReputationEntry,
  params: ReputationParams,
  now: string
): { entry: ReputationEntry; struck: boolean } {
  const violation_count = entry.violation_count + 1;
  const struck = !entry.flagged && violation_count >= params.strikeLimit;
  return {
    entry: {
      ...entry,
      violation_count,
      trust_score: clamp(entry.trust_score - params.violationPenalty, params),
      flagged: entry.flagged || struck,
      updated_at: now,
    },
    struck,
  };
}

export function applyFulfillment(entry: ReputationEntry, params: ReputationParams, now: string): ReputationEntry {
  return {
    ...entry,
    fulfilled_count: entry.fulfilled_count + 1,
    trust_score: clamp(entry.trust_score + params.fulfillmentReward, params),
    updated_at: now,
  };
}

export function reputationKey(truster: string, trustee: string): string {
  return `${truster}->${trustee}`;
}
