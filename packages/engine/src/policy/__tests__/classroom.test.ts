import { describe, it, expect } from "vitest";
import { assess, respond, giveWay, selectTarget, offerMinutes, compareIds, type ReputationView, type Offer } from "../index";
import { DEFAULT_CONFIG, type Flexibility } from "../../config";
import { estimateTraffic, type Classroom } from "../../traffic";
import type { Commitment, ReputationEntry } from "../../ledger/types";

function room(id: string, count: number, flex: Flexibility = "medium"): Classroom {
  return { id, student_count: count, professor_flexibility: flex, reliability: 1 };
}

function entry(truster: string, trustee: string, patch: Partial<ReputationEntry>): ReputationEntry {
  return {
    truster,
    trustee,
    trust_score: 0.5,
    violation_count: 0,
    fulfilled_count: 0,
    flagged: false,
    updated_at: "2026-01-05T09:00:00.000Z",
    ...patch,
  };
}

function owed(debtor: string, creditor: string): Commitment {
  return {
    id: `ep-0:${debtor}->${creditor}`,
    debtor,
    creditor,
    time_adjustment: -2,
    future_obligation: `${creditor} may extend its lecture by 2 minutes in episode 1`,
    episode: "ep-0",
    episode_index: 0,
    due_episode_index: 1,
    session_id: "ep-0-s0",
    proposal_hash_hex: "00",
    degraded: false,
    created_at: "2026-01-05T09:00:00.000Z",
    status: "accepted",
  };
}

function view(entries: ReputationEntry[] = [], debts: Array<Pick<Commitment, "debtor" | "creditor">> = []): ReputationView {
  return {
    reputationOf: (truster, trustee) => entries.find((e) => e.truster === truster && e.trustee === trustee),
    outstanding: (debtor) =>
      debts.filter((d) => d.debtor === debtor).map((d) => owed(d.debtor, d.creditor)),
  };
}

const scenario = [room("C1", 80, "high"), room("C2", 75), room("C3", 60, "low"), room("C4", 40), room("C5", 30)];
const traffic = estimateTraffic(scenario, 50, 0);

function context(overrides: { proposalsMade?: number; proposedTo?: string[] } = {}) {
  return {
    episode: "ep-0",
    episodeIndex: 0,
    classrooms: scenario,
    proposalsMade: overrides.proposalsMade ?? 0,
    proposedTo: overrides.proposedTo ?? [],
    config: DEFAULT_CONFIG,
  };
}

describe("offerMinutes", () => {
  it("grows with congestion", () => {
    const params = { ...DEFAULT_CONFIG, maxAdjustmentMinutes: 100 };
    expect(offerMinutes(1.2, "medium", params)).toBe(2);
    expect(offerMinutes(2.5, "medium", params)).toBe(3);
    expect(offerMinutes(5.7, "medium", params)).toBe(6);
  });

  it("offers more for more flexible professors", () => {
    const params = { ...DEFAULT_CONFIG, maxAdjustmentMinutes: 100 };
    expect(offerMinutes(4, "low", params)).toBe(2);
    expect(offerMinutes(4, "medium", params)).toBe(4);
    expect(offerMinutes(4, "high", params)).toBe(6);
  });

  it("stays within [1, max]", () => {
    expect(offerMinutes(0.01, "low", DEFAULT_CONFIG)).toBe(1);
    expect(offerMinutes(50, "high", DEFAULT_CONFIG)).toBe(DEFAULT_CONFIG.maxAdjustmentMinutes);
  });
});

describe("assess", () => {
  it("proposes from a high-count classroom when the bottleneck is overloaded", () => {
    expect(traffic.congestion_ratio).toBeGreaterThan(1);
    const intent = assess(scenario[0], traffic, view(), context());
    expect(intent).toEqual({
      kind: "propose",
      classroom: "C1",
      target: "C2",
      basis: "ranked",
      terms: {
        debtor: "C1",
        creditor: "C2",
        time_adjustment: -6,
        future_obligation: "C2 may extend its lecture by 6 minutes in episode 1",
      },
    });
  });

  it("stays idle below the mean", () => {
    expect(assess(scenario[4], traffic, view(), context())).toEqual({
      kind: "idle",
      classroom: "C5",
      reason: "below mean demand",
    });
  });

  it("stays idle when the bottleneck has room", () => {
    const calm = estimateTraffic([room("C1", 30), room("C2", 10)], 50, 0);
    expect(assess(room("C1", 30), calm, view(), context()).kind).toBe("idle");
  });

  it("respects the per-episode proposal cap", () => {
    const intent = assess(scenario[0], traffic, view(), context({ proposalsMade: 1 }));
    expect(intent).toEqual({ kind: "idle", classroom: "C1", reason: "proposal cap reached" });
  });

  it("moves on to the next peer under a higher cap", () => {
    const config = { ...DEFAULT_CONFIG, maxProposalsPerEpisode: 3 };
    const intent = assess(scenario[0], traffic, view(), { ...context({ proposalsMade: 1, proposedTo: ["C2"] }), config });
    expect(intent).toMatchObject({ kind: "propose", target: "C3", basis: "ranked" });
  });

  it("goes idle once every peer has been asked", () => {
    const config = { ...DEFAULT_CONFIG, maxProposalsPerEpisode: 5 };
    const intent = assess(scenario[0], traffic, view(), {
      ...context({ proposalsMade: 4, proposedTo: ["C2", "C3", "C4", "C5"] }),
      config,
    });
    expect(intent).toEqual({ kind: "idle", classroom: "C1", reason: "no peers" });
  });
});

describe("selectTarget", () => {
  it("never picks itself and breaks ties by id", () => {
    expect(selectTarget("C2", scenario, view(), 0.5)).toEqual({ target: "C1", basis: "ranked" });
    expect(selectTarget("C1", [room("C1", 50)], view(), 0.5)).toBeNull();
  });

  it("prefers fewer violations, then higher trust", () => {
    const v = view([
      entry("C1", "C2", { violation_count: 2, trust_score: 0.9 }),
      entry("C1", "C3", { trust_score: 0.4 }),
      entry("C1", "C4", { trust_score: 0.8 }),
    ]);
    expect(selectTarget("C1", scenario, v, 0.5)).toEqual({ target: "C4", basis: "ranked" });
  });

  it("puts flagged peers last", () => {
    const peers = [room("C1", 50), room("C2", 50), room("C3", 50)];
    const v = view([entry("C1", "C2", { flagged: true, trust_score: 1 }), entry("C1", "C3", { trust_score: 0.1, violation_count: 1 })]);
    expect(selectTarget("C1", peers, v, 0.5)?.target).toBe("C3");
  });

  it("treats missing reputation as neutral", () => {
    const v = view([entry("C1", "C2", { trust_score: 0.45 })]);
    expect(selectTarget("C1", [room("C1", 1), room("C2", 1), room("C3", 1)], v, 0.5)?.target).toBe("C3");
  });

  it("settles a debt first", () => {
    const v = view([entry("C1", "C2", { trust_score: 1 })], [{ debtor: "C1", creditor: "C5" }]);
    expect(selectTarget("C1", scenario, v, 0.5)).toEqual({ target: "C5", basis: "debt" });
  });

  it("orders ids numerically", () => {
    expect(["C10", "C2", "C1"].sort(compareIds)).toEqual(["C1", "C2", "C10"]);
  });
});

describe("respond", () => {
  const offer: Offer = {
    session_id: "s1",
    episode: "ep-0",
    from: "C1",
    round: "proposal",
    terms: { debtor: "C1", creditor: "C2", time_adjustment: -5, future_obligation: "C2 may extend" },
  };

  it("accepts when flexible", () => {
    expect(respond(room("C2", 50, "high"), offer, view(), DEFAULT_CONFIG)).toEqual({ type: "ACCEPT" });
  });

  it("accepts on neutral trust and rejects low trust at medium flexibility", () => {
    expect(respond(room("C2", 50, "medium"), offer, view(), DEFAULT_CONFIG)).toEqual({ type: "ACCEPT" });
    const distrust = view([entry("C2", "C1", { trust_score: 0.2 })]);
    expect(respond(room("C2", 50, "medium"), offer, distrust, DEFAULT_CONFIG)).toEqual({
      type: "REJECT",
      reason: "trust in C1 too low (0.20)",
    });
  });

  it("counters with half the shift at low flexibility", () => {
    expect(respond(room("C2", 50, "low"), offer, view(), DEFAULT_CONFIG)).toEqual({
      type: "COUNTER",
      terms: {
        debtor: "C1",
        creditor: "C2",
        time_adjustment: -2,
        future_obligation: "C2 may extend (countered by C2: 2 minute window)",
      },
    });
  });

  it("never counters a counter", () => {
    const counter: Offer = { ...offer, from: "C2", round: "counter" };
    expect(respond(room("C1", 50, "low"), counter, view(), DEFAULT_CONFIG)).toEqual({ type: "ACCEPT" });
  });

  it("refuses a flagged counterpart", () => {
    const v = view([entry("C2", "C1", { flagged: true, violation_count: 3 })]);
    expect(respond(room("C2", 50, "high"), offer, v, DEFAULT_CONFIG)).toEqual({
      type: "REJECT",
      reason: "C1 is flagged for repeated violations",
    });
  });
});

describe("giveWay", () => {
  const request = { commitment: owed("C1", "C2"), episode: "ep-1", extension_minutes: 2, traffic };
  const shaky = { ...room("C1", 50), reliability: 0.5 };

  it("follows the classroom's reliability under congestion", () => {
    expect(giveWay(shaky, request, DEFAULT_CONFIG, () => 0.49)).toBe(true);
    expect(giveWay(shaky, request, DEFAULT_CONFIG, () => 0.5)).toBe(false);
  });

  it("always gives way while the bottleneck has room", () => {
    const calm = estimateTraffic([room("C1", 30), room("C2", 10)], 50, 0);
    expect(giveWay(shaky, { ...request, traffic: calm }, DEFAULT_CONFIG, () => 0.99)).toBe(true);
  });
});
