import { describe, it, expect, vi } from "vitest";
import { NegotiationEngine, type SessionRequest } from "../index";
import { loadConfig, type Flexibility } from "../../config";
import { CommitmentLedger, MemoryLedgerStore } from "../../ledger";
import { policyAgent, type ClassroomAgent, type Decision, type Offer } from "../../policy";
import { keypairFromSeed, publicKeyB58, type CommitmentTerms } from "../../protocol";
import { TemplateTextCapability, type TextCapability } from "../../text";
import { runPool } from "../../concurrency";
import { ParseFailure } from "../../errors";
import type { Logger } from "../../logging";

const config = loadConfig({}, { sessionDeadlineMs: 50, capabilityTimeoutMs: 20, capabilityRetries: 0 });

function agent(id: string, flex: Flexibility = "high"): ClassroomAgent {
  return policyAgent({ id, student_count: 60, professor_flexibility: flex, reliability: 1 }, keypairFromSeed(id));
}

function scripted(id: string, respond: (offer: Offer) => Decision | Promise<Decision>): ClassroomAgent {
  return { ...agent(id), respond };
}

function terms(debtor: string, creditor: string, minutes = 6): CommitmentTerms {
  return {
    debtor,
    creditor,
    time_adjustment: -minutes,
    future_obligation: `${creditor} may extend its lecture by ${minutes} minutes in episode 1`,
  };
}

function request(initiator: ClassroomAgent, responder: ClassroomAgent, n = 0): SessionRequest {
  return {
    session_id: `ep-0-s${n}`,
    episode: "ep-0",
    episodeIndex: 0,
    initiator,
    responder,
    terms: terms(initiator.classroom.id, responder.classroom.id),
  };
}

function mockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function setup(opts: { text?: TextCapability; directory?: ReadonlyMap<string, string>; logger?: Logger } = {}) {
  const ledger = new CommitmentLedger({ store: new MemoryLedgerStore(), params: config });
  const engine = new NegotiationEngine({ ledger, config, now: () => 5_000, ...opts });
  return { ledger, engine };
}

const never = () => new Promise<Decision>(() => undefined);

describe("NegotiationEngine", () => {
  it("records a commitment when the responder accepts", async () => {
    const { ledger, engine } = setup({ text: new TemplateTextCapability() });
    const proposals: string[] = [];

    const result = await engine.runSession(request(agent("C1"), agent("C2")), {
      onProposal: (m) => proposals.push(m.text ?? ""),
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.commitment).toMatchObject({
      id: "ep-0:C1->C2",
      debtor: "C1",
      creditor: "C2",
      time_adjustment: -6,
      episode_index: 0,
      due_episode_index: 1,
      session_id: "ep-0-s0",
      degraded: false,
      status: "accepted",
    });
    expect(result.commitment.proposal_hash_hex).toBe(result.transcript[0].message_hash_hex);
    expect(result.transcript.map((e) => e.message.type)).toEqual(["PROPOSE", "ACCEPT"]);
    expect(proposals[0].split("\n")[0]).toBe("PROPOSE: C1 to C2 (ep-0).");
    expect(ledger.list()).toHaveLength(1);
  });

  it("settles on the counter from a low-flexibility responder", async () => {
    const { engine } = setup({ text: new TemplateTextCapability() });
    const result = await engine.runSession(request(agent("C1"), agent("C2", "low")));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.transcript.map((e) => e.message.type)).toEqual(["PROPOSE", "COUNTER", "ACCEPT"]);
    expect(result.commitment.time_adjustment).toBe(-3);
    expect(result.commitment.future_obligation).toBe(
      "C2 may extend its lecture by 6 minutes in episode 1 (countered by C2: 3 minute window)"
    );
    expect(result.commitment.proposal_hash_hex).toBe(result.transcript[1].message_hash_hex);
  });

  it("falls back to structured counter terms when parsing fails", async () => {
    const template = new TemplateTextCapability();
    const garbled: TextCapability = {
      name: "garbled",
      generate: (t, ctx) => template.generate(t, ctx),
      parse: async (text) => new ParseFailure("No JSON block found", text),
    };
    const logger = mockLogger();
    const { engine } = setup({ text: garbled, logger });

    const result = await engine.runSession(request(agent("C1"), agent("C2", "low")));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.degraded_parse).toBe(true);
    expect(result.commitment.degraded).toBe(true);
    expect(result.commitment.time_adjustment).toBe(-3);
    expect(logger.warn).toHaveBeenCalledWith(
      "Session ep-0-s0: counter parse degraded, using structured terms (No JSON block found)"
    );
  });

  it("continues without text when the capability fails", async () => {
    const broken: TextCapability = {
      name: "text",
      generate: async () => {
        throw new Error("service down");
      },
      parse: async (text) => new ParseFailure("unused", text),
    };
    const logger = mockLogger();
    const { engine } = setup({ text: broken, logger });

    const result = await engine.runSession(request(agent("C1"), agent("C2")));

    expect(result.ok).toBe(true);
    expect(result.transcript[0].message).not.toHaveProperty("text");
    expect(logger.warn).toHaveBeenCalledWith(
      "Text capability unavailable, continuing with structured terms: text: service down (1 attempt(s))"
    );
  });

  it("returns a rejection without touching the ledger", async () => {
    const { ledger, engine } = setup();
    const result = await engine.runSession(
      request(agent("C1"), scripted("C2", () => ({ type: "REJECT", reason: "exam day" })))
    );

    expect(result).toMatchObject({ ok: false, outcome: "rejected", code: "REJECTED", reason: "exam day", initiator: "C1", responder: "C2" });
    expect(ledger.list()).toEqual([]);
    expect(ledger.listReputations()).toEqual([]);
  });

  it("times out a stalled responder with no commitment and no reputation change", async () => {
    const ledger = new CommitmentLedger({ store: new MemoryLedgerStore(), params: config });
    const engine = new NegotiationEngine({ ledger, config });

    const result = await engine.runSession(request(agent("C1"), scripted("C2", never)));

    expect(result).toMatchObject({ ok: false, outcome: "timed_out", code: "NEGOTIATION_TIMEOUT" });
    expect(result.transcript.map((e) => e.message.type)).toEqual(["PROPOSE"]);
    expect(ledger.list()).toEqual([]);
    expect(ledger.listReputations()).toEqual([]);
  });

  it("treats cancellation as a rejection", async () => {
    const ledger = new CommitmentLedger({ store: new MemoryLedgerStore(), params: config });
    const engine = new NegotiationEngine({ ledger, config: { ...config, sessionDeadlineMs: 5_000 } });
    const controller = new AbortController();

    const pending = engine.runSession(request(agent("C1"), scripted("C2", never)), { signal: controller.signal });
    setTimeout(() => controller.abort(), 5);
    const result = await pending;

    expect(result).toMatchObject({ ok: false, outcome: "rejected", code: "CANCELLED", reason: "Session ep-0-s0 cancelled" });
    expect(ledger.list()).toEqual([]);
  });

  it("fails the session when a signature does not match the registered key", async () => {
    const directory = new Map([
      ["C1", publicKeyB58(keypairFromSeed("C1"))],
      ["C2", publicKeyB58(keypairFromSeed("someone else"))],
    ]);
    const { ledger, engine } = setup({ directory });

    const result = await engine.runSession(request(agent("C1"), agent("C2")));

    expect(result).toMatchObject({
      ok: false,
      outcome: "failed",
      code: "BAD_SIGNATURE",
      reason: "ACCEPT from C2 failed signature verification",
    });
    expect(ledger.list()).toEqual([]);
  });

  it("turns a second counter into a rejection", async () => {
    const initiator = scripted("C1", (offer) => ({ type: "COUNTER", terms: { ...offer.terms, time_adjustment: -1 } }));
    const { engine } = setup();

    const result = await engine.runSession(request(initiator, agent("C2", "low")));

    expect(result).toMatchObject({ ok: false, outcome: "rejected", code: "REJECTED", reason: "only one counter round is allowed" });
    expect(result.transcript.map((e) => e.message.type)).toEqual(["PROPOSE", "COUNTER", "REJECT"]);
  });

  it("fails the session when an agent throws", async () => {
    const { engine } = setup({ logger: mockLogger() });
    const result = await engine.runSession(
      request(agent("C1"), scripted("C2", () => {
        throw new Error("boom");
      }))
    );

    expect(result).toMatchObject({ ok: false, outcome: "failed", code: "AGENT_ERROR", reason: "agent C2 failed: boom" });
  });

  it("completes disjoint sessions concurrently", async () => {
    const { ledger, engine } = setup({ text: new TemplateTextCapability() });
    const pairs = [
      ["C1", "C2"],
      ["C3", "C4"],
      ["C5", "C6"],
    ];

    const results = await runPool(
      pairs.map(([a, b], n) => () => engine.runSession(request(agent(a), agent(b), n))),
      3
    );

    expect(results.map((r) => r.status === "fulfilled" && r.value.ok)).toEqual([true, true, true]);
    expect(ledger.list().map((c) => c.id).sort()).toEqual(["ep-0:C1->C2", "ep-0:C3->C4", "ep-0:C5->C6"]);
  });

  it("never lets a classroom claim capacity twice in an episode", async () => {
    const { ledger, engine } = setup();

    const results = await runPool(
      [
        () => engine.runSession(request(agent("C1"), agent("C2"), 0)),
        () => engine.runSession(request(agent("C3"), agent("C2"), 1)),
      ],
      2
    );

    const values = results.flatMap((r) => (r.status === "fulfilled" ? [r.value] : []));
    expect(values).toHaveLength(2);
    expect(values.filter((v) => v.ok)).toHaveLength(1);
    expect(values.filter((v) => !v.ok).map((v) => (v.ok ? "" : v.code))).toEqual(["CAPACITY_CLAIMED"]);
    expect(ledger.list({ party: "C2" })).toHaveLength(1);
  });
});
