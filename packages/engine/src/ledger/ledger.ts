/**
 * Commitment Ledger
 *
 * Sole writer of commitment and reputation state. `record` and `resolve` are
 * the only mutations of commitments; every reputation change happens inside
 * `resolve` (or the explicit `resetViolations`).
 */

import { KeyedMutex } from "../concurrency/mutex";
import {
  AlreadyResolvedError,
  DuplicateCommitmentError,
  InvalidCommitmentError,
  UnknownCommitmentError,
} from "../errors";
import { silentLogger, type Logger } from "../logging";
import { applyFulfillment, applyViolation, neutralEntry, reputationKey } from "./reputation";
import {
  LEDGER_FORMAT,
  type Commitment,
  type CommitmentStatus,
  type EpisodeRecord,
  type LedgerSnapshot,
  type LedgerStore,
  type ReputationEntry,
  type ReputationParams,
  type ResolutionOutcome,
  type ViolationEvent,
} from "./types";

export type NewCommitment = Omit<Commitment, "id" | "status" | "created_at" | "resolved_at">;

export interface ResolveResult {
  commitment: Commitment;
  reputation: ReputationEntry;
  violation?: ViolationEvent;
}

export interface CommitmentLedgerOptions {
  store: LedgerStore;
  params: ReputationParams;
  now?: () => Date;
  logger?: Logger;
}

const TERMINAL: ReadonlySet<CommitmentStatus> = new Set(["fulfilled", "violated", "rejected"]);

/**
 * Commitment ids are derived from the (debtor, creditor, episode) triple,
 * which the ledger keeps unique.
 */
export function commitmentId(debtor: string, creditor: string, episode: string): string {
  return `${episode}:${debtor}->${creditor}`;
}

export class CommitmentLedger {
  private commitments: Map<string, Commitment> = new Map();
  private reputations: Map<string, ReputationEntry> = new Map();
  private episodeLog: EpisodeRecord[] = [];
  private locks = new KeyedMutex();
  private readonly store: LedgerStore;
  private readonly params: ReputationParams;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(opts: CommitmentLedgerOptions) {
    this.store = opts.store;
    this.params = opts.params;
    this.now = opts.now ?? (() => new Date());
    this.logger = opts.logger ?? silentLogger;
  }

  /**
   * Replace in-memory state with what the store holds. An empty store gives
   * an empty ledger.
   */
  async load(): Promise<void> {
    const snapshot = await this.store.load();
    this.commitments.clear();
    this.reputations.clear();
    this.episodeLog = [];
    if (!snapshot) {
      this.logger.info("No ledger found, starting empty");
      return;
    }

    for (const c of snapshot.commitments) this.commitments.set(c.id, { ...c });
    for (const r of snapshot.reputations) this.reputations.set(reputationKey(r.truster, r.trustee), { ...r });
    this.episodeLog = snapshot.episodes.map((e) => structuredClone(e));
    this.logger.info(
      `Loaded ${snapshot.commitments.length} commitments, ${snapshot.reputations.length} reputation entries, ${snapshot.episodes.length} episodes`
    );
  }

  /**
   * Persist the full ledger. Saves are serialized with each other.
   */
  async save(): Promise<void> {
    await this.locks.runExclusive("ledger:save", () => this.store.save(this.snapshot()));
  }

  snapshot(): LedgerSnapshot {
    return {
      format: LEDGER_FORMAT,
      saved_at: this.now().toISOString(),
      commitments: Array.from(this.commitments.values()).map((c) => ({ ...c })),
      reputations: Array.from(this.reputations.values()).map((r) => ({ ...r })),
      episodes: this.episodeLog.map((e) => structuredClone(e)),
    };
  }

  /**
   * Insert an accepted commitment.
   * Throws DuplicateCommitmentError when the triple already exists.
   */
  async record(input: NewCommitment): Promise<Commitment> {
    if (input.debtor === input.creditor) {
      throw new InvalidCommitmentError(`Debtor and creditor are both ${input.debtor}`);
    }
    if (!Number.isInteger(input.time_adjustment)) {
      throw new InvalidCommitmentError(`time_adjustment must be whole minutes, got ${input.time_adjustment}`);
    }

    const id = commitmentId(input.debtor, input.creditor, input.episode);
    return this.locks.runExclusive(`commitment:${id}`, () => {
      if (this.commitments.has(id)) {
        throw new DuplicateCommitmentError(input.debtor, input.creditor, input.episode);
      }
      const commitment: Commitment = {
        ...input,
        id,
        status: "accepted",
        created_at: this.now().toISOString(),
      };
      this.commitments.set(id, commitment);
      this.logger.debug(`Recorded ${id}`);
      return { ...commitment };
    });
  }

  /**
   * Move an accepted commitment to fulfilled or violated and update the
   * creditor's view of the debtor.
   */
  async resolve(id: string, outcome: ResolutionOutcome): Promise<ResolveResult> {
    return this.locks.runExclusive(`commitment:${id}`, () => {
      const current = this.commitments.get(id);
      if (!current) {
        throw new UnknownCommitmentError(id);
      }
      if (TERMINAL.has(current.status)) {
        throw new AlreadyResolvedError(id, current.status);
      }

      const now = this.now().toISOString();
      const key = reputationKey(current.creditor, current.debtor);
      const before = this.reputations.get(key) ?? neutralEntry(current.creditor, current.debtor, this.params, now);

      let reputation: ReputationEntry;
      let violation: ViolationEvent | undefined;
      if (outcome === "violated") {
        const applied = applyViolation(before, this.params, now);
        reputation = applied.entry;
        if (applied.struck) {
          violation = {
            truster: current.creditor,
            trustee: current.debtor,
            violation_count: reputation.violation_count,
            commitment_id: id,
            episode: current.episode,
          };
          this.logger.warn(
            `${current.debtor} reached ${reputation.violation_count} violations against ${current.creditor}`
          );
        }
      } else {
        reputation = applyFulfillment(before, this.params, now);
      }

      const resolved: Commitment = { ...current, status: outcome, resolved_at: now };
      this.commitments.set(id, resolved);
      this.reputations.set(key, reputation);

      return { commitment: { ...resolved }, reputation: { ...reputation }, violation };
    });
  }

  /**
   * Explicit policy reset of a pair's violation history.
   */
  resetViolations(truster: string, trustee: string): ReputationEntry | undefined {
    const key = reputationKey(truster, trustee);
    const entry = this.reputations.get(key);
    if (!entry) return undefined;
    const reset = { ...entry, violation_count: 0, flagged: false, updated_at: this.now().toISOString() };
    this.reputations.set(key, reset);
    this.logger.info(`Violation history reset for ${truster} -> ${trustee}`);
    return { ...reset };
  }

  get(id: string): Commitment | undefined {
    const c = this.commitments.get(id);
    return c ? { ...c } : undefined;
  }

  list(filter: { status?: CommitmentStatus; episode?: string; party?: string } = {}): Commitment[] {
    return Array.from(this.commitments.values())
      .filter((c) => filter.status === undefined || c.status === filter.status)
      .filter((c) => filter.episode === undefined || c.episode === filter.episode)
      .filter((c) => filter.party === undefined || c.debtor === filter.party || c.creditor === filter.party)
      .map((c) => ({ ...c }));
  }

  /**
   * Accepted commitments the classroom still owes.
   */
  outstanding(debtor: string): Commitment[] {
    return this.list({ status: "accepted" }).filter((c) => c.debtor === debtor);
  }

  /**
   * Accepted commitments whose obligation point is at or before the index.
   */
  dueAt(episodeIndex: number): Commitment[] {
    return this.list({ status: "accepted" })
      .filter((c) => c.due_episode_index <= episodeIndex)
      .sort((a, b) => a.id.localeCompare(b.id));
  }

  /**
   * True when the classroom is already a party to a commitment created in the
   * episode, so its exit window is claimed.
   */
  holdsCapacity(classroom: string, episode: string): boolean {
    for (const c of this.commitments.values()) {
      if (c.episode === episode && c.status !== "rejected" && (c.debtor === classroom || c.creditor === classroom)) {
        return true;
      }
    }
    return false;
  }

  reputationOf(truster: string, trustee: string): ReputationEntry | undefined {
    const entry = this.reputations.get(reputationKey(truster, trustee));
    return entry ? { ...entry } : undefined;
  }

  listReputations(): ReputationEntry[] {
    return Array.from(this.reputations.values()).map((r) => ({ ...r }));
  }

  /**
   * Everything one classroom thinks of its peers.
   */
  reputationView(truster: string): ReputationEntry[] {
    return this.listReputations()
      .filter((r) => r.truster === truster)
      .sort((a, b) => a.trustee.localeCompare(b.trustee, "en", { numeric: true }));
  }

  flagged(): ReputationEntry[] {
    return this.listReputations().filter((r) => r.flagged);
  }

  appendEpisode(record: EpisodeRecord): void {
    if (this.episodeLog.some((e) => e.id === record.id)) {
      throw new Error(`Episode ${record.id} is already closed`);
    }
    this.episodeLog.push(structuredClone(record));
  }

  episodes(): EpisodeRecord[] {
    return this.episodeLog.map((e) => structuredClone(e));
  }
}
