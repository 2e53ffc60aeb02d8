/**
 * Simulation
 *
 * Control surface for a run: seeded classrooms, sequential episodes, a
 * cooperative stop and a status snapshot. One run at a time.
 */

import seedrandom from "seedrandom";
import type { CorridorConfig, Flexibility } from "../config";
import { EventBus } from "../events/bus";
import type { EventHandler, Phase } from "../events/types";
import { CommitmentLedger } from "../ledger/ledger";
import { JsonFileLedgerStore } from "../ledger/store";
import type { CommitmentStatus, LedgerStore } from "../ledger/types";
import { consoleLogger, type Logger } from "../logging";
import { NegotiationEngine } from "../negotiation/engine";
import { policyAgent } from "../policy/classroom";
import type { ClassroomAgent } from "../policy/types";
import { keypairFromSeed, publicKeyB58, type Keypair } from "../protocol/envelope";
import { TemplateTextCapability } from "../text/template";
import type { TextCapability } from "../text/types";
import type { Classroom } from "../traffic/types";
import { EpisodeOrchestrator, type EpisodeSummary } from "./orchestrator";

export const MIN_STUDENTS = 30;
export const MAX_STUDENTS = 80;
const FLEXIBILITY: readonly Flexibility[] = ["high", "medium", "low"];

export type SimulationState = "idle" | "running" | "stopping" | "completed" | "cancelled" | "aborted";

export interface SimulationStatus {
  state: SimulationState;
  run_id?: string;
  current_episode?: string;
  current_phase?: Phase;
  completed_episodes: number;
  total_episodes: number;
  commitments: Record<CommitmentStatus, number>;
  flagged: Array<{ truster: string; trustee: string; violation_count: number }>;
}

export interface RunReport {
  run_id: string;
  state: Extract<SimulationState, "completed" | "cancelled" | "aborted">;
  classrooms: Classroom[];
  episodes: EpisodeSummary[];
}

export interface SimulationOptions {
  config: CorridorConfig;
  /** Defaults to the JSON file at `config.ledgerPath`. */
  store?: LedgerStore;
  /** Defaults to the template capability. Pass `null` to run structured-only. */
  text?: TextCapability | null;
  agentFactory?: (classroom: Classroom, keypair: Keypair) => ClassroomAgent;
  logger?: Logger;
  now?: () => number;
}

function randomInt(rng: () => number, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

/**
 * Classrooms C1..Cn with seeded counts, flexibility and reliability.
 */
export function generateClassrooms(count: number, rng: () => number): Classroom[] {
  return Array.from({ length: count }, (_, i) => ({
    id: `C${i + 1}`,
    student_count: randomInt(rng, MIN_STUDENTS, MAX_STUDENTS),
    professor_flexibility: FLEXIBILITY[Math.floor(rng() * FLEXIBILITY.length)],
    reliability: Math.round((0.5 + rng() * 0.5) * 100) / 100,
  }));
}

export class Simulation {
  private state: SimulationState = "idle";
  private runs = 0;
  private runId?: string;
  private controller?: AbortController;
  private orchestrator?: EpisodeOrchestrator;
  private currentEpisode?: string;
  private completed = 0;
  private total = 0;
  private handlers: EventHandler[] = [];
  private readonly ledger: CommitmentLedger;
  private readonly logger: Logger;
  private readonly text?: TextCapability;

  constructor(private readonly opts: SimulationOptions) {
    this.logger = opts.logger ?? consoleLogger("simulation", opts.config.logLevel);
    const now = opts.now;
    this.ledger = new CommitmentLedger({
      store: opts.store ?? new JsonFileLedgerStore(opts.config.ledgerPath),
      params: opts.config,
      logger: this.logger,
      ...(now ? { now: () => new Date(now()) } : {}),
    });
    this.text = opts.text === null ? undefined : (opts.text ?? new TemplateTextCapability());
  }

  /**
   * Subscribe to dashboard events for every run. Returns an unsubscribe.
   */
  on(handler: EventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((h) => h !== handler);
    };
  }

  getLedger(): CommitmentLedger {
    return this.ledger;
  }

  /**
   * Run `numEpisodes` episodes over `numClassrooms` seeded classrooms.
   * Throws when a run is already in progress.
   */
  async start(numClassrooms: number, numEpisodes: number): Promise<RunReport> {
    if (this.state === "running" || this.state === "stopping") {
      throw new Error("A simulation is already running");
    }
    if (!Number.isInteger(numClassrooms) || numClassrooms < 2) {
      throw new RangeError(`numClassrooms must be an integer >= 2, got ${numClassrooms}`);
    }
    if (!Number.isInteger(numEpisodes) || numEpisodes < 1) {
      throw new RangeError(`numEpisodes must be a positive integer, got ${numEpisodes}`);
    }

    const { config } = this.opts;
    this.state = "running";
    this.runId = `${config.seed}-r${this.runs++}`;
    this.controller = new AbortController();
    this.completed = 0;
    this.total = numEpisodes;
    this.currentEpisode = undefined;
    const runId = this.runId;
    const signal = this.controller.signal;

    const rng = seedrandom(runId);
    const factory = this.opts.agentFactory ?? policyAgent;
    let classrooms = generateClassrooms(numClassrooms, rng);
    const keypairs = new Map(classrooms.map((c) => [c.id, keypairFromSeed(`${config.seed}:${c.id}`)]));
    const directory = new Map<string, string>();
    for (const [id, kp] of keypairs) directory.set(id, publicKeyB58(kp));
    const keypairOf = (id: string): Keypair => {
      const kp = keypairs.get(id);
      if (!kp) throw new Error(`No keypair for ${id}`);
      return kp;
    };

    const bus = new EventBus(runId, { logger: this.logger, keepHistory: false, ...(this.opts.now ? { now: this.opts.now } : {}) });
    for (const handler of this.handlers) bus.on(handler);

    const episodes: EpisodeSummary[] = [];
    let finalState: RunReport["state"] = "completed";

    try {
      await this.ledger.load();
      const firstIndex = this.ledger.episodes().reduce((max, e) => Math.max(max, e.index + 1), 0);

      if (this.text?.open) await this.text.open();
      try {
        const engine = new NegotiationEngine({
          ledger: this.ledger,
          config,
          directory,
          logger: this.logger,
          ...(this.text ? { text: this.text } : {}),
          ...(this.opts.now ? { now: this.opts.now } : {}),
        });
        this.orchestrator = new EpisodeOrchestrator({
          ledger: this.ledger,
          engine,
          bus,
          config,
          rng,
          logger: this.logger,
          ...(this.opts.now ? { now: this.opts.now } : {}),
        });

        for (let n = 0; n < numEpisodes; n++) {
          if (signal.aborted) {
            finalState = "cancelled";
            break;
          }
          if (n > 0) {
            // Counts move between episodes, never during one.
            classrooms = classrooms.map((c) => ({ ...c, student_count: randomInt(rng, MIN_STUDENTS, MAX_STUDENTS) }));
          }
          const agents = classrooms.map((c) => factory(c, keypairOf(c.id)));
          const index = firstIndex + n;
          this.currentEpisode = `ep-${index}`;

          const summary = await this.orchestrator.runEpisode(index, agents, signal);
          episodes.push(summary);
          this.completed++;

          if (summary.status === "cancelled") {
            finalState = "cancelled";
            break;
          }
          if (summary.status === "aborted") {
            finalState = "aborted";
            break;
          }
        }
      } finally {
        if (this.text?.close) await this.text.close();
      }
    } catch (err) {
      this.state = "aborted";
      this.controller = undefined;
      throw err;
    }

    this.controller = undefined;
    this.state = finalState;
    this.logger.info(`Run ${runId} ${finalState} after ${episodes.length} episode(s)`);
    return { run_id: runId, state: finalState, classrooms, episodes };
  }

  /**
   * Request a cooperative stop. The current episode is recorded as cancelled.
   */
  stop(): void {
    if (this.state !== "running" || !this.controller) return;
    this.state = "stopping";
    this.controller.abort();
  }

  status(): SimulationStatus {
    const commitments: Record<CommitmentStatus, number> = {
      proposed: 0,
      accepted: 0,
      rejected: 0,
      fulfilled: 0,
      violated: 0,
    };
    for (const c of this.ledger.list()) commitments[c.status]++;

    const phase = this.orchestrator?.currentPhase();
    return {
      state: this.state,
      ...(this.runId !== undefined ? { run_id: this.runId } : {}),
      ...(this.currentEpisode !== undefined ? { current_episode: this.currentEpisode } : {}),
      ...(phase !== undefined ? { current_phase: phase } : {}),
      completed_episodes: this.completed,
      total_episodes: this.total,
      commitments,
      flagged: this.ledger
        .flagged()
        .map((r) => ({ truster: r.truster, trustee: r.trustee, violation_count: r.violation_count })),
    };
  }
}
