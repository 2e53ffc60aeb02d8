/**
 * Argument parsing and output formatting for the corridor CLI.
 * Kept free of process I/O so it can be tested directly.
 */

import minimist from "minimist";
import {
  compareIds,
  isLogLevel,
  type CommitmentStatus,
  type CorridorConfig,
  type LedgerSnapshot,
  type ReputationEntry,
  type RunReport,
} from "@corridor/engine";

export type ConfigOverrides = Partial<Pick<CorridorConfig, "capacity" | "seed" | "ledgerPath" | "logLevel">>;

export type Command =
  | { kind: "run"; classrooms: number; episodes: number; events: boolean; overrides: ConfigOverrides }
  | { kind: "status"; overrides: ConfigOverrides }
  | { kind: "reputation"; classroom?: string; overrides: ConfigOverrides }
  | { kind: "help" };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = [
  "Usage: corridor <command> [options]",
  "",
  "Commands:",
  "  run          Run a simulation",
  "  status       Summarize the stored ledger",
  "  reputation   Print the reputation table",
  "",
  "Options:",
  "  --classrooms <n>   Number of classrooms (run, default: 5)",
  "  --episodes <n>     Number of episodes (run, default: 3)",
  "  --capacity <n>     Bottleneck capacity in students per minute",
  "  --seed <s>         Random seed",
  "  --ledger <path>    Ledger file (default: CORRIDOR_LEDGER_PATH or .corridor/ledger.json)",
  "  --log-level <l>    debug | info | warn | error | silent",
  "  --events           Stream events to stdout as NDJSON (run)",
  "  --classroom <id>   Only show entries held by this classroom (reputation)",
].join("\n");

function positiveInt(flag: string, raw: unknown, fallback: number): number {
  if (raw === undefined) return fallback;
  const text = String(raw);
  const value = Number(text);
  if (!/^\d+$/.test(text) || !Number.isInteger(value) || value <= 0) {
    throw new UsageError(`--${flag} must be a positive integer, got "${text}"`);
  }
  return value;
}

function optionalString(args: minimist.ParsedArgs, flag: string): string | undefined {
  const raw: unknown = args[flag];
  if (raw === undefined) return undefined;
  if (typeof raw !== "string" || raw === "") {
    throw new UsageError(`--${flag} needs a value`);
  }
  return raw;
}

export function parseCommand(argv: readonly string[]): Command {
  const args = minimist(
    argv.filter((x) => x !== "--"),
    {
      boolean: ["events", "help"],
      string: ["seed", "ledger", "classroom", "log-level", "classrooms", "episodes", "capacity"],
      alias: { h: "help" },
    }
  );

  const [name] = args._;
  if (args.help || name === undefined || name === "help") {
    return { kind: "help" };
  }

  const overrides: ConfigOverrides = {};
  const capacity = args.capacity === undefined ? undefined : positiveInt("capacity", args.capacity, 0);
  if (capacity !== undefined) overrides.capacity = capacity;
  const seed = optionalString(args, "seed");
  if (seed !== undefined) overrides.seed = seed;
  const ledgerPath = optionalString(args, "ledger");
  if (ledgerPath !== undefined) overrides.ledgerPath = ledgerPath;
  const level = optionalString(args, "log-level");
  if (level !== undefined) {
    if (!isLogLevel(level)) throw new UsageError(`--log-level must be debug, info, warn, error or silent, got "${level}"`);
    overrides.logLevel = level;
  }

  switch (name) {
    case "run":
      return {
        kind: "run",
        classrooms: positiveInt("classrooms", args.classrooms, 5),
        episodes: positiveInt("episodes", args.episodes, 3),
        events: Boolean(args.events),
        overrides,
      };
    case "status":
      return { kind: "status", overrides };
    case "reputation": {
      const classroom = optionalString(args, "classroom");
      return classroom === undefined ? { kind: "reputation", overrides } : { kind: "reputation", classroom, overrides };
    }
    default:
      throw new UsageError(`Unknown command: ${name}`);
  }
}

export function formatReport(report: RunReport): string[] {
  const lines = [`Run ${report.run_id}: ${report.state}`];
  for (const c of report.classrooms) {
    lines.push(`  ${c.id}  ${c.student_count} students  ${c.professor_flexibility} flexibility  reliability ${c.reliability.toFixed(2)}`);
  }
  for (const e of report.episodes) {
    const detail = e.reason ? ` (${e.reason})` : "";
    lines.push(`  ${e.id}  ${e.status}  created ${e.created}  resolved ${e.resolved}  violations ${e.violations}${detail}`);
  }
  return lines;
}

export function formatStatus(snapshot: LedgerSnapshot): string[] {
  const counts: Record<CommitmentStatus, number> = { proposed: 0, accepted: 0, rejected: 0, fulfilled: 0, violated: 0 };
  for (const c of snapshot.commitments) counts[c.status]++;

  const lines = [
    `Ledger saved ${snapshot.saved_at}`,
    `Episodes: ${snapshot.episodes.length}`,
    `Commitments: ${Object.entries(counts)
      .map(([status, n]) => `${status} ${n}`)
      .join(", ")}`,
  ];

  const last = snapshot.episodes[snapshot.episodes.length - 1];
  if (last) {
    lines.push(`Last episode: ${last.id} ${last.status}${last.reason ? ` (${last.reason})` : ""}`);
  }

  const flagged = snapshot.reputations.filter((r) => r.flagged);
  if (flagged.length === 0) {
    lines.push("Flagged pairs: none");
  } else {
    lines.push("Flagged pairs:");
    for (const r of flagged) {
      lines.push(`  ${r.truster} -> ${r.trustee} (${r.violation_count} violations)`);
    }
  }
  return lines;
}

export function formatReputation(entries: readonly ReputationEntry[], classroom?: string): string[] {
  const rows = entries
    .filter((r) => classroom === undefined || r.truster === classroom)
    .sort((a, b) => compareIds(a.truster, b.truster) || compareIds(a.trustee, b.trustee));
  if (rows.length === 0) {
    return [classroom ? `No reputation entries held by ${classroom}` : "No reputation entries"];
  }

  const lines = ["truster  trustee  trust  violations  fulfilled  flagged"];
  for (const r of rows) {
    lines.push(
      [
        r.truster.padEnd(7),
        r.trustee.padEnd(7),
        r.trust_score.toFixed(2).padStart(5),
        String(r.violation_count).padStart(10),
        String(r.fulfilled_count).padStart(9),
        r.flagged ? "yes" : "no",
      ].join("  ")
    );
  }
  return lines;
}
