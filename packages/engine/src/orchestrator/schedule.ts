/**
 * Staggered exit schedule.
 *
 * Every classroom releases at minute 0 plus its agreed adjustment and joins
 * the first batch at or after that minute. Batches leave every
 * `intervalMinutes`; a batch carries at most `capacity * intervalMinutes`
 * students and overflow waits for the next one. Among equal releases,
 * classrooms listed in `priority` fill batches first.
 */

import { compareIds } from "../policy/classroom";
import type { ExitBatch } from "../events/types";
import type { Classroom } from "../traffic/types";

export interface ExitPlan {
  batches: ExitBatch[];
  batch_capacity: number;
  /** Heaviest batch. */
  peak_load: number;
  /** Minute at which the last batch has left. */
  clear_minute: number;
}

/**
 * Minute of a classroom's first batch, or undefined when it has none.
 */
export function firstBatchMinute(plan: Pick<ExitPlan, "batches">, classroom: string): number | undefined {
  return plan.batches.find((b) => b.classroom === classroom)?.minute;
}

export function exitSchedule(
  classrooms: readonly Classroom[],
  adjustments: ReadonlyMap<string, number>,
  capacity: number,
  intervalMinutes: number,
  priority: readonly string[] = []
): ExitPlan {
  const batchCapacity = capacity * intervalMinutes;
  const rank = (id: string): number => (priority.includes(id) ? 0 : 1);
  const order = classrooms
    .map((c) => ({ id: c.id, students: c.student_count, release: adjustments.get(c.id) ?? 0 }))
    .sort((a, b) => a.release - b.release || rank(a.id) - rank(b.id) || compareIds(a.id, b.id));

  const load = new Map<number, number>();
  const batches: ExitBatch[] = [];
  for (const entry of order) {
    // `+ 0` turns the -0 from ceil of a small negative into 0
    let slot = Math.ceil(entry.release / intervalMinutes) * intervalMinutes + 0;
    let remaining = entry.students;
    while (remaining > 0) {
      const used = load.get(slot) ?? 0;
      const take = Math.min(batchCapacity - used, remaining);
      if (take > 0) {
        batches.push({ minute: slot, classroom: entry.id, students: take });
        load.set(slot, used + take);
        remaining -= take;
      }
      slot += intervalMinutes;
    }
  }

  batches.sort((a, b) => a.minute - b.minute || compareIds(a.classroom, b.classroom));
  const slots = Array.from(load.keys());
  return {
    batches,
    batch_capacity: batchCapacity,
    peak_load: Math.max(0, ...load.values()),
    clear_minute: slots.length === 0 ? 0 : Math.max(...slots) + intervalMinutes,
  };
}
