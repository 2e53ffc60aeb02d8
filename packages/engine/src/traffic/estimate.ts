import { InsufficientDataError } from "../errors";
import type { Classroom, TrafficState } from "./types";

/**
 * Estimate bottleneck congestion from aggregated classroom demand.
 * Pure: the same classrooms and capacity always give the same ratio.
 */
export function estimateTraffic(
  classrooms: readonly Pick<Classroom, "id" | "student_count">[],
  capacity: number,
  now: number = Date.now()
): TrafficState {
  if (classrooms.length === 0) {
    throw new InsufficientDataError("No classrooms to assess");
  }
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new InsufficientDataError(`Bottleneck capacity must be a positive integer, got ${capacity}`);
  }

  let total = 0;
  for (const c of classrooms) {
    if (!Number.isFinite(c.student_count) || c.student_count < 0) {
      throw new InsufficientDataError(`Classroom ${c.id} has an invalid student count: ${c.student_count}`);
    }
    total += c.student_count;
  }

  return Object.freeze({
    capacity,
    total_students: total,
    congestion_ratio: total / capacity,
    timestamp_ms: now,
  });
}

/**
 * Fraction of total demand contributed by one classroom.
 */
export function classroomShare(classroom: Pick<Classroom, "student_count">, traffic: TrafficState): number {
  if (traffic.total_students === 0) return 0;
  return classroom.student_count / traffic.total_students;
}
