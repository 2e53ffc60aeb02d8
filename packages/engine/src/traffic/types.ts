import type { Flexibility } from "../config";

/**
 * A classroom as seen by the engine. Counts are fixed for an episode.
 */
export interface Classroom {
  id: string;
  student_count: number;
  professor_flexibility: Flexibility;
  /** Probability of honouring an obligation under the default policy (0..1). */
  reliability: number;
}

/**
 * Bottleneck load for one episode tick.
 */
export interface TrafficState {
  capacity: number;
  total_students: number;
  congestion_ratio: number;
  timestamp_ms: number;
}
