/**
 * Traffic Module
 *
 * Capacity-vs-demand estimate for the shared bottleneck.
 */

export * from "./types";
export { estimateTraffic, classroomShare } from "./estimate";
