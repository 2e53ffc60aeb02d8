/**
 * Orchestrator Module
 *
 * Episode phases, exit scheduling and the run-level control surface.
 */

export { EpisodeOrchestrator, episodeId, type EpisodeOrchestratorOptions, type EpisodeSummary } from "./orchestrator";
export { exitSchedule, firstBatchMinute, type ExitPlan } from "./schedule";
export {
  Simulation,
  generateClassrooms,
  MIN_STUDENTS,
  MAX_STUDENTS,
  type SimulationOptions,
  type SimulationState,
  type SimulationStatus,
  type RunReport,
} from "./simulation";
