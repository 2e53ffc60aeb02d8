/**
 * @corridor/engine
 *
 * Negotiation, commitment and reputation engine for classrooms sharing a
 * corridor bottleneck.
 */

export * from "./errors";
export * from "./logging";
export * from "./config";
export * from "./traffic";
export * from "./protocol";
export * from "./concurrency";
export * from "./text";
export * from "./policy";
export * from "./ledger";
export * from "./negotiation";
export * from "./events";
export * from "./orchestrator";
