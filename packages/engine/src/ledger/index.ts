/**
 * Ledger Module
 *
 * Commitments, reputation and closed episodes, with durable load/save.
 */

export * from "./types";
export { CommitmentLedger, commitmentId, type NewCommitment, type ResolveResult, type CommitmentLedgerOptions } from "./ledger";
export { applyViolation, applyFulfillment, neutralEntry, reputationKey } from "./reputation";
export { JsonFileLedgerStore, MemoryLedgerStore } from "./store";
export { validateLedger, type LedgerValidationResult } from "./validate";
