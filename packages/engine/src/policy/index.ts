/**
 * Policy Module
 *
 * Per-classroom decision logic and the agent capability interface.
 */

export * from "./types";
export {
  assess,
  respond,
  giveWay,
  selectTarget,
  offerMinutes,
  obligationText,
  compareIds,
  policyAgent,
} from "./classroom";
