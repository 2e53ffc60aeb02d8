export { stableCanonicalize } from "./canonical";
export * from "./envelope";
export * from "./types";
