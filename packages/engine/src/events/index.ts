export * from "./types";
export { EventBus } from "./bus";
