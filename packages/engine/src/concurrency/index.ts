export { KeyedMutex } from "./mutex";
export { runPool } from "./pool";
export { raceDeadline, throwIfAborted, type Raced } from "./deadline";
