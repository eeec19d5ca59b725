// src/core/runtime/index.ts

export {
  RuntimeLoop,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_STOP_TIMEOUT_MS,
  type RuntimeLoopOptions,
  type RuntimeState,
} from "./loop";
