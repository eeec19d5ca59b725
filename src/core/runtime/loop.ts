// src/core/runtime/loop.ts
// Background consumer: dequeue → parse → derive path → update namespace

import { ParseError } from "../errors";
import { silentLog, type LogFn } from "../log";
import type { Namespace } from "../namespace";
import { LAST_MESSAGE_PATH } from "../namespace/paths";
import { parseSexp, sexpToPath } from "../sexp";

export type RuntimeLoopOptions = {
  /** Dequeue timeout per poll. */
  pollIntervalMs?: number;
  /** Upper bound `stop()` waits for the loop to notice cancellation. */
  stopTimeoutMs?: number;
  log?: LogFn;
};

export type RuntimeState = "idle" | "polling" | "stopping" | "stopped";

export const DEFAULT_POLL_INTERVAL_MS = 100;
export const DEFAULT_STOP_TIMEOUT_MS = 1000;

/** Resolves `true` if `task` settles within `ms`, `false` otherwise. The timer never outlives the race. */
async function settlesWithin(task: Promise<void>, ms: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<boolean>(resolve => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([task.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Drains the namespace message channel until stopped.
 *
 * A message that fails to parse is logged as a `runtime-error` event and the
 * loop keeps polling. Any other handler failure is logged the same way; the
 * loop only ends on cancellation. The channel is unbounded, so a slow loop
 * lets the backlog grow. Closing the namespace also ends the loop.
 */
export class RuntimeLoop {
  private readonly pollIntervalMs: number;
  private readonly stopTimeoutMs: number;
  private readonly log: LogFn;

  private controller: AbortController | undefined;
  private task: Promise<void> | undefined;
  private state: RuntimeState = "idle";
  private handled = 0;

  constructor(private readonly ns: Namespace, options: RuntimeLoopOptions = {}) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.log = options.log ?? silentLog;
  }

  /** Start polling. Calling it while the loop is running does nothing. */
  start(): void {
    if (this.task) return;
    const controller = new AbortController();
    this.controller = controller;
    this.state = "polling";
    this.task = this.run(controller.signal).finally(() => {
      this.state = "stopped";
      this.task = undefined;
      this.controller = undefined;
    });
  }

  /**
   * Request cancellation and wait at most `stopTimeoutMs` for the loop to
   * exit. Resolves `true` once it has exited (or was never started) and
   * `false` if it is still finishing a message when the wait runs out.
   */
  async stop(): Promise<boolean> {
    const task = this.task;
    if (!task || !this.controller) return true;
    this.state = "stopping";
    this.controller.abort();
    const exited = await settlesWithin(task, this.stopTimeoutMs);
    if (!exited) this.log("runtime loop did not stop in time", { stopTimeoutMs: this.stopTimeoutMs });
    return exited;
  }

  isRunning(): boolean {
    return this.task !== undefined;
  }

  status(): RuntimeState {
    return this.state;
  }

  handledCount(): number {
    return this.handled;
  }

  private async run(signal: AbortSignal): Promise<void> {
    this.ns.log("runtime", "start");
    this.log("runtime started", { pollIntervalMs: this.pollIntervalMs });
    while (!signal.aborted) {
      const msg = await this.ns.dequeue(this.pollIntervalMs, signal);
      if (msg === undefined) {
        // closed: nothing more will arrive
        if (this.ns.isClosed()) break;
        continue;
      }
      this.handle(msg);
    }
    this.ns.log("runtime", "stop");
    this.log("runtime stopped", { handled: this.handled });
  }

  private handle(msg: string): void {
    try {
      const expr = parseSexp(msg);
      const path = sexpToPath(expr);
      this.ns.write(LAST_MESSAGE_PATH, path);
      this.ns.log("runtime-msg", path);
      this.handled++;
    } catch (e) {
      const detail = e instanceof Error ? e.message : String(e);
      this.ns.log("runtime-error", detail);
      if (!(e instanceof ParseError)) this.log("runtime handler failed", { message: msg, error: detail });
    }
  }
}
