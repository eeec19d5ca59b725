// src/core/log.ts
// Injectable logging sinks

export type LogFn = (msg: string, data?: unknown) => void;

export const silentLog: LogFn = () => undefined;

/**
 * Console sink with a `[scope]` prefix. Data is passed through untouched so
 * objects stay inspectable.
 */
export function consoleLog(scope: string, write: (...args: unknown[]) => void = console.log): LogFn {
  return (msg, data) => {
    if (data === undefined) write(`[${scope}] ${msg}`);
    else write(`[${scope}] ${msg}`, data);
  };
}

/** Pick a sink from a verbosity flag. */
export function logFor(scope: string, verbose: boolean): LogFn {
  return verbose ? consoleLog(scope) : silentLog;
}
