// src/core/namespace/namespace.ts
// In-process namespace: path-keyed store, advisory mounts, message channel, event log

import { NamespaceClosedError } from "../errors";
import { MessageChannel } from "./channel";
import { isUnder, normalizePath } from "./path";

/** Anything but `undefined`, which `read` reserves for "absent". */
export type NamespaceValue = {} | null;

export type NamespaceEvent = {
  kind: string;
  detail: string;
};

/**
 * Namespace service shared by the designer, compiler and runtime loop.
 *
 * Store operations are synchronous, so each call is one critical section on
 * the event loop; there is no atomicity across calls ("exists then write" can
 * interleave with another writer between awaits). The message channel keeps
 * its own buffer independent of the store.
 */
export class Namespace {
  private readonly entries = new Map<string, NamespaceValue>();
  private readonly mountTable = new Map<string, string>();
  private readonly channel = new MessageChannel<string>();
  private readonly eventLog: NamespaceEvent[] = [];

  // ─────────────────────────────────────────────────────────────────
  // Store
  // ─────────────────────────────────────────────────────────────────

  write(path: string, value: NamespaceValue): void {
    this.entries.set(normalizePath(path), value);
  }

  read(path: string): NamespaceValue | undefined {
    return this.entries.get(normalizePath(path));
  }

  exists(path: string): boolean {
    return this.entries.has(normalizePath(path));
  }

  /** Paths at or beneath `prefix`, sorted. */
  list(prefix = "/"): string[] {
    return [...this.entries.keys()].filter(p => isUnder(p, prefix)).sort();
  }

  /**
   * Record that `dest` overlays `src`. Bookkeeping only: reads and writes
   * under `dest` are not redirected.
   */
  mount(src: string, dest: string): void {
    this.mountTable.set(normalizePath(dest), normalizePath(src));
  }

  mounts(): Record<string, string> {
    return Object.fromEntries(this.mountTable);
  }

  // ─────────────────────────────────────────────────────────────────
  // Messages
  // ─────────────────────────────────────────────────────────────────

  enqueue(message: string): void {
    if (this.channel.isClosed()) throw new NamespaceClosedError("enqueue");
    this.channel.send(message);
  }

  /** Next message, or `undefined` after `timeoutMs` / on abort / after close. */
  dequeue(timeoutMs?: number, signal?: AbortSignal): Promise<string | undefined> {
    return this.channel.recv(timeoutMs, signal);
  }

  pending(): number {
    return this.channel.size();
  }

  // ─────────────────────────────────────────────────────────────────
  // Events
  // ─────────────────────────────────────────────────────────────────

  log(kind: string, detail: string): void {
    this.eventLog.push({ kind, detail });
  }

  events(): NamespaceEvent[] {
    return this.eventLog.map(e => ({ ...e }));
  }

  // ─────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────

  isClosed(): boolean {
    return this.channel.isClosed();
  }

  /** Release waiting consumers. The store stays readable and writable. */
  close(): void {
    this.channel.close();
  }
}
