// bin/formwork-cli-lib.ts
// Shared CLI utilities for the formwork command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { loadConfig, type FormworkConfig } from "../src/core/config";
import { MANIFEST_PATH, LAST_MESSAGE_PATH } from "../src/core/namespace/paths";
import type { NamespaceEvent } from "../src/core/namespace";
import type { LogFn } from "../src/core/log";
import { Workbench } from "../src/workbench";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  verbose?: boolean;
  file?: string;
  config?: string;
  send: string[];
};

export type SessionOptions = {
  source: string;
  messages: string[];
  config?: FormworkConfig;
  log?: LogFn;
  /** How long to wait for the runtime to consume every message */
  settleTimeoutMs?: number;
};

export type SessionReport = {
  events: NamespaceEvent[];
  lastPath: unknown;
  manifest: unknown;
  stoppedCleanly: boolean;
};

export const SAMPLE_FORM = "(widget (button ok) (textbox name))";
export const SAMPLE_MESSAGES = ["(button ok click)", "(textbox name focus)"];

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { send: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--send" || arg === "-s") {
      result.send.push(args[++i] ?? "");
    } else if (arg === "--config" || arg === "-c") {
      result.config = args[++i];
    } else if (!arg.startsWith("-")) {
      // First non-flag argument is the design file
      if (!result.file) result.file = arg;
    }
    // Ignore unknown flags
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
formwork - design, compile and run a symbolic form

USAGE:
  formwork [options]                  Run the built-in sample form
  formwork [options] <file>           Design and compile a form from a file

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -s, --send <message>               Send a runtime message (repeatable)
  -c, --config <file>                Load configuration from a JSON or YAML file
  --verbose                          Print pipeline diagnostics

EXAMPLES:
  formwork                                   # Sample form and messages
  formwork ui.scm --send "(button ok click)"
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  const pkgPath = path.join(path.dirname(fileURLToPath(import.meta.url)), "..", "package.json");
  if (fs.existsSync(pkgPath)) {
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `formwork v${pkg.version}`;
    }
  }
  return "formwork v0.1.0";
}

// ═══════════════════════════════════════════════════════════════════════════════
// SESSION
// ═══════════════════════════════════════════════════════════════════════════════

export function buildConfig(args: CliArgs): FormworkConfig {
  return loadConfig({
    configFile: args.config,
    overrides: args.verbose ? { logging: { verbose: true } } : undefined,
  });
}

function runtimeOutcomes(events: NamespaceEvent[]): number {
  return events.filter(e => e.kind === "runtime-msg" || e.kind === "runtime-error").length;
}

/**
 * Design and compile `source`, start the runtime, send `messages` and wait
 * until each has been handled (or the settle timeout passes), then stop.
 */
export async function runSession(options: SessionOptions): Promise<SessionReport> {
  const bench = new Workbench({ config: options.config, log: options.log });
  const expr = bench.designer(options.source);
  bench.compiler(expr);
  bench.runtime();

  const before = runtimeOutcomes(bench.namespace.events());
  for (const msg of options.messages) bench.send(msg);

  const deadline = Date.now() + (options.settleTimeoutMs ?? 2000);
  while (runtimeOutcomes(bench.namespace.events()) - before < options.messages.length && Date.now() < deadline) {
    await new Promise<void>(resolve => setTimeout(resolve, 10));
  }

  const stoppedCleanly = await bench.stop();
  return {
    events: bench.namespace.events(),
    lastPath: bench.namespace.read(LAST_MESSAGE_PATH),
    manifest: bench.namespace.read(MANIFEST_PATH),
    stoppedCleanly,
  };
}

export function formatReport(report: SessionReport): string {
  const lines = report.events.map(ev => `EVENT ${ev.kind}: ${ev.detail}`);
  lines.push(`Last path: ${String(report.lastPath)}`);
  lines.push(`Manifest:\n${String(report.manifest)}`);
  return lines.join("\n");
}
